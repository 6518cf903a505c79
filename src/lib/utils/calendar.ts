import { MONTH_CODES, type MonthCode } from "@/types/calendar";

/** Monday-first, as printed in the calendar. */
export const WEEKDAY_NAMES = ["e hënë", "e martë", "e mërkurë", "e enjte", "e premte", "e shtunë", "e diel"] as const;

const THIRTY_DAY_MONTHS = new Set<MonthCode>(["04", "06", "09", "11"]);

export function normalizeWhitespace(value: string): string {
  return value
    .replace(/\u00a0/g, " ")
    .replace(/[ \t]+/g, " ")
    .replace(/\r\n/g, "\n")
    .trim();
}

export function parseIntSafe(value: string | undefined): number | undefined {
  if (!value) {
    return undefined;
  }
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    return undefined;
  }
  const numeric = Number(trimmed);
  return Number.isSafeInteger(numeric) ? numeric : undefined;
}

export function padTwo(value: number): string {
  return String(value).padStart(2, "0");
}

export function toMonthCode(value: number | string): MonthCode | null {
  const candidate = typeof value === "number" ? padTwo(value) : value.trim().padStart(2, "0");
  return MONTH_CODES.find((code) => code === candidate) ?? null;
}

export function monthNumber(month: MonthCode): number {
  return Number(month);
}

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInMonth(year: number, month: MonthCode): number {
  if (month === "02") {
    return isLeapYear(year) ? 29 : 28;
  }
  return THIRTY_DAY_MONTHS.has(month) ? 30 : 31;
}

export function isValidDay(year: number, month: MonthCode, day: number): boolean {
  return Number.isInteger(day) && day >= 1 && day <= daysInMonth(year, month);
}

export function weekdayFor(year: number, month: MonthCode, day: number): string {
  if (!isValidDay(year, month, day)) {
    return "";
  }
  // getUTCDay() is Sunday-first; the table is Monday-first.
  const sundayFirst = new Date(Date.UTC(year, monthNumber(month) - 1, day)).getUTCDay();
  return WEEKDAY_NAMES[(sundayFirst + 6) % 7] ?? "";
}

export function holidayKey(month: MonthCode, dayCode: string): string {
  return `${month}-${dayCode}`;
}

export function correctionKey(year: number, month: MonthCode, dayCode: string): string {
  return `${year}-${month}-${dayCode}`;
}

/** Leading integer of a cell such as `"12"`, `" 3 "` or `"7*"`. */
export function leadingInteger(value: string | undefined): number | undefined {
  const match = (value ?? "").match(/^\s*(\d+)/);
  return match ? parseIntSafe(match[1]) : undefined;
}
