import type { PageTable, RowCandidate, TableRow } from "@/types/calendar";
import { isValidDay, leadingInteger, normalizeWhitespace, parseIntSafe } from "@/lib/utils/calendar";
import { TIME_TOKEN_SOURCE, extractTime, hasTimeToken } from "@/lib/parser/time-tokens";
import { toPrayerTimes, type RowParseContext } from "@/lib/parser/row-parsers";

export const PRAYER_HEADER_KEYWORDS = ["imsak", "sabah", "dreka", "ikindia", "akshami", "jacia"] as const;

/** Column where the first time sits when cells cannot be located by content. */
const HEADER_TABLE_TIME_OFFSET = 3;
const FIXED_OFFSET_TIME_COLUMN = 4;
const MIN_FIXED_OFFSET_CELLS = 7;
const MIN_FESTIVAL_CELLS = 4;
const BARE_TIME_REGEX = new RegExp(`^${TIME_TOKEN_SOURCE}$`);

export interface FestivalEntry {
  day: number;
  festival: string;
}

function cleanCell(cell: string | undefined): string {
  return normalizeWhitespace((cell ?? "").replace(/\s+/g, " "));
}

export function isPrayerTimesHeader(row: TableRow | undefined): boolean {
  const headerText = (row ?? []).filter(Boolean).join(" ").toLowerCase();
  return PRAYER_HEADER_KEYWORDS.some((keyword) => headerText.includes(keyword));
}

export function rowHasTime(row: TableRow): boolean {
  return row.some((cell) => hasTimeToken(cell));
}

export function parseHeaderKeywordRow(row: TableRow, context: RowParseContext): RowCandidate | null {
  const day = leadingInteger(row[0]);
  if (day === undefined || !isValidDay(context.year, context.month, day)) {
    return null;
  }

  const timeColumns = row.flatMap((cell, index) => (hasTimeToken(cell) ? [index] : []));
  let values: string[];
  if (timeColumns.length >= 7) {
    const lastColumn = timeColumns[timeColumns.length - 1];
    values = timeColumns.slice(0, 7).map((index) => row[index] ?? "");
    values.push(timeColumns.length > 7 && lastColumn !== undefined ? row[lastColumn] ?? "" : "");
  } else {
    values = Array.from({ length: 7 }, (_, offset) => row[HEADER_TABLE_TIME_OFFSET + offset] ?? "");
    values.push(row.length > HEADER_TABLE_TIME_OFFSET + 7 ? row[row.length - 1] ?? "" : "");
  }

  const times = toPrayerTimes(values);
  if (!Object.values(times).some(Boolean)) {
    return null;
  }

  const weekdayCell = row[1];
  return {
    day,
    weekday: hasTimeToken(weekdayCell) ? "" : cleanCell(weekdayCell),
    festival: "",
    times,
    strategy: "header-keyword"
  };
}

export function extractHeaderKeywordTable(table: PageTable, context: RowParseContext): RowCandidate[] {
  if (!isPrayerTimesHeader(table[0])) {
    return [];
  }
  return table
    .slice(1)
    .map((row) => parseHeaderKeywordRow(row, context))
    .filter((candidate): candidate is RowCandidate => candidate !== null);
}

/**
 * Rigid layout: day, weekday, secondary day, festival, then eight time columns.
 */
export function parseFixedOffsetRow(row: TableRow, context: RowParseContext): RowCandidate | null {
  if (row.length < MIN_FIXED_OFFSET_CELLS) {
    return null;
  }
  const day = parseIntSafe(cleanCell(row[0]));
  if (day === undefined || !isValidDay(context.year, context.month, day)) {
    return null;
  }

  const times = toPrayerTimes(row.slice(FIXED_OFFSET_TIME_COLUMN, FIXED_OFFSET_TIME_COLUMN + 8).map((cell) => extractTime(cell)));
  if (!Object.values(times).some(Boolean)) {
    return null;
  }

  return {
    day,
    weekday: cleanCell(row[1]),
    secondaryDay: parseIntSafe(cleanCell(row[2])),
    festival: cleanCell(row[3]),
    times,
    strategy: "fixed-offset"
  };
}

/** Day and festival pairs from column 0 and column 3. A prayer table's time in column 3 is not a festival. */
export function extractFestivalTable(table: PageTable, context: RowParseContext): FestivalEntry[] {
  const entries: FestivalEntry[] = [];
  for (const row of table) {
    if (row.length < MIN_FESTIVAL_CELLS) {
      continue;
    }
    const day = leadingInteger(row[0]);
    const festival = cleanCell(row[3]);
    if (day === undefined || !festival || BARE_TIME_REGEX.test(festival) || !isValidDay(context.year, context.month, day)) {
      continue;
    }
    entries.push({ day, festival });
  }
  return entries;
}
