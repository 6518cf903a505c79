import type { MonthCode } from "@/types/calendar";
import { toMonthCode } from "@/lib/utils/calendar";

export type MonthResolutionSource = "explicit" | "positional";

export interface MonthResolution {
  month: MonthCode;
  source: MonthResolutionSource;
}

const MONTH_NAMES: ReadonlyArray<{ month: MonthCode; names: string[] }> = [
  { month: "01", names: ["janar"] },
  { month: "02", names: ["shkurt"] },
  { month: "03", names: ["mars"] },
  { month: "04", names: ["prill"] },
  { month: "05", names: ["maj"] },
  { month: "06", names: ["qershor"] },
  { month: "07", names: ["korrik"] },
  { month: "08", names: ["gusht"] },
  { month: "09", names: ["shtator"] },
  { month: "10", names: ["tetor"] },
  { month: "11", names: ["nëntor", "nentor"] },
  { month: "12", names: ["dhjetor"] }
];

// \b only knows ASCII word characters, which would let "maj" match inside "majë".
const MONTH_NAME_REGEX = new RegExp(
  `(?<![\\p{L}\\p{N}])(${MONTH_NAMES.flatMap((entry) => entry.names).join("|")})(?![\\p{L}\\p{N}])`,
  "iu"
);

const MONTH_BY_NAME = new Map<string, MonthCode>(
  MONTH_NAMES.flatMap((entry) => entry.names.map((name): [string, MonthCode] => [name, entry.month]))
);

/** Month named earliest in the text, if any. */
export function detectMonthFromText(text: string): MonthCode | null {
  const match = text.normalize("NFC").match(MONTH_NAME_REGEX);
  if (!match?.[1]) {
    return null;
  }
  return MONTH_BY_NAME.get(match[1].toLowerCase()) ?? null;
}

export function inferMonthFromPageIndex(pageIndex: number): MonthCode | null {
  if (!Number.isInteger(pageIndex) || pageIndex < 0 || pageIndex >= 12) {
    return null;
  }
  return toMonthCode(pageIndex + 1);
}

export function resolvePageMonth(pageText: string, pageIndex: number): MonthResolution | null {
  const explicit = detectMonthFromText(pageText);
  if (explicit) {
    return { month: explicit, source: "explicit" };
  }

  const positional = inferMonthFromPageIndex(pageIndex);
  if (positional) {
    return { month: positional, source: "positional" };
  }

  return null;
}
