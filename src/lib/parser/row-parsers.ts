import { PRAYER_TIME_KEYS, type MonthCode, type PrayerTimes, type RowCandidate, type RowStrategyName, type TableRow } from "@/types/calendar";
import { WEEKDAY_NAMES, isValidDay, normalizeWhitespace, parseIntSafe, weekdayFor } from "@/lib/utils/calendar";
import { createEmptyPrayerTimes } from "@/lib/domain/day-records";
import { TIME_TOKEN_SOURCE, extractTime, extractTimes } from "@/lib/parser/time-tokens";

export interface RowParseContext {
  year: number;
  month: MonthCode;
}

export interface RowParser {
  readonly name: RowStrategyName;
  tryParse(line: string, context: RowParseContext): RowCandidate | null;
}

const TIME = `(${TIME_TOKEN_SOURCE})`;
// A day or secondary-calendar number is never the hour of a time token.
const NUMBER = "(\\d{1,2})(?![\\d:])";

function repeatTimes(count: number, separator: string): string {
  return Array.from({ length: count }, () => TIME).join(separator);
}

const FIXED_SCHEMA_REGEX = new RegExp(
  `^\\s*${NUMBER}\\s+((?:e\\s+)?[^\\s\\d]+)\\s+${NUMBER}\\s+(?:(.*?)\\s+)?${repeatTimes(8, "\\s+")}`,
  "u"
);

const LOOSELY_DELIMITED_REGEX = new RegExp(
  `^\\s*${NUMBER}[^\\d:]+${NUMBER}[^\\d:]+?(.*?)${repeatTimes(6, "\\s+")}(.*)$`,
  "u"
);

const PERMISSIVE_REGEX = new RegExp(
  `^\\s*${NUMBER}(?:[^\\d:]+${NUMBER})?(?:\\s+([^\\d]*))?${Array.from({ length: 8 }, () => `(?:[^\\d]*?${TIME})?`).join("")}`,
  "u"
);

const LEADING_DAY_REGEX = new RegExp(`^\\s*${NUMBER}`);

const LEADING_WEEKDAY_REGEX = new RegExp(`^(?:${WEEKDAY_NAMES.join("|")})(?![\\p{L}])\\s*`, "iu");

export function toPrayerTimes(values: ReadonlyArray<string | undefined>): PrayerTimes {
  const times = createEmptyPrayerTimes();
  PRAYER_TIME_KEYS.forEach((key, index) => {
    times[key] = extractTime(values[index]);
  });
  return times;
}

function cleanFestival(raw: string | undefined): string {
  return normalizeWhitespace(raw ?? "").replace(/[\s,;|-]+$/, "");
}

export const fixedSchemaParser: RowParser = {
  name: "fixed-schema",
  tryParse(line) {
    const match = line.match(FIXED_SCHEMA_REGEX);
    if (!match) {
      return null;
    }
    const day = parseIntSafe(match[1]);
    if (day === undefined) {
      return null;
    }

    return {
      day,
      weekday: normalizeWhitespace(match[2] ?? ""),
      secondaryDay: parseIntSafe(match[3]),
      festival: cleanFestival(match[4]),
      times: toPrayerTimes(match.slice(5, 13)),
      strategy: "fixed-schema"
    };
  }
};

export const looselyDelimitedParser: RowParser = {
  name: "loosely-delimited",
  tryParse(line, context) {
    const match = line.match(LOOSELY_DELIMITED_REGEX);
    if (!match) {
      return null;
    }
    const day = parseIntSafe(match[1]);
    // Nightfall and day-length share the trailing segment; nightfall is required.
    const [nightfall, dayLength] = extractTimes(match[10]);
    if (day === undefined || !nightfall) {
      return null;
    }

    return {
      day,
      weekday: weekdayFor(context.year, context.month, day),
      secondaryDay: parseIntSafe(match[2]),
      festival: cleanFestival(match[3]),
      times: toPrayerTimes([...match.slice(4, 10), nightfall, dayLength]),
      strategy: "loosely-delimited"
    };
  }
};

/**
 * Accepts partial rows. The festival is only the digit-free text before the first time token, with
 * a leading printed weekday removed; anything that looks like a time never ends up in it.
 */
export const permissivePositionalParser: RowParser = {
  name: "permissive-positional",
  tryParse(line, context) {
    const match = line.match(PERMISSIVE_REGEX);
    if (!match) {
      return null;
    }
    const day = parseIntSafe(match[1]);
    const timeValues = match.slice(4, 12);
    if (day === undefined || !timeValues.some(Boolean)) {
      return null;
    }

    return {
      day,
      weekday: weekdayFor(context.year, context.month, day),
      secondaryDay: parseIntSafe(match[2]),
      festival: cleanFestival((match[3] ?? "").replace(LEADING_WEEKDAY_REGEX, "")),
      times: toPrayerTimes(timeValues),
      strategy: "permissive-positional"
    };
  }
};

export const bruteForceParser: RowParser = {
  name: "brute-force",
  tryParse(line, context) {
    const dayMatch = line.match(LEADING_DAY_REGEX);
    const day = parseIntSafe(dayMatch?.[1]);
    const times = extractTimes(line);
    if (day === undefined || times.length < 7) {
      return null;
    }

    return {
      day,
      weekday: weekdayFor(context.year, context.month, day),
      festival: "",
      times: toPrayerTimes(times.slice(0, 8)),
      strategy: "brute-force"
    };
  }
};

export const DEFAULT_ROW_PARSERS: readonly RowParser[] = [
  fixedSchemaParser,
  looselyDelimitedParser,
  permissivePositionalParser,
  bruteForceParser
];

export function rowToLine(row: TableRow): string {
  return row.map((cell) => (cell ?? "").replace(/\s+/g, " ").trim()).join(" ");
}

/**
 * Runs the strategies in priority order. The first match commits: a day outside the month is
 * dropped rather than handed to the next strategy.
 */
export function parseRowLine(
  line: string,
  context: RowParseContext,
  parsers: readonly RowParser[] = DEFAULT_ROW_PARSERS
): RowCandidate | null {
  const normalized = normalizeWhitespace(line.replace(/\s+/g, " "));
  if (!normalized) {
    return null;
  }

  for (const parser of parsers) {
    const candidate = parser.tryParse(normalized, context);
    if (!candidate) {
      continue;
    }
    return isValidDay(context.year, context.month, candidate.day) ? candidate : null;
  }

  return null;
}

export function parseTableRow(
  row: TableRow,
  context: RowParseContext,
  parsers: readonly RowParser[] = DEFAULT_ROW_PARSERS
): RowCandidate | null {
  return parseRowLine(rowToLine(row), context, parsers);
}
