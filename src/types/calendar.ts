export const MONTH_CODES = ["01", "02", "03", "04", "05", "06", "07", "08", "09", "10", "11", "12"] as const;

export type MonthCode = (typeof MONTH_CODES)[number];

export const PRAYER_TIME_KEYS = [
  "imsaku",
  "sabahu",
  "lindja_e_diellit",
  "dreka",
  "ikindia",
  "akshami",
  "jacia",
  "gjatesia_e_dites"
] as const;

export type PrayerTimeKey = (typeof PRAYER_TIME_KEYS)[number];

/** Every field is either an `HH:MM` string or empty. */
export type PrayerTimes = Record<PrayerTimeKey, string>;

export interface DayRecord {
  data_sipas_kal_boteror: number;
  dita_javes: string;
  festat_fetare_dhe_shenime_te_tjera_astronomike: string;
  kohet: PrayerTimes;
}

export type MonthBucket = Record<string, DayRecord>;

export type CalendarYear = Record<MonthCode, MonthBucket>;

export type HolidayTable = Readonly<Record<string, string>>;

export type CorrectionTable = Readonly<Record<string, Partial<PrayerTimes>>>;

export interface CalendarTables {
  holidays: HolidayTable;
  corrections: CorrectionTable;
}

export type TableRow = string[];

export type PageTable = TableRow[];

/**
 * Read-only view over a paginated document. Indices are 0-based.
 */
export interface CalendarDocument {
  readonly pageCount: number;
  getPageText(pageIndex: number): string;
  getPageTables(pageIndex: number): PageTable[];
}

export type RowStrategyName =
  | "fixed-schema"
  | "loosely-delimited"
  | "permissive-positional"
  | "brute-force"
  | "header-keyword"
  | "fixed-offset"
  | "festival-only";

export interface RowCandidate {
  day: number;
  weekday: string;
  secondaryDay?: number;
  festival: string;
  times: PrayerTimes;
  strategy: RowStrategyName;
}

export interface ExtractionStats {
  daysByMonth: Record<MonthCode, number>;
  rowsByStrategy: Partial<Record<RowStrategyName, number>>;
  rejectedRows: number;
  skippedPages: number[];
  gapFilledMonths: MonthCode[];
}

export interface CalendarExtraction {
  year: number;
  data: CalendarYear;
  warnings: string[];
  stats: ExtractionStats;
}

export interface YearPayload {
  year: string;
  data: CalendarYear;
  message?: string;
}

export interface MonthPayload {
  year: string;
  month: MonthCode;
  data: MonthBucket;
  message?: string;
}
