import {
  MONTH_CODES,
  type CalendarDocument,
  type CalendarExtraction,
  type CalendarTables,
  type CalendarYear,
  type ExtractionStats,
  type MonthCode,
  type PageTable,
  type RowStrategyName
} from "@/types/calendar";
import { DocumentUnreadableError, describeError } from "@/lib/errors";
import { countDays, createEmptyYear, freezeCalendarYear, hasPrayerTimes } from "@/lib/domain/day-records";
import { EMPTY_CALENDAR_TABLES, applyCorrections, mergeFestivals } from "@/lib/domain/calendar-tables";
import { detectMonthFromText, resolvePageMonth } from "@/lib/parser/month-resolver";
import { DEFAULT_ROW_PARSERS, type RowParser } from "@/lib/parser/row-parsers";
import {
  applyCandidates,
  applyFestivals,
  extractFestivalPage,
  extractPrayerTimesPage,
  type PageContent
} from "@/lib/parser/page-extractors";

/** Pages before the first month's festival page in the standard print layout. */
export const DEFAULT_FRONT_MATTER_OFFSET = 7;

export interface ExtractCalendarOptions {
  tables?: CalendarTables;
  frontMatterOffset?: number;
  parsers?: readonly RowParser[];
}

export interface PageTableExport {
  rows: PageTable | null;
  message: string | null;
}

interface ExtractionRun {
  year: number;
  data: CalendarYear;
  parsers: readonly RowParser[];
  warnings: string[];
  rowsByStrategy: Partial<Record<RowStrategyName, number>>;
  rejectedRows: number;
  skippedPages: number[];
}

function readPageCount(document: CalendarDocument): number {
  try {
    return document.pageCount;
  } catch (error) {
    throw new DocumentUnreadableError(`Unable to read page count: ${describeError(error)}`, { cause: error });
  }
}

function readPage(document: CalendarDocument, index: number): PageContent {
  try {
    return { index, text: document.getPageText(index), tables: document.getPageTables(index) };
  } catch (error) {
    throw new DocumentUnreadableError(`Unable to read page ${index + 1}: ${describeError(error)}`, { cause: error });
  }
}

function countStrategy(run: ExtractionRun, strategy: RowStrategyName, amount = 1): void {
  if (amount > 0) {
    run.rowsByStrategy[strategy] = (run.rowsByStrategy[strategy] ?? 0) + amount;
  }
}

function runFestivalPage(run: ExtractionRun, page: PageContent, month: MonthCode): void {
  try {
    const entries = extractFestivalPage(page, { year: run.year, month });
    applyFestivals(run.data[month], entries);
    countStrategy(run, "festival-only", entries.length);
  } catch (error) {
    run.warnings.push(`Festival page ${page.index + 1} (${month}) failed: ${describeError(error)}`);
  }
}

function runPrayerTimesPage(run: ExtractionRun, page: PageContent, month: MonthCode): number {
  try {
    const result = extractPrayerTimesPage(page, { year: run.year, month }, run.parsers);
    applyCandidates(run.data[month], result.candidates);
    for (const candidate of result.candidates) {
      countStrategy(run, candidate.strategy);
    }
    run.rejectedRows += result.rejectedRows;
    return result.candidates.length;
  } catch (error) {
    run.warnings.push(`Prayer-times page ${page.index + 1} (${month}) failed: ${describeError(error)}`);
    return 0;
  }
}

function perMonthPass(run: ExtractionRun, document: CalendarDocument, pageCount: number, offset: number): void {
  MONTH_CODES.forEach((month, monthIndex) => {
    const festivalIndex = offset + monthIndex * 2;
    const prayerIndex = festivalIndex + 1;
    if (prayerIndex >= pageCount) {
      run.warnings.push(`Month ${month}: pages ${festivalIndex + 1}-${prayerIndex + 1} are beyond the document (${pageCount} pages).`);
      return;
    }

    runFestivalPage(run, readPage(document, festivalIndex), month);

    const prayerPage = readPage(document, prayerIndex);
    const namedMonth = detectMonthFromText(prayerPage.text);
    if (namedMonth && namedMonth !== month) {
      run.warnings.push(`Page ${prayerIndex + 1} is read as month ${month} but names month ${namedMonth}.`);
    }
    runPrayerTimesPage(run, prayerPage, month);
  });
}

/** A month holding only festival placeholders still counts as empty here. */
function gapFillPass(run: ExtractionRun, document: CalendarDocument, pageCount: number): MonthCode[] {
  const emptyMonths = new Set(MONTH_CODES.filter((month) => !hasPrayerTimes(run.data[month])));
  if (emptyMonths.size === 0) {
    return [];
  }

  const filled = new Set<MonthCode>();
  for (let index = 0; index < pageCount; index += 1) {
    const page = readPage(document, index);
    const resolution = resolvePageMonth(page.text, index);
    if (!resolution) {
      run.skippedPages.push(index);
      continue;
    }
    if (!emptyMonths.has(resolution.month)) {
      continue;
    }
    if (runPrayerTimesPage(run, page, resolution.month) > 0) {
      filled.add(resolution.month);
    }
  }

  return MONTH_CODES.filter((month) => filled.has(month));
}

/**
 * Runs the whole pipeline and reports what happened along the way. Only an unreadable document
 * raises; a page or row that cannot be parsed just contributes fewer records.
 */
export function extractCalendar(
  document: CalendarDocument,
  year: number,
  options: ExtractCalendarOptions = {}
): CalendarExtraction {
  const tables = options.tables ?? EMPTY_CALENDAR_TABLES;
  const offset = options.frontMatterOffset ?? DEFAULT_FRONT_MATTER_OFFSET;
  const run: ExtractionRun = {
    year,
    data: createEmptyYear(),
    parsers: options.parsers ?? DEFAULT_ROW_PARSERS,
    warnings: [],
    rowsByStrategy: {},
    rejectedRows: 0,
    skippedPages: []
  };

  const pageCount = readPageCount(document);
  perMonthPass(run, document, pageCount, offset);
  const gapFilledMonths = gapFillPass(run, document, pageCount);

  mergeFestivals(run.data, tables.holidays);
  applyCorrections(run.data, year, tables.corrections);

  const stats: ExtractionStats = {
    daysByMonth: countDays(run.data),
    rowsByStrategy: run.rowsByStrategy,
    rejectedRows: run.rejectedRows,
    skippedPages: run.skippedPages,
    gapFilledMonths
  };

  const emptyMonths = MONTH_CODES.filter((month) => stats.daysByMonth[month] === 0);
  if (emptyMonths.length > 0) {
    run.warnings.push(`No days extracted for months: ${emptyMonths.join(", ")}.`);
  }

  return { year, data: freezeCalendarYear(run.data), warnings: run.warnings, stats };
}

export function extract(document: CalendarDocument, year: number, options: ExtractCalendarOptions = {}): CalendarYear {
  return extractCalendar(document, year, options).data;
}

/** First detected table of a page, or a message (the page text when it has no table). */
export function extractPageTable(document: CalendarDocument, pageIndex: number): PageTableExport {
  const pageCount = readPageCount(document);
  if (!Number.isInteger(pageIndex) || pageIndex < 0 || pageIndex >= pageCount) {
    return { rows: null, message: "Invalid page number" };
  }

  const page = readPage(document, pageIndex);
  const firstTable = page.tables.find((table) => table.length > 0);
  if (firstTable) {
    return { rows: firstTable, message: null };
  }

  const text = page.text.trim();
  return { rows: null, message: text || "No tables found on this page" };
}
