import {
  MONTH_CODES,
  type CalendarDocument,
  type CalendarExtraction,
  type CalendarTables,
  type MonthCode,
  type MonthPayload,
  type YearPayload
} from "@/types/calendar";
import { getEnv } from "@/lib/env";
import { CalendarStore } from "@/lib/domain/calendar-store";
import { loadCalendarTables } from "@/lib/domain/calendar-tables";
import { loadPdfCalendarDocument } from "@/lib/pdf/pdf-document";
import { extractCalendar, extractPageTable } from "@/lib/parser/calendar-extractor";
import { rowsToCsv } from "@/lib/export/csv";

export const EMPTY_EXTRACTION_MESSAGE = "No data could be extracted from the PDF. The PDF format may not be supported.";

export const CACHING_INFO =
  "By default, caching is enabled for month data and disabled for full year data. To change this behavior, add ?use_cache=true or ?use_cache=false to your request.";

export interface CalendarServiceDeps {
  store: CalendarStore;
  loadDocument: (buffer: Buffer) => Promise<CalendarDocument>;
  loadTables: (year: number) => Promise<CalendarTables>;
  frontMatterOffset: number;
}

export type ServiceResult<T> = { status: 200 | 404; body: T };

export type PageCsvResult =
  | { status: 200; csv: string; filename: string }
  | { status: 404; message: string };

export function createDefaultDeps(): CalendarServiceDeps {
  const env = getEnv();
  return {
    store: new CalendarStore({ jsonDir: env.TAKVIMI_JSON_DIR, pdfDir: env.TAKVIMI_PDF_DIR }),
    loadDocument: loadPdfCalendarDocument,
    loadTables: loadCalendarTables,
    frontMatterOffset: env.TAKVIMI_FRONT_MATTER_OFFSET
  };
}

function hasAnyDay(extraction: CalendarExtraction): boolean {
  return MONTH_CODES.some((month) => extraction.stats.daysByMonth[month] > 0);
}

export async function extractYearFromPdf(year: number, deps: CalendarServiceDeps): Promise<CalendarExtraction> {
  const buffer = await deps.store.readPdf(year);
  const document = await deps.loadDocument(buffer);
  const tables = await deps.loadTables(year);
  return extractCalendar(document, year, { tables, frontMatterOffset: deps.frontMatterOffset });
}

/** Extracts a year and caches it unless nothing could be extracted. */
async function extractAndSave(year: number, deps: CalendarServiceDeps): Promise<{ extraction: CalendarExtraction; empty: boolean }> {
  const extraction = await extractYearFromPdf(year, deps);
  const empty = !hasAnyDay(extraction);
  if (!empty) {
    await deps.store.saveCalendar(year, extraction.data);
  }
  return { extraction, empty };
}

export async function getYearCalendar(year: number, useCache: boolean, deps: CalendarServiceDeps): Promise<ServiceResult<YearPayload>> {
  if (useCache) {
    const cached = await deps.store.loadYear(year);
    if (cached) {
      return { status: 200, body: cached };
    }
  }

  const { extraction, empty } = await extractAndSave(year, deps);
  const body: YearPayload = { year: String(year), data: extraction.data };
  return { status: 200, body: empty ? { ...body, message: EMPTY_EXTRACTION_MESSAGE } : body };
}

export async function getMonthCalendar(
  year: number,
  month: MonthCode,
  useCache: boolean,
  deps: CalendarServiceDeps
): Promise<ServiceResult<MonthPayload>> {
  const yearCode = String(year);
  if (useCache) {
    const cachedMonth = await deps.store.loadMonth(year, month);
    if (cachedMonth) {
      return { status: 200, body: cachedMonth };
    }
  }

  const cachedYear = await deps.store.loadYear(year);
  if (cachedYear) {
    return { status: 200, body: { year: yearCode, month, data: cachedYear.data[month] } };
  }

  const { extraction, empty } = await extractAndSave(year, deps);
  const bucket = extraction.data[month];
  if (empty) {
    return { status: 200, body: { year: yearCode, month, data: bucket, message: EMPTY_EXTRACTION_MESSAGE } };
  }
  if (Object.keys(bucket).length === 0) {
    return { status: 404, body: { year: yearCode, month, data: bucket, message: `No data found for month ${month}.` } };
  }
  return { status: 200, body: { year: yearCode, month, data: bucket } };
}

/** `pageNumber` is 1-based, as printed. */
export async function getPageCsv(year: number, pageNumber: number, deps: CalendarServiceDeps): Promise<PageCsvResult> {
  const buffer = await deps.store.readPdf(year);
  const document = await deps.loadDocument(buffer);
  const exported = extractPageTable(document, pageNumber - 1);
  if (!exported.rows) {
    return { status: 404, message: exported.message ?? "No tables found on this page" };
  }
  return { status: 200, csv: rowsToCsv(exported.rows), filename: `takvimi${year}_page${pageNumber}.csv` };
}
