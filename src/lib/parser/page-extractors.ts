import type { MonthBucket, PageTable, RowCandidate } from "@/types/calendar";
import { upsertDayRecord } from "@/lib/domain/day-records";
import { hasTimeToken } from "@/lib/parser/time-tokens";
import { DEFAULT_ROW_PARSERS, parseRowLine, parseTableRow, type RowParseContext, type RowParser } from "@/lib/parser/row-parsers";
import {
  extractFestivalTable,
  isPrayerTimesHeader,
  parseFixedOffsetRow,
  parseHeaderKeywordRow,
  rowHasTime,
  type FestivalEntry
} from "@/lib/parser/table-extractors";

export interface PageContent {
  index: number;
  text: string;
  tables: PageTable[];
}

export interface PageExtractionResult {
  candidates: RowCandidate[];
  rejectedRows: number;
  source: "tables" | "text" | "none";
}

function extractFromTables(
  tables: PageTable[],
  context: RowParseContext,
  parsers: readonly RowParser[]
): { candidates: RowCandidate[]; rejectedRows: number } {
  const candidates: RowCandidate[] = [];
  let rejectedRows = 0;

  for (const table of tables) {
    if (table.length === 0) {
      continue;
    }

    const headerDriven = isPrayerTimesHeader(table[0]);
    const rows = headerDriven ? table.slice(1) : table;
    for (const row of rows) {
      const candidate = headerDriven
        ? parseHeaderKeywordRow(row, context)
        : (parseTableRow(row, context, parsers) ?? parseFixedOffsetRow(row, context));
      if (candidate) {
        candidates.push(candidate);
      } else if (rowHasTime(row)) {
        rejectedRows += 1;
      }
    }
  }

  return { candidates, rejectedRows };
}

function extractFromText(
  text: string,
  context: RowParseContext,
  parsers: readonly RowParser[]
): { candidates: RowCandidate[]; rejectedRows: number } {
  const candidates: RowCandidate[] = [];
  let rejectedRows = 0;

  for (const line of text.split(/\r?\n/)) {
    if (!hasTimeToken(line)) {
      continue;
    }
    const candidate = parseRowLine(line, context, parsers);
    if (candidate) {
      candidates.push(candidate);
    } else {
      rejectedRows += 1;
    }
  }

  return { candidates, rejectedRows };
}

/**
 * Tables are read first. The page text is scanned line by line only when no table row produced a
 * record, which covers pages where table detection failed altogether.
 */
export function extractPrayerTimesPage(
  page: PageContent,
  context: RowParseContext,
  parsers: readonly RowParser[] = DEFAULT_ROW_PARSERS
): PageExtractionResult {
  const fromTables = extractFromTables(page.tables, context, parsers);
  if (fromTables.candidates.length > 0) {
    return { ...fromTables, source: "tables" };
  }

  const fromText = extractFromText(page.text, context, parsers);
  return {
    candidates: fromText.candidates,
    rejectedRows: fromTables.rejectedRows + fromText.rejectedRows,
    source: fromText.candidates.length > 0 ? "text" : "none"
  };
}

export function extractFestivalPage(page: PageContent, context: RowParseContext): FestivalEntry[] {
  return page.tables.flatMap((table) => extractFestivalTable(table, context));
}

export function applyCandidates(bucket: MonthBucket, candidates: RowCandidate[]): void {
  for (const candidate of candidates) {
    upsertDayRecord(bucket, {
      day: candidate.day,
      weekday: candidate.weekday,
      festival: candidate.festival,
      times: candidate.times
    });
  }
}

/** Only the festival field is written; unseen days get a placeholder with empty times. */
export function applyFestivals(bucket: MonthBucket, entries: FestivalEntry[]): void {
  for (const entry of entries) {
    upsertDayRecord(bucket, { day: entry.day, festival: entry.festival });
  }
}
