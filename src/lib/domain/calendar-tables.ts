import { readFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";

import {
  MONTH_CODES,
  PRAYER_TIME_KEYS,
  type CalendarTables,
  type CalendarYear,
  type CorrectionTable,
  type HolidayTable
} from "@/types/calendar";
import { normalizeRelativePath, readEmbeddedJson } from "@/lib/domain/embedded-data";
import { correctionKey, holidayKey } from "@/lib/utils/calendar";

export const FESTIVAL_SEPARATOR = ", ";

const timeOrEmptySchema = z.string().regex(/^(\d{1,2}:\d{2})?$/, "Expected HH:MM or an empty string");

const prayerTimesPatchSchema = z
  .object({
    imsaku: timeOrEmptySchema.optional(),
    sabahu: timeOrEmptySchema.optional(),
    lindja_e_diellit: timeOrEmptySchema.optional(),
    dreka: timeOrEmptySchema.optional(),
    ikindia: timeOrEmptySchema.optional(),
    akshami: timeOrEmptySchema.optional(),
    jacia: timeOrEmptySchema.optional(),
    gjatesia_e_dites: timeOrEmptySchema.optional()
  })
  .strict();

export const holidayTableSchema = z.record(z.string().regex(/^\d{2}-\d{2}$/, "Expected MM-DD"), z.string().min(1));

export const correctionTableSchema = z.record(
  z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Expected YYYY-MM-DD"),
  prayerTimesPatchSchema
);

const yearTablesFileSchema = z.object({
  holidays: holidayTableSchema.default({}),
  corrections: correctionTableSchema.default({})
});

export const EMPTY_CALENDAR_TABLES: CalendarTables = Object.freeze({
  holidays: Object.freeze({}),
  corrections: Object.freeze({})
});

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
}

export function createCalendarTables(input: { holidays?: unknown; corrections?: unknown }): CalendarTables {
  const holidays = holidayTableSchema.safeParse(input.holidays ?? {});
  if (!holidays.success) {
    throw new Error(`Invalid holiday table: ${formatIssues(holidays.error)}`);
  }
  const corrections = correctionTableSchema.safeParse(input.corrections ?? {});
  if (!corrections.success) {
    throw new Error(`Invalid correction table: ${formatIssues(corrections.error)}`);
  }
  return {
    holidays: Object.freeze({ ...holidays.data }),
    corrections: Object.freeze({ ...corrections.data })
  };
}

async function readOptionalJsonFromRoot(relativePath: string): Promise<unknown> {
  const normalizedPath = normalizeRelativePath(relativePath);
  const rootsToTry = [process.cwd(), path.join(process.cwd(), ".next", "server"), path.join(process.cwd(), ".next", "standalone")];

  for (const root of rootsToTry) {
    try {
      const payload = await readFile(path.join(root, normalizedPath), "utf8");
      return JSON.parse(payload);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== "ENOENT") {
        throw error;
      }
    }
  }

  return readEmbeddedJson(normalizedPath);
}

function interpolateYear(table: HolidayTable, year: number): Record<string, string> {
  return Object.fromEntries(Object.entries(table).map(([key, text]) => [key, text.replace(/\{year\}/g, String(year))]));
}

/**
 * Shared holidays from `data/calendar/holidays.json`, overlaid with the year file
 * `data/calendar/<year>.json` when one exists.
 */
export async function loadCalendarTables(year: number): Promise<CalendarTables> {
  const sharedRaw = await readOptionalJsonFromRoot("data/calendar/holidays.json");
  const shared = holidayTableSchema.safeParse(sharedRaw ?? {});
  if (!shared.success) {
    throw new Error(`Invalid data/calendar/holidays.json: ${formatIssues(shared.error)}`);
  }

  const yearRaw = await readOptionalJsonFromRoot(`data/calendar/${year}.json`);
  const yearTables = yearTablesFileSchema.safeParse(yearRaw ?? {});
  if (!yearTables.success) {
    throw new Error(`Invalid data/calendar/${year}.json: ${formatIssues(yearTables.error)}`);
  }

  return createCalendarTables({
    holidays: { ...interpolateYear(shared.data, year), ...interpolateYear(yearTables.data.holidays, year) },
    corrections: yearTables.data.corrections
  });
}

/**
 * Adds holiday text to existing records. Extracted text is never replaced: the holiday is appended
 * after a separator, or skipped when it is already one of the separated parts.
 */
export function mergeFestivals(data: CalendarYear, holidays: HolidayTable): number {
  let merged = 0;
  for (const month of MONTH_CODES) {
    for (const [dayCode, record] of Object.entries(data[month])) {
      const holiday = holidays[holidayKey(month, dayCode)];
      if (!holiday) {
        continue;
      }
      const current = record.festat_fetare_dhe_shenime_te_tjera_astronomike;
      if (!current) {
        record.festat_fetare_dhe_shenime_te_tjera_astronomike = holiday;
      } else if (!current.split(FESTIVAL_SEPARATOR).includes(holiday)) {
        record.festat_fetare_dhe_shenime_te_tjera_astronomike = `${current}${FESTIVAL_SEPARATOR}${holiday}`;
      } else {
        continue;
      }
      merged += 1;
    }
  }
  return merged;
}

/** Overwrites exactly the corrected fields. Dates without a record are ignored. */
export function applyCorrections(data: CalendarYear, year: number, corrections: CorrectionTable): number {
  let applied = 0;
  for (const month of MONTH_CODES) {
    for (const [dayCode, record] of Object.entries(data[month])) {
      const correction = corrections[correctionKey(year, month, dayCode)];
      if (!correction) {
        continue;
      }
      for (const key of PRAYER_TIME_KEYS) {
        const value = correction[key];
        if (value !== undefined) {
          record.kohet[key] = value;
        }
      }
      applied += 1;
    }
  }
  return applied;
}
