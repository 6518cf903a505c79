import { mkdir, readdir, readFile, rename, writeFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";

import { MONTH_CODES, type CalendarYear, type MonthBucket, type MonthCode, type MonthPayload, type YearPayload } from "@/types/calendar";
import { getEnv } from "@/lib/env";
import { PdfNotFoundError } from "@/lib/errors";
import { toMonthCode } from "@/lib/utils/calendar";

const prayerTimesSchema = z.object({
  imsaku: z.string(),
  sabahu: z.string(),
  lindja_e_diellit: z.string(),
  dreka: z.string(),
  ikindia: z.string(),
  akshami: z.string(),
  jacia: z.string(),
  gjatesia_e_dites: z.string()
});

const dayRecordSchema = z.object({
  data_sipas_kal_boteror: z.number().int().min(1).max(31),
  dita_javes: z.string(),
  festat_fetare_dhe_shenime_te_tjera_astronomike: z.string(),
  kohet: prayerTimesSchema
});

const monthBucketSchema = z.record(z.string().regex(/^\d{2}$/), dayRecordSchema);

const calendarYearSchema = z.object({
  "01": monthBucketSchema,
  "02": monthBucketSchema,
  "03": monthBucketSchema,
  "04": monthBucketSchema,
  "05": monthBucketSchema,
  "06": monthBucketSchema,
  "07": monthBucketSchema,
  "08": monthBucketSchema,
  "09": monthBucketSchema,
  "10": monthBucketSchema,
  "11": monthBucketSchema,
  "12": monthBucketSchema
});

const yearPayloadSchema = z.object({
  year: z.string(),
  data: calendarYearSchema
});

const monthPayloadSchema = z.object({
  year: z.string(),
  month: z.enum(MONTH_CODES),
  data: monthBucketSchema
});

const PDF_FILE_REGEX = /^takvimi(\d{4})\.pdf$/;
const YEAR_FILE_REGEX = /^(\d{4})\.json$/;
const MONTH_FILE_REGEX = /^(\d{2})\.json$/;

export interface CalendarStoreOptions {
  jsonDir?: string;
  pdfDir?: string;
}

export interface CalendarListing {
  availableFiles: string[];
  availableYears: string[];
  processedYears: string[];
  processedMonths: Record<string, MonthCode[]>;
}

let writeChain: Promise<void> = Promise.resolve();

async function withWriteLock<T>(fn: () => Promise<T>): Promise<T> {
  const previous = writeChain;
  let release: (() => void) | undefined;
  writeChain = new Promise<void>((resolve) => {
    release = resolve;
  });

  await previous;
  try {
    return await fn();
  } finally {
    release?.();
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && (error as { code?: unknown }).code === "ENOENT";
}

async function writeJsonAtomic(filePath: string, payload: unknown): Promise<void> {
  const tmpPath = `${filePath}.tmp.${process.pid}.${Date.now()}`;
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(tmpPath, JSON.stringify(payload, null, 2) + "\n", "utf8");
  await rename(tmpPath, filePath);
}

async function readJsonFile<S extends z.ZodTypeAny>(filePath: string, schema: S): Promise<z.infer<S> | null> {
  let contents: string;
  try {
    contents = await readFile(filePath, "utf8");
  } catch (error) {
    if (isMissingFile(error)) {
      return null;
    }
    throw error;
  }

  const parsed = schema.safeParse(JSON.parse(contents));
  if (!parsed.success) {
    throw new Error(`Invalid calendar cache file format at ${filePath}`);
  }
  return parsed.data;
}

async function listDirectory(dir: string): Promise<string[]> {
  try {
    return (await readdir(dir)).sort();
  } catch (error) {
    if (isMissingFile(error)) {
      return [];
    }
    throw error;
  }
}

/**
 * JSON cache laid out as `<jsonDir>/<year>.json` plus `<jsonDir>/<year>/<MM>.json` for every month
 * that has days. Source PDFs live at `<pdfDir>/takvimi<year>.pdf`.
 */
export class CalendarStore {
  readonly jsonDir: string;
  readonly pdfDir: string;

  constructor(options: CalendarStoreOptions = {}) {
    const env = options.jsonDir && options.pdfDir ? null : getEnv();
    this.jsonDir = path.resolve(options.jsonDir ?? env?.TAKVIMI_JSON_DIR ?? "api/takvimi");
    this.pdfDir = path.resolve(options.pdfDir ?? env?.TAKVIMI_PDF_DIR ?? "takvimi-pdf");
  }

  pdfPath(year: number): string {
    return path.join(this.pdfDir, `takvimi${year}.pdf`);
  }

  async readPdf(year: number): Promise<Buffer> {
    try {
      return await readFile(this.pdfPath(year));
    } catch (error) {
      if (isMissingFile(error)) {
        throw new PdfNotFoundError(year);
      }
      throw error;
    }
  }

  async saveCalendar(year: number, data: CalendarYear): Promise<void> {
    const yearCode = String(year);
    await withWriteLock(async () => {
      await writeJsonAtomic(path.join(this.jsonDir, `${yearCode}.json`), { year: yearCode, data } satisfies YearPayload);
      for (const month of MONTH_CODES) {
        const bucket: MonthBucket = data[month];
        if (Object.keys(bucket).length === 0) {
          continue;
        }
        await writeJsonAtomic(path.join(this.jsonDir, yearCode, `${month}.json`), {
          year: yearCode,
          month,
          data: bucket
        } satisfies MonthPayload);
      }
    });
  }

  async loadYear(year: number): Promise<YearPayload | null> {
    return readJsonFile(path.join(this.jsonDir, `${year}.json`), yearPayloadSchema);
  }

  async loadMonth(year: number, month: MonthCode): Promise<MonthPayload | null> {
    return readJsonFile(path.join(this.jsonDir, String(year), `${month}.json`), monthPayloadSchema);
  }

  async listCalendars(): Promise<CalendarListing> {
    const availableFiles = (await listDirectory(this.pdfDir)).filter((file) => PDF_FILE_REGEX.test(file));
    const availableYears = availableFiles.flatMap((file) => PDF_FILE_REGEX.exec(file)?.[1] ?? []);
    const processedYears = (await listDirectory(this.jsonDir)).flatMap((file) => YEAR_FILE_REGEX.exec(file)?.[1] ?? []);

    const processedMonths: Record<string, MonthCode[]> = {};
    for (const year of processedYears) {
      const months = (await listDirectory(path.join(this.jsonDir, year))).flatMap((file) => {
        const code = MONTH_FILE_REGEX.exec(file)?.[1];
        const month = code ? toMonthCode(code) : null;
        return month ? [month] : [];
      });
      if (months.length > 0) {
        processedMonths[year] = months;
      }
    }

    return { availableFiles, availableYears, processedYears, processedMonths };
  }
}
