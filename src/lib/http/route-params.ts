import { NextResponse } from "next/server";
import { z } from "zod";

import { PdfNotFoundError, describeError } from "@/lib/errors";
import { toMonthCode } from "@/lib/utils/calendar";

export const yearFileSchema = z
  .string()
  .regex(/^\d{4}\.json$/, "Expected <year>.json")
  .transform((value) => Number(value.slice(0, 4)));

export const yearSchema = z
  .string()
  .regex(/^\d{4}$/, "Expected a four-digit year")
  .transform((value) => Number(value));

export const monthFileSchema = z
  .string()
  .regex(/^\d{1,2}\.json$/, "Month must be a number between 01 and 12.")
  .transform((value, ctx) => {
    const month = toMonthCode(value.replace(/\.json$/, ""));
    if (!month) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Month must be a number between 01 and 12." });
      return z.NEVER;
    }
    return month;
  });

export const pageCsvSchema = z
  .string()
  .regex(/^\d+\.csv$/, "Expected <page>.csv")
  .transform((value) => Number(value.replace(/\.csv$/, "")));

export function parseUseCache(request: Request, fallback: boolean): boolean {
  const raw = new URL(request.url).searchParams.get("use_cache");
  return raw === null ? fallback : raw.toLowerCase() === "true";
}

export function invalidParamsResponse(error: string, issues: z.ZodIssue[]) {
  return NextResponse.json({ error, issues }, { status: 400 });
}

export function failureResponse(error: string, cause: unknown) {
  if (cause instanceof PdfNotFoundError) {
    return NextResponse.json({ error: `PDF file not found for the year ${cause.year}.` }, { status: 404 });
  }
  return NextResponse.json({ error, details: describeError(cause) }, { status: 500 });
}
