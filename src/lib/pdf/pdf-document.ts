import { z } from "zod";

import type { CalendarDocument } from "@/types/calendar";
import { DocumentUnreadableError, describeError } from "@/lib/errors";
import { createInMemoryDocument, type DocumentPage } from "@/lib/parser/calendar-document";

const textResultSchema = z.object({
  total: z.number().int().min(0),
  pages: z.array(z.object({ num: z.number().int(), text: z.string() }))
});

const tableResultSchema = z.object({
  pages: z.array(
    z.object({
      num: z.number().int(),
      tables: z.array(z.array(z.array(z.string().nullable().transform((cell) => cell ?? ""))))
    })
  )
});

interface PdfParser {
  getText(): Promise<unknown>;
  getTable(): Promise<unknown>;
  destroy(): Promise<void>;
}

async function createParser(buffer: Buffer): Promise<PdfParser> {
  const { PDFParse } = await import("pdf-parse");
  return new PDFParse({ data: new Uint8Array(buffer) });
}

/**
 * Reads every page's text and detected tables up front, so extraction can run without suspension
 * points. Pages are indexed from 0 in the returned document.
 */
export async function loadPdfCalendarDocument(buffer: Buffer): Promise<CalendarDocument> {
  let parser: PdfParser;
  try {
    parser = await createParser(buffer);
  } catch (error) {
    throw new DocumentUnreadableError(`Unable to open PDF: ${describeError(error)}`, { cause: error });
  }

  try {
    const text = textResultSchema.parse(await parser.getText());
    const tables = tableResultSchema.parse(await parser.getTable());

    const tablesByPage = new Map(tables.pages.map((page) => [page.num, page.tables]));
    const textByPage = new Map(text.pages.map((page) => [page.num, page.text]));
    const pages: DocumentPage[] = Array.from({ length: text.total }, (_, index) => ({
      text: textByPage.get(index + 1) ?? "",
      tables: tablesByPage.get(index + 1) ?? []
    }));

    return createInMemoryDocument(pages);
  } catch (error) {
    throw new DocumentUnreadableError(`Unable to read PDF pages: ${describeError(error)}`, { cause: error });
  } finally {
    await parser.destroy();
  }
}
