/** The document could not be opened or one of its pages could not be read. */
export class DocumentUnreadableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DocumentUnreadableError";
  }
}

export class PdfNotFoundError extends Error {
  constructor(public year: number) {
    super(`PDF for year ${year} not found`);
    this.name = "PdfNotFoundError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
