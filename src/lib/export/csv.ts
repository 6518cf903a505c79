import type { PageTable } from "@/types/calendar";

const NEEDS_QUOTING_REGEX = /[",\r\n]/;

export function escapeCsvCell(cell: string | null | undefined): string {
  const value = (cell ?? "").trim();
  return NEEDS_QUOTING_REGEX.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/** Comma-separated, `\r\n` line endings, quoting only cells that need it. */
export function rowsToCsv(rows: PageTable): string {
  return rows.map((row) => row.map((cell) => escapeCsvCell(cell)).join(",")).join("\r\n") + "\r\n";
}
