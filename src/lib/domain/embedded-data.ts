import sharedHolidays from "../../../data/calendar/holidays.json";
import calendar2024 from "../../../data/calendar/2024.json";

// Bundled copies for serverless builds where data/ is not traced next to the route.
const EMBEDDED_JSON_BY_PATH: Record<string, unknown> = {
  "data/calendar/holidays.json": sharedHolidays,
  "data/calendar/2024.json": calendar2024
};

export function normalizeRelativePath(relativePath: string): string {
  return relativePath.replace(/\\/g, "/").replace(/^\.?\//, "");
}

export function readEmbeddedJson(relativePath: string): unknown {
  return EMBEDDED_JSON_BY_PATH[normalizeRelativePath(relativePath)] ?? null;
}
