import { NextResponse } from "next/server";

import { CACHING_INFO } from "@/lib/domain/calendar-service";

export const runtime = "nodejs";

export function GET() {
  return NextResponse.json({
    name: "Takvimi Shqip API",
    description: "API for Albanian Islamic Calendar (Takvimi)",
    endpoints: [
      "/api/takvimi - List available calendar years",
      "/api/takvimi/<year>.json - Get calendar data for specific year",
      "/api/takvimi/<year>/<month>.json - Get calendar data for specific month",
      "/api/takvimi/<year>/page/<page_num>.csv - Extract a specific page as CSV"
    ],
    caching_behavior: CACHING_INFO
  });
}
