import { NextResponse } from "next/server";

import { CACHING_INFO, createDefaultDeps } from "@/lib/domain/calendar-service";
import { failureResponse } from "@/lib/http/route-params";

export const runtime = "nodejs";

export async function GET() {
  try {
    const { store } = createDefaultDeps();
    const listing = await store.listCalendars();

    return NextResponse.json({
      available_years: listing.availableYears,
      processed_years: listing.processedYears,
      processed_months: listing.processedMonths,
      available_files: listing.availableFiles,
      caching_info: CACHING_INFO
    });
  } catch (error) {
    return failureResponse("Error listing available PDF files.", error);
  }
}
