import { describe, expect, it } from "vitest";

import { escapeCsvCell, rowsToCsv } from "@/lib/export/csv";

describe("csv export", () => {
  it("quotes cells with separators, quotes or line breaks", () => {
    expect(escapeCsvCell("Viti i Ri, 2024")).toBe('"Viti i Ri, 2024"');
    expect(escapeCsvCell('Nata "e Kadrit"')).toBe('"Nata ""e Kadrit"""');
    expect(escapeCsvCell("Fitër\nBajrami")).toBe('"Fitër\nBajrami"');
    expect(escapeCsvCell(null)).toBe("");
  });

  it("trims cells and joins rows with CRLF", () => {
    const csv = rowsToCsv([
      ["Dita", " Imsaku "],
      ["1", "05:21"]
    ]);

    expect(csv).toBe("Dita,Imsaku\r\n1,05:21\r\n");
  });
});
