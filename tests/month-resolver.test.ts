import { describe, expect, it } from "vitest";

import { detectMonthFromText, inferMonthFromPageIndex, resolvePageMonth } from "@/lib/parser/month-resolver";

describe("month resolver", () => {
  it("detects month names case-insensitively", () => {
    expect(detectMonthFromText("TAKVIMI 2024 - JANAR")).toBe("01");
    expect(detectMonthFromText("Nëntor 1445/1446")).toBe("11");
    expect(detectMonthFromText("NENTOR")).toBe("11");
    expect(detectMonthFromText("dhjetor")).toBe("12");
  });

  it("only matches whole words", () => {
    expect(detectMonthFromText("Majë e malit")).toBeNull();
    expect(detectMonthFromText("Marsi")).toBeNull();
  });

  it("takes the earliest month named on the page", () => {
    expect(detectMonthFromText("Shkurt (vazhdim nga Janar)")).toBe("02");
  });

  it("infers months from the first twelve page indices", () => {
    expect(inferMonthFromPageIndex(0)).toBe("01");
    expect(inferMonthFromPageIndex(11)).toBe("12");
    expect(inferMonthFromPageIndex(12)).toBeNull();
  });

  it("prefers explicit names over position", () => {
    expect(resolvePageMonth("Korrik", 0)).toEqual({ month: "07", source: "explicit" });
    expect(resolvePageMonth("05:21 06:10", 3)).toEqual({ month: "04", source: "positional" });
    expect(resolvePageMonth("", 20)).toBeNull();
  });
});
