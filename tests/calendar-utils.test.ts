import { describe, expect, it } from "vitest";

import {
  daysInMonth,
  isValidDay,
  leadingInteger,
  normalizeWhitespace,
  parseIntSafe,
  toMonthCode,
  weekdayFor
} from "@/lib/utils/calendar";

describe("calendar utils", () => {
  it("follows the leap-year rule for February", () => {
    expect(daysInMonth(2024, "02")).toBe(29);
    expect(daysInMonth(2023, "02")).toBe(28);
    expect(daysInMonth(2000, "02")).toBe(29);
    expect(daysInMonth(1900, "02")).toBe(28);
  });

  it("knows thirty and thirty-one day months", () => {
    expect(daysInMonth(2024, "04")).toBe(30);
    expect(daysInMonth(2024, "11")).toBe(30);
    expect(daysInMonth(2024, "08")).toBe(31);
    expect(isValidDay(2024, "04", 31)).toBe(false);
    expect(isValidDay(2024, "04", 0)).toBe(false);
  });

  it("computes Monday-first weekday names", () => {
    expect(weekdayFor(2024, "01", 1)).toBe("e hënë");
    expect(weekdayFor(2024, "01", 7)).toBe("e diel");
    expect(weekdayFor(2024, "02", 29)).toBe("e enjte");
    expect(weekdayFor(2023, "02", 29)).toBe("");
  });

  it("maps numbers and strings to month codes", () => {
    expect(toMonthCode(1)).toBe("01");
    expect(toMonthCode("9")).toBe("09");
    expect(toMonthCode("12")).toBe("12");
    expect(toMonthCode(13)).toBeNull();
    expect(toMonthCode("0")).toBeNull();
  });

  it("parses integers strictly", () => {
    expect(parseIntSafe(" 07 ")).toBe(7);
    expect(parseIntSafe("7a")).toBeUndefined();
    expect(leadingInteger("7*")).toBe(7);
    expect(leadingInteger("Dita")).toBeUndefined();
  });

  it("normalizes non-breaking spaces", () => {
    expect(normalizeWhitespace("\u00a0e\u00a0 hënë\t")).toBe("e hënë");
  });
});
