import { describe, expect, it } from "vitest";

import { extractTime, extractTimes, hasTimeToken } from "@/lib/parser/time-tokens";

describe("time tokens", () => {
  it("returns the first time in a cell", () => {
    expect(extractTime(" 5:21 (06:10)")).toBe("5:21");
    expect(extractTime("Imsaku")).toBe("");
    expect(extractTime(undefined)).toBe("");
  });

  it("keeps values verbatim without range checks", () => {
    expect(extractTime("99:99")).toBe("99:99");
  });

  it("returns every time in order", () => {
    expect(extractTimes("1 e hënë 05:21 06:10 | 19:30")).toEqual(["05:21", "06:10", "19:30"]);
    expect(extractTimes("2024-01-09")).toEqual([]);
  });

  it("detects time tokens", () => {
    expect(hasTimeToken("Dreka 12:30")).toBe(true);
    expect(hasTimeToken("12.30")).toBe(false);
  });
});
