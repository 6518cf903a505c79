import { describe, expect, it } from "vitest";

import {
  extractFestivalTable,
  extractHeaderKeywordTable,
  isPrayerTimesHeader,
  parseFixedOffsetRow,
  parseHeaderKeywordRow
} from "@/lib/parser/table-extractors";

const january = { year: 2024, month: "01" as const };

describe("table extractors", () => {
  it("recognizes prayer-time headers by keyword", () => {
    expect(isPrayerTimesHeader(["Dita", "IMSAKU", "Sabahu"])).toBe(true);
    expect(isPrayerTimesHeader(["Data", "", "Festat"])).toBe(false);
    expect(isPrayerTimesHeader(undefined)).toBe(false);
  });

  it("locates time cells by content", () => {
    const row = ["3", "e mërkurë", "23", "05:22", "06:11", "07:45", "12:31", "15:11", "18:06", "19:31", "09:15"];

    expect(parseHeaderKeywordRow(row, january)).toEqual({
      day: 3,
      weekday: "e mërkurë",
      festival: "",
      strategy: "header-keyword",
      times: {
        imsaku: "05:22",
        sabahu: "06:11",
        lindja_e_diellit: "07:45",
        dreka: "12:31",
        ikindia: "15:11",
        akshami: "18:06",
        jacia: "19:31",
        gjatesia_e_dites: "09:15"
      }
    });
  });

  it("falls back to fixed columns when cells are missing", () => {
    const row = ["4", "e enjte", "24", "05:22", "", "07:45", "12:31", "15:11", "18:06", "19:31"];
    const candidate = parseHeaderKeywordRow(row, january);

    expect(candidate?.times).toEqual({
      imsaku: "05:22",
      sabahu: "",
      lindja_e_diellit: "07:45",
      dreka: "12:31",
      ikindia: "15:11",
      akshami: "18:06",
      jacia: "19:31",
      gjatesia_e_dites: ""
    });
  });

  it("skips data rows of a header table without a valid day", () => {
    const table = [
      ["Dita", "", "", "Imsaku", "Sabahu", "Lindja", "Dreka", "Ikindia", "Akshami", "Jacia"],
      ["1", "e hënë", "20", "05:21", "06:10", "07:45", "12:30", "15:10", "18:05", "19:30"],
      ["32", "", "", "05:21", "06:10", "07:45", "12:30", "15:10", "18:05", "19:30"],
      ["Shënim", "", "", "", "", "", "", "", "", ""]
    ];

    expect(extractHeaderKeywordTable(table, january).map((candidate) => candidate.day)).toEqual([1]);
    expect(extractHeaderKeywordTable(table.slice(1), january)).toEqual([]);
  });

  it("reads the rigid column layout", () => {
    const row = ["2", "e martë", "22", "Shënim", "05:21", "06:10", "07:45", "12:30", "15:10", "18:05", "19:30", "09:10"];
    const candidate = parseFixedOffsetRow(row, january);

    expect(candidate?.strategy).toBe("fixed-offset");
    expect(candidate?.weekday).toBe("e martë");
    expect(candidate?.secondaryDay).toBe(22);
    expect(candidate?.festival).toBe("Shënim");
    expect(candidate?.times.gjatesia_e_dites).toBe("09:10");
  });

  it("requires a purely numeric day for the rigid layout", () => {
    const row = ["2a", "e martë", "22", "", "05:21", "06:10", "07:45", "12:30"];

    expect(parseFixedOffsetRow(row, january)).toBeNull();
    expect(parseFixedOffsetRow(["2", "e martë", "22"], january)).toBeNull();
  });

  it("collects day and festival pairs", () => {
    const table = [
      ["Dita", "", "", "Festa"],
      ["1", "", "", "Viti i Ri"],
      ["2", "", "", ""],
      ["40", "", "", "Jashtë muajit"],
      ["7*", "", "", " Krishtlindjet\northodokse "],
      ["9", "x"]
    ];

    expect(extractFestivalTable(table, january)).toEqual([
      { day: 1, festival: "Viti i Ri" },
      { day: 7, festival: "Krishtlindjet orthodokse" }
    ]);
  });

  it("does not read a prayer table's time column as a festival", () => {
    const table = [
      ["Dita", "", "", "Imsaku", "Sabahu"],
      ["1", "e hënë", "19", "05:21", "06:10"],
      ["2", "e martë", "20", "Nata e Regaibit 05:22", "06:10"]
    ];

    expect(extractFestivalTable(table, january)).toEqual([{ day: 2, festival: "Nata e Regaibit 05:22" }]);
  });
});
