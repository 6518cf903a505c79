import { describe, expect, it } from "vitest";

import type { MonthBucket } from "@/types/calendar";
import { applyCandidates, applyFestivals, extractFestivalPage, extractPrayerTimesPage } from "@/lib/parser/page-extractors";

const january = { year: 2024, month: "01" as const };

describe("page extractors", () => {
  it("runs non-header tables through the cascade", () => {
    const page = {
      index: 8,
      text: "",
      tables: [[["1", "e hënë", "3", "Viti i Ri", "05:21", "06:10", "07:45", "12:30", "15:10", "18:05", "19:30", "13:09"]]]
    };
    const result = extractPrayerTimesPage(page, january);

    expect(result.source).toBe("tables");
    expect(result.candidates).toHaveLength(1);
    expect(result.candidates[0]?.strategy).toBe("fixed-schema");
  });

  it("scans text lines when the tables yield nothing", () => {
    const page = {
      index: 8,
      text: ["JANAR 2024", "Dita Imsaku Sabahu", "1 e hënë 20 05:21 06:10 07:45 12:30 15:10 18:05 19:30 09:10", "Faqe 9"].join("\n"),
      tables: [[["Dita", "Festa"]]]
    };
    const result = extractPrayerTimesPage(page, january);

    expect(result.source).toBe("text");
    expect(result.candidates.map((candidate) => candidate.day)).toEqual([1]);
    expect(result.rejectedRows).toBe(0);
  });

  it("contributes nothing for a page without tables or times", () => {
    const result = extractPrayerTimesPage({ index: 0, text: "Parathënie\nFaleminderit", tables: [] }, january);

    expect(result).toEqual({ candidates: [], rejectedRows: 0, source: "none" });
  });

  it("counts rows with times that no strategy accepts", () => {
    const result = extractPrayerTimesPage({ index: 0, text: "Ora 05:21", tables: [] }, january);

    expect(result.candidates).toEqual([]);
    expect(result.rejectedRows).toBe(1);
  });

  it("is idempotent when replayed against the same bucket", () => {
    const page = {
      index: 7,
      text: "",
      tables: [
        [
          ["Dita", "", "", "Festa"],
          ["1", "", "", "Viti i Ri"],
          ["6", "", "", "Nata e Bozhiqit"]
        ]
      ]
    };
    const prayerPage = {
      index: 8,
      text: "1 e hënë 20 05:21 06:10 07:45 12:30 15:10 18:05 19:30 09:10",
      tables: []
    };

    const bucket: MonthBucket = {};
    applyFestivals(bucket, extractFestivalPage(page, january));
    applyCandidates(bucket, extractPrayerTimesPage(prayerPage, january).candidates);
    const once = structuredClone(bucket);

    applyFestivals(bucket, extractFestivalPage(page, january));
    applyCandidates(bucket, extractPrayerTimesPage(prayerPage, january).candidates);

    expect(bucket).toEqual(once);
    expect(bucket["01"]?.festat_fetare_dhe_shenime_te_tjera_astronomike).toBe("Viti i Ri");
    expect(bucket["01"]?.kohet.imsaku).toBe("05:21");
    expect(bucket["06"]).toEqual({
      data_sipas_kal_boteror: 6,
      dita_javes: "",
      festat_fetare_dhe_shenime_te_tjera_astronomike: "Nata e Bozhiqit",
      kohet: {
        imsaku: "",
        sabahu: "",
        lindja_e_diellit: "",
        dreka: "",
        ikindia: "",
        akshami: "",
        jacia: "",
        gjatesia_e_dites: ""
      }
    });
  });
});
