import { afterEach, describe, expect, it, vi } from "vitest";

import { getEnv } from "@/lib/env";

describe("env", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("falls back to the default directories and offset", () => {
    vi.stubEnv("TAKVIMI_PDF_DIR", "");
    vi.stubEnv("TAKVIMI_JSON_DIR", "");
    vi.stubEnv("TAKVIMI_FRONT_MATTER_OFFSET", "");

    expect(getEnv()).toEqual({ TAKVIMI_PDF_DIR: "takvimi-pdf", TAKVIMI_JSON_DIR: "api/takvimi", TAKVIMI_FRONT_MATTER_OFFSET: 7 });
  });

  it("coerces the page offset", () => {
    vi.stubEnv("TAKVIMI_FRONT_MATTER_OFFSET", "5");

    expect(getEnv().TAKVIMI_FRONT_MATTER_OFFSET).toBe(5);
  });

  it("lists every invalid variable", () => {
    vi.stubEnv("TAKVIMI_FRONT_MATTER_OFFSET", "-2");

    expect(() => getEnv()).toThrow("Missing/invalid environment variables: TAKVIMI_FRONT_MATTER_OFFSET: Number must be greater than or equal to 0");
  });
});
