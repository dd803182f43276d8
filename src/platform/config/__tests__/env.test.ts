import { describe, expect, it, vi } from "vitest";
import { parseEnv, resolveConfig } from "../env";
import type { PlatformConfig } from "../env";

describe("parseEnv", () => {
  it("falls back to defaults", () => {
    expect(parseEnv({})).toEqual({
      apiBaseUrl: "https://api.grustnogram.ru",
      apiTimeout: 0,
      userAgent: "grustnogram-client/0.1.0",
      debug: false,
    });
  });

  it("reads GRUSTNOGRAM_* variables", () => {
    expect(
      parseEnv({
        GRUSTNOGRAM_API_BASE_URL: "http://localhost:9000/",
        GRUSTNOGRAM_API_TIMEOUT: "5000",
        GRUSTNOGRAM_USER_AGENT: "my-bot/2.0",
        GRUSTNOGRAM_DEBUG: "true",
      })
    ).toEqual({
      apiBaseUrl: "http://localhost:9000",
      apiTimeout: 5000,
      userAgent: "my-bot/2.0",
      debug: true,
    });
  });

  it.each(["abc", "-1"])("warns and ignores timeout %s", (value) => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    expect(parseEnv({ GRUSTNOGRAM_API_TIMEOUT: value }).apiTimeout).toBe(0);
    expect(warn).toHaveBeenCalledTimes(1);
  });
});

describe("resolveConfig", () => {
  const base: PlatformConfig = {
    apiBaseUrl: "https://api.grustnogram.ru",
    apiTimeout: 0,
    userAgent: "grustnogram-client/0.1.0",
    debug: false,
  };

  it("keeps the base when no overrides are given", () => {
    expect(resolveConfig({}, base)).toEqual(base);
  });

  it("applies overrides and trims the base URL", () => {
    expect(
      resolveConfig({ apiBaseUrl: "https://staging.example.test//", apiTimeout: 250 }, base)
    ).toEqual({ ...base, apiBaseUrl: "https://staging.example.test", apiTimeout: 250 });
  });

  it("treats undefined overrides as absent", () => {
    expect(resolveConfig({ debug: undefined, userAgent: undefined }, base)).toEqual(base);
  });

  it.each([-5, Number.NaN, Number.POSITIVE_INFINITY])(
    "warns and keeps the base timeout for override %s",
    (timeout) => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

      expect(resolveConfig({ apiTimeout: timeout }, { ...base, apiTimeout: 3000 }).apiTimeout).toBe(
        3000
      );
      expect(warn).toHaveBeenCalledTimes(1);
    }
  );

  it("accepts a zero timeout override", () => {
    expect(resolveConfig({ apiTimeout: 0 }, { ...base, apiTimeout: 3000 }).apiTimeout).toBe(0);
  });
});
