/**
 * Unit tests for environment configuration parsing
 */

import { describe, it, expect } from "vitest";
import { DEFAULT_CITIES, loadConfig } from "@/config/loadConfig";
import { ConfigError } from "@/errors";
import { NICHES } from "@/types";

describe("loadConfig", () => {
  it("should apply defaults and drop sources without credentials", () => {
    const config = loadConfig({});

    expect(config).toEqual({
      runMode: "schedule",
      logLevel: "info",
      dbPath: "./data/leads.db",
      enabledSources: ["egr", "onliner", "deal"],
      enabledNiches: [...NICHES],
      cities: DEFAULT_CITIES,
      credentials: {},
      scrapingTime: "03:00",
      maxAttemptsPerUnit: 3,
      concurrencyPerSource: 2,
      minRequestIntervalMs: 500,
      limitPerUnit: 100,
    });
  });

  it("should read explicit selections and credentials", () => {
    const config = loadConfig({
      RUN_MODE: "once",
      TWOGIS_API_KEY: " test-key ",
      ENABLED_SOURCES: "twogis, onliner",
      ENABLED_NICHES: "tattoo,legal",
      TARGET_CITIES: "Минск, Брест",
      SCRAPING_TIME: "06:30",
      MAX_ATTEMPTS_PER_UNIT: "5",
      MIN_REQUEST_INTERVAL_MS: "0",
    });

    expect(config.runMode).toBe("once");
    expect(config.credentials.twogisApiKey).toBe("test-key");
    expect(config.enabledSources).toEqual(["twogis", "onliner"]);
    expect(config.enabledNiches).toEqual(["tattoo", "legal"]);
    expect(config.cities).toEqual(["Минск", "Брест"]);
    expect(config.scrapingTime).toBe("06:30");
    expect(config.maxAttemptsPerUnit).toBe(5);
    expect(config.minRequestIntervalMs).toBe(0);
  });

  it("should treat 'all' as every value", () => {
    const config = loadConfig({
      ENABLED_SOURCES: "all",
      YANDEX_API_KEY: "test-key",
      INSTAGRAM_SESSION_ID: "test-session",
      TWOGIS_API_KEY: "test-key",
    });

    expect(config.enabledSources).toEqual([
      "twogis",
      "yandex_maps",
      "egr",
      "onliner",
      "deal",
      "instagram",
    ]);
  });

  it("should reject an invalid daily time", () => {
    expect(() => loadConfig({ SCRAPING_TIME: "25:00" })).toThrow(ConfigError);

    try {
      loadConfig({ SCRAPING_TIME: "25:00" });
    } catch (error) {
      expect(error instanceof ConfigError ? error.issues : []).toEqual([
        "SCRAPING_TIME: must be HH:MM (24h)",
      ]);
    }
  });

  it("should reject unknown sources and niches", () => {
    try {
      loadConfig({ ENABLED_SOURCES: "twogis,facebook", ENABLED_NICHES: "bakery" });
      expect.unreachable("loadConfig should have thrown");
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      expect(error instanceof ConfigError ? error.issues : []).toEqual([
        'ENABLED_SOURCES: unknown value "facebook" (allowed: twogis, yandex_maps, egr, onliner, deal, instagram)',
        'ENABLED_NICHES: unknown value "bakery" (allowed: auto_service, handyman, cleaning, moving, education, fitness, photo_video, legal, psychology, tattoo)',
      ]);
    }
  });

  it("should reject non-positive attempt counts", () => {
    expect(() => loadConfig({ MAX_ATTEMPTS_PER_UNIT: "0" })).toThrow(
      ConfigError,
    );
  });
});
