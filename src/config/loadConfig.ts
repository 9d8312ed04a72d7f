/**
 * Environment configuration
 *
 * Parses process.env (after dotenv) into a typed AppConfig. Invalid values
 * fail fast with a ConfigError; a source whose credential is missing is
 * dropped from the enabled set with a warning instead.
 */

import { z } from "zod";
import type { AppConfig, Niche, SourceId } from "@/types";
import { NICHES, SOURCE_IDS } from "@/types";
import {
  DEFAULT_CONCURRENCY_PER_SOURCE,
  DEFAULT_LIMIT_PER_UNIT,
  DEFAULT_LOG_LEVEL,
  DEFAULT_MAX_ATTEMPTS_PER_UNIT,
  DEFAULT_MIN_REQUEST_INTERVAL_MS,
  DEFAULT_SCRAPING_TIME,
} from "@/constants";
import { ConfigError } from "@/errors";
import * as logger from "@/logger";

export const DEFAULT_CITIES = ["Минск", "Гомель", "Могилев", "Витебск", "Гродно", "Брест"];

export const DEFAULT_DB_PATH = "./data/leads.db";

const SOURCE_CREDENTIAL: Partial<Record<SourceId, keyof AppConfig["credentials"]>> = {
  twogis: "twogisApiKey",
  yandex_maps: "yandexApiKey",
  instagram: "instagramSessionId",
};

const csv = z
  .string()
  .optional()
  .transform((value) =>
    value === undefined
      ? []
      : value
          .split(",")
          .map((item) => item.trim())
          .filter((item) => item.length > 0),
  );

const optionalSecret = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

function positiveInt(fallback: number) {
  return z.coerce.number().int().positive().default(fallback);
}

const envSchema = z.object({
  RUN_MODE: z.enum(["once", "schedule"]).default("schedule"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default(DEFAULT_LOG_LEVEL),
  DB_PATH: z.string().min(1).default(DEFAULT_DB_PATH),
  ENABLED_SOURCES: csv,
  ENABLED_NICHES: csv,
  TARGET_CITIES: csv,
  TWOGIS_API_KEY: optionalSecret,
  YANDEX_API_KEY: optionalSecret,
  INSTAGRAM_SESSION_ID: optionalSecret,
  SCRAPING_TIME: z
    .string()
    .regex(/^([01]\d|2[0-3]):[0-5]\d$/, "must be HH:MM (24h)")
    .default(DEFAULT_SCRAPING_TIME),
  MAX_ATTEMPTS_PER_UNIT: positiveInt(DEFAULT_MAX_ATTEMPTS_PER_UNIT),
  CONCURRENCY_PER_SOURCE: positiveInt(DEFAULT_CONCURRENCY_PER_SOURCE),
  MIN_REQUEST_INTERVAL_MS: z.coerce.number().int().nonnegative().default(DEFAULT_MIN_REQUEST_INTERVAL_MS),
  LIMIT_PER_UNIT: positiveInt(DEFAULT_LIMIT_PER_UNIT),
});

/**
 * Resolves a csv list against a closed set; "all" or empty selects everything
 */
function selectFrom<T extends string>(
  values: string[],
  allowed: readonly T[],
  variable: string,
  issues: string[],
): T[] {
  if (values.length === 0 || values.some((v) => v.toLowerCase() === "all")) {
    return [...allowed];
  }
  const selected: T[] = [];
  for (const value of values) {
    const match = allowed.find((item) => item === value);
    if (match === undefined) {
      issues.push(`${variable}: unknown value "${value}" (allowed: ${allowed.join(", ")})`);
    } else if (!selected.includes(match)) {
      selected.push(match);
    }
  }
  return selected;
}

/**
 * Parse and validate configuration from environment variables.
 *
 * @param env - Defaults to process.env
 * @returns Validated configuration
 * @throws {ConfigError} When a variable has an invalid value
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }
  const vars = parsed.data;

  const issues: string[] = [];
  const requestedSources = selectFrom<SourceId>(vars.ENABLED_SOURCES, SOURCE_IDS, "ENABLED_SOURCES", issues);
  const enabledNiches = selectFrom<Niche>(vars.ENABLED_NICHES, NICHES, "ENABLED_NICHES", issues);
  if (issues.length > 0) {
    throw new ConfigError(issues);
  }

  const credentials = {
    twogisApiKey: vars.TWOGIS_API_KEY,
    yandexApiKey: vars.YANDEX_API_KEY,
    instagramSessionId: vars.INSTAGRAM_SESSION_ID,
  };

  const enabledSources = requestedSources.filter((sourceId) => {
    const credential = SOURCE_CREDENTIAL[sourceId];
    if (credential && !credentials[credential]) {
      logger.warn("Source disabled: credential not configured", { sourceId, credential });
      return false;
    }
    return true;
  });

  return {
    runMode: vars.RUN_MODE,
    logLevel: vars.LOG_LEVEL,
    dbPath: vars.DB_PATH,
    enabledSources,
    enabledNiches,
    cities: vars.TARGET_CITIES.length > 0 ? vars.TARGET_CITIES : [...DEFAULT_CITIES],
    credentials,
    scrapingTime: vars.SCRAPING_TIME,
    maxAttemptsPerUnit: vars.MAX_ATTEMPTS_PER_UNIT,
    concurrencyPerSource: vars.CONCURRENCY_PER_SOURCE,
    minRequestIntervalMs: vars.MIN_REQUEST_INTERVAL_MS,
    limitPerUnit: vars.LIMIT_PER_UNIT,
  };
}
