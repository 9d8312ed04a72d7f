/**
 * Application configuration type definitions
 */

import type { LogLevel } from "./logger";
import type { Niche } from "./lead";
import type { SourceId } from "./sources";

export type RunMode = "once" | "schedule";

export type SourceCredentials = {
  twogisApiKey?: string;
  yandexApiKey?: string;
  instagramSessionId?: string;
};

export type AppConfig = {
  runMode: RunMode;
  logLevel: LogLevel;
  dbPath: string;
  enabledSources: SourceId[];
  enabledNiches: Niche[];
  cities: string[];
  credentials: SourceCredentials;
  /** Daily trigger, "HH:MM" UTC */
  scrapingTime: string;
  maxAttemptsPerUnit: number;
  concurrencyPerSource: number;
  minRequestIntervalMs: number;
  limitPerUnit: number;
};
