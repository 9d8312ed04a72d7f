/**
 * Source adapter type definitions
 *
 * RawListing is a closed union with one variant per provider. Only the
 * provider's own normalizer reads the provider-specific fields.
 */

import type { Niche } from "./lead";

export const SOURCE_IDS = [
  "twogis",
  "yandex_maps",
  "egr",
  "onliner",
  "deal",
  "instagram",
] as const;

export type SourceId = (typeof SOURCE_IDS)[number];

/**
 * Field-completeness trust tier
 *
 * - structured: reached through a defined API contract
 * - scraped: parsed from HTML or free text
 */
export type SourceTrust = "structured" | "scraped";

type RawListingBase = {
  categoryHint: Niche;
  cityHint: string;
  /** ISO 8601 fetch timestamp */
  fetchedAt: string;
  sourceRecordId?: string;
  sourceUrl?: string;
};

export type TwoGisContact = {
  type: string;
  value?: string;
  text?: string;
};

export type TwoGisRawListing = RawListingBase & {
  source: "twogis";
  name?: string;
  address?: string;
  city?: string;
  district?: string;
  lat?: number;
  lon?: number;
  contacts: TwoGisContact[];
  rubrics: string[];
  rating?: number;
  reviewCount?: number;
};

export type YandexRawListing = RawListingBase & {
  source: "yandex_maps";
  name?: string;
  address?: string;
  /** [lon, lat] as delivered by the API */
  coordinates?: number[];
  phones: string[];
  url?: string;
  categories: string[];
  /** Matched search query */
  query: string;
};

export type EgrRawListing = RawListingBase & {
  source: "egr";
  name?: string;
  address?: string;
  region?: string;
  /** Taxpayer registration number */
  unp?: string;
  legalForm?: string;
  okedCodes: string[];
};

export type ClassifiedRawListing = RawListingBase & {
  source: "onliner" | "deal";
  title?: string;
  description: string;
  location?: string;
  link?: string;
};

export type InstagramRawListing = RawListingBase & {
  source: "instagram";
  username: string;
  caption: string;
  profileUrl: string;
};

export type RawListing =
  | TwoGisRawListing
  | YandexRawListing
  | EgrRawListing
  | ClassifiedRawListing
  | InstagramRawListing;

/**
 * One fetch request for a (category, city) pair
 */
export type FetchRequest = {
  category: Niche;
  city: string;
  /** Upper bound on listings, not a guarantee */
  limit: number;
};

/**
 * Capabilities the orchestrator lends to an adapter for one attempt
 */
export type FetchContext = {
  /** Cancellation reaching every in-flight request */
  signal: AbortSignal;
  /** Waits for the source's rate-limit budget before each request */
  throttle: () => Promise<void>;
};
