/**
 * Lead type definitions
 *
 * The canonical, deduplicated business record and the partial records
 * each source contributes before merging.
 */

import type { SourceId, SourceTrust } from "./sources";

/**
 * Fixed set of service niches a lead can belong to
 */
export const NICHES = [
  "auto_service",
  "handyman",
  "cleaning",
  "moving",
  "education",
  "fitness",
  "photo_video",
  "legal",
  "psychology",
  "tattoo",
] as const;

export type Niche = (typeof NICHES)[number];

/**
 * Lead category: one of the niches, or "unknown" when a source category
 * could not be mapped
 */
export type LeadCategory = Niche | "unknown";

export const SOCIAL_PLATFORMS = [
  "instagram",
  "facebook",
  "vk",
  "telegram",
] as const;

export type SocialPlatform = (typeof SOCIAL_PLATFORMS)[number];

export type SocialLinks = Partial<Record<SocialPlatform, string>>;

export type GeoPoint = {
  lat: number;
  lon: number;
};

/**
 * Canonical lead (one real-world business across all sources)
 */
export type Lead = {
  name: string;
  category: LeadCategory;
  address: string;
  city: string;
  district: string;
  /** Canonical phone numbers, sorted, no duplicates */
  phones: string[];
  email?: string;
  website?: string;
  social: SocialLinks;
  /** 0..5 */
  rating?: number;
  reviewCount?: number;
  geo?: GeoPoint;
  /** Single contributing provider, or "merged" */
  source: SourceId | "merged";
  /** Every provider that ever contributed, sorted */
  sources: SourceId[];
  /** ISO 8601 timestamp of the last merge touching this lead */
  updatedAt: string;
  identityKey: string;
};

/**
 * Lead-shaped record produced by a normalizer from one raw listing.
 * Only the fields the source could supply are populated.
 */
export type PartialLead = {
  name: string;
  category: LeadCategory;
  address?: string;
  city?: string;
  district?: string;
  phones: string[];
  email?: string;
  website?: string;
  social: SocialLinks;
  rating?: number;
  reviewCount?: number;
  geo?: GeoPoint;
  source: SourceId;
  trust: SourceTrust;
  /** Position in the run's arrival order (lower = seen first) */
  seenOrder: number;
  /** ISO 8601 timestamp of the fetch that produced this record */
  observedAt: string;
};

/**
 * Upsert outcome reported by the persistence gateway
 */
export type UpsertAction = "inserted" | "updated";

/**
 * Reasons a raw listing yields no partial lead
 */
export type NormalizationSkipReason = "missing_name";

/**
 * Outcome of normalizing one raw listing. A skip is counted, not an error.
 */
export type NormalizationResult =
  | { kind: "lead"; lead: PartialLead }
  | { kind: "skip"; reason: NormalizationSkipReason };
