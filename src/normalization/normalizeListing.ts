/**
 * Listing normalizer
 *
 * One pure function per provider turns a RawListing into a PartialLead.
 * A field that fails to parse is omitted; a listing without a usable name
 * is skipped.
 */

import type {
  CatalogRuntime,
  ClassifiedRawListing,
  EgrRawListing,
  InstagramRawListing,
  NormalizationResult,
  PartialLead,
  RawListing,
  SocialLinks,
  TwoGisRawListing,
  YandexRawListing,
} from "@/types";
import { SOCIAL_PLATFORMS } from "@/types";
import { SOURCE_TRUST } from "@/constants";
import { resolveCategory } from "./category";
import { resolveCity } from "./city";
import {
  extractEmail,
  extractWebsite,
  normalizeRating,
  normalizeReviewCount,
  normalizeWebsite,
} from "./contact";
import { toGeoPoint } from "./geo";
import { canonicalizePhones, extractPhones } from "./phone";
import { extractSocialLinks, normalizeInstagramHandle } from "./social";

export type NormalizeContext = {
  catalog: CatalogRuntime;
  /** Arrival position of the listing within the run */
  seenOrder: number;
};

/** Listing fields every variant shares, minus what the provider fills */
type LeadBase = Pick<PartialLead, "source" | "trust" | "seenOrder" | "observedAt">;

function cleanText(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const cleaned = value.replace(/\s+/g, " ").trim();
  return cleaned.length > 0 ? cleaned : undefined;
}

/**
 * Strip wrapping quotes registries put around trade names
 *
 * @example
 * cleanName('ООО «Мастер Дом»') // "ООО Мастер Дом"
 */
function cleanName(value: string | undefined): string | undefined {
  return cleanText(value?.replace(/["«»“”„]/g, ""));
}

/**
 * First handle per platform across the given sets
 */
function mergeSocial(...sets: SocialLinks[]): SocialLinks {
  const merged: SocialLinks = {};
  for (const set of sets) {
    for (const platform of SOCIAL_PLATFORMS) {
      const handle = set[platform];
      if (handle && !merged[platform]) {
        merged[platform] = handle;
      }
    }
  }
  return merged;
}

function normalizeTwoGis(
  listing: TwoGisRawListing,
  base: LeadBase,
  catalog: CatalogRuntime,
): PartialLead | null {
  const name = cleanName(listing.name);
  if (!name) return null;

  const phoneValues: string[] = [];
  let email: string | undefined;
  let website: string | undefined;
  let social: SocialLinks = {};

  for (const contact of listing.contacts) {
    const value = contact.value ?? contact.text ?? "";
    switch (contact.type) {
      case "phone":
        phoneValues.push(value);
        break;
      case "email":
        email ??= extractEmail(value);
        break;
      case "website":
        website ??= normalizeWebsite(contact.text ?? contact.value);
        break;
      default:
        social = mergeSocial(social, extractSocialLinks(value));
    }
  }

  return {
    ...base,
    name,
    category: resolveCategory(catalog, listing.categoryHint, listing.rubrics),
    address: cleanText(listing.address),
    city: resolveCity(catalog, listing.city, listing.cityHint),
    district: cleanText(listing.district),
    phones: canonicalizePhones(phoneValues),
    email,
    website,
    social,
    rating: normalizeRating(listing.rating),
    reviewCount: normalizeReviewCount(listing.reviewCount),
    geo: toGeoPoint(listing.lat, listing.lon),
  };
}

function normalizeYandex(
  listing: YandexRawListing,
  base: LeadBase,
  catalog: CatalogRuntime,
): PartialLead | null {
  const name = cleanName(listing.name);
  if (!name) return null;

  const [lon, lat] = listing.coordinates ?? [];

  return {
    ...base,
    name,
    category: resolveCategory(catalog, listing.categoryHint, listing.categories),
    address: cleanText(listing.address),
    city: resolveCity(catalog, listing.address, listing.cityHint),
    phones: canonicalizePhones(listing.phones),
    website: normalizeWebsite(listing.url),
    social: extractSocialLinks(listing.url),
    geo: toGeoPoint(lat, lon),
  };
}

function normalizeEgr(
  listing: EgrRawListing,
  base: LeadBase,
  catalog: CatalogRuntime,
): PartialLead | null {
  const name = cleanName(listing.name);
  if (!name) return null;

  return {
    ...base,
    name,
    category: resolveCategory(catalog, listing.categoryHint, [name]),
    address: cleanText(listing.address),
    city: resolveCity(catalog, listing.address ?? listing.region, listing.cityHint),
    phones: [],
    social: {},
  };
}

function normalizeClassified(
  listing: ClassifiedRawListing,
  base: LeadBase,
  catalog: CatalogRuntime,
): PartialLead | null {
  const name = cleanText(listing.title);
  if (!name) return null;

  const text = `${name}\n${listing.description}`;

  return {
    ...base,
    name,
    category: resolveCategory(catalog, listing.categoryHint, [text]),
    address: cleanText(listing.location),
    city: resolveCity(catalog, listing.location, listing.cityHint),
    phones: extractPhones(text),
    email: extractEmail(text),
    website: extractWebsite(listing.description),
    social: extractSocialLinks(listing.description),
  };
}

function normalizeInstagram(
  listing: InstagramRawListing,
  base: LeadBase,
  catalog: CatalogRuntime,
): PartialLead | null {
  const name = cleanText(listing.username);
  const handle = normalizeInstagramHandle(listing.username);
  if (!name || !handle) return null;

  return {
    ...base,
    name,
    category: resolveCategory(catalog, listing.categoryHint, [listing.caption]),
    city: resolveCity(catalog, undefined, listing.cityHint),
    phones: extractPhones(listing.caption),
    email: extractEmail(listing.caption),
    website: extractWebsite(listing.caption),
    social: mergeSocial({ instagram: handle }, extractSocialLinks(listing.caption)),
  };
}

/**
 * Normalize one raw listing into a partial lead
 *
 * @param listing - Raw listing from any adapter
 * @param context - Catalog and arrival position
 * @returns The partial lead, or a skip when no usable name is present
 */
export function normalizeListing(listing: RawListing, context: NormalizeContext): NormalizationResult {
  const base: LeadBase = {
    source: listing.source,
    trust: SOURCE_TRUST[listing.source],
    seenOrder: context.seenOrder,
    observedAt: listing.fetchedAt,
  };

  let lead: PartialLead | null;
  switch (listing.source) {
    case "twogis":
      lead = normalizeTwoGis(listing, base, context.catalog);
      break;
    case "yandex_maps":
      lead = normalizeYandex(listing, base, context.catalog);
      break;
    case "egr":
      lead = normalizeEgr(listing, base, context.catalog);
      break;
    case "onliner":
    case "deal":
      lead = normalizeClassified(listing, base, context.catalog);
      break;
    case "instagram":
      lead = normalizeInstagram(listing, base, context.catalog);
      break;
    default: {
      const unreachable: never = listing;
      throw new Error(`Unhandled listing source: ${JSON.stringify(unreachable)}`);
    }
  }

  return lead ? { kind: "lead", lead } : { kind: "skip", reason: "missing_name" };
}
