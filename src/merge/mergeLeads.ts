/**
 * Merge/dedup engine
 *
 * Folds one cluster (partial records of a run plus an optional persisted
 * lead) into a single canonical lead. Pure: the clock is injected.
 *
 * Priority order: structured before scraped, then arrival order within
 * the run; the persisted lead comes last, so fresh data supersedes stale
 * data while a populated field never becomes empty.
 */

import type {
  GeoPoint,
  Lead,
  LeadCategory,
  PartialLead,
  SocialLinks,
  SourceId,
  SourceTrust,
} from "@/types";
import { SOCIAL_PLATFORMS } from "@/types";
import { computeIdentityKey } from "@/utils/identity/leadIdentity";

const TRUST_RANK: Record<SourceTrust, number> = {
  structured: 0,
  scraped: 1,
};

type ScalarValues = {
  address: string;
  city: string;
  district: string;
  email: string;
  website: string;
  rating: number;
  reviewCount: number;
  geo: GeoPoint;
};

type ScalarField = keyof ScalarValues;

/**
 * One record contributing to a merge, in a shape shared by partials and
 * the persisted lead
 */
type Contribution = {
  name: string;
  category: LeadCategory;
  phones: string[];
  social: SocialLinks;
  sources: SourceId[];
  /** Lower is higher priority */
  rank: number;
  seenOrder: number;
  observedAt: string;
  values: Partial<ScalarValues>;
};

export type MergeConflict = {
  field: ScalarField;
  kept: unknown;
  dropped: unknown;
  keptSource: SourceId[];
  droppedSource: SourceId[];
};

export type MergeInput = {
  partials: PartialLead[];
  persisted?: Lead | null;
  now: Date;
};

export type MergeResult = {
  lead: Lead;
  conflicts: MergeConflict[];
};

function pickScalars(record: Partial<ScalarValues>): Partial<ScalarValues> {
  const values: Partial<ScalarValues> = {};
  if (record.address) values.address = record.address;
  if (record.city) values.city = record.city;
  if (record.district) values.district = record.district;
  if (record.email) values.email = record.email;
  if (record.website) values.website = record.website;
  if (record.rating !== undefined) values.rating = record.rating;
  if (record.reviewCount !== undefined) values.reviewCount = record.reviewCount;
  if (record.geo) values.geo = record.geo;
  return values;
}

function fromPartial(partial: PartialLead): Contribution {
  return {
    name: partial.name.trim(),
    category: partial.category,
    phones: partial.phones,
    social: partial.social,
    sources: [partial.source],
    rank: TRUST_RANK[partial.trust],
    seenOrder: partial.seenOrder,
    observedAt: partial.observedAt,
    values: pickScalars(partial),
  };
}

function fromPersisted(lead: Lead): Contribution {
  return {
    name: lead.name.trim(),
    category: lead.category,
    phones: lead.phones,
    social: lead.social,
    sources: lead.sources,
    rank: Number.MAX_SAFE_INTEGER,
    seenOrder: Number.MAX_SAFE_INTEGER,
    observedAt: lead.updatedAt,
    values: pickScalars(lead),
  };
}

/**
 * Priority order; on an exact tie the newer observation goes first
 */
function comparePriority(a: Contribution, b: Contribution): number {
  if (a.rank !== b.rank) return a.rank - b.rank;
  if (a.seenOrder !== b.seenOrder) return a.seenOrder - b.seenOrder;
  if (a.observedAt === b.observedAt) return 0;
  return a.observedAt > b.observedAt ? -1 : 1;
}

function sameValue(a: unknown, b: unknown): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}

/**
 * Longest non-empty name; ties keep the higher-priority record
 */
function pickName(ordered: Contribution[]): string {
  let best = "";
  for (const record of ordered) {
    if (record.name.length > best.length) {
      best = record.name;
    }
  }
  return best;
}

function pickCategory(ordered: Contribution[]): LeadCategory {
  return ordered.find((record) => record.category !== "unknown")?.category ?? "unknown";
}

function pickScalar<F extends ScalarField>(
  field: F,
  ordered: Contribution[],
  conflicts: MergeConflict[],
): ScalarValues[F] | undefined {
  const winner = ordered.find((record) => record.values[field] !== undefined);
  if (!winner) return undefined;

  const kept = winner.values[field];
  for (const record of ordered) {
    if (record === winner) continue;
    const other = record.values[field];
    if (
      other !== undefined &&
      record.rank === winner.rank &&
      record.seenOrder === winner.seenOrder &&
      !sameValue(kept, other)
    ) {
      conflicts.push({
        field,
        kept,
        dropped: other,
        keptSource: winner.sources,
        droppedSource: record.sources,
      });
    }
  }
  return kept;
}

function unionPhones(ordered: Contribution[]): string[] {
  return [...new Set(ordered.flatMap((record) => record.phones))].sort();
}

function unionSocial(ordered: Contribution[]): SocialLinks {
  const social: SocialLinks = {};
  // Keys in alphabetical order
  for (const platform of [...SOCIAL_PLATFORMS].sort()) {
    const record = ordered.find((candidate) => candidate.social[platform]);
    const handle = record?.social[platform];
    if (handle) social[platform] = handle;
  }
  return social;
}

/**
 * Merge a cluster into one canonical lead
 *
 * - name: longest non-empty, ties by priority
 * - address, city, district, email, website, rating, reviewCount, geo:
 *   first present value in priority order
 * - phones, social, sources: union (social keeps the first handle per platform)
 * - source: the single contributing provider, or "merged"
 * - identityKey: kept from the persisted lead, computed otherwise
 *
 * @throws {Error} When the cluster is empty
 */
export function mergeLeads(input: MergeInput): MergeResult {
  const contributions = input.partials.map(fromPartial);
  if (input.persisted) {
    contributions.push(fromPersisted(input.persisted));
  }
  if (contributions.length === 0) {
    throw new Error("Cannot merge an empty cluster");
  }

  const ordered = [...contributions].sort(comparePriority);
  const conflicts: MergeConflict[] = [];

  const email = pickScalar("email", ordered, conflicts);
  const website = pickScalar("website", ordered, conflicts);
  const rating = pickScalar("rating", ordered, conflicts);
  const reviewCount = pickScalar("reviewCount", ordered, conflicts);
  const geo = pickScalar("geo", ordered, conflicts);

  const sources = [...new Set(ordered.flatMap((record) => record.sources))].sort();
  const phones = unionPhones(ordered);
  const name = pickName(ordered);
  const category = pickCategory(ordered);
  const city = pickScalar("city", ordered, conflicts) ?? "";

  const lead: Lead = {
    name,
    category,
    address: pickScalar("address", ordered, conflicts) ?? "",
    city,
    district: pickScalar("district", ordered, conflicts) ?? "",
    phones,
    social: unionSocial(ordered),
    source: sources.length === 1 ? sources[0] : "merged",
    sources,
    updatedAt: input.now.toISOString(),
    identityKey:
      input.persisted?.identityKey ?? computeIdentityKey({ name, city, category, phones }),
  };
  if (email !== undefined) lead.email = email;
  if (website !== undefined) lead.website = website;
  if (rating !== undefined) lead.rating = rating;
  if (reviewCount !== undefined) lead.reviewCount = reviewCount;
  if (geo !== undefined) lead.geo = geo;

  return { lead, conflicts };
}
