/**
 * Identity & matching engine
 *
 * Groups the partial records of one run into clusters that denote the same
 * business, then resolves each cluster against persisted leads.
 *
 * Rules, strongest first:
 * 1. a shared canonical phone joins records even when their names differ
 * 2. an equal name key (name + city + category) joins records, unless both
 *    carry phones and share none
 * 3. (optional) similar names within one city and category join records
 */

import type { LeadStore, StoredLead } from "@/interfaces";
import type { PartialLead } from "@/types";
import {
  PHONE_KEY_PREFIX,
  computeIdentityKey,
  nameKey,
  nameSimilarity,
} from "@/utils/identity/leadIdentity";
import { normalizeText } from "@/utils/text/textNormalization";
import * as logger from "@/logger";

export type MatchingOptions = {
  /**
   * Token-set Jaccard threshold in (0, 1] for joining records by name.
   * Unset disables fuzzy matching.
   */
  fuzzyNameThreshold?: number;
};

export type LeadCluster = {
  /** Members in arrival order */
  partials: PartialLead[];
  /** Identity keys and name keys of the members, sorted, no duplicates */
  keys: string[];
  /** Canonical phones of the members, sorted, no duplicates */
  phones: string[];
};

export type ResolvedCluster = LeadCluster & {
  /** Oldest persisted lead matched by any key or phone */
  persisted: StoredLead | null;
  /** Further persisted leads matched, left untouched */
  shadowed: StoredLead[];
};

/**
 * Disjoint-set forest over record indexes
 */
class UnionFind {
  private readonly parent: number[];

  constructor(size: number) {
    this.parent = Array.from({ length: size }, (_, index) => index);
  }

  find(index: number): number {
    let root = index;
    while (this.parent[root] !== root) {
      root = this.parent[root];
    }
    // Path compression
    let current = index;
    while (this.parent[current] !== root) {
      const next = this.parent[current];
      this.parent[current] = root;
      current = next;
    }
    return root;
  }

  union(a: number, b: number): void {
    const rootA = this.find(a);
    const rootB = this.find(b);
    if (rootA === rootB) return;
    // Lower index stays root so clusters order by first arrival
    if (rootA < rootB) {
      this.parent[rootB] = rootA;
    } else {
      this.parent[rootA] = rootB;
    }
  }
}

/**
 * Cluster one run's partial records
 *
 * @param partials - Normalized records of the run
 * @returns Clusters ordered by their first member's arrival
 */
export function clusterPartials(partials: PartialLead[], options: MatchingOptions = {}): LeadCluster[] {
  const ordered = [...partials].sort((a, b) => a.seenOrder - b.seenOrder);
  const identityKeys = ordered.map((partial) => computeIdentityKey(partial));
  const nameKeys = ordered.map((partial) => nameKey(partial.name, partial.city, partial.category));
  const forest = new UnionFind(ordered.length);

  const firstByPhone = new Map<string, number>();
  ordered.forEach((partial, index) => {
    for (const phone of partial.phones) {
      const phoneOwner = firstByPhone.get(phone);
      if (phoneOwner === undefined) {
        firstByPhone.set(phone, index);
      } else {
        forest.union(phoneOwner, index);
      }
    }
  });

  // Name anchor: first phone-bearing record with the key, else the first record
  const anchorByName = new Map<string, number>();
  ordered.forEach((partial, index) => {
    const anchor = anchorByName.get(nameKeys[index]);
    if (anchor === undefined || (ordered[anchor].phones.length === 0 && partial.phones.length > 0)) {
      anchorByName.set(nameKeys[index], index);
    }
  });
  ordered.forEach((partial, index) => {
    const anchor = anchorByName.get(nameKeys[index]);
    if (anchor === undefined || anchor === index) return;
    // Both carry phones and share none: the phones keep them apart
    if (partial.phones.length > 0 && ordered[anchor].phones.length > 0) return;
    forest.union(anchor, index);
  });

  const threshold = options.fuzzyNameThreshold;
  if (threshold !== undefined && threshold > 0 && threshold <= 1) {
    for (let i = 0; i < ordered.length; i++) {
      for (let j = i + 1; j < ordered.length; j++) {
        if (
          ordered[i].category === ordered[j].category &&
          normalizeText(ordered[i].city ?? "") === normalizeText(ordered[j].city ?? "") &&
          nameSimilarity(ordered[i].name, ordered[j].name) >= threshold
        ) {
          forest.union(i, j);
        }
      }
    }
  }

  const groups = new Map<number, number[]>();
  ordered.forEach((_, index) => {
    const root = forest.find(index);
    const members = groups.get(root) ?? [];
    members.push(index);
    groups.set(root, members);
  });

  return [...groups.entries()]
    .sort(([rootA], [rootB]) => rootA - rootB)
    .map(([, members]) => ({
      partials: members.map((index) => ordered[index]),
      keys: [...new Set(members.flatMap((index) => [identityKeys[index], nameKeys[index]]))].sort(),
      phones: [...new Set(members.flatMap((index) => ordered[index].phones))].sort(),
    }));
}

function phonesDisjoint(a: string[], b: string[]): boolean {
  return a.length > 0 && b.length > 0 && !a.some((phone) => b.includes(phone));
}

function compareByAge(a: StoredLead, b: StoredLead): number {
  if (a.createdAt !== b.createdAt) return a.createdAt < b.createdAt ? -1 : 1;
  return a.id - b.id;
}

/**
 * Resolve a cluster against persisted history
 *
 * Looks up every member key (identity, name or alias) and every phone. A
 * lead found only through a name key is skipped when both sides carry
 * phones and share none. When several persisted leads match, the oldest
 * becomes the merge target and the others are reported as shadowed; none
 * is deleted.
 */
export async function resolvePersisted(cluster: LeadCluster, store: LeadStore): Promise<ResolvedCluster> {
  const matches = new Map<number, StoredLead>();

  for (const key of cluster.keys) {
    const lead = await store.findByIdentity(key);
    if (!lead) continue;
    if (!key.startsWith(PHONE_KEY_PREFIX) && phonesDisjoint(cluster.phones, lead.phones)) {
      logger.debug("Name key match with disjoint phones, kept apart", {
        key,
        persisted: lead.identityKey,
      });
      continue;
    }
    matches.set(lead.id, lead);
  }
  for (const phone of cluster.phones) {
    for (const lead of await store.findByPhone(phone)) {
      matches.set(lead.id, lead);
    }
  }

  const [persisted = null, ...shadowed] = [...matches.values()].sort(compareByAge);

  if (shadowed.length > 0) {
    logger.warn("Cluster matches several persisted leads, merging into the oldest", {
      target: persisted?.identityKey,
      shadowed: shadowed.map((lead) => lead.identityKey),
    });
  }

  return { ...cluster, persisted, shadowed };
}
