/**
 * LeadStore Interface
 *
 * Persistence gateway consumed by the aggregation pipeline. Methods are
 * asynchronous so any engine fits behind it; the SQLite implementation
 * lives in src/db/sqliteLeadStore.ts.
 */

import type { Lead, LeadCategory, UpsertAction } from "@/types";

export type UpsertOptions = {
  /**
   * Further identity keys that should resolve to this lead from now on
   * (keys of the partial records merged into it)
   */
  aliasKeys?: string[];
};

export type StoredLead = Lead & {
  /** Store-assigned row id */
  id: number;
  createdAt: string;
};

export interface LeadStore {
  /**
   * Insert or update the lead stored under `lead.identityKey`
   *
   * Atomic per key. An existing row keeps its identity key.
   */
  upsert(lead: Lead, options?: UpsertOptions): Promise<UpsertAction>;

  /**
   * Find a lead by identity key or by any alias key recorded for it
   */
  findByIdentity(key: string): Promise<StoredLead | null>;

  findByCategory(category: LeadCategory): Promise<StoredLead[]>;

  exists(key: string): Promise<boolean>;

  /**
   * Leads carrying the canonical phone, oldest first
   */
  findByPhone(phone: string): Promise<StoredLead[]>;

  /**
   * All leads, oldest first
   */
  listLeads(): Promise<StoredLead[]>;

  countLeads(): Promise<number>;
}
