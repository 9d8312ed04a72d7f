/**
 * SQLite-backed LeadStore
 *
 * Wraps the synchronous leads repository behind the asynchronous
 * persistence gateway. Each upsert runs in its own transaction.
 */

import type { Lead, LeadCategory, UpsertAction } from "@/types";
import type { LeadStore, StoredLead, UpsertOptions } from "@/interfaces";
import {
  countLeads,
  findLeadsByCategory,
  findLeadsByPhone,
  getLeadByKey,
  leadKeyExists,
  listLeads,
  upsertLead,
} from "./repos/leadsRepo";

export class SqliteLeadStore implements LeadStore {
  async upsert(lead: Lead, options: UpsertOptions = {}): Promise<UpsertAction> {
    return upsertLead(lead, options.aliasKeys).action;
  }

  async findByIdentity(key: string): Promise<StoredLead | null> {
    return getLeadByKey(key);
  }

  async findByCategory(category: LeadCategory): Promise<StoredLead[]> {
    return findLeadsByCategory(category);
  }

  async exists(key: string): Promise<boolean> {
    return leadKeyExists(key);
  }

  async findByPhone(phone: string): Promise<StoredLead[]> {
    return findLeadsByPhone(phone);
  }

  async listLeads(): Promise<StoredLead[]> {
    return listLeads();
  }

  async countLeads(): Promise<number> {
    return countLeads();
  }
}
