/**
 * Database type definitions
 *
 * Row shapes for the tables created in migrations/.
 */

import type { RunStatus, FailureLabel } from "./runner";
import type { UpsertAction } from "./lead";

/**
 * leads table row
 *
 * JSON columns: phones (string[]), social (object), sources (string[])
 */
export type LeadRow = {
  id: number;
  identity_key: string;
  name: string;
  category: string;
  address: string;
  city: string;
  district: string;
  phones: string;
  email: string | null;
  website: string | null;
  social: string;
  rating: number | null;
  review_count: number | null;
  lat: number | null;
  lon: number | null;
  source: string;
  sources: string;
  created_at: string;
  updated_at: string;
};

/**
 * lead_keys table row: every identity key ever resolved to a lead
 */
export type LeadKeyRow = {
  key: string;
  lead_id: number;
};

export type AggregationRunRow = {
  id: number;
  run_id: string;
  started_at: string;
  finished_at: string | null;
  status: RunStatus | "RUNNING";
  units_total: number;
  units_failed: number;
  listings_fetched: number;
  listings_skipped: number;
  leads_inserted: number;
  leads_updated: number;
  failures_json: string | null;
};

export type AggregationRunInput = {
  run_id: string;
  started_at: string;
  units_total: number;
};

export type AggregationRunUpdate = {
  finished_at: string;
  status: RunStatus;
  units_failed: number;
  listings_fetched: number;
  listings_skipped: number;
  leads_inserted: number;
  leads_updated: number;
  failures_json: string | null;
};

export type RunUnitRow = {
  id: number;
  run_id: string;
  source: string;
  category: string;
  city: string;
  ok: number;
  attempts: number;
  listings: number;
  failure_label: FailureLabel | null;
  error_message: string | null;
};

export type RunLeadRow = {
  run_id: string;
  lead_id: number;
  action: UpsertAction;
};

/**
 * Aggregate counts over the persisted lead set
 */
export type LeadStats = {
  total: number;
  byCategory: Record<string, number>;
  bySource: Record<string, number>;
  byCity: Record<string, number>;
  withPhone: number;
  withEmail: number;
  withWebsite: number;
  withInstagram: number;
};
