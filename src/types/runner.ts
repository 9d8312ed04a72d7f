/**
 * Aggregation run type definitions
 */

import type { LeadCategory, Niche } from "./lead";
import type { SourceId } from "./sources";

/**
 * Run state machine: PENDING -> RUNNING -> COMPLETED | PARTIAL | FAILED
 */
export type RunState = "PENDING" | "RUNNING" | RunStatus;

export type RunStatus = "COMPLETED" | "PARTIAL" | "FAILED";

/**
 * One fetch task within a run
 */
export type WorkUnit = {
  sourceId: SourceId;
  category: Niche;
  city: string;
};

/**
 * Labels from the source error taxonomy, plus cancellation
 */
export type FailureLabel =
  | "SourceUnavailable"
  | "RateLimited"
  | "AuthRejected"
  | "MalformedResponse"
  | "Cancelled";

export type UnitFailure = {
  sourceId: SourceId;
  category: Niche;
  city: string;
  label: FailureLabel;
  attempts: number;
};

export type UnitResult =
  | {
      unit: WorkUnit;
      ok: true;
      attempts: number;
      listings: number;
      skipped: number;
    }
  | {
      unit: WorkUnit;
      ok: false;
      attempts: number;
      label: FailureLabel;
      message: string;
    };

export type SourceUnitCounts = {
  succeeded: number;
  failed: number;
};

/**
 * Event delivered to the export/notification collaborator after a run
 */
export type SnapshotReadyEvent = {
  runId: string;
  startedAt: string;
  finishedAt: string;
  status: RunStatus;
  perSource: Partial<Record<SourceId, SourceUnitCounts>>;
  totalNew: number;
  totalUpdated: number;
  /** Leads touched in this run, by category */
  countsByCategory: Partial<Record<LeadCategory, number>>;
  /** Leads touched in this run, by city */
  countsByCity: Record<string, number>;
  /** Normalized records fetched in this run, by source */
  countsBySource: Partial<Record<SourceId, number>>;
  /** Records dropped by normalization (no usable name) */
  skipped: number;
  /** Clusters whose merge or upsert failed; the run continued without them */
  mergeFailures: number;
  failures: UnitFailure[];
};

/**
 * Outcome of one orchestrator invocation
 */
export type RunOutcome =
  | { kind: "ran"; snapshot: SnapshotReadyEvent }
  | { kind: "skipped"; reason: "LOCKED" };

export type SnapshotListener = (event: SnapshotReadyEvent) => void;
