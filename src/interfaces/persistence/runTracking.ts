/**
 * Run tracking interfaces
 *
 * Run history and the cross-process run lock, consumed by the
 * aggregation orchestrator. SQLite implementations live in
 * src/db/sqliteRunTracking.ts.
 */

import type {
  RunLockAcquireResult,
  SnapshotReadyEvent,
  UnitResult,
  UpsertAction,
} from "@/types";

export type TouchedLead = {
  identityKey: string;
  action: UpsertAction;
};

export interface RunHistory {
  startRun(runId: string, startedAt: string, unitsTotal: number): void;

  recordUnit(runId: string, result: UnitResult): void;

  recordLeads(runId: string, touched: TouchedLead[]): void;

  finishRun(
    snapshot: SnapshotReadyEvent,
    totals: { unitsFailed: number; listingsFetched: number },
  ): void;
}

export interface RunLock {
  acquire(ownerId: string): RunLockAcquireResult;

  /** @returns false if the lock is no longer held by this owner */
  refresh(ownerId: string): boolean;

  release(ownerId: string): boolean;
}
