/**
 * SQLite-backed run history and run lock
 */

import type { RunHistory, RunLock } from "@/interfaces";
import {
  createAggregationRun,
  finishAggregationRun,
  insertRunLeads,
  insertRunUnit,
} from "./repos/aggregationRunsRepo";
import {
  acquireRunLock,
  refreshRunLock,
  releaseRunLock,
} from "./repos/runLockRepo";

export const sqliteRunHistory: RunHistory = {
  startRun(runId, startedAt, unitsTotal) {
    createAggregationRun({
      run_id: runId,
      started_at: startedAt,
      units_total: unitsTotal,
    });
  },

  recordUnit(runId, result) {
    insertRunUnit(runId, result);
  },

  recordLeads(runId, touched) {
    insertRunLeads(runId, touched);
  },

  finishRun(snapshot, totals) {
    finishAggregationRun(snapshot.runId, {
      finished_at: snapshot.finishedAt,
      status: snapshot.status,
      units_failed: totals.unitsFailed,
      listings_fetched: totals.listingsFetched,
      listings_skipped: snapshot.skipped,
      leads_inserted: snapshot.totalNew,
      leads_updated: snapshot.totalUpdated,
      failures_json:
        snapshot.failures.length > 0 ? JSON.stringify(snapshot.failures) : null,
    });
  },
};

export function createSqliteRunLock(ttlSeconds?: number): RunLock {
  return {
    acquire: (ownerId) => acquireRunLock(ownerId, ttlSeconds),
    refresh: (ownerId) => refreshRunLock(ownerId, ttlSeconds),
    release: (ownerId) => releaseRunLock(ownerId),
  };
}
