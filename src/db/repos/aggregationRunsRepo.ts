/**
 * Aggregation runs repository
 *
 * Data access layer for aggregation_runs, run_units and run_leads tables.
 */

import type {
  AggregationRunInput,
  AggregationRunRow,
  AggregationRunUpdate,
  RunLeadRow,
  RunUnitRow,
  UnitResult,
  UpsertAction,
} from "@/types";
import { getDb } from "../connection";

export function createAggregationRun(input: AggregationRunInput): void {
  getDb()
    .prepare(
      `
    INSERT INTO aggregation_runs (run_id, started_at, units_total, status)
    VALUES (?, ?, ?, 'RUNNING')
  `,
    )
    .run(input.run_id, input.started_at, input.units_total);
}

export function finishAggregationRun(
  runId: string,
  update: AggregationRunUpdate,
): void {
  getDb()
    .prepare(
      `
    UPDATE aggregation_runs SET
      finished_at = @finished_at,
      status = @status,
      units_failed = @units_failed,
      listings_fetched = @listings_fetched,
      listings_skipped = @listings_skipped,
      leads_inserted = @leads_inserted,
      leads_updated = @leads_updated,
      failures_json = @failures_json
    WHERE run_id = @run_id
  `,
    )
    .run({ ...update, run_id: runId });
}

export function getAggregationRun(runId: string): AggregationRunRow | null {
  const row = getDb()
    .prepare<[string], AggregationRunRow>(
      "SELECT * FROM aggregation_runs WHERE run_id = ?",
    )
    .get(runId);
  return row ?? null;
}

/**
 * Most recent runs first
 */
export function listAggregationRuns(limit = 20): AggregationRunRow[] {
  return getDb()
    .prepare<[number], AggregationRunRow>(
      "SELECT * FROM aggregation_runs ORDER BY id DESC LIMIT ?",
    )
    .all(limit);
}

export function insertRunUnit(runId: string, result: UnitResult): void {
  getDb()
    .prepare(
      `
    INSERT INTO run_units (
      run_id, source, category, city, ok, attempts, listings,
      failure_label, error_message
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
  `,
    )
    .run(
      runId,
      result.unit.sourceId,
      result.unit.category,
      result.unit.city,
      result.ok ? 1 : 0,
      result.attempts,
      result.ok ? result.listings : 0,
      result.ok ? null : result.label,
      result.ok ? null : result.message,
    );
}

export function listRunUnits(runId: string): RunUnitRow[] {
  return getDb()
    .prepare<[string], RunUnitRow>(
      "SELECT * FROM run_units WHERE run_id = ? ORDER BY id ASC",
    )
    .all(runId);
}

/**
 * Record the leads a run touched. The first action recorded for a lead
 * within a run is kept.
 */
export function insertRunLeads(
  runId: string,
  touched: Array<{ identityKey: string; action: UpsertAction }>,
): void {
  const db = getDb();
  const insert = db.prepare(
    `
    INSERT OR IGNORE INTO run_leads (run_id, lead_id, action)
    SELECT ?, lead_id, ? FROM lead_keys WHERE key = ?
  `,
  );

  const transaction = db.transaction(() => {
    for (const entry of touched) {
      insert.run(runId, entry.action, entry.identityKey);
    }
  });

  transaction();
}

export function listRunLeads(runId: string): RunLeadRow[] {
  return getDb()
    .prepare<[string], RunLeadRow>(
      "SELECT * FROM run_leads WHERE run_id = ? ORDER BY lead_id ASC",
    )
    .all(runId);
}
