/**
 * Aggregation orchestrator
 *
 * One run: expand work units, fetch them through per-source pools, then
 * match, merge and persist the normalized records, and publish a snapshot.
 *
 * Run state machine: PENDING -> RUNNING -> COMPLETED | PARTIAL | FAILED
 */

import { randomUUID } from "crypto";
import pLimit, { type LimitFunction } from "p-limit";
import type {
  LeadStore,
  RunHistory,
  RunLock,
  SourceAdapter,
  TouchedLead,
} from "@/interfaces";
import type {
  AppConfig,
  CatalogRuntime,
  LeadCategory,
  Logger,
  PartialLead,
  RunOutcome,
  RunState,
  RunStatus,
  SnapshotListener,
  SnapshotReadyEvent,
  SourceId,
  SourceUnitCounts,
  UnitFailure,
  UnitResult,
  UpsertAction,
} from "@/types";
import {
  clusterPartials,
  resolvePersisted,
  type LeadCluster,
  type MatchingOptions,
} from "@/matching";
import { mergeLeads } from "@/merge";
import { getErrorMessage } from "@/errors";
import { KeyedMutex } from "@/utils/concurrency/keyedMutex";
import { RateLimiter } from "@/utils/concurrency/rateLimiter";
import { phoneKey } from "@/utils/identity/leadIdentity";
import { RUN_LOCK_REFRESH_INTERVAL_MS } from "@/constants";
import * as logger from "@/logger";
import { buildWorkUnits, describeUnit } from "./workUnits";
import {
  defaultRetryPolicy,
  executeUnit,
  type RetryPolicy,
  type UnitExecution,
} from "./unitExecutor";

export type OrchestratorSettings = Pick<
  AppConfig,
  | "enabledNiches"
  | "cities"
  | "maxAttemptsPerUnit"
  | "concurrencyPerSource"
  | "minRequestIntervalMs"
  | "limitPerUnit"
>;

export type AggregationOrchestratorDeps = {
  adapters: SourceAdapter[];
  store: LeadStore;
  catalog: CatalogRuntime;
  settings: OrchestratorSettings;
  matching?: MatchingOptions;
  runHistory?: RunHistory;
  runLock?: RunLock;
  /** Overrides the backoff derived from settings.maxAttemptsPerUnit */
  retryPolicy?: RetryPolicy;
  now?: () => Date;
  createRunId?: () => string;
};

export type RunOptions = {
  signal?: AbortSignal;
};

type TouchedLeadStats = {
  action: UpsertAction;
  category: LeadCategory;
  city: string;
};

type SourcePool = {
  limit: LimitFunction;
  limiter: RateLimiter;
};

type MergePhaseResult = {
  touched: Map<string, TouchedLeadStats>;
  failures: number;
};

/**
 * Final status from unit outcomes
 *
 * - COMPLETED: every unit succeeded (zero results included)
 * - PARTIAL: some succeeded, some failed, and records were produced
 * - FAILED: nothing succeeded, or failures left no usable record
 */
export function computeRunStatus(
  results: UnitResult[],
  recordsProduced: number,
): RunStatus {
  const succeeded = results.filter((r) => r.ok).length;
  const failed = results.length - succeeded;

  if (results.length === 0 || succeeded === 0) {
    return "FAILED";
  }
  if (failed === 0) {
    return "COMPLETED";
  }
  return recordsProduced > 0 ? "PARTIAL" : "FAILED";
}

/**
 * Critical-section keys for a cluster: identity and name keys plus phone keys, so
 * two clusters that could resolve to the same persisted lead serialize
 */
function clusterLockKeys(cluster: LeadCluster): string[] {
  return [...cluster.keys, ...cluster.phones.map(phoneKey)];
}

export class AggregationOrchestrator {
  private currentState: RunState = "PENDING";
  private readonly listeners = new Set<SnapshotListener>();
  private readonly mutex = new KeyedMutex();
  private readonly now: () => Date;
  private readonly createRunId: () => string;
  private readonly retryPolicy: RetryPolicy;

  constructor(private readonly deps: AggregationOrchestratorDeps) {
    this.now = deps.now ?? (() => new Date());
    this.createRunId = deps.createRunId ?? randomUUID;
    this.retryPolicy =
      deps.retryPolicy ?? defaultRetryPolicy(deps.settings.maxAttemptsPerUnit);
  }

  /**
   * State of the current or most recent run
   */
  get state(): RunState {
    return this.currentState;
  }

  /**
   * Subscribe to "snapshot ready" events
   *
   * @returns Unsubscribe function
   */
  onSnapshot(listener: SnapshotListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Execute one aggregation run
   *
   * Skips (no snapshot) when another run holds the lock, in this process
   * or another one. Cancellation through `signal` ends in-flight fetches
   * and backoff sleeps; the merge phase always finishes once started.
   */
  async run(options: RunOptions = {}): Promise<RunOutcome> {
    if (this.currentState === "RUNNING") {
      logger.warn("Aggregation run already in progress, skipping");
      return { kind: "skipped", reason: "LOCKED" };
    }

    const runId = this.createRunId();
    const { runLock } = this.deps;

    if (runLock) {
      const lockResult = runLock.acquire(runId);
      if (!lockResult.ok) {
        if (lockResult.reason === "LOCKED") {
          logger.warn("Run lock held by another process, skipping run", {
            runId,
          });
          return { kind: "skipped", reason: "LOCKED" };
        }
        throw new Error(`Run lock unavailable: ${lockResult.reason}`);
      }
      logger.debug("Global run lock acquired", { runId });
    }

    const refreshTimer = runLock
      ? setInterval(() => {
          if (!runLock.refresh(runId)) {
            logger.warn("Run lock refresh failed (no longer owned)", {
              runId,
            });
          }
        }, RUN_LOCK_REFRESH_INTERVAL_MS)
      : null;
    refreshTimer?.unref();

    this.currentState = "RUNNING";

    try {
      const snapshot = await this.execute(
        runId,
        options.signal ?? new AbortController().signal,
      );
      this.currentState = snapshot.status;
      this.publish(snapshot);
      return { kind: "ran", snapshot };
    } catch (error) {
      this.currentState = "FAILED";
      throw error;
    } finally {
      if (refreshTimer) {
        clearInterval(refreshTimer);
      }
      if (runLock) {
        if (runLock.release(runId)) {
          logger.debug("Global run lock released", { runId });
        } else {
          logger.warn("Failed to release run lock (may not be owned)", {
            runId,
          });
        }
      }
    }
  }

  private async execute(
    runId: string,
    signal: AbortSignal,
  ): Promise<SnapshotReadyEvent> {
    const { adapters, settings, runHistory } = this.deps;
    const startedAt = this.now().toISOString();
    const log = logger.withContext({ runId });

    const adapterById = new Map<SourceId, SourceAdapter>(
      adapters.map((adapter) => [adapter.id, adapter]),
    );
    const units = buildWorkUnits(
      [...adapterById.keys()],
      settings.enabledNiches,
      settings.cities,
    );

    log.info("Aggregation run started", {
      units: units.length,
      sources: [...adapterById.keys()],
    });
    runHistory?.startRun(runId, startedAt, units.length);

    let seenOrder = 0;
    const nextSeenOrder = (): number => seenOrder++;

    // Sources never share a pool or a rate limiter
    const pools = new Map<SourceId, SourcePool>();
    for (const sourceId of adapterById.keys()) {
      pools.set(sourceId, {
        limit: pLimit(Math.max(1, settings.concurrencyPerSource)),
        limiter: new RateLimiter(settings.minRequestIntervalMs),
      });
    }

    const executions = await Promise.all(
      units.map(async (unit): Promise<UnitExecution> => {
        const adapter = adapterById.get(unit.sourceId);
        const pool = pools.get(unit.sourceId);
        if (!adapter || !pool) {
          throw new Error(`No adapter for ${describeUnit(unit)}`);
        }

        const execution = await pool.limit(() =>
          executeUnit(adapter, unit, {
            catalog: this.deps.catalog,
            signal,
            throttle: () => pool.limiter.wait(signal),
            retry: this.retryPolicy,
            limit: settings.limitPerUnit,
            nextSeenOrder,
          }),
        );

        runHistory?.recordUnit(runId, execution.result);
        return execution;
      }),
    );

    const results = executions.map((e) => e.result);
    const partials = executions
      .flatMap((e) => e.partials)
      .sort((a, b) => a.seenOrder - b.seenOrder);

    log.info("Fetch phase finished", {
      unitsSucceeded: results.filter((r) => r.ok).length,
      unitsFailed: results.filter((r) => !r.ok).length,
      records: partials.length,
      cancelled: signal.aborted,
    });

    const merge = await this.mergeAndPersist(partials, log);

    runHistory?.recordLeads(
      runId,
      [...merge.touched.entries()].map(
        ([identityKey, stats]): TouchedLead => ({
          identityKey,
          action: stats.action,
        }),
      ),
    );

    const snapshot = this.buildSnapshot({
      runId,
      startedAt,
      results,
      partials,
      merge,
    });

    runHistory?.finishRun(snapshot, {
      unitsFailed: snapshot.failures.length,
      listingsFetched: results.reduce(
        (sum, r) => sum + (r.ok ? r.listings : 0),
        0,
      ),
    });

    log.info("Aggregation run finished", {
      status: snapshot.status,
      totalNew: snapshot.totalNew,
      totalUpdated: snapshot.totalUpdated,
      skipped: snapshot.skipped,
      failures: snapshot.failures.length,
      mergeFailures: snapshot.mergeFailures,
    });

    return snapshot;
  }

  /**
   * Matching -> merge -> upsert, one cluster at a time, each inside the
   * keyed critical section. Not cancellable.
   */
  private async mergeAndPersist(
    partials: PartialLead[],
    log: Logger,
  ): Promise<MergePhaseResult> {
    const { store } = this.deps;
    const touched = new Map<string, TouchedLeadStats>();
    let failures = 0;

    const clusters = clusterPartials(partials, this.deps.matching);
    log.debug("Clusters formed", {
      records: partials.length,
      clusters: clusters.length,
    });

    for (const cluster of clusters) {
      try {
        await this.mutex.runExclusive(clusterLockKeys(cluster), async () => {
          const resolved = await resolvePersisted(cluster, store);
          const { lead, conflicts } = mergeLeads({
            partials: resolved.partials,
            persisted: resolved.persisted,
            now: this.now(),
          });

          for (const conflict of conflicts) {
            log.warn("Merge conflict", {
              identityKey: lead.identityKey,
              field: conflict.field,
              kept: conflict.kept,
              dropped: conflict.dropped,
              keptSource: conflict.keptSource,
              droppedSource: conflict.droppedSource,
            });
          }

          const action = await store.upsert(lead, {
            aliasKeys: cluster.keys.filter((key) => key !== lead.identityKey),
          });

          const previous = touched.get(lead.identityKey);
          touched.set(lead.identityKey, {
            action: previous?.action ?? action,
            category: lead.category,
            city: lead.city,
          });
        });
      } catch (error) {
        failures++;
        log.error("Failed to merge cluster", {
          keys: cluster.keys,
          error: getErrorMessage(error),
        });
      }
    }

    return { touched, failures };
  }

  private buildSnapshot(input: {
    runId: string;
    startedAt: string;
    results: UnitResult[];
    partials: PartialLead[];
    merge: MergePhaseResult;
  }): SnapshotReadyEvent {
    const { results, partials, merge } = input;

    const perSource: Partial<Record<SourceId, SourceUnitCounts>> = {};
    const failures: UnitFailure[] = [];
    let skipped = 0;

    for (const result of results) {
      const counts = perSource[result.unit.sourceId] ?? {
        succeeded: 0,
        failed: 0,
      };
      if (result.ok) {
        counts.succeeded++;
        skipped += result.skipped;
      } else {
        counts.failed++;
        failures.push({
          sourceId: result.unit.sourceId,
          category: result.unit.category,
          city: result.unit.city,
          label: result.label,
          attempts: result.attempts,
        });
      }
      perSource[result.unit.sourceId] = counts;
    }

    const countsBySource: Partial<Record<SourceId, number>> = {};
    for (const partial of partials) {
      countsBySource[partial.source] =
        (countsBySource[partial.source] ?? 0) + 1;
    }

    const countsByCategory: Partial<Record<LeadCategory, number>> = {};
    const countsByCity: Record<string, number> = {};
    let totalNew = 0;
    let totalUpdated = 0;

    for (const stats of merge.touched.values()) {
      if (stats.action === "inserted") {
        totalNew++;
      } else {
        totalUpdated++;
      }
      countsByCategory[stats.category] =
        (countsByCategory[stats.category] ?? 0) + 1;
      if (stats.city) {
        countsByCity[stats.city] = (countsByCity[stats.city] ?? 0) + 1;
      }
    }

    return {
      runId: input.runId,
      startedAt: input.startedAt,
      finishedAt: this.now().toISOString(),
      status: computeRunStatus(results, partials.length),
      perSource,
      totalNew,
      totalUpdated,
      countsByCategory,
      countsByCity,
      countsBySource,
      skipped,
      mergeFailures: merge.failures,
      failures,
    };
  }

  /**
   * Deliver a snapshot to every listener; a failing listener is logged and
   * does not affect the others
   */
  private publish(snapshot: SnapshotReadyEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(snapshot);
      } catch (error) {
        logger.error("Snapshot listener failed", {
          runId: snapshot.runId,
          error: getErrorMessage(error),
        });
      }
    }
  }
}
