/**
 * Unit tests for the aggregation scheduler
 *
 * The orchestrator is replaced by a manual stand-in whose runs finish
 * only when the test resolves them.
 */

import { describe, it, expect, afterEach, vi } from "vitest";
import {
  AggregationScheduler,
  computeNextRunTime,
  parseDailyTime,
  type RunnableOrchestrator,
} from "@/scheduler/aggregationScheduler";
import type { RunOptions } from "@/orchestration/aggregationOrchestrator";
import type { RunOutcome, SnapshotReadyEvent } from "@/types";
import { RunSkippedError, SchedulerStoppedError } from "@/errors";

type ManualRun = {
  signal?: AbortSignal;
  resolve: (outcome: RunOutcome) => void;
  reject: (reason: unknown) => void;
};

class ManualOrchestrator implements RunnableOrchestrator {
  readonly runs: ManualRun[] = [];

  run(options: RunOptions = {}): Promise<RunOutcome> {
    return new Promise((resolve, reject) => {
      this.runs.push({ signal: options.signal, resolve, reject });
    });
  }
}

function makeSnapshot(runId: string): SnapshotReadyEvent {
  return {
    runId,
    startedAt: "2026-03-10T03:00:00.000Z",
    finishedAt: "2026-03-10T03:05:00.000Z",
    status: "COMPLETED",
    perSource: {},
    totalNew: 0,
    totalUpdated: 0,
    countsByCategory: {},
    countsByCity: {},
    countsBySource: {},
    skipped: 0,
    mergeFailures: 0,
    failures: [],
  };
}

function ran(runId: string): RunOutcome {
  return { kind: "ran", snapshot: makeSnapshot(runId) };
}

function flush(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

afterEach(() => {
  vi.useRealTimers();
});

describe("parseDailyTime", () => {
  it("should parse 24h HH:MM", () => {
    expect(parseDailyTime("03:00")).toEqual({ hours: 3, minutes: 0 });
    expect(parseDailyTime("23:59")).toEqual({ hours: 23, minutes: 59 });
  });

  it("should reject malformed times", () => {
    expect(() => parseDailyTime("3:00")).toThrow(
      'Invalid daily time "3:00", expected HH:MM',
    );
    expect(() => parseDailyTime("24:00")).toThrow();
  });
});

describe("computeNextRunTime", () => {
  const time = { hours: 3, minutes: 0 };

  it("should pick today when the time is still ahead", () => {
    expect(
      computeNextRunTime(new Date("2026-03-10T02:59:00.000Z"), time).toISOString(),
    ).toBe("2026-03-10T03:00:00.000Z");
  });

  it("should pick tomorrow at or after the time", () => {
    expect(
      computeNextRunTime(new Date("2026-03-10T03:00:00.000Z"), time).toISOString(),
    ).toBe("2026-03-11T03:00:00.000Z");
    expect(
      computeNextRunTime(new Date("2026-03-31T05:00:00.000Z"), time).toISOString(),
    ).toBe("2026-04-01T03:00:00.000Z");
  });
});

describe("AggregationScheduler", () => {
  it("should run at once on trigger and resolve with the snapshot", async () => {
    const orchestrator = new ManualOrchestrator();
    const scheduler = new AggregationScheduler({
      orchestrator,
      scrapingTime: "03:00",
    });

    const result = scheduler.trigger();
    expect(orchestrator.runs).toHaveLength(1);
    expect(scheduler.isRunning).toBe(true);

    orchestrator.runs[0].resolve(ran("run-1"));

    await expect(result).resolves.toMatchObject({ runId: "run-1" });
    await flush();
    expect(scheduler.isRunning).toBe(false);
  });

  it("should queue one run behind the active one and coalesce further triggers", async () => {
    const orchestrator = new ManualOrchestrator();
    const scheduler = new AggregationScheduler({
      orchestrator,
      scrapingTime: "03:00",
    });

    const first = scheduler.trigger();
    const second = scheduler.trigger();
    const third = scheduler.trigger();

    expect(second).toBe(third);
    expect(orchestrator.runs).toHaveLength(1);

    orchestrator.runs[0].resolve(ran("run-1"));
    await expect(first).resolves.toMatchObject({ runId: "run-1" });
    await flush();

    expect(orchestrator.runs).toHaveLength(2);
    orchestrator.runs[1].resolve(ran("run-2"));

    await expect(second).resolves.toMatchObject({ runId: "run-2" });
    await flush();
    expect(orchestrator.runs).toHaveLength(2);
  });

  it("should reject with RunSkippedError when the run was skipped", async () => {
    const orchestrator = new ManualOrchestrator();
    const scheduler = new AggregationScheduler({
      orchestrator,
      scrapingTime: "03:00",
    });

    const result = scheduler.trigger();
    orchestrator.runs[0].resolve({ kind: "skipped", reason: "LOCKED" });

    await expect(result).rejects.toBeInstanceOf(RunSkippedError);
    await expect(result).rejects.toMatchObject({ reason: "LOCKED" });
  });

  it("should pass orchestrator failures through", async () => {
    const orchestrator = new ManualOrchestrator();
    const scheduler = new AggregationScheduler({
      orchestrator,
      scrapingTime: "03:00",
    });

    const result = scheduler.trigger();
    orchestrator.runs[0].reject(new Error("database is locked"));

    await expect(result).rejects.toThrow("database is locked");
  });

  it("should drop the queued run on stop and wait for the active one", async () => {
    const orchestrator = new ManualOrchestrator();
    const scheduler = new AggregationScheduler({
      orchestrator,
      scrapingTime: "03:00",
    });

    const first = scheduler.trigger();
    const queued = scheduler.trigger();

    const stopping = scheduler.stop();
    await expect(queued).rejects.toBeInstanceOf(SchedulerStoppedError);

    const stopped = vi.fn();
    void stopping.then(stopped);
    await flush();
    expect(stopped).not.toHaveBeenCalled();
    expect(orchestrator.runs[0].signal?.aborted).toBe(false);

    orchestrator.runs[0].resolve(ran("run-1"));
    await stopping;

    await expect(first).resolves.toMatchObject({ runId: "run-1" });
    expect(orchestrator.runs).toHaveLength(1);
    await expect(scheduler.trigger()).rejects.toBeInstanceOf(
      SchedulerStoppedError,
    );
  });

  it("should abort the in-flight run when asked", async () => {
    const orchestrator = new ManualOrchestrator();
    const scheduler = new AggregationScheduler({
      orchestrator,
      scrapingTime: "03:00",
    });

    const result = scheduler.trigger();
    const stopping = scheduler.stop({ abortInFlight: true });

    expect(orchestrator.runs[0].signal?.aborted).toBe(true);

    orchestrator.runs[0].resolve(ran("run-1"));
    await stopping;
    await expect(result).resolves.toMatchObject({ runId: "run-1" });
  });

  it("should fire daily at the configured UTC time", async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-03-10T02:00:00.000Z"));

    const orchestrator = new ManualOrchestrator();
    const scheduler = new AggregationScheduler({
      orchestrator,
      scrapingTime: "03:00",
    });

    scheduler.start();
    expect(scheduler.getNextRunTime()?.toISOString()).toBe(
      "2026-03-10T03:00:00.000Z",
    );

    await vi.advanceTimersByTimeAsync(60 * 60 * 1000 - 1);
    expect(orchestrator.runs).toHaveLength(0);

    await vi.advanceTimersByTimeAsync(1);
    expect(orchestrator.runs).toHaveLength(1);
    expect(scheduler.getNextRunTime()?.toISOString()).toBe(
      "2026-03-11T03:00:00.000Z",
    );

    orchestrator.runs[0].resolve(ran("run-1"));
    await scheduler.stop();

    expect(scheduler.getNextRunTime()).toBeNull();
    await vi.advanceTimersByTimeAsync(24 * 60 * 60 * 1000);
    expect(orchestrator.runs).toHaveLength(1);
  });
});
