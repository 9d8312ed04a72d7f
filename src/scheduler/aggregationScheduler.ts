/**
 * Aggregation scheduler
 *
 * Fires one run per day at a fixed UTC wall-clock time and serves
 * on-demand triggers. At most one run is active; one more may wait behind
 * it, and further triggers join the waiting one.
 */

import type { RunOptions } from "@/orchestration/aggregationOrchestrator";
import type { RunOutcome, SnapshotReadyEvent } from "@/types";
import { RunSkippedError, SchedulerStoppedError, getErrorMessage } from "@/errors";
import * as logger from "@/logger";

export type RunnableOrchestrator = {
  run(options?: RunOptions): Promise<RunOutcome>;
};

export type AggregationSchedulerOptions = {
  orchestrator: RunnableOrchestrator;
  /** "HH:MM", UTC */
  scrapingTime: string;
  now?: () => Date;
};

export type StopOptions = {
  /** Abort the in-flight run's fetches; its merge phase still finishes */
  abortInFlight?: boolean;
};

type DailyTime = {
  hours: number;
  minutes: number;
};

type Deferred<T> = {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
};

function createDeferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

const DAILY_TIME_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;

/**
 * @throws {Error} If the value is not a valid 24h "HH:MM" time
 */
export function parseDailyTime(value: string): DailyTime {
  const match = DAILY_TIME_PATTERN.exec(value);
  if (!match) {
    throw new Error(`Invalid daily time "${value}", expected HH:MM`);
  }
  return { hours: Number(match[1]), minutes: Number(match[2]) };
}

/**
 * Next occurrence of the daily time strictly after `now` (UTC)
 */
export function computeNextRunTime(now: Date, time: DailyTime): Date {
  const next = new Date(
    Date.UTC(
      now.getUTCFullYear(),
      now.getUTCMonth(),
      now.getUTCDate(),
      time.hours,
      time.minutes,
    ),
  );
  if (next.getTime() <= now.getTime()) {
    next.setUTCDate(next.getUTCDate() + 1);
  }
  return next;
}

export class AggregationScheduler {
  private readonly orchestrator: RunnableOrchestrator;
  private readonly dailyTime: DailyTime;
  private readonly now: () => Date;

  private timer: ReturnType<typeof setTimeout> | null = null;
  private nextRunAt: Date | null = null;
  private active: Promise<void> | null = null;
  private activeController: AbortController | null = null;
  private pending: Deferred<SnapshotReadyEvent> | null = null;
  private stopped = false;

  constructor(options: AggregationSchedulerOptions) {
    this.orchestrator = options.orchestrator;
    this.dailyTime = parseDailyTime(options.scrapingTime);
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Arm the daily trigger
   */
  start(): void {
    this.stopped = false;
    if (!this.timer) {
      this.scheduleNext();
    }
    logger.info("Scheduler started", {
      nextRunAt: this.nextRunAt?.toISOString(),
    });
  }

  /**
   * Clear the daily trigger, drop the queued run and wait for the active one
   */
  async stop(options: StopOptions = {}): Promise<void> {
    this.stopped = true;

    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.nextRunAt = null;

    if (this.pending) {
      this.pending.reject(new SchedulerStoppedError());
      this.pending = null;
    }

    if (options.abortInFlight) {
      this.activeController?.abort();
    }

    if (this.active) {
      logger.info("Waiting for the active run to finish");
      await this.active;
    }

    logger.info("Scheduler stopped");
  }

  /**
   * Request a run now
   *
   * @returns Snapshot of the run that serves this request
   * @throws {RunSkippedError} If the run was skipped because of the lock
   * @throws {SchedulerStoppedError} If the scheduler stopped first
   */
  trigger(): Promise<SnapshotReadyEvent> {
    if (this.stopped) {
      return Promise.reject(new SchedulerStoppedError());
    }

    if (!this.active) {
      return this.launch(createDeferred());
    }

    if (this.pending) {
      logger.debug("Run already queued, trigger coalesced");
      return this.pending.promise;
    }

    logger.debug("Run in progress, trigger queued");
    this.pending = createDeferred();
    return this.pending.promise;
  }

  getNextRunTime(): Date | null {
    return this.nextRunAt;
  }

  get isRunning(): boolean {
    return this.active !== null;
  }

  private launch(
    deferred: Deferred<SnapshotReadyEvent>,
  ): Promise<SnapshotReadyEvent> {
    const controller = new AbortController();
    this.activeController = controller;

    this.active = this.orchestrator
      .run({ signal: controller.signal })
      .then(
        (outcome) => {
          if (outcome.kind === "ran") {
            deferred.resolve(outcome.snapshot);
          } else {
            deferred.reject(new RunSkippedError(outcome.reason));
          }
        },
        (error: unknown) => {
          deferred.reject(error);
        },
      )
      .finally(() => {
        this.active = null;
        this.activeController = null;
        this.startPending();
      });

    return deferred.promise;
  }

  private startPending(): void {
    const pending = this.pending;
    if (!pending || this.stopped) {
      return;
    }
    this.pending = null;
    void this.launch(pending);
  }

  private scheduleNext(): void {
    if (this.stopped) {
      return;
    }

    const now = this.now();
    const next = computeNextRunTime(now, this.dailyTime);
    this.nextRunAt = next;

    this.timer = setTimeout(() => {
      this.timer = null;
      this.onTimer();
    }, next.getTime() - now.getTime());
  }

  private onTimer(): void {
    logger.info("Scheduled aggregation run triggered");

    void this.trigger().then(
      (snapshot) => {
        logger.info("Scheduled run finished", {
          runId: snapshot.runId,
          status: snapshot.status,
        });
      },
      (error: unknown) => {
        if (error instanceof RunSkippedError) {
          logger.warn("Scheduled run skipped", { reason: error.reason });
        } else {
          logger.error("Scheduled run failed", {
            error: getErrorMessage(error),
          });
        }
      },
    );

    this.scheduleNext();
  }
}
