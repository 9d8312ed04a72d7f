/**
 * Scheduler errors
 */

/**
 * A triggered run did not execute because another run held the lock
 */
export class RunSkippedError extends Error {
  public readonly reason: "LOCKED";

  constructor(reason: "LOCKED") {
    super(`Aggregation run skipped: ${reason}`);
    this.name = "RunSkippedError";
    this.reason = reason;
  }
}

/**
 * A queued run was dropped because the scheduler stopped
 */
export class SchedulerStoppedError extends Error {
  constructor() {
    super("Scheduler stopped before the queued run started");
    this.name = "SchedulerStoppedError";
  }
}
