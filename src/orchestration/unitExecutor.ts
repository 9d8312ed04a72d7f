/**
 * Work unit executor
 *
 * Runs one (source, category, city) fetch with retries and normalizes
 * what it yields. Never throws: every outcome, cancellation included,
 * comes back as a UnitResult.
 */

import type { SourceAdapter } from "@/interfaces";
import type {
  CatalogRuntime,
  PartialLead,
  UnitResult,
  WorkUnit,
} from "@/types";
import {
  RateLimited,
  RunCancelledError,
  classifySourceError,
  getErrorMessage,
} from "@/errors";
import { normalizeListing } from "@/normalization";
import { computeRetryDelay, sleep } from "@/utils/backoff";
import {
  MAX_RETRY_AFTER_MS,
  UNIT_BACKOFF_BASE_DELAY_MS,
  UNIT_BACKOFF_MAX_DELAY_MS,
} from "@/constants";
import * as logger from "@/logger";
import { describeUnit } from "./workUnits";

export type RetryPolicy = {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  maxRetryAfterMs: number;
  /** Jitter source in [0, 1) */
  random?: () => number;
};

export function defaultRetryPolicy(maxAttempts: number): RetryPolicy {
  return {
    maxAttempts,
    baseDelayMs: UNIT_BACKOFF_BASE_DELAY_MS,
    maxDelayMs: UNIT_BACKOFF_MAX_DELAY_MS,
    maxRetryAfterMs: MAX_RETRY_AFTER_MS,
  };
}

export type UnitExecutionContext = {
  catalog: CatalogRuntime;
  signal: AbortSignal;
  /** Source-wide request spacing */
  throttle: () => Promise<void>;
  retry: RetryPolicy;
  limit: number;
  /** Hands out run-wide arrival positions */
  nextSeenOrder: () => number;
};

export type UnitExecution = {
  result: UnitResult;
  /** Normalized records of the successful attempt; empty on failure */
  partials: PartialLead[];
};

type AttemptOutput = {
  partials: PartialLead[];
  listings: number;
  skipped: number;
};

async function runAttempt(
  adapter: SourceAdapter,
  unit: WorkUnit,
  context: UnitExecutionContext,
): Promise<AttemptOutput> {
  const output: AttemptOutput = { partials: [], listings: 0, skipped: 0 };

  const listings = adapter.fetch(
    { category: unit.category, city: unit.city, limit: context.limit },
    { signal: context.signal, throttle: context.throttle },
  );

  for await (const listing of listings) {
    output.listings++;

    const normalized = normalizeListing(listing, {
      catalog: context.catalog,
      seenOrder: context.nextSeenOrder(),
    });

    if (normalized.kind === "skip") {
      output.skipped++;
      logger.debug("Listing skipped", {
        unit: describeUnit(unit),
        reason: normalized.reason,
        sourceRecordId: listing.sourceRecordId,
      });
      continue;
    }

    output.partials.push(normalized.lead);
  }

  return output;
}

/**
 * Execute one work unit
 *
 * Attempts run strictly one after another. Transient failures
 * (SourceUnavailable, RateLimited) are retried after a backoff delay, or
 * after the provider's Retry-After hint; other failures end the unit at
 * once. A fired signal ends the unit with the Cancelled label.
 */
export async function executeUnit(
  adapter: SourceAdapter,
  unit: WorkUnit,
  context: UnitExecutionContext,
): Promise<UnitExecution> {
  const { retry, signal } = context;
  let attempts = 0;

  const cancelled = (message: string): UnitExecution => ({
    result: { unit, ok: false, attempts, label: "Cancelled", message },
    partials: [],
  });

  while (attempts < retry.maxAttempts) {
    if (signal.aborted) {
      return cancelled("Run cancelled before attempt");
    }

    attempts++;

    try {
      const output = await runAttempt(adapter, unit, context);

      logger.debug("Unit attempt succeeded", {
        unit: describeUnit(unit),
        attempt: attempts,
        listings: output.listings,
        skipped: output.skipped,
      });

      return {
        result: {
          unit,
          ok: true,
          attempts,
          listings: output.listings,
          skipped: output.skipped,
        },
        partials: output.partials,
      };
    } catch (error) {
      if (signal.aborted || error instanceof RunCancelledError) {
        return cancelled(getErrorMessage(error));
      }

      const sourceError = classifySourceError(error, unit.sourceId);
      const message = getErrorMessage(sourceError);

      if (!sourceError.transient || attempts >= retry.maxAttempts) {
        logger.warn("Unit failed", {
          unit: describeUnit(unit),
          label: sourceError.label,
          attempts,
          error: message,
        });
        return {
          result: {
            unit,
            ok: false,
            attempts,
            label: sourceError.label,
            message,
          },
          partials: [],
        };
      }

      const delayMs = computeRetryDelay(attempts, {
        baseDelayMs: retry.baseDelayMs,
        maxDelayMs: retry.maxDelayMs,
        maxRetryAfterMs: retry.maxRetryAfterMs,
        retryAfterMs:
          sourceError instanceof RateLimited
            ? sourceError.retryAfterMs
            : undefined,
        random: retry.random,
      });

      logger.info("Unit attempt failed, retrying", {
        unit: describeUnit(unit),
        label: sourceError.label,
        attempt: attempts,
        delayMs,
        error: message,
      });

      try {
        await sleep(delayMs, signal);
      } catch (sleepError) {
        return cancelled(getErrorMessage(sleepError));
      }
    }
  }

  // maxAttempts < 1: nothing was attempted
  return {
    result: {
      unit,
      ok: false,
      attempts,
      label: "SourceUnavailable",
      message: "No attempts allowed",
    },
    partials: [],
  };
}
