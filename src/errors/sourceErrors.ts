/**
 * Source error taxonomy
 *
 * Every failure an adapter can produce surfaces as one of four labelled
 * classes. The orchestrator retries only the transient ones.
 */

import { ZodError } from "zod";
import { HttpError, parseRetryAfter } from "@/clients/http";
import type { FailureLabel, SourceId } from "@/types";
import { MAX_LOGGED_ERROR_LENGTH } from "@/constants";

export type SourceErrorLabel = Exclude<FailureLabel, "Cancelled">;

export type SourceErrorOptions = {
  sourceId?: SourceId;
  cause?: unknown;
};

/**
 * Base class for provider failures, discriminated by `label`
 */
export abstract class SourceError extends Error {
  abstract readonly label: SourceErrorLabel;
  abstract readonly transient: boolean;
  public readonly sourceId?: SourceId;

  constructor(message: string, options: SourceErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.sourceId = options.sourceId;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Provider unreachable: 408/5xx, timeout, network error. Transient.
 */
export class SourceUnavailable extends SourceError {
  readonly label = "SourceUnavailable";
  readonly transient = true;

  constructor(message: string, options?: SourceErrorOptions) {
    super(message, options);
    this.name = "SourceUnavailable";
  }
}

/**
 * Provider throttled us (HTTP 429). Transient; carries the Retry-After hint.
 */
export class RateLimited extends SourceError {
  readonly label = "RateLimited";
  readonly transient = true;
  public readonly retryAfterMs?: number;

  constructor(
    message: string,
    options: SourceErrorOptions & { retryAfterMs?: number } = {},
  ) {
    super(message, options);
    this.name = "RateLimited";
    this.retryAfterMs = options.retryAfterMs;
  }
}

/**
 * Credentials missing or refused (HTTP 401/403). Not retried.
 */
export class AuthRejected extends SourceError {
  readonly label = "AuthRejected";
  readonly transient = false;

  constructor(message: string, options?: SourceErrorOptions) {
    super(message, options);
    this.name = "AuthRejected";
  }
}

/**
 * Response does not have the expected shape. Not retried.
 */
export class MalformedResponse extends SourceError {
  readonly label = "MalformedResponse";
  readonly transient = false;

  constructor(message: string, options?: SourceErrorOptions) {
    super(message, options);
    this.name = "MalformedResponse";
  }
}

/**
 * Thrown when a run's AbortSignal fires during a fetch or a backoff sleep
 */
export class RunCancelledError extends Error {
  constructor(message = "Run cancelled") {
    super(message);
    this.name = "RunCancelledError";
  }
}

/**
 * Maps any thrown value into the taxonomy.
 *
 * - SourceError: returned as-is
 * - HttpError: 401/403 AuthRejected, 429 RateLimited, 408/5xx SourceUnavailable,
 *   other 4xx MalformedResponse (the request we built is not what the provider expects)
 * - AbortError / TimeoutError / TypeError (fetch network failure): SourceUnavailable
 * - ZodError / SyntaxError: MalformedResponse
 * - anything else: SourceUnavailable
 *
 * @param error - Thrown value
 * @param sourceId - Provider the failure belongs to
 */
export function classifySourceError(error: unknown, sourceId?: SourceId): SourceError {
  if (error instanceof SourceError) {
    return error;
  }

  if (error instanceof HttpError) {
    const options = { sourceId, cause: error };
    switch (error.statusClass) {
      case "auth":
        return new AuthRejected(`HTTP ${error.status} from ${error.url}`, options);
      case "rate_limit":
        return new RateLimited(`HTTP 429 from ${error.url}`, {
          ...options,
          retryAfterMs: parseRetryAfter(error.retryAfterHeader) ?? undefined,
        });
      case "unavailable":
        return new SourceUnavailable(`HTTP ${error.status} from ${error.url}`, options);
      case "client":
        return new MalformedResponse(`HTTP ${error.status} from ${error.url}`, options);
    }
  }

  if (error instanceof ZodError) {
    const issue = error.issues[0];
    const where = issue ? `${issue.path.join(".") || "(root)"}: ${issue.message}` : "unknown";
    return new MalformedResponse(`Unexpected response shape at ${where}`, {
      sourceId,
      cause: error,
    });
  }

  if (error instanceof SyntaxError) {
    return new MalformedResponse(`Unparseable response body: ${error.message}`, {
      sourceId,
      cause: error,
    });
  }

  if (error instanceof Error) {
    if (error.name === "AbortError" || error.name === "TimeoutError") {
      return new SourceUnavailable("Request timed out or was aborted", { sourceId, cause: error });
    }
    return new SourceUnavailable(error.message, { sourceId, cause: error });
  }

  return new SourceUnavailable(String(error), { sourceId, cause: error });
}

/**
 * Extract a loggable message from an unknown error, truncated
 */
export function getErrorMessage(
  error: unknown,
  maxLength = MAX_LOGGED_ERROR_LENGTH,
): string {
  const message = error instanceof Error ? error.message : String(error);
  return message.length > maxLength ? message.substring(0, maxLength) + "..." : message;
}
