/**
 * Orchestration and scheduling constants
 */

/**
 * Maximum attempts per work unit (initial attempt included).
 * Only transient failures (SourceUnavailable, RateLimited) are retried.
 */
export const DEFAULT_MAX_ATTEMPTS_PER_UNIT = 3;

/**
 * Base delay for exponential backoff between attempts of one unit
 * First retry: ~2s, second retry: ~4s (with jitter)
 */
export const UNIT_BACKOFF_BASE_DELAY_MS = 2_000;

export const UNIT_BACKOFF_MAX_DELAY_MS = 60_000;

/**
 * Upper bound on a provider-supplied Retry-After hint
 */
export const MAX_RETRY_AFTER_MS = 120_000;

/**
 * Concurrent work units per source (sources never share a pool)
 */
export const DEFAULT_CONCURRENCY_PER_SOURCE = 2;

/**
 * Minimum spacing between two requests to the same source
 */
export const DEFAULT_MIN_REQUEST_INTERVAL_MS = 500;

/**
 * Upper bound on listings requested per work unit
 */
export const DEFAULT_LIMIT_PER_UNIT = 100;

/**
 * Daily trigger time (UTC)
 */
export const DEFAULT_SCRAPING_TIME = "03:00";
