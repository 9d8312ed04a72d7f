/**
 * Run lock constants
 */

/**
 * Global run lock name (one aggregation at a time across processes)
 */
export const RUN_LOCK_NAME = "aggregation";

/**
 * Lock TTL in seconds
 * After this time, a stale lock left by a crashed process can be taken over.
 * Default: 2 hours
 */
export const RUN_LOCK_TTL_SECONDS = 7200;

/**
 * How often a running aggregation extends its lock
 */
export const RUN_LOCK_REFRESH_INTERVAL_MS = 10 * 60 * 1000;
