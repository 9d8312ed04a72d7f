/**
 * Run lock type definitions
 *
 * Types for the global run lock (prevents two processes aggregating at once).
 */

/**
 * Run lock row (database entity)
 */
export type RunLockRow = {
  /** Lock name (single system-wide lock) */
  lock_name: string;

  /** Owner identifier (UUID of the run) */
  owner_id: string;

  acquired_at: string;
  expires_at: string;
  updated_at: string;
};

/**
 * Lock acquisition result
 */
export type RunLockAcquireResult =
  | { ok: true }
  | { ok: false; reason: "LOCKED" | "DB_NOT_OPEN" | "UNKNOWN" };
