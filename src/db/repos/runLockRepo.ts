/**
 * Run lock repository
 *
 * Global run lock so two processes never aggregate at the same time.
 * The lock carries a TTL; a lock left behind by a crashed process can be
 * taken over once expired.
 */

import type { RunLockRow, RunLockAcquireResult } from "@/types";
import { getDb } from "../connection";
import { RUN_LOCK_NAME, RUN_LOCK_TTL_SECONDS } from "@/constants";

/**
 * Acquire global run lock
 *
 * Atomic across processes: INSERT ... ON CONFLICT only takes over a row
 * whose expiry has passed.
 *
 * @param ownerId - Unique owner identifier (the run id)
 */
export function acquireRunLock(
  ownerId: string,
  ttlSeconds: number = RUN_LOCK_TTL_SECONDS,
): RunLockAcquireResult {
  try {
    const result = getDb()
      .prepare(
        `
      INSERT INTO run_lock (lock_name, owner_id, acquired_at, expires_at)
      VALUES (
        ?,
        ?,
        datetime('now'),
        datetime('now', '+' || ? || ' seconds')
      )
      ON CONFLICT(lock_name) DO UPDATE SET
        owner_id = excluded.owner_id,
        acquired_at = excluded.acquired_at,
        expires_at = excluded.expires_at,
        updated_at = datetime('now')
      WHERE datetime('now') >= expires_at
    `,
      )
      .run(RUN_LOCK_NAME, ownerId, ttlSeconds);

    if (result.changes > 0) {
      return { ok: true };
    }

    return { ok: false, reason: "LOCKED" };
  } catch (err) {
    if (err instanceof Error && err.message.includes("not opened")) {
      return { ok: false, reason: "DB_NOT_OPEN" };
    }
    return { ok: false, reason: "UNKNOWN" };
  }
}

/**
 * Extend the lock expiry if this owner holds it
 *
 * @returns false if the lock is not held by this owner
 */
export function refreshRunLock(
  ownerId: string,
  ttlSeconds: number = RUN_LOCK_TTL_SECONDS,
): boolean {
  const result = getDb()
    .prepare(
      `
    UPDATE run_lock
    SET expires_at = datetime('now', '+' || ? || ' seconds'),
        updated_at = datetime('now')
    WHERE lock_name = ?
      AND owner_id = ?
  `,
    )
    .run(ttlSeconds, RUN_LOCK_NAME, ownerId);

  return result.changes > 0;
}

/**
 * Delete the lock row if this owner holds it
 *
 * @returns false if the lock is not held by this owner
 */
export function releaseRunLock(ownerId: string): boolean {
  const result = getDb()
    .prepare(
      `
    DELETE FROM run_lock
    WHERE lock_name = ?
      AND owner_id = ?
  `,
    )
    .run(RUN_LOCK_NAME, ownerId);

  return result.changes > 0;
}

export function getRunLock(): RunLockRow | null {
  const row = getDb()
    .prepare<[string], RunLockRow>("SELECT * FROM run_lock WHERE lock_name = ?")
    .get(RUN_LOCK_NAME);

  return row ?? null;
}
