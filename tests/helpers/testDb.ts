/**
 * Test Database Harness
 *
 * Creates fresh temporary SQLite databases per test.
 * Runs real migrations, provides DB handle, handles cleanup.
 *
 * Usage:
 *   const harness = await createTestDb();
 *   // ... use harness.db for repos ...
 *   harness.cleanup();
 */

import Database from "better-sqlite3";
import { mkdirSync, rmSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { runMigrations, setDbForTesting } from "@/db";

export interface TestDbHarness {
  /** The SQLite database connection */
  db: Database.Database;
  /** Path to the temp database file */
  dbPath: string;
  /** Clean up: close connection and delete temp file */
  cleanup: () => void;
}

function generateTempDbPath(): string {
  const random = Math.random().toString(36).substring(2, 8);
  const tempDir = join(tmpdir(), "lead-aggregator-tests");
  mkdirSync(tempDir, { recursive: true });
  return join(tempDir, `test-${Date.now()}-${random}.db`);
}

/**
 * Create a fresh test database with all migrations applied.
 *
 * The harness injects the test DB into the connection singleton,
 * so repos and SqliteLeadStore work transparently with it.
 *
 * IMPORTANT: Always call cleanup() after the test completes.
 */
export async function createTestDb(): Promise<TestDbHarness> {
  const dbPath = generateTempDbPath();

  const db = new Database(dbPath);
  db.pragma("foreign_keys = ON");
  runMigrations(db);

  setDbForTesting(db);

  const cleanup = (): void => {
    setDbForTesting(null);
    db.close();
    for (const suffix of ["", "-wal", "-shm"]) {
      rmSync(dbPath + suffix, { force: true });
    }
  };

  return { db, dbPath, cleanup };
}
