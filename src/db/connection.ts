/**
 * SQLite database connection
 *
 * Process-wide connection singleton shared by the repositories.
 */

import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname, join } from "path";

let db: Database.Database | null = null;

/**
 * Resolve the database file path: explicit argument, then DB_PATH, then
 * data/leads.db under the working directory
 */
function resolveDbPath(explicitPath?: string): string {
  const defaultPath = join(process.cwd(), "data", "leads.db");
  const dbPath = explicitPath || process.env.DB_PATH || defaultPath;

  if (dbPath !== ":memory:") {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  return dbPath;
}

/**
 * Open database connection with required pragmas
 * Returns existing connection if already open
 */
export function openDb(dbPath?: string): Database.Database {
  if (db) {
    return db;
  }

  db = new Database(resolveDbPath(dbPath));

  // SQLite default is OFF
  db.pragma("foreign_keys = ON");
  db.pragma("journal_mode = WAL");

  return db;
}

export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}

/**
 * Get current database connection (must be opened first)
 */
export function getDb(): Database.Database {
  if (!db) {
    throw new Error("Database not opened. Call openDb() first.");
  }
  return db;
}

/**
 * Inject a connection into the singleton.
 *
 * @internal Test use only
 */
export function setDbForTesting(testDb: Database.Database | null): void {
  db = testDb;
}
