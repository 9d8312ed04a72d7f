/**
 * Database migration runner
 *
 * Applies SQL migrations from migrations/ directory in order.
 */

import type Database from "better-sqlite3";
import { readdirSync, readFileSync } from "fs";
import { join } from "path";
import * as logger from "@/logger";

function defaultMigrationsDir(): string {
  return join(process.cwd(), "migrations");
}

function ensureMigrationsTable(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      version TEXT NOT NULL UNIQUE,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);
}

function getAppliedMigrations(db: Database.Database): Set<string> {
  const rows = db
    .prepare<[], { version: string }>("SELECT version FROM schema_migrations")
    .all();
  return new Set(rows.map((r) => r.version));
}

function getPendingMigrations(
  migrationsDir: string,
  appliedMigrations: Set<string>,
): string[] {
  let files: string[];
  try {
    files = readdirSync(migrationsDir);
  } catch (err) {
    logger.warn("Migrations directory not readable", {
      migrationsDir,
      error: err instanceof Error ? err.message : String(err),
    });
    return [];
  }

  return files
    .filter((f) => f.endsWith(".sql"))
    .sort()
    .filter((f) => !appliedMigrations.has(f));
}

/**
 * Apply a single migration file atomically (SQL + bookkeeping row)
 */
function applyMigration(
  db: Database.Database,
  migrationsDir: string,
  filename: string,
): void {
  const sql = readFileSync(join(migrationsDir, filename), "utf-8");

  const transaction = db.transaction(() => {
    db.exec(sql);
    db.prepare("INSERT INTO schema_migrations (version) VALUES (?)").run(
      filename,
    );
  });

  transaction();
}

/**
 * Apply all pending migrations to the given connection
 *
 * @returns Filenames applied by this call
 */
export function runMigrations(
  db: Database.Database,
  migrationsDir: string = defaultMigrationsDir(),
): string[] {
  ensureMigrationsTable(db);

  const pending = getPendingMigrations(migrationsDir, getAppliedMigrations(db));

  if (pending.length === 0) {
    logger.debug("No pending migrations");
    return [];
  }

  logger.info("Applying migrations", { count: pending.length });

  for (const migration of pending) {
    logger.info("Applying migration", { migration });
    applyMigration(db, migrationsDir, migration);
  }

  return pending;
}
