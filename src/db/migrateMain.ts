/**
 * Migration entrypoint
 *
 * Usage:
 *   npm run migrate
 */

import "dotenv/config";
import { openDb, closeDb } from "./connection";
import { runMigrations } from "./migrate";
import * as logger from "@/logger";

try {
  const applied = runMigrations(openDb());
  logger.info("Migrations complete", { applied: applied.length });
} catch (error) {
  logger.error("Migration failed", {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exitCode = 1;
} finally {
  closeDb();
}
