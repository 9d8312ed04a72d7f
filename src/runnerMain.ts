/**
 * Runner entrypoint: wires config, storage, sources and the scheduler
 *
 * Modes (RUN_MODE):
 * - once: one aggregation run, then exit (code 1 unless COMPLETED/PARTIAL)
 * - schedule: daily run at SCRAPING_TIME (UTC) until SIGINT/SIGTERM
 *
 * Usage:
 *   npm start
 *   npm run start:once
 *
 * Environment: see .env.example
 */

import "dotenv/config";
import { loadConfig } from "@/config/loadConfig";
import { loadCatalog, findCity } from "@/catalog/loader";
import {
  openDb,
  closeDb,
  runMigrations,
  getLeadStats,
  SqliteLeadStore,
  sqliteRunHistory,
  createSqliteRunLock,
} from "@/db";
import { createSourceAdapters } from "@/sources";
import { AggregationOrchestrator } from "@/orchestration/aggregationOrchestrator";
import { AggregationScheduler } from "@/scheduler/aggregationScheduler";
import { ConfigError, RunSkippedError, getErrorMessage } from "@/errors";
import type { SnapshotReadyEvent } from "@/types";
import * as logger from "@/logger";

function logSnapshot(snapshot: SnapshotReadyEvent): void {
  logger.info("Snapshot ready", {
    runId: snapshot.runId,
    status: snapshot.status,
    totalNew: snapshot.totalNew,
    totalUpdated: snapshot.totalUpdated,
    skipped: snapshot.skipped,
    countsBySource: snapshot.countsBySource,
    countsByCategory: snapshot.countsByCategory,
    failures: snapshot.failures.map(
      (f) => `${f.sourceId}/${f.category}/${f.city}: ${f.label}`,
    ),
  });
  logger.info("Lead totals", { ...getLeadStats() });
}

async function main(): Promise<number> {
  const config = loadConfig();
  logger.setLogLevel(config.logLevel);

  const catalog = loadCatalog();
  const unknownCities = config.cities.filter(
    (city) => !findCity(catalog, city),
  );
  if (unknownCities.length > 0) {
    logger.warn("Cities not in catalog will yield no listings", {
      cities: unknownCities,
    });
  }

  runMigrations(openDb(config.dbPath));

  const adapters = createSourceAdapters(config, catalog);
  if (adapters.length === 0) {
    logger.error("No source adapters enabled");
    return 1;
  }

  const orchestrator = new AggregationOrchestrator({
    adapters,
    store: new SqliteLeadStore(),
    catalog,
    settings: config,
    runHistory: sqliteRunHistory,
    runLock: createSqliteRunLock(),
  });
  orchestrator.onSnapshot(logSnapshot);

  const scheduler = new AggregationScheduler({
    orchestrator,
    scrapingTime: config.scrapingTime,
  });

  let shutdownRequested = false;
  const shutdown = new Promise<void>((resolve) => {
    const handleShutdown = (signal: string): void => {
      if (shutdownRequested) {
        logger.warn("Forced shutdown - exiting immediately");
        process.exit(1);
      }
      shutdownRequested = true;
      logger.info("Shutdown signal received, stopping scheduler", { signal });
      scheduler.stop({ abortInFlight: true }).then(resolve, (error) => {
        logger.error("Scheduler stop failed", {
          error: getErrorMessage(error),
        });
        resolve();
      });
    };
    process.on("SIGINT", () => handleShutdown("SIGINT"));
    process.on("SIGTERM", () => handleShutdown("SIGTERM"));
  });

  if (config.runMode === "once") {
    logger.info("Starting aggregation (single run mode)", {
      sources: adapters.map((a) => a.id),
      niches: config.enabledNiches.length,
      cities: config.cities.length,
    });
    try {
      const snapshot = await scheduler.trigger();
      return snapshot.status === "FAILED" ? 1 : 0;
    } catch (error) {
      if (error instanceof RunSkippedError) {
        logger.warn("Run skipped: another aggregation holds the lock");
        return 0;
      }
      throw error;
    }
  }

  scheduler.start();
  logger.info("Starting aggregation (schedule mode)", {
    scrapingTime: config.scrapingTime,
    nextRunAt: scheduler.getNextRunTime()?.toISOString(),
  });
  await shutdown;
  return 0;
}

main()
  .then((code) => {
    closeDb();
    process.exit(code);
  })
  .catch((error: unknown) => {
    if (error instanceof ConfigError) {
      logger.error("Invalid configuration", { issues: error.issues });
    } else {
      logger.error("Runner failed with fatal error", {
        error: getErrorMessage(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
    }
    closeDb();
    process.exit(1);
  });
