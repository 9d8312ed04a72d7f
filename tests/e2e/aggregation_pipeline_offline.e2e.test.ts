/**
 * E2E Test: Aggregation pipeline, offline, real SQLite
 *
 * Real adapters read recorded provider answers through the mock HTTP
 * harness; the orchestrator matches, merges and persists into a fresh
 * migrated database with run history and the global run lock.
 *
 * - One source rejected with 401: the run is PARTIAL, the others persist
 * - Records of the same business from two sources merge into one lead
 * - A repeated run updates instead of inserting
 * - A lock held by another process skips the run
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { createTestDb, type TestDbHarness } from "../helpers/testDb";
import {
  createMockHttp,
  loadFixtureJson,
  loadFixtureText,
} from "../helpers/mockHttp";
import { loadCatalog } from "@/catalog/loader";
import { createSourceAdapters } from "@/sources";
import { AggregationOrchestrator } from "@/orchestration/aggregationOrchestrator";
import {
  SqliteLeadStore,
  acquireRunLock,
  createSqliteRunLock,
  getAggregationRun,
  getRunLock,
  listAggregationRuns,
  listLeads,
  listRunLeads,
  listRunUnits,
  sqliteRunHistory,
} from "@/db";
import type { SnapshotReadyEvent } from "@/types";

const catalog = loadCatalog();
const NOW = new Date("2026-02-01T03:00:00.000Z");

describe("E2E: Aggregation pipeline (offline DB)", () => {
  let dbHarness: TestDbHarness;
  const mockHttp = createMockHttp();
  let runCounter = 0;

  beforeEach(async () => {
    dbHarness = await createTestDb();
    mockHttp.reset();
    runCounter = 0;

    mockHttp.on(
      "GET",
      "https://catalog.api.2gis.com/3.0/items",
      loadFixtureJson("twogis/items_auto_service_minsk.json"),
    );
    mockHttp.onResponse("GET", "https://search-maps.yandex.ru/v1/", {
      status: 401,
      body: { message: "Invalid api key" },
    });
    mockHttp.on(
      "GET",
      "https://baraholka.onliner.by/transportnye-uslugi",
      loadFixtureText("onliner/transportnye_uslugi.html"),
    );
  });

  afterEach(() => {
    dbHarness.cleanup();
  });

  function buildOrchestrator(): AggregationOrchestrator {
    const adapters = createSourceAdapters(
      {
        enabledSources: ["twogis", "yandex_maps", "onliner", "instagram"],
        credentials: { twogisApiKey: "test-key", yandexApiKey: "test-key" },
      },
      catalog,
      mockHttp.request,
    );

    return new AggregationOrchestrator({
      adapters,
      store: new SqliteLeadStore(),
      catalog,
      settings: {
        enabledNiches: ["auto_service"],
        cities: ["Минск"],
        maxAttemptsPerUnit: 2,
        concurrencyPerSource: 2,
        minRequestIntervalMs: 0,
        limitPerUnit: 50,
      },
      retryPolicy: {
        maxAttempts: 2,
        baseDelayMs: 0,
        maxDelayMs: 0,
        maxRetryAfterMs: 0,
      },
      runHistory: sqliteRunHistory,
      runLock: createSqliteRunLock(),
      now: () => NOW,
      createRunId: () => `run-${++runCounter}`,
    });
  }

  async function runOnce(
    orchestrator: AggregationOrchestrator,
  ): Promise<SnapshotReadyEvent> {
    const outcome = await orchestrator.run();
    if (outcome.kind !== "ran") {
      throw new Error(`Expected a run, got ${outcome.kind}`);
    }
    return outcome.snapshot;
  }

  it("should finish PARTIAL and persist the leads of the healthy sources", async () => {
    const snapshot = await runOnce(buildOrchestrator());

    expect(snapshot).toEqual({
      runId: "run-1",
      startedAt: "2026-02-01T03:00:00.000Z",
      finishedAt: "2026-02-01T03:00:00.000Z",
      status: "PARTIAL",
      perSource: {
        twogis: { succeeded: 1, failed: 0 },
        yandex_maps: { succeeded: 0, failed: 1 },
        onliner: { succeeded: 1, failed: 0 },
      },
      totalNew: 3,
      totalUpdated: 0,
      countsByCategory: { auto_service: 3 },
      countsByCity: { Минск: 3 },
      countsBySource: { twogis: 2, onliner: 2 },
      skipped: 1,
      mergeFailures: 0,
      failures: [
        {
          sourceId: "yandex_maps",
          category: "auto_service",
          city: "Минск",
          label: "AuthRejected",
          attempts: 1,
        },
      ],
    });

    const yandexCalls = mockHttp
      .getRecordedRequests()
      .filter((request) => request.url === "https://search-maps.yandex.ru/v1/");
    expect(yandexCalls).toHaveLength(1);

    expect(getAggregationRun("run-1")).toMatchObject({
      status: "PARTIAL",
      units_total: 3,
      units_failed: 1,
      listings_fetched: 5,
      listings_skipped: 1,
      leads_inserted: 3,
      leads_updated: 0,
    });
    expect(listRunUnits("run-1")).toHaveLength(3);
    expect(listRunLeads("run-1").map((row) => row.action)).toEqual([
      "inserted",
      "inserted",
      "inserted",
    ]);
    expect(getRunLock()).toBeNull();
  });

  it("should merge the map listing and the board card of one business", async () => {
    await runOnce(buildOrchestrator());

    const leads = listLeads();
    expect(leads.map((lead) => lead.name).sort()).toEqual([
      "AutoService Premium",
      "Автоэлектрик",
      "Шиномонтаж 24",
    ]);

    const merged = leads.find((lead) => lead.identityKey === "phone:+375291234567");
    expect(merged).toMatchObject({
      name: "AutoService Premium",
      category: "auto_service",
      address: "ул. Кальварийская, 25",
      city: "Минск",
      district: "Фрунзенский район",
      phones: ["+375291234567"],
      website: "https://premium-auto.by/",
      social: { instagram: "@autoservice_premium" },
      rating: 4.7,
      reviewCount: 128,
      geo: { lat: 53.9081, lon: 27.5207 },
      source: "merged",
      sources: ["onliner", "twogis"],
      updatedAt: "2026-02-01T03:00:00.000Z",
    });

    const electrician = leads.find((lead) => lead.name === "Автоэлектрик");
    expect(electrician).toMatchObject({
      phones: [],
      source: "onliner",
      sources: ["onliner"],
    });
    expect(electrician?.identityKey).toMatch(/^[0-9a-f]{64}$/);
  });

  it("should update instead of insert when the same listings arrive again", async () => {
    const orchestrator = buildOrchestrator();

    await runOnce(orchestrator);
    const leadsAfterFirst = listLeads();
    const second = await runOnce(orchestrator);

    expect(second.runId).toBe("run-2");
    expect(second.totalNew).toBe(0);
    expect(second.totalUpdated).toBe(3);
    expect(listLeads()).toEqual(leadsAfterFirst);
    expect(listRunLeads("run-2").map((row) => row.action)).toEqual([
      "updated",
      "updated",
      "updated",
    ]);
  });

  it("should skip the run while another process holds the lock", async () => {
    expect(acquireRunLock("other-process")).toEqual({ ok: true });

    const outcome = await buildOrchestrator().run();

    expect(outcome).toEqual({ kind: "skipped", reason: "LOCKED" });
    expect(mockHttp.getRecordedRequests()).toEqual([]);
    expect(listAggregationRuns()).toEqual([]);
    expect(getRunLock()?.owner_id).toBe("other-process");
  });
});
