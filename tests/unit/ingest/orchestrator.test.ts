import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { pathToFileURL } from "node:url";

import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { DatasetRegistry } from "../../../src/datasets/registry.js";
import { StatisticsRepository } from "../../../src/db/repository.js";
import { LockTimeoutError, UnknownDatasetError } from "../../../src/errors.js";
import { KeyedMutex } from "../../../src/ingest/keyed-mutex.js";
import {
  IngestionOrchestrator,
  isTerminalState,
  type ProgressEvent,
} from "../../../src/ingest/orchestrator.js";
import { FileSource } from "../../../src/source/file-source.js";
import { createTestDatabase } from "../../helpers/database.js";
import {
  DEMO_PJAN_CONFIG,
  FIXED_NOW,
  PAGED_INDEX_CONFIG,
  createTestClient,
  type StubReply,
} from "../../helpers/upstream.js";

import type { Database } from "../../../src/db/types.js";
import type { ResolvedFact } from "../../../src/types/facts.js";
import type { Kysely } from "kysely";

const NOW_ISO = FIXED_NOW.toISOString();

const registry = DatasetRegistry.fromConfigs([DEMO_PJAN_CONFIG, PAGED_INDEX_CONFIG]);

const MALE_0_4 = { region: "DE", year: 2023, sex: "M", age_min: 0, age_max: 5 };
const FEMALE_0_4 = { region: "DE", year: 2023, sex: "F", age_min: 0, age_max: 5 };

function demoPage(records: Record<string, unknown>[]): StubReply {
  return { body: JSON.stringify(records) };
}

/** Nine monthly index records over five pages of two */
function indexPage(page: number): StubReply {
  const rows = [2 * page + 1, 2 * page + 2]
    .filter((month) => month <= 9)
    .map((month) => ({
      geo: "DE",
      period: `2023M0${String(month)}`,
      nace: "C",
      unit: "I21",
      value: 100 + month,
    }));
  return { body: JSON.stringify(rows) };
}

function pageOf(url: URL): number {
  return Number(url.searchParams.get("page"));
}

describe("ingest/orchestrator", () => {
  let db: Kysely<Database>;
  let repository: StatisticsRepository;

  beforeEach(async () => {
    db = await createTestDatabase();
    repository = new StatisticsRepository(db);
  });

  afterEach(async () => {
    await db.destroy();
  });

  function createOrchestrator(
    reply: (url: URL, call: number) => StubReply,
    options: {
      mutex?: KeyedMutex;
      lockTimeoutMs?: number;
      onSleep?: (ms: number) => void;
    } = {}
  ) {
    const { onSleep, ...deps } = options;
    const upstream = createTestClient(reply, { onSleep });
    const orchestrator = new IngestionOrchestrator({
      registry,
      client: upstream.client,
      repository,
      now: () => FIXED_NOW,
      ...deps,
    });
    const events: ProgressEvent[] = [];
    orchestrator.setProgressCallback((event) => {
      events.push(event);
    });
    return { orchestrator, events, ...upstream };
  }

  // ============================================================================
  // Single Runs
  // ============================================================================

  describe("run", () => {
    it("should persist the valid record and drop the malformed one", async () => {
      const { orchestrator } = createOrchestrator(() =>
        demoPage([
          { ...MALE_0_4, value: 2000000 },
          { ...FEMALE_0_4, value: "N/A" },
        ])
      );

      const result = await orchestrator.run("demo_pjan");

      expect(result).toMatchObject({
        datasetId: "demo_pjan",
        state: "COMPLETED",
        startedAt: NOW_ISO,
        finishedAt: NOW_ISO,
        pagesPersisted: 1,
        lastPersistedPage: 0,
        recordsFetched: 2,
        recordsNormalized: 1,
        recordsDropped: 1,
        inserted: 1,
        updated: 0,
      });
      expect(result.error).toBeUndefined();

      const rows = await repository.queryDemographics({ source: "demo_pjan" });
      expect(rows).toEqual([
        expect.objectContaining({
          regionCode: "DE",
          year: 2023,
          sex: "M",
          ageMin: 0,
          ageMax: 5,
          value: 2000000,
        }),
      ]);
    });

    it("should archive the raw page and record the source", async () => {
      const { orchestrator } = createOrchestrator(() =>
        demoPage([{ ...MALE_0_4, value: 2000000 }])
      );

      await orchestrator.run("demo_pjan", { overrides: { geo: "DE" } });

      const snapshots = await repository.listSnapshots("demo_pjan");
      expect(snapshots).toHaveLength(1);
      expect(snapshots[0]).toMatchObject({
        pageIndex: 0,
        params: { unit: "NR", geo: "DE" },
        url: "https://stats.test/api/demo_pjan?unit=NR&geo=DE",
      });

      const source = await repository.findSourceByName("demo_pjan");
      expect(source).toMatchObject({
        sourceType: "api",
        lastUpdated: NOW_ISO,
        metadata: {
          name: "Population on 1 January",
          family: "demographic",
          format: "json",
          measure: "population",
        },
      });
    });

    it("should update an existing fact in place on rerun", async () => {
      let value = 2000000;
      const { orchestrator } = createOrchestrator(() =>
        demoPage([{ ...MALE_0_4, value }])
      );

      await orchestrator.run("demo_pjan");
      value = 2100000;
      const rerun = await orchestrator.run("demo_pjan");

      expect(rerun).toMatchObject({ state: "COMPLETED", inserted: 0, updated: 1 });
      const source = await repository.findSourceByName("demo_pjan");
      expect(await repository.countFacts("demographic", source?.id)).toBe(1);
      const rows = await repository.queryDemographics();
      expect(rows.map((row) => row.value)).toEqual([2100000]);
    });

    it("should replace existing facts when asked", async () => {
      let records = [{ ...MALE_0_4, value: 1 }];
      const { orchestrator } = createOrchestrator(() => demoPage(records));

      await orchestrator.run("demo_pjan");
      records = [{ ...FEMALE_0_4, value: 2 }];
      await orchestrator.run("demo_pjan", { replaceExisting: true });

      const rows = await repository.queryDemographics();
      expect(rows.map((row) => [row.sex, row.value])).toEqual([["F", 2]]);
    });

    it("should keep existing facts when a replacing run fails before its first page", async () => {
      let failing = false;
      const { orchestrator } = createOrchestrator(() =>
        failing ? { status: 404 } : demoPage([{ ...MALE_0_4, value: 1 }])
      );

      await orchestrator.run("demo_pjan");
      failing = true;
      const result = await orchestrator.run("demo_pjan", { replaceExisting: true });

      expect(result.state).toBe("FAILED");
      expect(result.error).toMatchObject({ name: "SourceError", status: 404 });
      expect(await repository.countFacts("demographic")).toBe(1);
    });

    it("should throw for an unknown dataset before any request", async () => {
      const { orchestrator, fetch, events } = createOrchestrator(() => demoPage([]));

      await expect(orchestrator.run("missing")).rejects.toThrow(UnknownDatasetError);
      expect(fetch).not.toHaveBeenCalled();
      expect(events).toEqual([]);
    });
  });

  // ============================================================================
  // Failure and Resume
  // ============================================================================

  describe("partial failure", () => {
    it("should fail at page 2 and converge when rerun from page 0", async () => {
      let failing = true;
      const { orchestrator, sleeps } = createOrchestrator((url) =>
        failing && pageOf(url) === 2 ? { status: 503 } : indexPage(pageOf(url))
      );

      const failed = await orchestrator.run("paged_index");

      expect(failed).toMatchObject({
        state: "FAILED",
        pagesPersisted: 2,
        lastPersistedPage: 1,
        inserted: 4,
        error: {
          name: "SourceError",
          message: "Upstream returned HTTP 503 for paged_index after 4 attempts",
          status: 503,
        },
      });
      expect(sleeps).toEqual([1000, 2000, 4000]);
      expect(await repository.countFacts("industrial")).toBe(4);
      const source = await repository.findSourceByName("paged_index");
      expect(source?.lastUpdated).toBeNull();

      failing = false;
      const rerun = await orchestrator.run("paged_index", { startPage: 0 });

      expect(rerun).toMatchObject({
        state: "COMPLETED",
        pagesPersisted: 5,
        lastPersistedPage: 4,
        recordsFetched: 9,
        inserted: 5,
        updated: 4,
      });
      const rows = await repository.queryIndustrial({ source: "paged_index" });
      expect(rows).toHaveLength(9);
      expect(
        rows.filter((row) => (row.month ?? 0) <= 4).map((row) => [row.month, row.value])
      ).toEqual([
        [4, 104],
        [3, 103],
        [2, 102],
        [1, 101],
      ]);
    });

    it("should resume from the start page", async () => {
      const { orchestrator, urls } = createOrchestrator((url) => indexPage(pageOf(url)));

      const result = await orchestrator.run("paged_index", { startPage: 3 });

      expect(result).toMatchObject({
        state: "COMPLETED",
        pagesPersisted: 2,
        lastPersistedPage: 4,
        inserted: 3,
      });
      expect(urls.map((url) => new URL(url).searchParams.get("page"))).toEqual(["3", "4"]);
    });

    it("should report transitions up to the failure", async () => {
      const { orchestrator, events } = createOrchestrator((url) =>
        pageOf(url) === 1 ? { status: 404 } : indexPage(pageOf(url))
      );

      const result = await orchestrator.run("paged_index");

      expect(events.map((e) => [e.previousState, e.state, e.pageIndex])).toEqual([
        [null, "PENDING", null],
        ["PENDING", "FETCHING", 0],
        ["FETCHING", "NORMALIZING", 0],
        ["NORMALIZING", "PERSISTING", 0],
        ["PERSISTING", "FETCHING", 1],
        ["FETCHING", "FAILED", 1],
      ]);
      expect(events.every((e) => e.runId === result.runId)).toBe(true);
      expect(result.error).toEqual({
        name: "SourceError",
        message: "Upstream returned HTTP 404 for paged_index",
        status: 404,
      });
    });

    it("should fail on a malformed page and keep earlier pages", async () => {
      const { orchestrator } = createOrchestrator((url) =>
        pageOf(url) === 1 ? { body: "{broken" } : indexPage(pageOf(url))
      );

      const result = await orchestrator.run("paged_index");

      expect(result.state).toBe("FAILED");
      expect(result.lastPersistedPage).toBe(0);
      expect(result.error?.name).toBe("SourceError");
      expect(await repository.countFacts("industrial")).toBe(2);
    });

    it("should fail without throwing when the store rejects a write", async () => {
      class FailingRepository extends StatisticsRepository {
        override async upsertFacts(
          _batch: readonly ResolvedFact[],
          _sourceId: number
        ): Promise<{ inserted: number; updated: number }> {
          throw new Error("disk full");
        }
      }
      repository = new FailingRepository(db);
      const { orchestrator } = createOrchestrator(() =>
        demoPage([{ ...MALE_0_4, value: 1 }])
      );

      const result = await orchestrator.run("demo_pjan");

      expect(result.state).toBe("FAILED");
      expect(result.pagesPersisted).toBe(0);
      expect(result.error).toEqual({ name: "Error", message: "disk full" });
    });
  });

  // ============================================================================
  // File Sources
  // ============================================================================

  describe("file sources", () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), "ingest-file-"));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it("should ingest a mapped CSV export as a file source", async () => {
      const path = join(dir, "population.csv");
      writeFileSync(
        path,
        'geo,year,sex,lower,upper,value\nDE,2023,M,0,5,"2,000,000"\nDE,2023,F,0,5,N/A\n'
      );
      const orchestrator = new IngestionOrchestrator({
        registry,
        client: new FileSource({
          path,
          fieldMapping: { geo: "region", lower: "age_min", upper: "age_max" },
          now: () => FIXED_NOW,
        }),
        repository,
        now: () => FIXED_NOW,
      });

      const result = await orchestrator.run("demo_pjan");

      expect(result).toMatchObject({
        state: "COMPLETED",
        pagesPersisted: 1,
        recordsFetched: 2,
        recordsNormalized: 1,
        recordsDropped: 1,
        inserted: 1,
      });
      const rows = await repository.queryDemographics({ source: "population.csv" });
      expect(rows).toEqual([
        expect.objectContaining({ regionCode: "DE", sex: "M", ageMin: 0, ageMax: 5, value: 2000000 }),
      ]);
      const source = await repository.findSourceByName("population.csv");
      expect(source).toMatchObject({
        sourceType: "file",
        url: pathToFileURL(path).href,
        lastUpdated: NOW_ISO,
        metadata: { dataset: "demo_pjan", format: "json" },
      });
      const snapshots = await repository.listSnapshots("demo_pjan");
      expect(snapshots).toHaveLength(1);
      expect(snapshots[0]).toMatchObject({ params: {}, url: pathToFileURL(path).href });
    });
  });

  // ============================================================================
  // Cancellation
  // ============================================================================

  describe("cancellation", () => {
    it("should stop between pages once the signal is aborted", async () => {
      const controller = new AbortController();
      const { orchestrator, fetch } = createOrchestrator((url) => indexPage(pageOf(url)));
      orchestrator.setProgressCallback((event) => {
        if (event.state === "PERSISTING") {
          controller.abort();
        }
      });

      const result = await orchestrator.run("paged_index", { signal: controller.signal });

      expect(result).toMatchObject({
        state: "CANCELLED",
        pagesPersisted: 1,
        lastPersistedPage: 0,
      });
      expect(fetch).toHaveBeenCalledTimes(1);
      const source = await repository.findSourceByName("paged_index");
      expect(source?.lastUpdated).toBeNull();
    });

    it("should cancel instead of failing when aborted during a retry", async () => {
      const controller = new AbortController();
      const { orchestrator, fetch } = createOrchestrator(() => ({ status: 503 }), {
        onSleep: () => {
          controller.abort();
        },
      });

      const result = await orchestrator.run("demo_pjan", { signal: controller.signal });

      expect(result.state).toBe("CANCELLED");
      expect(result.error).toBeUndefined();
      expect(fetch).toHaveBeenCalledTimes(1);
    });

    it("should not fetch when cancelled before starting", async () => {
      const controller = new AbortController();
      controller.abort();
      const { orchestrator, fetch, events } = createOrchestrator(() => demoPage([]));

      const result = await orchestrator.run("demo_pjan", { signal: controller.signal });

      expect(result.state).toBe("CANCELLED");
      expect(fetch).not.toHaveBeenCalled();
      expect(events.map((e) => e.state)).toEqual(["PENDING", "CANCELLED"]);
    });
  });

  // ============================================================================
  // Progress
  // ============================================================================

  describe("progress", () => {
    it("should report every transition of a completed run", async () => {
      const { orchestrator, events } = createOrchestrator(() =>
        demoPage([{ ...MALE_0_4, value: 1 }])
      );

      await orchestrator.run("demo_pjan");

      expect(events.map((e) => e.state)).toEqual([
        "PENDING",
        "FETCHING",
        "NORMALIZING",
        "PERSISTING",
        "COMPLETED",
      ]);
      expect(events.at(-1)?.pagesPersisted).toBe(1);
    });

    it("should complete even when the progress callback throws", async () => {
      const { orchestrator } = createOrchestrator(() =>
        demoPage([{ ...MALE_0_4, value: 1 }])
      );
      orchestrator.setProgressCallback(() => {
        throw new Error("listener failed");
      });

      const result = await orchestrator.run("demo_pjan");

      expect(result.state).toBe("COMPLETED");
    });

    it("should classify terminal states", () => {
      expect(isTerminalState("COMPLETED")).toBe(true);
      expect(isTerminalState("FAILED")).toBe(true);
      expect(isTerminalState("CANCELLED")).toBe(true);
      expect(isTerminalState("PERSISTING")).toBe(false);
    });
  });

  // ============================================================================
  // Concurrency
  // ============================================================================

  describe("concurrency", () => {
    it("should serialize runs of the same dataset", async () => {
      const { orchestrator, events } = createOrchestrator(() =>
        demoPage([{ ...MALE_0_4, value: 1 }])
      );

      const [first, second] = await Promise.all([
        orchestrator.run("demo_pjan"),
        orchestrator.run("demo_pjan"),
      ]);

      const runIds = events.map((e) => e.runId);
      const lastOfFirst = runIds.lastIndexOf(first.runId);
      const firstOfSecond = runIds.indexOf(second.runId);
      expect(lastOfFirst).toBeLessThan(firstOfSecond);
      expect([first.state, second.state]).toEqual(["COMPLETED", "COMPLETED"]);
      expect(second).toMatchObject({ inserted: 0, updated: 1 });
    });

    it("should run several datasets and keep their order", async () => {
      const { orchestrator } = createOrchestrator((url) =>
        url.pathname.endsWith("/demo_pjan")
          ? demoPage([{ ...MALE_0_4, value: 1 }])
          : indexPage(pageOf(url))
      );

      const results = await orchestrator.runMany(["paged_index", "demo_pjan"], {
        concurrency: 2,
      });

      expect(results.map((r) => [r.datasetId, r.state])).toEqual([
        ["paged_index", "COMPLETED"],
        ["demo_pjan", "COMPLETED"],
      ]);
      expect(await repository.countFacts("industrial")).toBe(9);
      expect(await repository.countFacts("demographic")).toBe(1);
    });

    it("should check every dataset id before starting", async () => {
      const { orchestrator, fetch } = createOrchestrator(() => demoPage([]));

      await expect(orchestrator.runMany(["demo_pjan", "missing"])).rejects.toThrow(
        "Unknown dataset: missing"
      );
      expect(fetch).not.toHaveBeenCalled();
    });

    it("should time out waiting for a held dataset lock", async () => {
      const mutex = new KeyedMutex();
      const release = await mutex.acquire("demo_pjan");
      const { orchestrator, fetch } = createOrchestrator(() => demoPage([]), {
        mutex,
        lockTimeoutMs: 10,
      });

      await expect(orchestrator.run("demo_pjan")).rejects.toThrow(LockTimeoutError);
      const [result] = await orchestrator.runMany(["demo_pjan"]);

      expect(result).toMatchObject({
        datasetId: "demo_pjan",
        state: "FAILED",
        pagesPersisted: 0,
        error: { name: "LockTimeoutError" },
      });
      expect(fetch).not.toHaveBeenCalled();
      release();
    });
  });
});
