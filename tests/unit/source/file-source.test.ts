import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { pathToFileURL } from "node:url";

import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { SourceError } from "../../../src/errors.js";
import { FileSource, detectFileFormat } from "../../../src/source/file-source.js";
import {
  DEMO_PJAN_CONFIG,
  FIXED_NOW,
  collect,
  descriptor,
} from "../../helpers/upstream.js";

const demo = descriptor(DEMO_PJAN_CONFIG);
const jsonStatDataset = descriptor({ ...DEMO_PJAN_CONFIG, id: "demo_stat", format: "jsonstat" });

describe("source/file-source", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "file-source-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeExport(name: string, content: string): string {
    const path = join(dir, name);
    writeFileSync(path, content);
    return path;
  }

  // ============================================================================
  // Format Detection
  // ============================================================================

  describe("detectFileFormat", () => {
    it("should read .csv files as CSV", () => {
      expect(detectFileFormat("exports/POP.CSV", demo)).toBe("csv");
    });

    it("should read .json files as records or JSON-stat per dataset", () => {
      expect(detectFileFormat("pop.json", demo)).toBe("json");
      expect(detectFileFormat("pop.json", jsonStatDataset)).toBe("jsonstat");
    });

    it("should fall back to JSON for other extensions", () => {
      expect(detectFileFormat("pop.txt", demo)).toBe("json");
      expect(detectFileFormat("pop", demo)).toBe("json");
    });
  });

  // ============================================================================
  // Reading
  // ============================================================================

  describe("fetchPages", () => {
    it("should yield the whole file as page 0 with provenance", async () => {
      const content = JSON.stringify([{ region: "AT", year: 2022, value: 9 }]);
      const path = writeExport("population.json", content);
      const source = new FileSource({ path, now: () => FIXED_NOW });

      const pages = await collect(source.fetchPages(demo));

      expect(pages).toHaveLength(1);
      expect(pages[0]).toMatchObject({
        datasetId: "demo_pjan",
        pageIndex: 0,
        url: pathToFileURL(path).href,
        params: {},
        fetchedAt: FIXED_NOW.toISOString(),
        payload: content,
        rows: [{ region: "AT", year: 2022, value: 9 }],
        hasMore: false,
      });
    });

    it("should rename mapped columns and keep the rest", async () => {
      const path = writeExport("pop.csv", "country;yr;value\nDE;2023;12\n");
      const source = new FileSource({
        path,
        delimiter: ";",
        fieldMapping: { country: "region", yr: "year" },
      });

      const pages = await collect(source.fetchPages(demo));

      expect(pages[0]?.rows).toEqual([{ region: "DE", year: "2023", value: "12" }]);
    });

    it("should honour an explicit format over the extension", async () => {
      const path = writeExport("pop.txt", "region,year,value\nFR,2021,3\n");
      const source = new FileSource({ path, format: "csv" });

      const pages = await collect(source.fetchPages(demo));

      expect(pages[0]?.rows).toEqual([{ region: "FR", year: "2021", value: "3" }]);
    });

    it("should yield nothing past the first page or once aborted", async () => {
      const path = writeExport("pop.json", "[]");
      const source = new FileSource({ path });
      const controller = new AbortController();
      controller.abort();

      expect(await collect(source.fetchPages(demo, {}, { startPage: 1 }))).toEqual([]);
      expect(await collect(source.fetchPages(demo, {}, { signal: controller.signal }))).toEqual([]);
    });

    it("should fail with a permanent SourceError for a missing file", async () => {
      const source = new FileSource({ path: join(dir, "missing.json") });

      const error: unknown = await collect(source.fetchPages(demo)).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(SourceError);
      expect(error).toMatchObject({ datasetId: "demo_pjan", transient: false, query: {} });
      expect(String(error)).toContain("Cannot read");
    });

    it("should fail with a SourceError for a malformed file", async () => {
      const path = writeExport("pop.json", "{ not json");
      const source = new FileSource({ path });

      const error: unknown = await collect(source.fetchPages(demo)).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(SourceError);
      expect(String(error)).toContain("Malformed json file");
    });
  });

  describe("origin", () => {
    it("should record a file source named after the file", () => {
      const path = join(dir, "population.csv");

      expect(new FileSource({ path }).origin()).toEqual({
        name: "population.csv",
        sourceType: "file",
        url: pathToFileURL(path).href,
      });
      expect(new FileSource({ path, sourceName: "census-2023" }).origin().name).toBe(
        "census-2023"
      );
    });
  });
});
