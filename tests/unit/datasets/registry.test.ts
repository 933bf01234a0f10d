import { fileURLToPath } from "node:url";

import { describe, it, expect } from "vitest";

import {
  DatasetRegistry,
  defineDataset,
  loadDatasetRegistry,
  parseDatasetsConfig,
} from "../../../src/datasets/registry.js";
import { UnknownDatasetError } from "../../../src/errors.js";
import { DEMO_PJAN_CONFIG, PAGED_INDEX_CONFIG } from "../../helpers/upstream.js";

const DATASETS_FILE = fileURLToPath(
  new URL("../../../config/datasets.json", import.meta.url)
);

describe("datasets/registry", () => {
  // ============================================================================
  // Descriptors
  // ============================================================================

  describe("defineDataset", () => {
    it("should apply defaults", () => {
      const descriptor = defineDataset(PAGED_INDEX_CONFIG);

      expect(descriptor.valueField).toBe("value");
      expect(descriptor.defaultParams).toEqual({});
      expect(descriptor.paging).toEqual({
        pageParam: "page",
        firstPage: 0,
        sizeParam: "size",
        pageSize: 2,
        maxPages: 1000,
      });
      expect(descriptor.recordsField).toBe("data");
      expect(descriptor.nextField).toBe("next");
      expect(descriptor.delimiter).toBeUndefined();
    });

    it("should deep-freeze the descriptor", () => {
      const descriptor = defineDataset(DEMO_PJAN_CONFIG);

      expect(Object.isFrozen(descriptor)).toBe(true);
      expect(Object.isFrozen(descriptor.dimensions)).toBe(true);
      expect(Object.isFrozen(descriptor.dimensions.age)).toBe(true);
      expect(Object.isFrozen(descriptor.defaultParams)).toBe(true);
    });

    it("should not share state with the config it was built from", () => {
      const config = { ...DEMO_PJAN_CONFIG, defaultParams: { unit: "NR" } };
      const descriptor = defineDataset(config);

      config.defaultParams.unit = "PC";

      expect(descriptor.defaultParams).toEqual({ unit: "NR" });
    });
  });

  // ============================================================================
  // Registry
  // ============================================================================

  describe("DatasetRegistry", () => {
    const registry = DatasetRegistry.fromConfigs([DEMO_PJAN_CONFIG, PAGED_INDEX_CONFIG]);

    it("should look up descriptors by id", () => {
      expect(registry.lookup("demo_pjan").family).toBe("demographic");
      expect(registry.has("paged_index")).toBe(true);
      expect(registry.has("missing")).toBe(false);
    });

    it("should throw UnknownDatasetError for unknown ids", () => {
      expect(() => registry.lookup("missing")).toThrow(UnknownDatasetError);
      expect(() => registry.lookup("missing")).toThrow("Unknown dataset: missing");
    });

    it("should list descriptors in configuration order", () => {
      expect(registry.all().map((d) => d.id)).toEqual(["demo_pjan", "paged_index"]);
    });

    it("should reject duplicate ids", () => {
      expect(() =>
        DatasetRegistry.fromConfigs([DEMO_PJAN_CONFIG, DEMO_PJAN_CONFIG])
      ).toThrow("Duplicate dataset id in configuration: demo_pjan");
    });
  });

  // ============================================================================
  // Configuration
  // ============================================================================

  describe("parseDatasetsConfig", () => {
    it("should reject configuration that fails validation", () => {
      expect(() =>
        parseDatasetsConfig({ datasets: [{ ...DEMO_PJAN_CONFIG, family: "weather" }] })
      ).toThrow(/^Invalid dataset configuration: /);
    });

    it("should reject unknown descriptor fields", () => {
      expect(() =>
        parseDatasetsConfig({ datasets: [{ ...DEMO_PJAN_CONFIG, color: "red" }] })
      ).toThrow(/^Invalid dataset configuration: /);
    });
  });

  describe("loadDatasetRegistry", () => {
    it("should load the bundled dataset configuration", () => {
      const registry = loadDatasetRegistry(DATASETS_FILE);

      expect(registry.all().map((d) => d.id)).toEqual([
        "demo_pjan",
        "sts_inpr_m",
        "sts_inno_m",
        "nrg_bal_c",
        "lfsi_sla_q",
      ]);
      expect(registry.lookup("nrg_bal_c").family).toBe("energy");
      expect(registry.lookup("demo_pjan").format).toBe("jsonstat");
    });
  });
});
