import { describe, it, expect, vi } from "vitest";

import {
  Normalizer,
  evaluateRecord,
  normalizeBatch,
  normalizeRecord,
  type RegionStore,
} from "../../../src/normalize/normalizer.js";
import {
  DEMO_PJAN_CONFIG,
  PAGED_INDEX_CONFIG,
  descriptor,
} from "../../helpers/upstream.js";

import type { FactRecord, Region } from "../../../src/types/facts.js";

const demo = descriptor(DEMO_PJAN_CONFIG);
const index = descriptor(PAGED_INDEX_CONFIG);

const jsonStatDemo = descriptor({
  ...DEMO_PJAN_CONFIG,
  format: "jsonstat",
  dimensions: {
    geography: "geo",
    geographyLabel: "geo__label",
    time: "time",
    sex: "sex",
    age: { field: "age" },
  },
});

const energy = descriptor({
  id: "nrg_test",
  name: "Energy balance",
  family: "energy",
  format: "jsonstat",
  dimensions: { geography: "geo", time: "time", industry: "nrg_bal", unit: "unit" },
  measure: "energy",
});

describe("normalize/normalizer", () => {
  // ============================================================================
  // Demographic Records
  // ============================================================================

  describe("demographic records", () => {
    it("should keep the valid record and drop the unparseable one", () => {
      const batch = normalizeBatch(
        [
          { region: "DE", year: 2023, sex: "M", age_min: 0, age_max: 5, value: 2000000 },
          { region: "DE", year: 2023, sex: "F", age_min: 0, age_max: 5, value: "N/A" },
        ],
        demo
      );

      expect(batch.facts).toEqual([
        {
          family: "demographic",
          regionCode: "DE",
          regionName: "DE",
          regionLevel: "COUNTRY",
          year: 2023,
          quarter: null,
          month: null,
          value: 2000000,
          sex: "M",
          ageMin: 0,
          ageMax: 5,
        },
      ]);
      expect(batch.dropped).toBe(1);
      expect(batch.dropReasons).toEqual({ invalid_value: 1 });
    });

    it("should read banded age codes, labels and totals", () => {
      const fact = normalizeRecord(
        { geo: "de", geo__label: "Germany", time: "2023", sex: "T", age: "Y_GE85", value: 5 },
        jsonStatDemo
      );

      expect(fact).toMatchObject({
        regionCode: "DE",
        regionName: "Germany",
        sex: null,
        ageMin: 85,
        ageMax: null,
      });
    });

    it("should treat a dataset without sex or age as totals", () => {
      const plain = descriptor({
        ...DEMO_PJAN_CONFIG,
        dimensions: { geography: "region", time: "year" },
      });

      const fact = normalizeRecord({ region: "FR", year: "2022Q3", value: "7" }, plain);

      expect(fact).toMatchObject({ sex: null, ageMin: null, ageMax: null, quarter: 3 });
    });

    it("should report why a record was skipped", () => {
      const base = { region: "DE", year: 2023, sex: "M", age_min: 0, age_max: 5, value: 1 };

      expect(evaluateRecord({ ...base, region: "" }, demo)).toEqual({
        ok: false,
        reason: "missing_region",
      });
      expect(evaluateRecord({ ...base, year: 1850 }, demo)).toEqual({
        ok: false,
        reason: "invalid_time",
      });
      expect(evaluateRecord({ ...base, sex: "X" }, demo)).toEqual({
        ok: false,
        reason: "invalid_sex",
      });
      expect(evaluateRecord({ ...base, age_min: "old" }, demo)).toEqual({
        ok: false,
        reason: "invalid_age",
      });
    });
  });

  // ============================================================================
  // Industrial and Energy Records
  // ============================================================================

  describe("industrial records", () => {
    it("should normalize region, period and NACE code", () => {
      const fact = normalizeRecord(
        { geo: "de1", period: "2023M03", nace: "nace_c", unit: "I21", value: "101.5" },
        index
      );

      expect(fact).toEqual({
        family: "industrial",
        regionCode: "DE1",
        regionName: "DE1",
        regionLevel: "NUTS1",
        year: 2023,
        quarter: null,
        month: 3,
        value: 101.5,
        industryCode: "C",
        unit: "I21",
      });
    });

    it("should store the TOTAL industry code as null", () => {
      const fact = normalizeRecord(
        { geo: "DE", period: "2023", nace: "TOTAL", unit: "I21", value: 1 },
        index
      );

      expect(fact).toMatchObject({ industryCode: null });
    });

    it("should skip records without a declared industry code", () => {
      expect(
        evaluateRecord({ geo: "DE", period: "2023", unit: "I21", value: 1 }, index)
      ).toEqual({ ok: false, reason: "missing_industry" });
    });

    it("should persist energy records in the industrial shape", () => {
      const fact = normalizeRecord(
        { geo: "AT", time: "2021", nrg_bal: "FC_IND_E", unit: "KTOE", value: 812.3 },
        energy
      );

      expect(fact).toMatchObject({
        family: "industrial",
        industryCode: "FC_IND_E",
        unit: "KTOE",
        value: 812.3,
      });
    });
  });

  // ============================================================================
  // Region Resolution
  // ============================================================================

  describe("Normalizer.resolveRegions", () => {
    function createRegionStore() {
      let nextId = 1;
      const getOrCreateRegion = vi.fn<RegionStore["getOrCreateRegion"]>(
        async (code, name, level, parentCode = null): Promise<Region> => ({
          id: nextId++,
          code,
          name,
          level,
          parentCode,
        })
      );
      return { getOrCreateRegion };
    }

    it("should resolve each distinct region once", async () => {
      const store = createRegionStore();
      const normalizer = new Normalizer(store);
      const facts = [
        { geo: "DE111", period: "2023M01", nace: "C", unit: "I21", value: 1 },
        { geo: "DE111", period: "2023M02", nace: "C", unit: "I21", value: 2 },
        { geo: "FR", period: "2023M01", nace: "C", unit: "I21", value: 3 },
      ]
        .map((row) => normalizer.normalizeRecord(row, index))
        .filter((fact): fact is FactRecord => fact !== null);

      const resolved = await normalizer.resolveRegions(facts);

      expect(resolved.map((fact) => fact.regionId)).toEqual([1, 1, 2]);
      expect(store.getOrCreateRegion).toHaveBeenCalledTimes(2);
      expect(store.getOrCreateRegion).toHaveBeenNthCalledWith(
        1,
        "DE111",
        "DE111",
        "NUTS3",
        "DE11"
      );
      expect(store.getOrCreateRegion).toHaveBeenNthCalledWith(2, "FR", "FR", "COUNTRY", null);
    });

    it("should not touch the store for an empty batch", async () => {
      const store = createRegionStore();

      await expect(new Normalizer(store).resolveRegions([])).resolves.toEqual([]);
      expect(store.getOrCreateRegion).not.toHaveBeenCalled();
    });
  });
});
