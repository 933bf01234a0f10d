/**
 * Normalizer - maps flat upstream rows to unified fact records
 *
 * A row that cannot be mapped is skipped and counted, never thrown. Region
 * rows are created here, through the store's get-or-create, and nowhere else.
 */

import { normalizerLogger } from "../logger.js";
import {
  asText,
  isMissing,
  normalizeIndustryCode,
  normalizeRegionCode,
  normalizeSex,
  parentRegionCode,
  parseAgeBounds,
  parseAgeCode,
  parseNumericValue,
  parseTimePeriod,
  regionLevelFor,
  type AgeBand,
} from "./dimensions.js";
import {
  classifyRow,
  type DemographicObservation,
  type RawObservation,
} from "./observation.js";

import type { DatasetDescriptor } from "../datasets/types.js";
import type { RawRow } from "../source/types.js";
import type {
  FactRecord,
  Region,
  RegionLevel,
  ResolvedFact,
  Sex,
  TimePeriod,
} from "../types/facts.js";

export type SkipReason =
  | "missing_region"
  | "invalid_time"
  | "invalid_value"
  | "invalid_sex"
  | "invalid_age"
  | "missing_industry";

export type RecordOutcome =
  | { ok: true; fact: FactRecord }
  | { ok: false; reason: SkipReason };

export interface NormalizedBatch {
  facts: FactRecord[];
  dropped: number;
  dropReasons: Partial<Record<SkipReason, number>>;
}

/** The slice of the repository the normalizer may write through */
export interface RegionStore {
  getOrCreateRegion(
    code: string,
    name: string,
    level: RegionLevel,
    parentCode?: string | null
  ): Promise<Region>;
}

interface CommonFields extends TimePeriod {
  regionCode: string;
  regionName: string;
  regionLevel: RegionLevel;
  value: number;
}

function skip(reason: SkipReason): RecordOutcome {
  return { ok: false, reason };
}

function readCommon(
  observation: RawObservation
): CommonFields | { skip: SkipReason } {
  const regionCode = normalizeRegionCode(observation.geography);
  if (regionCode === null) {
    return { skip: "missing_region" };
  }
  const period = parseTimePeriod(observation.time);
  if (period === null) {
    return { skip: "invalid_time" };
  }
  const value = parseNumericValue(observation.value);
  if (value === null) {
    return { skip: "invalid_value" };
  }
  return {
    ...period,
    regionCode,
    regionName: asText(observation.geographyLabel) ?? regionCode,
    regionLevel: regionLevelFor(regionCode),
    value,
  };
}

function readAge(observation: DemographicObservation): AgeBand | null {
  switch (observation.age.kind) {
    case "none":
      return { min: null, max: null };
    case "code":
      return parseAgeCode(observation.age.code);
    case "bounds":
      return parseAgeBounds(observation.age.min, observation.age.max);
  }
}

function industryOf(code: unknown): string | null {
  const normalized = normalizeIndustryCode(code);
  return normalized === "TOTAL" ? null : normalized;
}

/**
 * Map one row, reporting why it was skipped when it cannot be mapped.
 */
export function evaluateRecord(
  row: RawRow,
  descriptor: DatasetDescriptor
): RecordOutcome {
  const observation = classifyRow(row, descriptor);
  const common = readCommon(observation);
  if ("skip" in common) {
    return skip(common.skip);
  }

  switch (observation.family) {
    case "demographic": {
      let sex: Sex | null = null;
      if (observation.hasSex) {
        const code = normalizeSex(observation.sex);
        if (code === null) {
          return skip("invalid_sex");
        }
        sex = code === "TOTAL" ? null : code;
      }
      const age = readAge(observation);
      if (age === null) {
        return skip("invalid_age");
      }
      return {
        ok: true,
        fact: {
          family: "demographic",
          ...common,
          sex,
          ageMin: age.min,
          ageMax: age.max,
        },
      };
    }

    case "industrial":
    case "energy": {
      const code =
        observation.family === "industrial"
          ? observation.industry
          : observation.balance;
      const declared =
        observation.family === "industrial"
          ? observation.hasIndustry
          : observation.hasBalance;
      if (declared && isMissing(code)) {
        return skip("missing_industry");
      }
      return {
        ok: true,
        fact: {
          family: "industrial",
          ...common,
          industryCode: declared ? industryOf(code) : null,
          unit: asText(observation.unit),
        },
      };
    }
  }
}

/**
 * Map one row to a fact, or null when the row is malformed.
 */
export function normalizeRecord(
  row: RawRow,
  descriptor: DatasetDescriptor
): FactRecord | null {
  const outcome = evaluateRecord(row, descriptor);
  return outcome.ok ? outcome.fact : null;
}

export function normalizeBatch(
  rows: readonly RawRow[],
  descriptor: DatasetDescriptor
): NormalizedBatch {
  const facts: FactRecord[] = [];
  const dropReasons: Partial<Record<SkipReason, number>> = {};
  let dropped = 0;

  for (const row of rows) {
    const outcome = evaluateRecord(row, descriptor);
    if (outcome.ok) {
      facts.push(outcome.fact);
    } else {
      dropped++;
      dropReasons[outcome.reason] = (dropReasons[outcome.reason] ?? 0) + 1;
      normalizerLogger.trace(
        { datasetId: descriptor.id, reason: outcome.reason, row },
        "Skipped record"
      );
    }
  }

  if (dropped > 0) {
    normalizerLogger.info(
      { datasetId: descriptor.id, kept: facts.length, dropped, dropReasons },
      "Dropped malformed records"
    );
  }

  return { facts, dropped, dropReasons };
}

export class Normalizer {
  constructor(private readonly regions: RegionStore) {}

  normalizeRecord(row: RawRow, descriptor: DatasetDescriptor): FactRecord | null {
    return normalizeRecord(row, descriptor);
  }

  normalizeBatch(
    rows: readonly RawRow[],
    descriptor: DatasetDescriptor
  ): NormalizedBatch {
    return normalizeBatch(rows, descriptor);
  }

  /**
   * Attach stored region ids, creating regions seen for the first time.
   * Each distinct code is resolved once per call.
   */
  async resolveRegions(facts: readonly FactRecord[]): Promise<ResolvedFact[]> {
    const regionIds = new Map<string, number>();

    for (const fact of facts) {
      if (regionIds.has(fact.regionCode)) {
        continue;
      }
      const region = await this.regions.getOrCreateRegion(
        fact.regionCode,
        fact.regionName,
        fact.regionLevel,
        parentRegionCode(fact.regionCode)
      );
      regionIds.set(fact.regionCode, region.id);
    }

    return facts.map((fact) => {
      const regionId = regionIds.get(fact.regionCode);
      if (regionId === undefined) {
        throw new Error(`Region ${fact.regionCode} was not resolved`);
      }
      return { ...fact, regionId };
    });
  }
}
