/**
 * Tagged raw observations
 *
 * A flat upstream row is split into the fields its descriptor maps and an
 * `extras` bucket for everything else. Nothing outside the normalizer sees
 * these shapes.
 */

import type { DatasetDescriptor } from "../datasets/types.js";
import type { RawRow } from "../source/types.js";

export type AgeObservation =
  | { kind: "none" }
  | { kind: "code"; code: unknown }
  | { kind: "bounds"; min: unknown; max: unknown };

interface ObservationBase {
  geography: unknown;
  geographyLabel: unknown;
  time: unknown;
  value: unknown;
  extras: Record<string, unknown>;
}

export interface DemographicObservation extends ObservationBase {
  family: "demographic";
  /** undefined when the dataset has no sex breakdown */
  sex: unknown;
  hasSex: boolean;
  age: AgeObservation;
}

export interface IndustrialObservation extends ObservationBase {
  family: "industrial";
  industry: unknown;
  hasIndustry: boolean;
  unit: unknown;
}

export interface EnergyObservation extends ObservationBase {
  family: "energy";
  balance: unknown;
  hasBalance: boolean;
  unit: unknown;
}

export type RawObservation =
  | DemographicObservation
  | IndustrialObservation
  | EnergyObservation;

export function classifyRow(
  row: RawRow,
  descriptor: DatasetDescriptor
): RawObservation {
  const { dimensions } = descriptor;
  const mapped = new Set<string>([
    dimensions.geography,
    dimensions.time,
    descriptor.valueField,
  ]);
  const take = (field: string | undefined): unknown => {
    if (field === undefined) {
      return undefined;
    }
    mapped.add(field);
    return row[field];
  };

  const geography = take(dimensions.geography);
  const geographyLabel = take(dimensions.geographyLabel);
  const time = take(dimensions.time);
  const value = take(descriptor.valueField);

  const extrasOf = (): Record<string, unknown> => {
    const extras: Record<string, unknown> = {};
    for (const [key, field] of Object.entries(row)) {
      if (!mapped.has(key)) {
        extras[key] = field;
      }
    }
    return extras;
  };

  switch (descriptor.family) {
    case "demographic": {
      const sex = take(dimensions.sex);
      const ageDim = dimensions.age;
      let age: AgeObservation;
      if (ageDim === undefined) {
        age = { kind: "none" };
      } else if ("field" in ageDim) {
        age = { kind: "code", code: take(ageDim.field) };
      } else {
        age = {
          kind: "bounds",
          min: take(ageDim.minField),
          max: take(ageDim.maxField),
        };
      }
      return {
        family: "demographic",
        geography,
        geographyLabel,
        time,
        value,
        sex,
        hasSex: dimensions.sex !== undefined,
        age,
        extras: extrasOf(),
      };
    }

    case "industrial": {
      const industry = take(dimensions.industry);
      const unit = take(dimensions.unit);
      return {
        family: "industrial",
        geography,
        geographyLabel,
        time,
        value,
        industry,
        hasIndustry: dimensions.industry !== undefined,
        unit,
        extras: extrasOf(),
      };
    }

    case "energy": {
      const balance = take(dimensions.industry);
      const unit = take(dimensions.unit);
      return {
        family: "energy",
        geography,
        geographyLabel,
        time,
        value,
        balance,
        hasBalance: dimensions.industry !== undefined,
        unit,
        extras: extrasOf(),
      };
    }
  }
}
