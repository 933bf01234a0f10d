/**
 * Common TypeBox schemas for API validation
 */

import { Type, type Static, type TSchema } from "@sinclair/typebox";

import {
  MAX_QUERY_LIMIT,
  DEFAULT_QUERY_LIMIT,
  type StatisticsFilters,
} from "../../db/repository.js";
import { MAX_YEAR, MIN_YEAR } from "../../normalize/dimensions.js";

export function Nullable<T extends TSchema>(schema: T) {
  return Type.Union([schema, Type.Null()]);
}

// ============================================================================
// Error Schemas
// ============================================================================

export const ApiErrorSchema = Type.Object({
  error: Type.String(),
  message: Type.String(),
  details: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
  requestId: Type.Optional(Type.String()),
});

// ============================================================================
// Response Wrapper Schemas
// ============================================================================

export function createListResponseSchema<T extends TSchema>(itemSchema: T) {
  return Type.Object({
    count: Type.Integer({ minimum: 0 }),
    data: Type.Array(itemSchema),
  });
}

// ============================================================================
// Common Field Schemas
// ============================================================================

export const RegionLevelSchema = Type.Union([
  Type.Literal("COUNTRY"),
  Type.Literal("NUTS1"),
  Type.Literal("NUTS2"),
  Type.Literal("NUTS3"),
  Type.Literal("AGGREGATE"),
]);

export const SexSchema = Type.Union(
  [Type.Literal("M"), Type.Literal("F"), Type.Literal("O")],
  { description: "Sex code; omit for all sexes" }
);

export const FamilySchema = Type.Union([
  Type.Literal("demographic"),
  Type.Literal("industrial"),
]);

export const LimitSchema = Type.Integer({
  minimum: 1,
  maximum: MAX_QUERY_LIMIT,
  default: DEFAULT_QUERY_LIMIT,
  description: `Maximum rows to return (1-${String(MAX_QUERY_LIMIT)})`,
});

export const YearSchema = Type.Integer({
  minimum: MIN_YEAR,
  maximum: MAX_YEAR,
  description: "Filter by year",
});

export const RegionCodeSchema = Type.String({
  minLength: 2,
  maxLength: 16,
  description: "Region code (e.g. 'DE', 'FR10')",
});

export const SourceNameSchema = Type.String({
  minLength: 1,
  description: "Data source name (the dataset id it was loaded from)",
});

/** Filters shared by the fact endpoints, named as in the query string */
export const FactFilterProperties = {
  region_code: Type.Optional(RegionCodeSchema),
  year: Type.Optional(YearSchema),
  source: Type.Optional(SourceNameSchema),
};

/** Unknown query keys are rejected rather than ignored */
export const STRICT_QUERY = { additionalProperties: false } as const;

export const StatsQuerySchema = Type.Object(FactFilterProperties, STRICT_QUERY);

export type StatsQuery = Static<typeof StatsQuerySchema>;

export function toFactFilters(query: StatsQuery): StatisticsFilters {
  return {
    regionCode: query.region_code,
    year: query.year,
    source: query.source,
  };
}
