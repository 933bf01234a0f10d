/**
 * Response schemas shared across routes
 */

import { Type, type Static } from "@sinclair/typebox";

import {
  FamilySchema,
  Nullable,
  RegionLevelSchema,
  SexSchema,
  createListResponseSchema,
} from "./common.js";

// ============================================================================
// Facts
// ============================================================================

const StoredFactProperties = {
  id: Type.Integer(),
  source: Type.String(),
  regionCode: Type.String(),
  regionName: Type.String(),
  year: Type.Integer(),
  quarter: Nullable(Type.Integer()),
  month: Nullable(Type.Integer()),
  value: Type.Number(),
  updatedAt: Type.String({ format: "date-time" }),
};

export const DemographicRecordSchema = Type.Object({
  ...StoredFactProperties,
  sex: Nullable(SexSchema),
  ageMin: Nullable(Type.Integer()),
  ageMax: Nullable(Type.Integer({ description: "Exclusive upper bound" })),
});

export const IndustrialRecordSchema = Type.Object({
  ...StoredFactProperties,
  industryCode: Nullable(Type.String()),
  unit: Nullable(Type.String()),
});

export const DemographicListResponseSchema = createListResponseSchema(
  DemographicRecordSchema
);
export const IndustrialListResponseSchema = createListResponseSchema(
  IndustrialRecordSchema
);

export const FactStatisticsSchema = Type.Object({
  family: FamilySchema,
  totalRecords: Type.Integer(),
  minYear: Nullable(Type.Integer()),
  maxYear: Nullable(Type.Integer()),
  yearsCovered: Type.String({ examples: ["2019-2023", "N/A"] }),
  regionCount: Type.Integer(),
  industryCodes: Type.Optional(Type.Array(Type.String())),
});

export const StoreSummarySchema = Type.Object({
  sources: Type.Integer(),
  regions: Type.Integer(),
  rawSnapshots: Type.Integer(),
  demographicFacts: Type.Integer(),
  industrialFacts: Type.Integer(),
});

// ============================================================================
// Reference Data
// ============================================================================

export const DataSourceSchema = Type.Object({
  id: Type.Integer(),
  name: Type.String(),
  sourceType: Type.Union([Type.Literal("api"), Type.Literal("file")]),
  url: Type.String(),
  lastUpdated: Nullable(Type.String({ format: "date-time" })),
  metadata: Type.Record(Type.String(), Type.Unknown()),
});

export const RegionSchema = Type.Object({
  id: Type.Integer(),
  code: Type.String(),
  name: Type.String(),
  level: RegionLevelSchema,
  parentCode: Nullable(Type.String()),
});

export const DatasetSchema = Type.Object({
  id: Type.String(),
  name: Type.String(),
  family: Type.Union([
    Type.Literal("demographic"),
    Type.Literal("industrial"),
    Type.Literal("energy"),
  ]),
  format: Type.Union([
    Type.Literal("jsonstat"),
    Type.Literal("json"),
    Type.Literal("csv"),
  ]),
  measure: Type.String(),
  paged: Type.Boolean(),
});

export type DatasetDto = Static<typeof DatasetSchema>;

export const SourceListResponseSchema = createListResponseSchema(DataSourceSchema);
export const RegionListResponseSchema = createListResponseSchema(RegionSchema);
export const DatasetListResponseSchema = createListResponseSchema(DatasetSchema);

// ============================================================================
// Ingestion
// ============================================================================

export const IngestionStateSchema = Type.Union([
  Type.Literal("PENDING"),
  Type.Literal("FETCHING"),
  Type.Literal("NORMALIZING"),
  Type.Literal("PERSISTING"),
  Type.Literal("COMPLETED"),
  Type.Literal("FAILED"),
  Type.Literal("CANCELLED"),
]);

export const IngestionRunResultSchema = Type.Object({
  runId: Type.String(),
  datasetId: Type.String(),
  state: IngestionStateSchema,
  startedAt: Type.String({ format: "date-time" }),
  finishedAt: Type.String({ format: "date-time" }),
  pagesPersisted: Type.Integer(),
  lastPersistedPage: Nullable(Type.Integer()),
  recordsFetched: Type.Integer(),
  recordsNormalized: Type.Integer(),
  recordsDropped: Type.Integer(),
  inserted: Type.Integer(),
  updated: Type.Integer(),
  error: Type.Optional(
    Type.Object({
      name: Type.String(),
      message: Type.String(),
      status: Type.Optional(Type.Integer()),
    })
  ),
});
