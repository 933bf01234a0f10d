import type { Generated, Insertable, Selectable, Updateable } from "kysely";

import type { RegionLevel, Sex, SourceType } from "../types/facts.js";

// ============================================================================
// Reference Tables
// ============================================================================

/**
 * data_sources - One row per upstream dataset
 */
export interface DataSourcesTable {
  id: Generated<number>;
  name: string;
  source_type: SourceType;
  url: string;
  /** ISO-8601; only ever moves forward */
  last_updated: string | null;
  /** JSON text */
  metadata: string;
  created_at: string;
}

/**
 * regions - Geographic areas keyed by immutable code
 */
export interface RegionsTable {
  id: Generated<number>;
  code: string;
  name: string;
  level: RegionLevel;
  parent_code: string | null;
  created_at: string;
}

// ============================================================================
// Provenance
// ============================================================================

/**
 * raw_snapshots - Append-only archive of every fetched page
 */
export interface RawSnapshotsTable {
  id: Generated<number>;
  dataset_id: string;
  page_index: number;
  url: string;
  /** JSON text with sorted keys */
  query_params: string;
  fetched_at: string;
  payload: string;
  content_hash: string;
}

// ============================================================================
// Facts
// ============================================================================

interface FactColumns {
  id: Generated<number>;
  natural_key_hash: string;
  data_source_id: number;
  region_id: number;
  year: number;
  quarter: number | null;
  month: number | null;
  value: number;
  created_at: string;
  updated_at: string;
}

/**
 * demographic_facts - Population-style counts by sex and age band
 */
export interface DemographicFactsTable extends FactColumns {
  sex: Sex | null;
  age_min: number | null;
  age_max: number | null;
}

/**
 * industrial_facts - Indices and volumes by industry or energy balance code
 */
export interface IndustrialFactsTable extends FactColumns {
  industry_code: string | null;
  unit: string | null;
}

// ============================================================================
// Database Interface
// ============================================================================

export interface Database {
  data_sources: DataSourcesTable;
  regions: RegionsTable;
  raw_snapshots: RawSnapshotsTable;
  demographic_facts: DemographicFactsTable;
  industrial_facts: IndustrialFactsTable;
}

export type FactTable = "demographic_facts" | "industrial_facts";

// ============================================================================
// Helper Types
// ============================================================================

export type DataSourceRow = Selectable<DataSourcesTable>;
export type NewDataSource = Insertable<DataSourcesTable>;
export type DataSourceUpdate = Updateable<DataSourcesTable>;

export type RegionRow = Selectable<RegionsTable>;
export type NewRegion = Insertable<RegionsTable>;

export type RawSnapshotRow = Selectable<RawSnapshotsTable>;
export type NewRawSnapshot = Insertable<RawSnapshotsTable>;

export type DemographicFactRow = Selectable<DemographicFactsTable>;
export type NewDemographicFact = Insertable<DemographicFactsTable>;

export type IndustrialFactRow = Selectable<IndustrialFactsTable>;
export type NewIndustrialFact = Insertable<IndustrialFactsTable>;
