// Unified fact model shared by the normalizer, the repository and the API

export type FactFamily = "demographic" | "industrial";

/** Sex code; a null sex on a fact means "total" */
export type Sex = "M" | "F" | "O";

export type RegionLevel = "COUNTRY" | "NUTS1" | "NUTS2" | "NUTS3" | "AGGREGATE";

export type SourceType = "api" | "file";

export interface TimePeriod {
  year: number;
  quarter: number | null;
  month: number | null;
}

interface FactBase extends TimePeriod {
  regionCode: string;
  regionName: string;
  regionLevel: RegionLevel;
  value: number;
}

export interface DemographicFact extends FactBase {
  family: "demographic";
  sex: Sex | null;
  /** Inclusive lower bound; null together with ageMax means all ages */
  ageMin: number | null;
  /** Exclusive upper bound; null means open-ended */
  ageMax: number | null;
}

export interface IndustrialFact extends FactBase {
  family: "industrial";
  /** NACE code or energy balance code; null means all industries */
  industryCode: string | null;
  unit: string | null;
}

export type FactRecord = DemographicFact | IndustrialFact;

/** A fact whose region has been resolved to a stored row */
export type ResolvedFact = FactRecord & { regionId: number };

export interface Region {
  id: number;
  code: string;
  name: string;
  level: RegionLevel;
  parentCode: string | null;
}

export interface DataSource {
  id: number;
  name: string;
  sourceType: SourceType;
  url: string;
  lastUpdated: string | null;
  metadata: Record<string, unknown>;
}

export interface RawSnapshot {
  datasetId: string;
  pageIndex: number;
  url: string;
  params: Record<string, string>;
  fetchedAt: string;
  payload: string;
  contentHash: string;
}
