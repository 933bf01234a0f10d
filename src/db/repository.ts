/**
 * Statistics repository - the only code that reads or writes the store
 *
 * Written against Kysely so the same queries run on PostgreSQL and SQLite.
 * Timestamps are ISO-8601 text; every write takes them from `now`.
 */

import { sql, type Kysely, type Transaction } from "kysely";

import { RepositoryConflictError } from "../errors.js";
import { dbLogger } from "../logger.js";
import { computeNaturalKeyHash } from "./natural-key.js";

import type {
  DataSourceRow,
  Database,
  NewDemographicFact,
  NewIndustrialFact,
  RawSnapshotRow,
  RegionRow,
} from "./types.js";
import type {
  DataSource,
  FactFamily,
  RawSnapshot,
  Region,
  RegionLevel,
  ResolvedFact,
  Sex,
  SourceType,
} from "../types/facts.js";

export const DEFAULT_QUERY_LIMIT = 1000;
export const MAX_QUERY_LIMIT = 10_000;

const WRITE_CHUNK_SIZE = 500;
const REGION_SEARCH_LIMIT = 1000;

// ============================================================================
// Types
// ============================================================================

export interface UpsertSummary {
  inserted: number;
  updated: number;
  /** Facts removed first, when the batch replaced its source */
  replaced?: number;
}

export interface UpsertOptions {
  /** Delete the source's existing facts inside the same transaction */
  replaceSource?: boolean;
}

interface CommonFilters {
  regionCode?: string;
  year?: number;
  /** Data source name */
  source?: string;
}

export interface DemographicFilters extends CommonFilters {
  sex?: Sex;
  ageMin?: number;
  ageMax?: number;
  limit?: number;
}

export interface IndustrialFilters extends CommonFilters {
  month?: number;
  industryCode?: string;
  limit?: number;
}

export type StatisticsFilters = CommonFilters;

interface StoredFactBase {
  id: number;
  source: string;
  regionCode: string;
  regionName: string;
  year: number;
  quarter: number | null;
  month: number | null;
  value: number;
  updatedAt: string;
}

export interface DemographicRecord extends StoredFactBase {
  sex: Sex | null;
  ageMin: number | null;
  ageMax: number | null;
}

export interface IndustrialRecord extends StoredFactBase {
  industryCode: string | null;
  unit: string | null;
}

export interface FactStatistics {
  family: FactFamily;
  totalRecords: number;
  minYear: number | null;
  maxYear: number | null;
  /** "2019-2023", or "N/A" when nothing matched */
  yearsCovered: string;
  regionCount: number;
  /** Industrial family only */
  industryCodes?: string[];
}

export interface StoreSummary {
  sources: number;
  regions: number;
  rawSnapshots: number;
  demographicFacts: number;
  industrialFacts: number;
}

export interface StoredSnapshot extends RawSnapshot {
  id: number;
}

// ============================================================================
// Helpers
// ============================================================================

function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

export function clampLimit(limit: number | undefined): number {
  if (limit === undefined) {
    return DEFAULT_QUERY_LIMIT;
  }
  return Math.min(Math.max(Math.trunc(limit), 1), MAX_QUERY_LIMIT);
}

function sortedJson(params: Record<string, string>): string {
  const entries = Object.entries(params).sort(([a], [b]) =>
    a < b ? -1 : a > b ? 1 : 0
  );
  return JSON.stringify(Object.fromEntries(entries));
}

function parseJsonObject(text: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(text);
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    return {};
  }
  return Object.fromEntries(Object.entries(parsed));
}

function parseParams(text: string): Record<string, string> {
  const params: Record<string, string> = {};
  for (const [key, value] of Object.entries(parseJsonObject(text))) {
    params[key] = String(value);
  }
  return params;
}

function yearsCovered(minYear: number | null, maxYear: number | null): string {
  if (minYear === null || maxYear === null) {
    return "N/A";
  }
  return `${String(minYear)}-${String(maxYear)}`;
}

function toRegion(row: RegionRow): Region {
  return {
    id: row.id,
    code: row.code,
    name: row.name,
    level: row.level,
    parentCode: row.parent_code,
  };
}

function toDataSource(row: DataSourceRow): DataSource {
  return {
    id: row.id,
    name: row.name,
    sourceType: row.source_type,
    url: row.url,
    lastUpdated: row.last_updated,
    metadata: parseJsonObject(row.metadata),
  };
}

function toSnapshot(row: RawSnapshotRow): StoredSnapshot {
  return {
    id: row.id,
    datasetId: row.dataset_id,
    pageIndex: row.page_index,
    url: row.url,
    params: parseParams(row.query_params),
    fetchedAt: row.fetched_at,
    payload: row.payload,
    contentHash: row.content_hash,
  };
}

// ============================================================================
// Repository
// ============================================================================

export class StatisticsRepository {
  constructor(
    private readonly db: Kysely<Database>,
    private readonly now: () => string = () => new Date().toISOString()
  ) {}

  // --------------------------------------------------------------------------
  // Provenance
  // --------------------------------------------------------------------------

  /**
   * Store a fetched page. Returns false when the same page (dataset, fetch
   * time, content hash) was already archived.
   */
  async archiveRawSnapshot(snapshot: RawSnapshot): Promise<boolean> {
    const result = await this.db
      .insertInto("raw_snapshots")
      .values({
        dataset_id: snapshot.datasetId,
        page_index: snapshot.pageIndex,
        url: snapshot.url,
        query_params: sortedJson(snapshot.params),
        fetched_at: snapshot.fetchedAt,
        payload: snapshot.payload,
        content_hash: snapshot.contentHash,
      })
      .onConflict((oc) =>
        oc.columns(["dataset_id", "fetched_at", "content_hash"]).doNothing()
      )
      .executeTakeFirst();

    return Number(result.numInsertedOrUpdatedRows ?? 0n) > 0;
  }

  async listSnapshots(datasetId: string): Promise<StoredSnapshot[]> {
    const rows = await this.db
      .selectFrom("raw_snapshots")
      .selectAll()
      .where("dataset_id", "=", datasetId)
      .orderBy("fetched_at")
      .orderBy("page_index")
      .orderBy("id")
      .execute();
    return rows.map(toSnapshot);
  }

  // --------------------------------------------------------------------------
  // Facts
  // --------------------------------------------------------------------------

  /**
   * Insert or update a batch of facts in one transaction.
   *
   * Facts sharing a natural key inside the batch collapse to the last one.
   * An existing row only has its value and updated_at replaced. With
   * `replaceSource` the source's facts are deleted first, and a failed batch
   * rolls the deletion back with it.
   */
  async upsertFacts(
    batch: readonly ResolvedFact[],
    sourceId: number,
    options: UpsertOptions = {}
  ): Promise<UpsertSummary> {
    const replaceSource = options.replaceSource === true;
    const now = this.now();
    const demographic = new Map<string, NewDemographicFact>();
    const industrial = new Map<string, NewIndustrialFact>();

    for (const fact of batch) {
      const hash = computeNaturalKeyHash(fact, sourceId, fact.regionId);
      const base = {
        natural_key_hash: hash,
        data_source_id: sourceId,
        region_id: fact.regionId,
        year: fact.year,
        quarter: fact.quarter,
        month: fact.month,
        value: fact.value,
        created_at: now,
        updated_at: now,
      };
      if (fact.family === "demographic") {
        demographic.set(hash, {
          ...base,
          sex: fact.sex,
          age_min: fact.ageMin,
          age_max: fact.ageMax,
        });
      } else {
        industrial.set(hash, {
          ...base,
          industry_code: fact.industryCode,
          unit: fact.unit,
        });
      }
    }

    if (!replaceSource && demographic.size === 0 && industrial.size === 0) {
      return { inserted: 0, updated: 0 };
    }

    const summary = await this.db.transaction().execute(async (trx) => {
      const replaced = replaceSource
        ? await this.deleteSourceFacts(trx, sourceId)
        : undefined;
      const demo = await this.upsertDemographicRows(trx, [
        ...demographic.values(),
      ]);
      const ind = await this.upsertIndustrialRows(trx, [
        ...industrial.values(),
      ]);
      const written: UpsertSummary = {
        inserted: demo.inserted + ind.inserted,
        updated: demo.updated + ind.updated,
      };
      if (replaced !== undefined) {
        written.replaced = replaced;
      }
      return written;
    });

    dbLogger.debug(
      { sourceId, received: batch.length, ...summary },
      "Upserted facts"
    );
    return summary;
  }

  private async upsertDemographicRows(
    trx: Transaction<Database>,
    rows: NewDemographicFact[]
  ): Promise<UpsertSummary> {
    let existing = 0;
    for (const part of chunk(rows, WRITE_CHUNK_SIZE)) {
      const found = await trx
        .selectFrom("demographic_facts")
        .select((eb) => eb.fn.countAll<number>().as("count"))
        .where(
          "natural_key_hash",
          "in",
          part.map((row) => row.natural_key_hash)
        )
        .executeTakeFirstOrThrow();
      existing += Number(found.count);

      await trx
        .insertInto("demographic_facts")
        .values(part)
        .onConflict((oc) =>
          oc.column("natural_key_hash").doUpdateSet((eb) => ({
            value: eb.ref("excluded.value"),
            updated_at: eb.ref("excluded.updated_at"),
          }))
        )
        .execute();
    }
    return { inserted: rows.length - existing, updated: existing };
  }

  private async upsertIndustrialRows(
    trx: Transaction<Database>,
    rows: NewIndustrialFact[]
  ): Promise<UpsertSummary> {
    let existing = 0;
    for (const part of chunk(rows, WRITE_CHUNK_SIZE)) {
      const found = await trx
        .selectFrom("industrial_facts")
        .select((eb) => eb.fn.countAll<number>().as("count"))
        .where(
          "natural_key_hash",
          "in",
          part.map((row) => row.natural_key_hash)
        )
        .executeTakeFirstOrThrow();
      existing += Number(found.count);

      await trx
        .insertInto("industrial_facts")
        .values(part)
        .onConflict((oc) =>
          oc.column("natural_key_hash").doUpdateSet((eb) => ({
            value: eb.ref("excluded.value"),
            updated_at: eb.ref("excluded.updated_at"),
          }))
        )
        .execute();
    }
    return { inserted: rows.length - existing, updated: existing };
  }

  /**
   * Remove every fact loaded from a source. Raw snapshots are kept.
   */
  async deleteBySource(sourceId: number): Promise<number> {
    const deleted = await this.db
      .transaction()
      .execute(async (trx) => this.deleteSourceFacts(trx, sourceId));

    dbLogger.info({ sourceId, deleted }, "Deleted facts for source");
    return deleted;
  }

  private async deleteSourceFacts(
    trx: Transaction<Database>,
    sourceId: number
  ): Promise<number> {
    const demo = await trx
      .deleteFrom("demographic_facts")
      .where("data_source_id", "=", sourceId)
      .executeTakeFirst();
    const ind = await trx
      .deleteFrom("industrial_facts")
      .where("data_source_id", "=", sourceId)
      .executeTakeFirst();
    return Number(demo.numDeletedRows) + Number(ind.numDeletedRows);
  }

  async countFacts(family: FactFamily, sourceId?: number): Promise<number> {
    const table =
      family === "demographic" ? "demographic_facts" : "industrial_facts";
    let query = this.db
      .selectFrom(table)
      .select((eb) => eb.fn.countAll<number>().as("count"));
    if (sourceId !== undefined) {
      query = query.where("data_source_id", "=", sourceId);
    }
    const row = await query.executeTakeFirstOrThrow();
    return Number(row.count);
  }

  // --------------------------------------------------------------------------
  // Reference data
  // --------------------------------------------------------------------------

  /**
   * Return the region with this code, creating it if needed. The first
   * write wins: later calls never change an existing region's name or level.
   */
  async getOrCreateRegion(
    code: string,
    name: string,
    level: RegionLevel,
    parentCode: string | null = null
  ): Promise<Region> {
    const existing = await this.findRegion(code);
    if (existing !== null) {
      return existing;
    }

    await this.db
      .insertInto("regions")
      .values({
        code,
        name,
        level,
        parent_code: parentCode,
        created_at: this.now(),
      })
      .onConflict((oc) => oc.column("code").doNothing())
      .execute();

    const created = await this.findRegion(code);
    if (created === null) {
      throw new RepositoryConflictError(
        `Region ${code} is missing after insert`
      );
    }
    return created;
  }

  async findRegion(code: string): Promise<Region | null> {
    const row = await this.db
      .selectFrom("regions")
      .selectAll()
      .where("code", "=", code)
      .executeTakeFirst();
    return row === undefined ? null : toRegion(row);
  }

  async listRegions(search?: string): Promise<Region[]> {
    let query = this.db.selectFrom("regions").selectAll();
    if (search !== undefined && search.trim() !== "") {
      const pattern = `%${search.trim().toLowerCase()}%`;
      query = query.where((eb) =>
        eb.or([
          eb(eb.fn("lower", ["code"]), "like", pattern),
          eb(eb.fn("lower", ["name"]), "like", pattern),
        ])
      );
    }
    const rows = await query.orderBy("code").limit(REGION_SEARCH_LIMIT).execute();
    return rows.map(toRegion);
  }

  async getOrCreateSource(
    name: string,
    sourceType: SourceType,
    url: string,
    metadata: Record<string, unknown> = {}
  ): Promise<DataSource> {
    const existing = await this.findSourceByName(name);
    if (existing !== null) {
      return existing;
    }

    await this.db
      .insertInto("data_sources")
      .values({
        name,
        source_type: sourceType,
        url,
        last_updated: null,
        metadata: JSON.stringify(metadata),
        created_at: this.now(),
      })
      .onConflict((oc) => oc.column("name").doNothing())
      .execute();

    const created = await this.findSourceByName(name);
    if (created === null) {
      throw new RepositoryConflictError(
        `Data source ${name} is missing after insert`
      );
    }
    return created;
  }

  async findSourceByName(name: string): Promise<DataSource | null> {
    const row = await this.db
      .selectFrom("data_sources")
      .selectAll()
      .where("name", "=", name)
      .executeTakeFirst();
    return row === undefined ? null : toDataSource(row);
  }

  async listSources(): Promise<DataSource[]> {
    const rows = await this.db
      .selectFrom("data_sources")
      .selectAll()
      .orderBy("name")
      .execute();
    return rows.map(toDataSource);
  }

  /**
   * Advance the source's last_updated to `at`. Earlier timestamps are
   * ignored; returns whether the value moved.
   */
  async markSourceUpdated(sourceId: number, at: string): Promise<boolean> {
    const result = await this.db
      .updateTable("data_sources")
      .set({ last_updated: at })
      .where("id", "=", sourceId)
      .where((eb) =>
        eb.or([eb("last_updated", "is", null), eb("last_updated", "<", at)])
      )
      .executeTakeFirst();
    return Number(result.numUpdatedRows) > 0;
  }

  // --------------------------------------------------------------------------
  // Read surface
  // --------------------------------------------------------------------------

  query(
    family: "demographic",
    filters?: DemographicFilters
  ): Promise<DemographicRecord[]>;
  query(
    family: "industrial",
    filters?: IndustrialFilters
  ): Promise<IndustrialRecord[]>;
  query(
    family: FactFamily,
    filters: DemographicFilters & IndustrialFilters = {}
  ): Promise<DemographicRecord[] | IndustrialRecord[]> {
    return family === "demographic"
      ? this.queryDemographics(filters)
      : this.queryIndustrial(filters);
  }

  async queryDemographics(
    filters: DemographicFilters = {}
  ): Promise<DemographicRecord[]> {
    let query = this.db
      .selectFrom("demographic_facts as f")
      .innerJoin("regions as r", "r.id", "f.region_id")
      .innerJoin("data_sources as s", "s.id", "f.data_source_id")
      .select([
        "f.id",
        "s.name as source",
        "r.code as region_code",
        "r.name as region_name",
        "f.year",
        "f.quarter",
        "f.month",
        "f.sex",
        "f.age_min",
        "f.age_max",
        "f.value",
        "f.updated_at",
      ]);

    if (filters.regionCode !== undefined) {
      query = query.where("r.code", "=", filters.regionCode.toUpperCase());
    }
    if (filters.year !== undefined) {
      query = query.where("f.year", "=", filters.year);
    }
    if (filters.source !== undefined) {
      query = query.where("s.name", "=", filters.source);
    }
    if (filters.sex !== undefined) {
      query = query.where("f.sex", "=", filters.sex);
    }
    if (filters.ageMin !== undefined) {
      query = query.where("f.age_min", "=", filters.ageMin);
    }
    if (filters.ageMax !== undefined) {
      query = query.where("f.age_max", "=", filters.ageMax);
    }

    const rows = await query
      .orderBy("f.year", "desc")
      .orderBy(sql`coalesce(f.quarter, 0)`, "desc")
      .orderBy(sql`coalesce(f.month, 0)`, "desc")
      .orderBy("r.code", "asc")
      .orderBy("f.id", "asc")
      .limit(clampLimit(filters.limit))
      .execute();

    return rows.map((row) => ({
      id: row.id,
      source: row.source,
      regionCode: row.region_code,
      regionName: row.region_name,
      year: row.year,
      quarter: row.quarter,
      month: row.month,
      sex: row.sex,
      ageMin: row.age_min,
      ageMax: row.age_max,
      value: row.value,
      updatedAt: row.updated_at,
    }));
  }

  async queryIndustrial(
    filters: IndustrialFilters = {}
  ): Promise<IndustrialRecord[]> {
    let query = this.db
      .selectFrom("industrial_facts as f")
      .innerJoin("regions as r", "r.id", "f.region_id")
      .innerJoin("data_sources as s", "s.id", "f.data_source_id")
      .select([
        "f.id",
        "s.name as source",
        "r.code as region_code",
        "r.name as region_name",
        "f.year",
        "f.quarter",
        "f.month",
        "f.industry_code",
        "f.unit",
        "f.value",
        "f.updated_at",
      ]);

    if (filters.regionCode !== undefined) {
      query = query.where("r.code", "=", filters.regionCode.toUpperCase());
    }
    if (filters.year !== undefined) {
      query = query.where("f.year", "=", filters.year);
    }
    if (filters.source !== undefined) {
      query = query.where("s.name", "=", filters.source);
    }
    if (filters.month !== undefined) {
      query = query.where("f.month", "=", filters.month);
    }
    if (filters.industryCode !== undefined) {
      query = query.where(
        "f.industry_code",
        "=",
        filters.industryCode.toUpperCase()
      );
    }

    const rows = await query
      .orderBy("f.year", "desc")
      .orderBy(sql`coalesce(f.quarter, 0)`, "desc")
      .orderBy(sql`coalesce(f.month, 0)`, "desc")
      .orderBy("r.code", "asc")
      .orderBy("f.id", "asc")
      .limit(clampLimit(filters.limit))
      .execute();

    return rows.map((row) => ({
      id: row.id,
      source: row.source,
      regionCode: row.region_code,
      regionName: row.region_name,
      year: row.year,
      quarter: row.quarter,
      month: row.month,
      industryCode: row.industry_code,
      unit: row.unit,
      value: row.value,
      updatedAt: row.updated_at,
    }));
  }

  async statistics(
    family: FactFamily,
    filters: StatisticsFilters = {}
  ): Promise<FactStatistics> {
    return family === "demographic"
      ? this.demographicStatistics(filters)
      : this.industrialStatistics(filters);
  }

  private async demographicStatistics(
    filters: StatisticsFilters
  ): Promise<FactStatistics> {
    let query = this.db
      .selectFrom("demographic_facts as f")
      .innerJoin("regions as r", "r.id", "f.region_id")
      .innerJoin("data_sources as s", "s.id", "f.data_source_id")
      .select((eb) => [
        eb.fn.countAll<number>().as("total"),
        eb.fn.min<number | null>("f.year").as("min_year"),
        eb.fn.max<number | null>("f.year").as("max_year"),
        eb.fn.count<number>("f.region_id").distinct().as("region_count"),
      ]);

    if (filters.regionCode !== undefined) {
      query = query.where("r.code", "=", filters.regionCode.toUpperCase());
    }
    if (filters.year !== undefined) {
      query = query.where("f.year", "=", filters.year);
    }
    if (filters.source !== undefined) {
      query = query.where("s.name", "=", filters.source);
    }

    const row = await query.executeTakeFirstOrThrow();
    return {
      family: "demographic",
      totalRecords: Number(row.total),
      minYear: row.min_year,
      maxYear: row.max_year,
      yearsCovered: yearsCovered(row.min_year, row.max_year),
      regionCount: Number(row.region_count),
    };
  }

  private async industrialStatistics(
    filters: StatisticsFilters
  ): Promise<FactStatistics> {
    let query = this.db
      .selectFrom("industrial_facts as f")
      .innerJoin("regions as r", "r.id", "f.region_id")
      .innerJoin("data_sources as s", "s.id", "f.data_source_id");

    if (filters.regionCode !== undefined) {
      query = query.where("r.code", "=", filters.regionCode.toUpperCase());
    }
    if (filters.year !== undefined) {
      query = query.where("f.year", "=", filters.year);
    }
    if (filters.source !== undefined) {
      query = query.where("s.name", "=", filters.source);
    }

    const row = await query
      .select((eb) => [
        eb.fn.countAll<number>().as("total"),
        eb.fn.min<number | null>("f.year").as("min_year"),
        eb.fn.max<number | null>("f.year").as("max_year"),
        eb.fn.count<number>("f.region_id").distinct().as("region_count"),
      ])
      .executeTakeFirstOrThrow();

    const codes = await query
      .select("f.industry_code")
      .distinct()
      .where("f.industry_code", "is not", null)
      .orderBy("f.industry_code")
      .execute();

    return {
      family: "industrial",
      totalRecords: Number(row.total),
      minYear: row.min_year,
      maxYear: row.max_year,
      yearsCovered: yearsCovered(row.min_year, row.max_year),
      regionCount: Number(row.region_count),
      industryCodes: codes.flatMap((code) =>
        code.industry_code === null ? [] : [code.industry_code]
      ),
    };
  }

  /**
   * Row totals across the store
   */
  async summary(): Promise<StoreSummary> {
    const [sources, regions, rawSnapshots, demographicFacts, industrialFacts] =
      await Promise.all([
        this.countRows("data_sources"),
        this.countRows("regions"),
        this.countRows("raw_snapshots"),
        this.countRows("demographic_facts"),
        this.countRows("industrial_facts"),
      ]);
    return { sources, regions, rawSnapshots, demographicFacts, industrialFacts };
  }

  private async countRows(table: keyof Database): Promise<number> {
    const row = await this.db
      .selectFrom(table)
      .select((eb) => eb.fn.countAll<number>().as("count"))
      .executeTakeFirstOrThrow();
    return Number(row.count);
  }
}
