import { pathToFileURL } from "node:url";

import { dbLogger } from "../logger.js";
import { closeConnection, getDb, isSqlite } from "./connection.js";

import type { Database } from "./types.js";
import type { ColumnDefinitionBuilder, Kysely } from "kysely";

// Dependants first, so drops never trip a foreign key
const TABLES = [
  "demographic_facts",
  "industrial_facts",
  "raw_snapshots",
  "regions",
  "data_sources",
] as const satisfies readonly (keyof Database)[];

// ============================================================================
// Migration Functions
// ============================================================================

/**
 * Create every table and index that does not exist yet. With `fresh`, drop
 * the existing tables first.
 */
export async function runMigration(
  db: Kysely<Database> = getDb(),
  options?: { fresh?: boolean }
): Promise<void> {
  const sqlite = isSqlite(db);
  const idType = sqlite ? "integer" : "serial";
  const id = (col: ColumnDefinitionBuilder): ColumnDefinitionBuilder =>
    sqlite ? col.primaryKey().autoIncrement() : col.primaryKey();

  try {
    await db.transaction().execute(async (trx) => {
      if (options?.fresh === true) {
        dbLogger.info("Dropping existing tables (--fresh mode)...");
        for (const table of TABLES) {
          await trx.schema.dropTable(table).ifExists().execute();
        }
      }

      dbLogger.info("Running schema migration...");

      await trx.schema
        .createTable("data_sources")
        .ifNotExists()
        .addColumn("id", idType, id)
        .addColumn("name", "text", (col) => col.notNull().unique())
        .addColumn("source_type", "text", (col) => col.notNull())
        .addColumn("url", "text", (col) => col.notNull())
        .addColumn("last_updated", "text")
        .addColumn("metadata", "text", (col) => col.notNull().defaultTo("{}"))
        .addColumn("created_at", "text", (col) => col.notNull())
        .execute();

      await trx.schema
        .createTable("regions")
        .ifNotExists()
        .addColumn("id", idType, id)
        .addColumn("code", "text", (col) => col.notNull().unique())
        .addColumn("name", "text", (col) => col.notNull())
        .addColumn("level", "text", (col) => col.notNull())
        .addColumn("parent_code", "text")
        .addColumn("created_at", "text", (col) => col.notNull())
        .execute();

      await trx.schema
        .createTable("raw_snapshots")
        .ifNotExists()
        .addColumn("id", idType, id)
        .addColumn("dataset_id", "text", (col) => col.notNull())
        .addColumn("page_index", "integer", (col) => col.notNull())
        .addColumn("url", "text", (col) => col.notNull())
        .addColumn("query_params", "text", (col) => col.notNull())
        .addColumn("fetched_at", "text", (col) => col.notNull())
        .addColumn("payload", "text", (col) => col.notNull())
        .addColumn("content_hash", "text", (col) => col.notNull())
        .addUniqueConstraint("raw_snapshots_fetch_unique", [
          "dataset_id",
          "fetched_at",
          "content_hash",
        ])
        .execute();

      await trx.schema
        .createTable("demographic_facts")
        .ifNotExists()
        .addColumn("id", idType, id)
        .addColumn("natural_key_hash", "text", (col) => col.notNull().unique())
        .addColumn("data_source_id", "integer", (col) =>
          col.notNull().references("data_sources.id").onDelete("cascade")
        )
        .addColumn("region_id", "integer", (col) =>
          col.notNull().references("regions.id")
        )
        .addColumn("year", "integer", (col) => col.notNull())
        .addColumn("quarter", "integer")
        .addColumn("month", "integer")
        .addColumn("sex", "text")
        .addColumn("age_min", "integer")
        .addColumn("age_max", "integer")
        .addColumn("value", "double precision", (col) => col.notNull())
        .addColumn("created_at", "text", (col) => col.notNull())
        .addColumn("updated_at", "text", (col) => col.notNull())
        .execute();

      await trx.schema
        .createTable("industrial_facts")
        .ifNotExists()
        .addColumn("id", idType, id)
        .addColumn("natural_key_hash", "text", (col) => col.notNull().unique())
        .addColumn("data_source_id", "integer", (col) =>
          col.notNull().references("data_sources.id").onDelete("cascade")
        )
        .addColumn("region_id", "integer", (col) =>
          col.notNull().references("regions.id")
        )
        .addColumn("year", "integer", (col) => col.notNull())
        .addColumn("quarter", "integer")
        .addColumn("month", "integer")
        .addColumn("industry_code", "text")
        .addColumn("unit", "text")
        .addColumn("value", "double precision", (col) => col.notNull())
        .addColumn("created_at", "text", (col) => col.notNull())
        .addColumn("updated_at", "text", (col) => col.notNull())
        .execute();

      await trx.schema
        .createIndex("idx_raw_snapshots_dataset")
        .ifNotExists()
        .on("raw_snapshots")
        .columns(["dataset_id", "page_index"])
        .execute();

      for (const table of ["demographic_facts", "industrial_facts"] as const) {
        await trx.schema
          .createIndex(`idx_${table}_region_year`)
          .ifNotExists()
          .on(table)
          .columns(["region_id", "year"])
          .execute();
        await trx.schema
          .createIndex(`idx_${table}_source`)
          .ifNotExists()
          .on(table)
          .column("data_source_id")
          .execute();
      }
    });

    dbLogger.info("Schema migration completed successfully");
  } catch (error) {
    dbLogger.error({ error }, "Schema migration failed");
    throw error;
  }
}

/**
 * Check if the schema exists (has tables)
 */
export async function hasSchema(
  db: Kysely<Database> = getDb()
): Promise<boolean> {
  const tables = await db.introspection.getTables();
  return tables.some((table) => table.name === "data_sources");
}

export interface TableStat {
  tableName: keyof Database;
  rowCount: number;
}

/**
 * Get row counts for every table
 */
export async function getTableStats(
  db: Kysely<Database> = getDb()
): Promise<TableStat[]> {
  const stats: TableStat[] = [];
  for (const table of [...TABLES].sort()) {
    const row = await db
      .selectFrom(table)
      .select((eb) => eb.fn.countAll<number>().as("count"))
      .executeTakeFirstOrThrow();
    stats.push({ tableName: table, rowCount: Number(row.count) });
  }
  return stats;
}

// ============================================================================
// CLI Entry Point (only runs when executed directly, not when imported)
// ============================================================================

async function main(): Promise<void> {
  const fresh = process.argv.slice(2).includes("--fresh");

  if (fresh) {
    console.log("Running migration with --fresh flag (will drop all tables)");
  }

  try {
    await runMigration(getDb(), { fresh });
    console.log("Migration completed successfully!");

    const stats = await getTableStats();
    console.log("\nTable statistics:");
    for (const row of stats) {
      console.log(`  ${row.tableName}: ${String(row.rowCount)} rows`);
    }
  } catch (error) {
    console.error("Migration failed:", error);
    process.exitCode = 1;
  } finally {
    await closeConnection();
  }
}

// Only run main() if this file is executed directly (not imported)
const entry = process.argv[1];
if (entry !== undefined && import.meta.url === pathToFileURL(entry).href) {
  void main();
}
