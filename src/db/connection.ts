import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

import SQLite from "better-sqlite3";
import {
  Kysely,
  PostgresDialect,
  SqliteDialect,
  sql,
  type Dialect,
} from "kysely";
import pg from "pg";

import { config } from "../config.js";
import { dbLogger } from "../logger.js";

import type { Database } from "./types.js";

const { Pool, types } = pg;

// COUNT(*) comes back as BIGINT; every count this store returns fits a number
types.setTypeParser(types.builtins.INT8, (val: string) =>
  Number.parseInt(val, 10)
);

const SQLITE_PREFIX = "sqlite:";

// ============================================================================
// Dialects
// ============================================================================

/**
 * `sqlite:<path>` (or `sqlite::memory:`) selects better-sqlite3; anything else
 * is a PostgreSQL connection string.
 */
export function isSqliteUrl(url: string): boolean {
  return url.startsWith(SQLITE_PREFIX);
}

function sqliteDialect(url: string): Dialect {
  const path = url.slice(SQLITE_PREFIX.length);
  if (path !== ":memory:") {
    const dataDir = dirname(path);
    if (!existsSync(dataDir)) {
      mkdirSync(dataDir, { recursive: true });
    }
  }
  const database = new SQLite(path);
  database.pragma("foreign_keys = ON");
  return new SqliteDialect({ database });
}

function postgresDialect(url: string): Dialect {
  const pool = new Pool({
    connectionString: url,
    max: 20,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5000,
  });
  return new PostgresDialect({ pool });
}

const sqliteDatabases = new WeakSet<Kysely<Database>>();

export function createDatabase(url: string): Kysely<Database> {
  if (!isSqliteUrl(url)) {
    return new Kysely<Database>({ dialect: postgresDialect(url) });
  }
  const db = new Kysely<Database>({ dialect: sqliteDialect(url) });
  sqliteDatabases.add(db);
  return db;
}

/** Whether `db` was opened on a `sqlite:` URL */
export function isSqlite(db: Kysely<Database>): boolean {
  return sqliteDatabases.has(db);
}

// ============================================================================
// Shared Instance
// ============================================================================

let shared: Kysely<Database> | undefined;

/**
 * Process-wide database, opened on first use from DATABASE_URL.
 */
export function getDb(): Kysely<Database> {
  shared ??= createDatabase(config.databaseUrl);
  return shared;
}

// ============================================================================
// Connection Management
// ============================================================================

/**
 * Check if the database connection is healthy
 */
export async function checkConnection(
  db: Kysely<Database> = getDb()
): Promise<boolean> {
  try {
    await sql`SELECT 1`.execute(db);
    return true;
  } catch (error) {
    dbLogger.warn({ error }, "Database health check failed");
    return false;
  }
}

/**
 * Gracefully close the shared connection, if one was opened
 */
export async function closeConnection(): Promise<void> {
  if (shared === undefined) {
    return;
  }
  const db = shared;
  shared = undefined;
  try {
    await db.destroy();
    dbLogger.info("Database connection closed");
  } catch (error) {
    dbLogger.error({ error }, "Error closing database connection");
    throw error;
  }
}

/**
 * Get the current database URL (for display, with password masked)
 */
export function getDatabaseUrl(url: string = config.databaseUrl): string {
  if (isSqliteUrl(url)) {
    return url;
  }
  const parsed = new URL(url);
  if (parsed.password !== "") {
    parsed.password = "****";
  }
  return parsed.toString();
}
