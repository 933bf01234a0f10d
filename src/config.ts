import "dotenv/config";

/**
 * Process-wide settings read from the environment (and `.env`).
 */

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === "") {
    return fallback;
  }
  const parsed = Number.parseInt(raw, 10);
  if (Number.isNaN(parsed) || parsed < 0) {
    throw new Error(`Invalid ${name}: expected a non-negative integer`);
  }
  return parsed;
}

export interface SourceConfig {
  baseUrl: string;
  timeoutMs: number;
  maxRetries: number;
  retryBackoffMs: number;
  rateLimitMs: number;
}

export interface IngestConfig {
  concurrency: number;
  lockTimeoutMs: number;
}

export const config = {
  databaseUrl:
    process.env.DATABASE_URL ?? "postgresql://localhost:5432/eurostat_ingest",
  port: intFromEnv("PORT", 3000),
  host: process.env.HOST ?? "0.0.0.0",
  datasetsFile: process.env.DATASETS_FILE ?? "./config/datasets.json",
  source: {
    baseUrl:
      process.env.SOURCE_BASE_URL ??
      "https://ec.europa.eu/eurostat/api/dissemination/statistics/1.0/data",
    timeoutMs: intFromEnv("SOURCE_TIMEOUT_MS", 30_000),
    maxRetries: intFromEnv("SOURCE_MAX_RETRIES", 3),
    retryBackoffMs: intFromEnv("SOURCE_RETRY_BACKOFF_MS", 1000),
    rateLimitMs: intFromEnv("SOURCE_RATE_LIMIT_MS", 750),
  } satisfies SourceConfig,
  ingest: {
    concurrency: Math.max(1, intFromEnv("INGEST_CONCURRENCY", 3)),
    lockTimeoutMs: intFromEnv("INGEST_LOCK_TIMEOUT_MS", 600_000),
  } satisfies IngestConfig,
};
