/**
 * Pipeline wiring shared by the CLI and the server
 */

import { config } from "./config.js";
import { loadDatasetRegistry } from "./datasets/registry.js";
import { getDb } from "./db/connection.js";
import { StatisticsRepository } from "./db/repository.js";
import { IngestionOrchestrator } from "./ingest/orchestrator.js";
import { SourceClient } from "./source/client.js";
import { HostRateLimiter } from "./source/rate-limiter.js";

import type { DatasetRegistry } from "./datasets/registry.js";
import type { PageSource } from "./source/types.js";

export function createRegistry(): DatasetRegistry {
  return loadDatasetRegistry(config.datasetsFile);
}

export function createRepository(): StatisticsRepository {
  return new StatisticsRepository(getDb());
}

export function createSourceClient(): SourceClient {
  return new SourceClient({
    ...config.source,
    rateLimiter: new HostRateLimiter(config.source.rateLimitMs),
  });
}

/**
 * Orchestrator over the upstream API, or over `client` (e.g. a FileSource)
 */
export function createOrchestrator(
  registry: DatasetRegistry,
  repository: StatisticsRepository,
  client: PageSource = createSourceClient()
): IngestionOrchestrator {
  return new IngestionOrchestrator({
    registry,
    client,
    repository,
    lockTimeoutMs: config.ingest.lockTimeoutMs,
    concurrency: config.ingest.concurrency,
  });
}
