/**
 * API Routes Registration
 */

import { Type } from "@sinclair/typebox";

import { registerDemographicRoutes } from "./demographics.js";
import { registerIndustrialRoutes } from "./industrial.js";
import { registerIngestRoutes, type IngestRunner } from "./ingest.js";
import { registerReferenceRoutes } from "./reference.js";

import type { DatasetRegistry } from "../../datasets/registry.js";
import type { StatisticsRepository } from "../../db/repository.js";
import type { FastifyInstance } from "fastify";

/** The read surface of the repository; handlers never write */
export type FactReader = Pick<
  StatisticsRepository,
  | "queryDemographics"
  | "queryIndustrial"
  | "statistics"
  | "summary"
  | "listSources"
  | "listRegions"
>;

export interface ApiDependencies {
  repository: FactReader;
  registry: DatasetRegistry;
  /** Omit to serve a read-only API */
  orchestrator?: IngestRunner;
}

// Health check response schema
const HealthResponseSchema = Type.Object(
  {
    status: Type.Literal("ok"),
  },
  {
    examples: [{ status: "ok" }],
  }
);

/**
 * Register all API v1 routes
 */
export async function registerApiRoutes(
  app: FastifyInstance,
  deps: ApiDependencies
): Promise<void> {
  // Health check (no version prefix)
  app.get(
    "/health",
    {
      schema: {
        summary: "Health check",
        description: "Returns the health status of the API",
        tags: ["Health"],
        response: {
          200: HealthResponseSchema,
        },
      },
    },
    () => ({ status: "ok" as const })
  );

  // API v1 routes
  await app.register(
    async (api) => {
      registerDemographicRoutes(api, deps.repository);
      registerIndustrialRoutes(api, deps.repository);
      registerReferenceRoutes(api, deps.repository, deps.registry);

      if (deps.orchestrator !== undefined) {
        registerIngestRoutes(api, deps.orchestrator);
      }
    },
    { prefix: "/api/v1" }
  );
}
