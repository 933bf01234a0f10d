/**
 * Reference Routes - sources, regions, datasets and store totals
 */

import { Type, type Static } from "@sinclair/typebox";

import { listResponse } from "../../types/api.js";
import { STRICT_QUERY } from "../schemas/common.js";
import {
  DatasetListResponseSchema,
  RegionListResponseSchema,
  SourceListResponseSchema,
  StoreSummarySchema,
  type DatasetDto,
} from "../schemas/responses.js";

import type { FactReader } from "./index.js";
import type { DatasetRegistry } from "../../datasets/registry.js";
import type { FastifyInstance } from "fastify";

const RegionsQuerySchema = Type.Object(
  {
    search: Type.Optional(
      Type.String({ description: "Case-insensitive match on region code or name" })
    ),
  },
  STRICT_QUERY
);

type RegionsQuery = Static<typeof RegionsQuerySchema>;

export function registerReferenceRoutes(
  app: FastifyInstance,
  repository: FactReader,
  registry: DatasetRegistry
): void {
  /**
   * GET /api/v1/stats
   * Row totals across the store
   */
  app.get(
    "/stats",
    {
      schema: {
        summary: "Store summary",
        description: "Counts of sources, regions, raw snapshots and facts per family",
        tags: ["Reference"],
        response: {
          200: StoreSummarySchema,
        },
      },
    },
    async () => repository.summary()
  );

  /**
   * GET /api/v1/sources
   * List data sources
   */
  app.get(
    "/sources",
    {
      schema: {
        summary: "List data sources",
        description: "One source per ingested dataset, with its last successful update",
        tags: ["Reference"],
        response: {
          200: SourceListResponseSchema,
        },
      },
    },
    async () => listResponse(await repository.listSources())
  );

  /**
   * GET /api/v1/regions
   * List or search regions
   */
  app.get<{ Querystring: RegionsQuery }>(
    "/regions",
    {
      schema: {
        summary: "List regions",
        description:
          "Regions seen during ingestion, ordered by code.\n" +
          "Examples:\n- `/regions?search=de` - Germany and its NUTS regions",
        tags: ["Reference"],
        querystring: RegionsQuerySchema,
        response: {
          200: RegionListResponseSchema,
        },
      },
    },
    async (request) =>
      listResponse(await repository.listRegions(request.query.search))
  );

  /**
   * GET /api/v1/datasets
   * List configured datasets
   */
  app.get(
    "/datasets",
    {
      schema: {
        summary: "List datasets",
        description: "Datasets the registry can ingest, in configuration order",
        tags: ["Reference"],
        response: {
          200: DatasetListResponseSchema,
        },
      },
    },
    () =>
      listResponse(
        registry.all().map(
          (descriptor): DatasetDto => ({
            id: descriptor.id,
            name: descriptor.name,
            family: descriptor.family,
            format: descriptor.format,
            measure: descriptor.measure,
            paged: descriptor.paging !== undefined,
          })
        )
      )
  );
}
