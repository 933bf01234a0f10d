/**
 * Industrial Routes - /api/v1/industrial
 */

import { Type, type Static } from "@sinclair/typebox";

import { listResponse } from "../../types/api.js";
import {
  FactFilterProperties,
  LimitSchema,
  STRICT_QUERY,
  StatsQuerySchema,
  toFactFilters,
  type StatsQuery,
} from "../schemas/common.js";
import {
  FactStatisticsSchema,
  IndustrialListResponseSchema,
} from "../schemas/responses.js";

import type { FactReader } from "./index.js";
import type { FastifyInstance } from "fastify";

// ============================================================================
// Schemas
// ============================================================================

const IndustrialQuerySchema = Type.Object(
  {
    ...FactFilterProperties,
    month: Type.Optional(Type.Integer({ minimum: 1, maximum: 12 })),
    industry_code: Type.Optional(
      Type.String({
        minLength: 1,
        description: "NACE or energy balance code (e.g. 'C', 'B-D', 'FC_IND_E')",
      })
    ),
    limit: Type.Optional(LimitSchema),
  },
  STRICT_QUERY
);

type IndustrialQuery = Static<typeof IndustrialQuerySchema>;

// ============================================================================
// Routes
// ============================================================================

export function registerIndustrialRoutes(
  app: FastifyInstance,
  repository: FactReader
): void {
  /**
   * GET /api/v1/industrial
   * Query industrial and energy facts
   */
  app.get<{ Querystring: IndustrialQuery }>(
    "/industrial",
    {
      schema: {
        summary: "Query industrial facts",
        description:
          "Production indices, new orders and energy balances, newest period first. " +
          "A null industryCode is the all-industries total.\n" +
          "Examples:\n- `/industrial?region_code=FR&year=2023&month=6`\n- `/industrial?industry_code=C`",
        tags: ["Industrial"],
        querystring: IndustrialQuerySchema,
        response: {
          200: IndustrialListResponseSchema,
        },
      },
    },
    async (request) => {
      const { month, industry_code, limit } = request.query;
      const records = await repository.queryIndustrial({
        ...toFactFilters(request.query),
        month,
        industryCode: industry_code,
        limit,
      });
      return listResponse(records);
    }
  );

  /**
   * GET /api/v1/industrial/stats
   * Summary of matching industrial facts
   */
  app.get<{ Querystring: StatsQuery }>(
    "/industrial/stats",
    {
      schema: {
        summary: "Industrial statistics",
        description:
          "Record count, year coverage, region count and the industry codes present",
        tags: ["Industrial"],
        querystring: StatsQuerySchema,
        response: {
          200: FactStatisticsSchema,
        },
      },
    },
    async (request) =>
      repository.statistics("industrial", toFactFilters(request.query))
  );
}
