/**
 * Demographic Routes - /api/v1/demographics
 */

import { Type, type Static } from "@sinclair/typebox";

import { listResponse } from "../../types/api.js";
import {
  FactFilterProperties,
  LimitSchema,
  STRICT_QUERY,
  SexSchema,
  StatsQuerySchema,
  toFactFilters,
  type StatsQuery,
} from "../schemas/common.js";
import {
  DemographicListResponseSchema,
  FactStatisticsSchema,
} from "../schemas/responses.js";

import type { FactReader } from "./index.js";
import type { FastifyInstance } from "fastify";

// ============================================================================
// Schemas
// ============================================================================

const DemographicsQuerySchema = Type.Object(
  {
    ...FactFilterProperties,
    sex: Type.Optional(SexSchema),
    age_min: Type.Optional(
      Type.Integer({ minimum: 0, description: "Inclusive lower age bound" })
    ),
    age_max: Type.Optional(
      Type.Integer({ minimum: 1, description: "Exclusive upper age bound" })
    ),
    limit: Type.Optional(LimitSchema),
  },
  STRICT_QUERY
);

type DemographicsQuery = Static<typeof DemographicsQuerySchema>;

// ============================================================================
// Routes
// ============================================================================

export function registerDemographicRoutes(
  app: FastifyInstance,
  repository: FactReader
): void {
  /**
   * GET /api/v1/demographics
   * Query demographic facts
   */
  app.get<{ Querystring: DemographicsQuery }>(
    "/demographics",
    {
      schema: {
        summary: "Query demographic facts",
        description:
          "Population-style facts, newest period first. A null sex means all sexes; " +
          "null age bounds mean all ages (or an open-ended band when only ageMax is null).\n" +
          "Examples:\n- `/demographics?region_code=DE&year=2023`\n- `/demographics?sex=F&age_min=85`",
        tags: ["Demographics"],
        querystring: DemographicsQuerySchema,
        response: {
          200: DemographicListResponseSchema,
        },
      },
    },
    async (request) => {
      const { sex, age_min, age_max, limit } = request.query;
      const records = await repository.queryDemographics({
        ...toFactFilters(request.query),
        sex,
        ageMin: age_min,
        ageMax: age_max,
        limit,
      });
      return listResponse(records);
    }
  );

  /**
   * GET /api/v1/demographics/stats
   * Summary of matching demographic facts
   */
  app.get<{ Querystring: StatsQuery }>(
    "/demographics/stats",
    {
      schema: {
        summary: "Demographic statistics",
        description: "Record count, year coverage and region count",
        tags: ["Demographics"],
        querystring: StatsQuerySchema,
        response: {
          200: FactStatisticsSchema,
        },
      },
    },
    async (request) =>
      repository.statistics("demographic", toFactFilters(request.query))
  );
}
