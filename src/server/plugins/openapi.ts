/**
 * OpenAPI Plugin - Generates OpenAPI 3.0 specification
 */

import swagger from "@fastify/swagger";
import fp from "fastify-plugin";

import type { FastifyInstance } from "fastify";

function openapiPlugin(
  fastify: FastifyInstance,
  _opts: Record<string, unknown>,
  done: () => void
): void {
  void fastify.register(swagger, {
    openapi: {
      openapi: "3.0.3",
      info: {
        title: "Eurostat Ingest API",
        description:
          "Read-only access to statistical facts ingested from the Eurostat dissemination API. " +
          "Demographic facts (population, labour-market slack) carry sex and age band dimensions; " +
          "industrial facts (production, new orders, energy balances) carry an industry or balance code and a unit.",
        version: "1.0.0",
      },
      servers: [
        {
          url: "http://localhost:3000",
          description: "Local development server",
        },
      ],
      tags: [
        {
          name: "Health",
          description: "Service liveness",
        },
        {
          name: "Demographics",
          description: "Population-style facts by region, year, sex and age band",
        },
        {
          name: "Industrial",
          description:
            "Production indices, new orders and energy balances by region, period and industry code",
        },
        {
          name: "Reference",
          description: "Data sources, regions, configured datasets and store totals",
        },
        {
          name: "Ingestion",
          description: "Trigger an ingestion run for a configured dataset",
        },
      ],
    },
  });

  done();
}

export const openapi = fp(openapiPlugin, { name: "openapi" });
