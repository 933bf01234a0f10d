/**
 * Ingestion Routes - /api/v1/ingest
 */

import { Type, type Static } from "@sinclair/typebox";

import { IngestionRunResultSchema } from "../schemas/responses.js";

import type { IngestionOrchestrator } from "../../ingest/orchestrator.js";
import type { FastifyInstance } from "fastify";

const IngestParamsSchema = Type.Object({
  datasetId: Type.String({ minLength: 1 }),
});

const IngestBodySchema = Type.Object({
  overrides: Type.Optional(
    Type.Record(Type.String(), Type.String(), {
      description: "Query parameters layered over the dataset defaults",
    })
  ),
  startPage: Type.Optional(
    Type.Integer({ minimum: 0, description: "Resume at this page index" })
  ),
  replaceExisting: Type.Optional(
    Type.Boolean({ description: "Delete the source's facts first" })
  ),
});

type IngestParams = Static<typeof IngestParamsSchema>;
type IngestBody = Static<typeof IngestBodySchema>;

export type IngestRunner = Pick<IngestionOrchestrator, "run">;

export function registerIngestRoutes(
  app: FastifyInstance,
  orchestrator: IngestRunner
): void {
  /**
   * POST /api/v1/ingest/:datasetId
   * Run one ingestion and wait for it to finish
   */
  app.post<{ Params: IngestParams; Body: IngestBody }>(
    "/ingest/:datasetId",
    {
      schema: {
        summary: "Ingest a dataset",
        description:
          "Runs the dataset through fetch, normalization and persistence. " +
          "A FAILED or CANCELLED run is still reported with status 200; " +
          "pages persisted before the failure stay in the store. Send `{}` for the defaults.",
        tags: ["Ingestion"],
        params: IngestParamsSchema,
        body: IngestBodySchema,
        response: {
          200: IngestionRunResultSchema,
        },
      },
    },
    async (request) => {
      const { overrides, startPage, replaceExisting } = request.body;
      return orchestrator.run(request.params.datasetId, {
        overrides,
        startPage,
        replaceExisting,
      });
    }
  );
}
