/**
 * Sync API Routes
 *
 * Checkpoints, run history and item failures of the ingestion pipeline,
 * plus manual connector runs.
 */

import { Type, type Static } from "@sinclair/typebox";

import { db } from "../../db/connection.js";
import { apiLogger } from "../../logger.js";
import { SyncCheckpointService, emptyCheckpoint } from "../../services/sync/checkpoints.js";
import { SyncFailureService } from "../../services/sync/failures.js";
import { getOrchestrator } from "../../services/sync/runtime.js";
import { SyncRunService } from "../../services/sync/runs.js";
import { isSourceId } from "../../types/index.js";
import { ConflictError, NotFoundError } from "../plugins/error-handler.js";
import {
  ApiErrorSchema,
  ConnectorIdSchema,
  NullableString,
} from "../schemas/common.js";

import type { SyncOrchestrator } from "../../services/sync/orchestrator.js";
import type {
  CheckpointDto,
  SyncFailureDto,
  SyncRunDto,
} from "../../types/api.js";
import type { SyncFailureRow, SyncRunRow } from "../../db/types.js";
import type { FastifyInstance } from "fastify";

// ============================================================================
// Schemas
// ============================================================================

const RunStatusSchema = Type.Union([
  Type.Literal("Committed"),
  Type.Literal("PartiallyFailed"),
  Type.Literal("Failed"),
]);

const CheckpointSchema = Type.Object({
  connector: Type.String(),
  cursor: NullableString,
  lastRunStatus: Type.Union([RunStatusSchema, Type.Null()]),
  lastRunAt: NullableString,
  lastSuccessAt: NullableString,
  lockedBy: NullableString,
  lockedUntil: NullableString,
  running: Type.Boolean(),
});

const RunCountsSchema = Type.Object({
  fetched: Type.Number(),
  reprocessed: Type.Number(),
  parsed: Type.Number(),
  projected: Type.Number(),
  upserted: Type.Number(),
  failed: Type.Number(),
});

const SyncRunSchema = Type.Object({
  id: Type.String(),
  connector: Type.String(),
  status: RunStatusSchema,
  startedAt: Type.String(),
  finishedAt: NullableString,
  cursorBefore: NullableString,
  cursorAfter: NullableString,
  counts: RunCountsSchema,
  errorMessage: NullableString,
});

const SyncFailureSchema = Type.Object({
  id: Type.String(),
  runId: Type.String(),
  connector: Type.String(),
  rawPayloadId: Type.String(),
  businessKey: Type.String(),
  stage: Type.Union([Type.Literal("PARSE"), Type.Literal("PROJECT")]),
  errorMessage: Type.String(),
  attempts: Type.Number(),
  status: Type.Union([Type.Literal("PENDING"), Type.Literal("RESOLVED")]),
  createdAt: Type.String(),
  updatedAt: Type.String(),
});

const RunsQuerySchema = Type.Object({
  connector: Type.Optional(ConnectorIdSchema),
  limit: Type.Optional(Type.Integer({ minimum: 1, maximum: 200, default: 20 })),
});

type RunsQuery = Static<typeof RunsQuerySchema>;

const FailuresQuerySchema = Type.Object({
  connector: Type.Optional(ConnectorIdSchema),
  status: Type.Optional(
    Type.Union([Type.Literal("PENDING"), Type.Literal("RESOLVED")])
  ),
  limit: Type.Optional(Type.Integer({ minimum: 1, maximum: 500, default: 50 })),
  offset: Type.Optional(Type.Integer({ minimum: 0, default: 0 })),
});

type FailuresQuery = Static<typeof FailuresQuerySchema>;

const ConnectorParamsSchema = Type.Object({
  connector: Type.String(),
});

type ConnectorParams = Static<typeof ConnectorParamsSchema>;

const RunTriggerResponseSchema = Type.Object({
  data: Type.Object({
    connector: Type.String(),
    accepted: Type.Boolean(),
    message: Type.String(),
  }),
});

// ============================================================================
// Mappers
// ============================================================================

function toRunDto(row: SyncRunRow): SyncRunDto {
  return {
    id: row.id,
    connector: row.connector,
    status: row.status,
    startedAt: row.started_at,
    finishedAt: row.finished_at,
    cursorBefore: row.cursor_before,
    cursorAfter: row.cursor_after,
    counts: {
      fetched: row.fetched,
      reprocessed: row.reprocessed,
      parsed: row.parsed,
      projected: row.projected,
      upserted: row.upserted,
      failed: row.failed,
    },
    errorMessage: row.error_message,
  };
}

function toFailureDto(row: SyncFailureRow): SyncFailureDto {
  return {
    id: row.id,
    runId: row.run_id,
    connector: row.connector,
    rawPayloadId: row.raw_payload_id,
    businessKey: row.business_key,
    stage: row.stage,
    errorMessage: row.error_message,
    attempts: row.attempts,
    status: row.status,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

// ============================================================================
// Routes
// ============================================================================

export interface SyncRouteOptions {
  /** Defaults to the process-wide orchestrator built from configuration */
  orchestrator?: () => SyncOrchestrator;
}

export function registerSyncRoutes(
  app: FastifyInstance,
  options: SyncRouteOptions = {}
): void {
  const checkpoints = new SyncCheckpointService(db);
  const runs = new SyncRunService(db);
  const failures = new SyncFailureService(db);
  const orchestrator = options.orchestrator ?? getOrchestrator;

  /**
   * GET /sync/checkpoints - Cursor and lease per connector
   */
  app.get(
    "/sync/checkpoints",
    {
      schema: {
        summary: "List connector checkpoints",
        description:
          "Stored checkpoints plus configured connectors that have not run yet.",
        tags: ["Sync"],
        response: {
          200: Type.Object({ data: Type.Array(CheckpointSchema) }),
        },
      },
    },
    async () => {
      const current = orchestrator();
      const stored = await checkpoints.list();
      const seen = new Set(stored.map((c) => c.connector));

      const neverRun = current.connectorIds
        .filter((id) => !seen.has(id))
        .map((id) => ({
          ...emptyCheckpoint(id),
          lockedBy: null,
          lockedUntil: null,
        }));

      const data: CheckpointDto[] = [...stored, ...neverRun].map((c) => ({
        ...c,
        running: current.isRunning(c.connector),
      }));

      return { data };
    }
  );

  /**
   * GET /sync/runs - Recent run outcomes
   */
  app.get<{ Querystring: RunsQuery }>(
    "/sync/runs",
    {
      schema: {
        summary: "List sync run outcomes",
        tags: ["Sync"],
        querystring: RunsQuerySchema,
        response: {
          200: Type.Object({ data: Type.Array(SyncRunSchema) }),
        },
      },
    },
    async (request) => {
      const rows = await runs.list(request.query);
      return { data: rows.map(toRunDto) };
    }
  );

  /**
   * GET /sync/failures - Items that failed parsing or projection
   */
  app.get<{ Querystring: FailuresQuery }>(
    "/sync/failures",
    {
      schema: {
        summary: "List item failures",
        tags: ["Sync"],
        querystring: FailuresQuerySchema,
        response: {
          200: Type.Object({ data: Type.Array(SyncFailureSchema) }),
        },
      },
    },
    async (request) => {
      const rows = await failures.list(request.query);
      return { data: rows.map(toFailureDto) };
    }
  );

  /**
   * POST /sync/:connector/run - Start a run in the background
   */
  app.post<{ Params: ConnectorParams }>(
    "/sync/:connector/run",
    {
      schema: {
        summary: "Trigger a connector run",
        description:
          "Starts a run and returns immediately. Progress is visible through /sync/runs.",
        tags: ["Sync"],
        params: ConnectorParamsSchema,
        response: {
          202: RunTriggerResponseSchema,
          404: ApiErrorSchema,
          409: ApiErrorSchema,
        },
      },
    },
    async (request, reply) => {
      const connector = request.params.connector.toUpperCase();
      const current = orchestrator();

      if (!isSourceId(connector) || !current.connectorIds.includes(connector)) {
        throw new NotFoundError(
          `Connector ${request.params.connector} is not configured`
        );
      }
      if (current.isRunning(connector)) {
        throw new ConflictError(`Connector ${connector} is already running`);
      }

      void current.runConnector(connector).catch((error: unknown) => {
        apiLogger.error(
          {
            connector,
            error: error instanceof Error ? error.message : String(error),
          },
          "Triggered run crashed"
        );
      });

      return await reply.status(202).send({
        data: {
          connector,
          accepted: true,
          message: `Run of ${connector} started`,
        },
      });
    }
  );
}
