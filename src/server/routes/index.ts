/**
 * API Routes Registration
 */

import { Type } from "@sinclair/typebox";

import { checkConnection } from "../../db/connection.js";
import { registerSalesRegisterRoutes } from "./sales-register.js";
import { registerSyncRoutes } from "./sync.js";

import type { FastifyInstance } from "fastify";

// Health check response schema
const HealthResponseSchema = Type.Object(
  {
    status: Type.Union([Type.Literal("ok"), Type.Literal("degraded")]),
    database: Type.Boolean(),
  },
  {
    examples: [{ status: "ok", database: true }],
  }
);

/**
 * Register all API v1 routes
 */
export async function registerApiRoutes(app: FastifyInstance): Promise<void> {
  // Health check (no version prefix)
  app.get(
    "/health",
    {
      schema: {
        summary: "Health check",
        description: "Returns the health status of the API and its database",
        tags: ["Health"],
        response: {
          200: HealthResponseSchema,
        },
      },
    },
    async () => {
      const database = await checkConnection();
      return { status: database ? ("ok" as const) : ("degraded" as const), database };
    }
  );

  // API v1 routes
  await app.register(
    (api) => {
      registerSalesRegisterRoutes(api);
      registerSyncRoutes(api);
    },
    { prefix: "/api/v1" }
  );
}
