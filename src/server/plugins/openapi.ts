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
        title: "Marketplace Sales Register API",
        description:
          "Read API over the unified sales register built from Ozon, Wildberries and Yandex Market feeds, " +
          "plus sync checkpoints, run outcomes and item failures of the ingestion pipeline.",
        version: "1.0.0",
      },
      servers: [
        {
          url: "http://localhost:3000",
          description: "Local development server",
        },
      ],
      tags: [
        { name: "Health", description: "Liveness and database connectivity" },
        {
          name: "Sales Register",
          description: "Delivered sale lines keyed by marketplace, document and line",
        },
        {
          name: "Sync",
          description: "Connector checkpoints, run history, failures and manual runs",
        },
      ],
    },
  });

  done();
}

export const openapi = fp(openapiPlugin, { name: "openapi" });
