/**
 * Fastify error handler plugin
 */

import fp from "fastify-plugin";

import { RegisterStorageError } from "../../services/sync/errors.js";

import type { ApiError } from "../../types/api.js";
import type {
  FastifyInstance,
  FastifyError,
  FastifyRequest,
  FastifyReply,
} from "fastify";

// ============================================================================
// Custom Error Classes
// ============================================================================

export class NotFoundError extends Error {
  code = "NOT_FOUND" as const;
  statusCode = 404;

  constructor(message: string) {
    super(message);
    this.name = "NotFoundError";
  }
}

export class ValidationError extends Error {
  code = "VALIDATION_ERROR" as const;
  statusCode = 400;
  details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "ValidationError";
    this.details = details;
  }
}

export class ConflictError extends Error {
  code = "CONFLICT" as const;
  statusCode = 409;

  constructor(message: string) {
    super(message);
    this.name = "ConflictError";
  }
}

// ============================================================================
// Error Handler Plugin
// ============================================================================

function errorHandlerPlugin(
  fastify: FastifyInstance,
  _opts: Record<string, unknown>,
  done: () => void
): void {
  fastify.setErrorHandler(
    (error: FastifyError, request: FastifyRequest, reply: FastifyReply) => {
      const requestId = request.id;

      // Handle Fastify validation errors
      if (error.validation) {
        const response: ApiError = {
          error: "VALIDATION_ERROR",
          message: "Invalid request parameters",
          details: {
            validation: error.validation,
          },
          requestId,
        };
        return reply.status(400).send(response);
      }

      // Handle custom errors
      if (error instanceof NotFoundError) {
        const response: ApiError = {
          error: error.code,
          message: error.message,
          requestId,
        };
        return reply.status(error.statusCode).send(response);
      }

      if (error instanceof ValidationError) {
        const response: ApiError = {
          error: error.code,
          message: error.message,
          details: error.details,
          requestId,
        };
        return reply.status(error.statusCode).send(response);
      }

      if (error instanceof ConflictError) {
        const response: ApiError = {
          error: error.code,
          message: error.message,
          requestId,
        };
        return reply.status(error.statusCode).send(response);
      }

      if (error instanceof RegisterStorageError) {
        request.log.error(error, "Sales register storage error");
        const response: ApiError = {
          error: "DATABASE_ERROR",
          message: error.message,
          requestId,
        };
        return reply.status(503).send(response);
      }

      // Handle 404 errors
      if (error.statusCode === 404) {
        const response: ApiError = {
          error: "NOT_FOUND",
          message: error.message || "Resource not found",
          requestId,
        };
        return reply.status(404).send(response);
      }

      // Log unexpected errors
      request.log.error(error, "Unhandled error");

      // Return generic error for unexpected errors
      const response: ApiError = {
        error: "INTERNAL_ERROR",
        message: "An unexpected error occurred",
        requestId,
      };
      return reply.status(500).send(response);
    }
  );

  // Handle 404 for unknown routes
  fastify.setNotFoundHandler((request: FastifyRequest, reply: FastifyReply) => {
    const response: ApiError = {
      error: "NOT_FOUND",
      message: `Route ${request.method} ${request.url} not found`,
      requestId: request.id,
    };
    return reply.status(404).send(response);
  });

  done();
}

export const errorHandler = fp(errorHandlerPlugin, {
  name: "error-handler",
});
