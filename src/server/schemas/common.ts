/**
 * Common TypeBox schemas for API validation
 */

import { Type, type Static, type TSchema } from "@sinclair/typebox";

import type { PaginationMeta } from "../../types/api.js";

// ============================================================================
// Pagination Schemas
// ============================================================================

export const PaginationMetaSchema = Type.Object({
  total: Type.Number(),
  limit: Type.Number(),
  offset: Type.Number(),
  hasMore: Type.Boolean(),
});

export function paginationMeta(
  total: number,
  limit: number,
  offset: number
): PaginationMeta {
  return { total, limit, offset, hasMore: offset + limit < total };
}

// ============================================================================
// Error Schemas
// ============================================================================

export const ApiErrorSchema = Type.Object({
  error: Type.String(),
  message: Type.String(),
  details: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
  requestId: Type.Optional(Type.String()),
});

export type ApiErrorType = Static<typeof ApiErrorSchema>;

// ============================================================================
// Response Wrapper Schemas
// ============================================================================

export function createResponseSchema<T extends TSchema>(dataSchema: T) {
  return Type.Object({
    data: dataSchema,
  });
}

export function createListResponseSchema<T extends TSchema>(itemSchema: T) {
  return Type.Object({
    data: Type.Array(itemSchema),
    meta: Type.Object({
      pagination: PaginationMetaSchema,
    }),
  });
}

// ============================================================================
// Common Field Schemas
// ============================================================================

export const NullableString = Type.Union([Type.String(), Type.Null()]);
export const NullableNumber = Type.Union([Type.Number(), Type.Null()]);

export const MarketplaceSchema = Type.Union([
  Type.Literal("OZON"),
  Type.Literal("WB"),
  Type.Literal("YM"),
]);

export const ConnectorIdSchema = Type.Union([
  Type.Literal("OZON_FBS"),
  Type.Literal("OZON_FBO"),
  Type.Literal("WB_SALES"),
  Type.Literal("YM_ORDERS"),
]);

export const StatusNormSchema = Type.Union([
  Type.Literal("DELIVERED"),
  Type.Literal("CANCELLED"),
  Type.Literal("PROCESSING"),
  Type.Literal("IN_DELIVERY"),
  Type.Literal("RETURNED"),
  Type.Literal("UNKNOWN"),
]);

export const DateOnlySchema = Type.String({
  pattern: "^\\d{4}-\\d{2}-\\d{2}$",
  examples: ["2024-03-01"],
});
