/**
 * Sales Register Routes
 *
 * Read access to the unified register of delivered sale lines.
 */

import { Type, type Static } from "@sinclair/typebox";

import { db } from "../../db/connection.js";
import { SalesRegisterService } from "../../services/sync/register.js";
import { isMarketplace } from "../../types/index.js";
import { NotFoundError, ValidationError } from "../plugins/error-handler.js";
import {
  ApiErrorSchema,
  DateOnlySchema,
  MarketplaceSchema,
  NullableNumber,
  NullableString,
  StatusNormSchema,
  createListResponseSchema,
  createResponseSchema,
  paginationMeta,
} from "../schemas/common.js";

import type { ApiResponse } from "../../types/api.js";
import type { StoredSalesRegisterEntry } from "../../types/index.js";
import type { FastifyInstance } from "fastify";

// ============================================================================
// Schemas
// ============================================================================

const SalesRegisterEntrySchema = Type.Object({
  marketplace: MarketplaceSchema,
  documentNo: Type.String(),
  lineId: Type.String(),
  scheme: Type.String(),
  documentType: Type.String(),
  documentVersion: Type.Number(),
  registratorRef: Type.String(),
  eventTimeSource: Type.String({ format: "date-time" }),
  saleDate: Type.String(),
  sourceUpdatedAt: NullableString,
  statusSource: Type.String(),
  statusNorm: StatusNormSchema,
  sellerSku: NullableString,
  mpItemId: NullableString,
  barcode: NullableString,
  title: NullableString,
  qty: Type.Number(),
  priceList: NullableNumber,
  discountTotal: NullableNumber,
  priceEffective: NullableNumber,
  amountLine: NullableNumber,
  currencyCode: NullableString,
  payloadVersion: Type.Number(),
  extra: Type.Union([Type.Record(Type.String(), Type.Unknown()), Type.Null()]),
  loadedAtUtc: Type.String({ format: "date-time" }),
});

const SalesRegisterQuerySchema = Type.Object({
  dateFrom: Type.Optional(DateOnlySchema),
  dateTo: Type.Optional(DateOnlySchema),
  marketplace: Type.Optional(MarketplaceSchema),
  documentNo: Type.Optional(Type.String()),
  sellerSku: Type.Optional(Type.String()),
  mpItemId: Type.Optional(Type.String()),
  barcode: Type.Optional(Type.String()),
  statusNorm: Type.Optional(StatusNormSchema),
  limit: Type.Optional(Type.Integer({ minimum: 1, maximum: 1000, default: 100 })),
  offset: Type.Optional(Type.Integer({ minimum: 0, default: 0 })),
});

type SalesRegisterQuery = Static<typeof SalesRegisterQuerySchema>;

const SalesRegisterListResponseSchema = createListResponseSchema(
  SalesRegisterEntrySchema
);

const EntryParamsSchema = Type.Object({
  marketplace: Type.String(),
  documentNo: Type.String(),
  lineId: Type.String(),
});

type EntryParams = Static<typeof EntryParamsSchema>;

const StatsQuerySchema = Type.Object({
  dateFrom: Type.Optional(DateOnlySchema),
  dateTo: Type.Optional(DateOnlySchema),
  marketplace: Type.Optional(MarketplaceSchema),
});

type StatsQuery = Static<typeof StatsQuerySchema>;

const DailyStatSchema = Type.Object({
  saleDate: Type.String(),
  marketplace: MarketplaceSchema,
  lines: Type.Number(),
  qty: Type.Number(),
  amount: Type.Number(),
});

const MarketplaceStatSchema = Type.Object({
  marketplace: MarketplaceSchema,
  lines: Type.Number(),
  documents: Type.Number(),
  qty: Type.Number(),
  amount: Type.Number(),
  firstSaleDate: NullableString,
  lastSaleDate: NullableString,
});

// ============================================================================
// Helpers
// ============================================================================

function validateDateRange(dateFrom?: string, dateTo?: string): void {
  if (dateFrom !== undefined && dateTo !== undefined && dateFrom > dateTo) {
    throw new ValidationError("dateFrom must not be after dateTo", {
      dateFrom,
      dateTo,
    });
  }
}

// ============================================================================
// Routes
// ============================================================================

export function registerSalesRegisterRoutes(app: FastifyInstance): void {
  const register = new SalesRegisterService(db);

  /**
   * GET /sales-register - Query register lines
   */
  app.get<{ Querystring: SalesRegisterQuery }>(
    "/sales-register",
    {
      schema: {
        summary: "Query sales register",
        description:
          "Delivered sale lines filtered by sale date range, marketplace, document, " +
          "product identity (seller SKU, marketplace item id, barcode) and status. " +
          "Ordered by sale date descending.",
        tags: ["Sales Register"],
        querystring: SalesRegisterQuerySchema,
        response: {
          200: SalesRegisterListResponseSchema,
          400: ApiErrorSchema,
        },
      },
    },
    async (request): Promise<ApiResponse<StoredSalesRegisterEntry[]>> => {
      const { dateFrom, dateTo } = request.query;
      validateDateRange(dateFrom, dateTo);

      const page = await register.query(request.query);

      return {
        data: page.items,
        meta: {
          pagination: paginationMeta(page.total, page.limit, page.offset),
        },
      };
    }
  );

  /**
   * GET /sales-register/stats/daily - Totals per day and marketplace
   */
  app.get<{ Querystring: StatsQuery }>(
    "/sales-register/stats/daily",
    {
      schema: {
        summary: "Daily sales totals",
        tags: ["Sales Register"],
        querystring: StatsQuerySchema,
        response: {
          200: Type.Object({ data: Type.Array(DailyStatSchema) }),
        },
      },
    },
    async (request) => {
      validateDateRange(request.query.dateFrom, request.query.dateTo);
      return { data: await register.dailyStats(request.query) };
    }
  );

  /**
   * GET /sales-register/stats/marketplaces - Totals per marketplace
   */
  app.get(
    "/sales-register/stats/marketplaces",
    {
      schema: {
        summary: "Sales totals per marketplace",
        tags: ["Sales Register"],
        response: {
          200: Type.Object({ data: Type.Array(MarketplaceStatSchema) }),
        },
      },
    },
    async () => ({ data: await register.marketplaceStats() })
  );

  /**
   * GET /sales-register/:marketplace/:documentNo/:lineId - One line by key
   */
  app.get<{ Params: EntryParams }>(
    "/sales-register/:marketplace/:documentNo/:lineId",
    {
      schema: {
        summary: "Get register line by natural key",
        tags: ["Sales Register"],
        params: EntryParamsSchema,
        response: {
          200: createResponseSchema(SalesRegisterEntrySchema),
          400: ApiErrorSchema,
          404: ApiErrorSchema,
          503: ApiErrorSchema,
        },
      },
    },
    async (request) => {
      const { marketplace, documentNo, lineId } = request.params;
      const upper = marketplace.toUpperCase();
      if (!isMarketplace(upper)) {
        throw new ValidationError(`Unknown marketplace: ${marketplace}`);
      }

      const entry = await register.getByKey({
        marketplace: upper,
        documentNo,
        lineId,
      });
      if (!entry) {
        throw new NotFoundError(
          `Register line ${upper}/${documentNo}/${lineId} not found`
        );
      }

      return { data: entry };
    }
  );
}
