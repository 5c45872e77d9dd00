/**
 * Ozon posting parser (FBS and FBO)
 */

import { Type } from "@sinclair/typebox";

import {
  IdentifierSchema,
  Nullable,
  NumericSchema,
  collectExtensions,
  isRecord,
  multiply,
  toIdentifier,
  toNumber,
  toText,
  validate,
} from "./common.js";
import { parseSourceDate } from "./dates.js";
import { normalizeOzonStatus } from "./status.js";

import type {
  OzonPostingDocument,
  OzonPostingLine,
  RawPayload,
} from "../../../types/index.js";

// ============================================================================
// Schemas
// ============================================================================

const OzonProductSchema = Type.Object({
  product_id: Nullable(IdentifierSchema),
  sku: Nullable(IdentifierSchema),
  offer_id: Nullable(Type.String()),
  name: Nullable(Type.String()),
  quantity: Type.Integer({ minimum: 0 }),
  price: Nullable(NumericSchema),
  currency_code: Nullable(Type.String()),
});

const OzonPostingSchema = Type.Object({
  posting_number: Type.String({ minLength: 1 }),
  order_id: Nullable(IdentifierSchema),
  order_number: Nullable(Type.String()),
  status: Type.String({ minLength: 1 }),
  substatus: Nullable(Type.String()),
  created_at: Nullable(Type.String()),
  in_process_at: Nullable(Type.String()),
  delivering_date: Nullable(Type.String()),
  delivered_at: Nullable(Type.String()),
  products: Type.Array(Type.Unknown()),
});

const POSTING_FIELDS = [
  "posting_number",
  "order_id",
  "order_number",
  "status",
  "substatus",
  "created_at",
  "in_process_at",
  "delivering_date",
  "delivered_at",
  "products",
] as const;

const PRODUCT_FIELDS = [
  "product_id",
  "sku",
  "offer_id",
  "name",
  "quantity",
  "price",
  "currency_code",
] as const;

// ============================================================================
// Parser
// ============================================================================

function parseLine(
  raw: RawPayload,
  record: unknown,
  index: number
): OzonPostingLine {
  const product = validate(
    OzonProductSchema,
    record,
    raw,
    `/products/${String(index)}`
  );
  const productId =
    toIdentifier(product.product_id) ?? toIdentifier(product.sku);
  const offerId = toText(product.offer_id);
  const position = index + 1;
  const price = toNumber(product.price);

  return {
    // Stable across re-fetches as long as the product order is unchanged
    lineId: `${productId ?? offerId ?? "line"}_${String(position)}`,
    position,
    productId,
    offerId,
    name: toText(product.name),
    qty: product.quantity,
    priceList: price,
    discountTotal: null,
    priceEffective: price,
    amountLine: multiply(price, product.quantity),
    currencyCode: toText(product.currency_code),
    extensions: isRecord(record)
      ? collectExtensions(record, PRODUCT_FIELDS)
      : {},
  };
}

export function parseOzonPosting(raw: RawPayload): OzonPostingDocument {
  const posting = validate(OzonPostingSchema, raw.body, raw);
  const body = isRecord(raw.body) ? raw.body : {};
  const scheme = raw.source === "OZON_FBO" ? "FBO" : "FBS";

  return {
    kind: scheme === "FBO" ? "OZON_FBO_POSTING" : "OZON_FBS_POSTING",
    scheme,
    documentVersion: raw.documentVersion,
    sourceRef: raw.id,
    fetchedAt: raw.fetchedAt,
    postingNumber: posting.posting_number,
    orderId: toIdentifier(posting.order_id),
    orderNumber: toText(posting.order_number),
    statusSource: posting.status,
    statusNorm: normalizeOzonStatus(posting.status),
    substatus: toText(posting.substatus),
    createdAt: parseSourceDate(posting.created_at),
    inProcessAt: parseSourceDate(posting.in_process_at),
    deliveringAt: parseSourceDate(posting.delivering_date),
    deliveredAt: parseSourceDate(posting.delivered_at),
    lines: posting.products.map((product, index) =>
      parseLine(raw, product, index)
    ),
    extensions: collectExtensions(body, POSTING_FIELDS),
  };
}
