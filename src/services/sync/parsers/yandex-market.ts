/**
 * Yandex Market order parser
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
import { normalizeYmStatus } from "./status.js";

import type {
  RawPayload,
  YmOrderDocument,
  YmOrderLine,
} from "../../../types/index.js";

// ============================================================================
// Schemas
// ============================================================================

const YmItemSchema = Type.Object({
  id: IdentifierSchema,
  offerId: Nullable(Type.String()),
  shopSku: Nullable(Type.String()),
  offerName: Nullable(Type.String()),
  name: Nullable(Type.String()),
  count: Type.Integer({ minimum: 0 }),
  price: Nullable(NumericSchema),
  subsidy: Nullable(NumericSchema),
  status: Nullable(Type.String()),
});

const YmOrderSchema = Type.Object({
  id: IdentifierSchema,
  status: Type.String({ minLength: 1 }),
  substatus: Nullable(Type.String()),
  creationDate: Nullable(Type.String()),
  statusUpdateDate: Nullable(Type.String()),
  currency: Nullable(Type.String()),
  itemsTotal: Nullable(NumericSchema),
  delivery: Nullable(
    Type.Object({
      dates: Nullable(
        Type.Object({
          realDeliveryDate: Nullable(Type.String()),
        })
      ),
    })
  ),
  items: Type.Array(Type.Unknown()),
});

const ORDER_FIELDS = [
  "id",
  "status",
  "substatus",
  "creationDate",
  "statusUpdateDate",
  "currency",
  "itemsTotal",
  "delivery",
  "items",
] as const;

const ITEM_FIELDS = [
  "id",
  "offerId",
  "shopSku",
  "offerName",
  "name",
  "count",
  "price",
  "subsidy",
  "status",
] as const;

// ============================================================================
// Parser
// ============================================================================

function parseItem(raw: RawPayload, record: unknown, index: number): YmOrderLine {
  const item = validate(YmItemSchema, record, raw, `/items/${String(index)}`);
  const price = toNumber(item.price);
  const subsidy = toNumber(item.subsidy);
  const statusSource = toText(item.status);

  return {
    lineId: String(item.id),
    position: index + 1,
    shopSku: toText(item.shopSku),
    offerId: toText(item.offerId),
    name: toText(item.offerName) ?? toText(item.name),
    qty: item.count,
    priceList: price,
    discountTotal: subsidy,
    priceEffective: price === null ? null : price - (subsidy ?? 0),
    amountLine: multiply(price, item.count),
    statusSource,
    statusNorm: statusSource === null ? null : normalizeYmStatus(statusSource),
    extensions: isRecord(record) ? collectExtensions(record, ITEM_FIELDS) : {},
  };
}

export function parseYmOrder(raw: RawPayload): YmOrderDocument {
  const order = validate(YmOrderSchema, raw.body, raw);
  const body = isRecord(raw.body) ? raw.body : {};

  return {
    kind: "YM_ORDER",
    documentVersion: raw.documentVersion,
    sourceRef: raw.id,
    fetchedAt: raw.fetchedAt,
    orderId: String(order.id),
    statusSource: order.status,
    statusNorm: normalizeYmStatus(order.status),
    substatus: toText(order.substatus),
    createdAt: parseSourceDate(order.creationDate),
    statusUpdatedAt: parseSourceDate(order.statusUpdateDate),
    deliveredAt: parseSourceDate(order.delivery?.dates?.realDeliveryDate),
    currencyCode: toText(order.currency),
    itemsTotal: toNumber(order.itemsTotal),
    lines: order.items.map((item, index) => parseItem(raw, item, index)),
    extensions: collectExtensions(body, ORDER_FIELDS),
  };
}
