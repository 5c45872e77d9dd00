/**
 * Wildberries sales feed parser
 *
 * One row of the feed is one event for one unit line; `srid` identifies it.
 */

import { Type } from "@sinclair/typebox";

import { ParseError } from "../errors.js";
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

import type {
  RawPayload,
  WbEventType,
  WbSaleDocument,
} from "../../../types/index.js";

const WB_CURRENCY = "RUB";

const WbSaleRowSchema = Type.Object({
  srid: Type.String({ minLength: 1 }),
  date: Type.String({ minLength: 1 }),
  lastChangeDate: Nullable(Type.String()),
  saleID: Nullable(Type.String()),
  odid: Nullable(IdentifierSchema),
  nmId: Nullable(IdentifierSchema),
  supplierArticle: Nullable(Type.String()),
  barcode: Nullable(Type.String()),
  brand: Nullable(Type.String()),
  subject: Nullable(Type.String()),
  quantity: Nullable(Type.Integer()),
  totalPrice: Nullable(NumericSchema),
  discountPercent: Nullable(NumericSchema),
  discount: Nullable(NumericSchema),
  priceWithDisc: Nullable(NumericSchema),
  forPay: Nullable(NumericSchema),
  finishedPrice: Nullable(NumericSchema),
  warehouseName: Nullable(Type.String()),
  oblastOkrugName: Nullable(Type.String()),
});

const SALE_ROW_FIELDS = [
  "srid",
  "date",
  "lastChangeDate",
  "saleID",
  "odid",
  "nmId",
  "supplierArticle",
  "barcode",
  "brand",
  "subject",
  "quantity",
  "totalPrice",
  "discountPercent",
  "discount",
  "priceWithDisc",
  "forPay",
  "finishedPrice",
  "warehouseName",
  "oblastOkrugName",
] as const;

/**
 * Returns carry a saleID starting with "R" or a negative quantity.
 */
export function detectWbEventType(
  saleId: string | null,
  quantity: number | null
): WbEventType {
  if (saleId?.toUpperCase().startsWith("R") === true) {
    return "return";
  }
  if (quantity !== null && quantity < 0) {
    return "return";
  }
  return "sale";
}

export function parseWbSale(raw: RawPayload): WbSaleDocument {
  const row = validate(WbSaleRowSchema, raw.body, raw);
  const body = isRecord(raw.body) ? raw.body : {};

  const saleDate = parseSourceDate(row.date);
  if (saleDate === null) {
    throw new ParseError(raw, [
      { path: "/date", message: `Unrecognized date "${row.date}"` },
    ]);
  }

  const saleId = toText(row.saleID);
  const quantity = row.quantity ?? null;
  const eventType = detectWbEventType(saleId, quantity);
  const qty = quantity ?? 1;
  const priceEffective = toNumber(row.priceWithDisc);

  return {
    kind: "WB_SALE_EVENT",
    documentVersion: raw.documentVersion,
    sourceRef: raw.id,
    fetchedAt: raw.fetchedAt,
    srid: row.srid,
    eventType,
    statusNorm: eventType === "sale" ? "DELIVERED" : "RETURNED",
    saleId,
    orderId: toIdentifier(row.odid),
    saleDate,
    lastChangeDate: parseSourceDate(row.lastChangeDate),
    nmId: toIdentifier(row.nmId),
    supplierArticle: toText(row.supplierArticle),
    barcode: toText(row.barcode),
    brand: toText(row.brand),
    subject: toText(row.subject),
    qty,
    totalPrice: toNumber(row.totalPrice),
    discountPercent: toNumber(row.discountPercent),
    priceList: toNumber(row.totalPrice),
    discountTotal: toNumber(row.discount),
    priceEffective,
    amountLine: multiply(priceEffective, qty),
    forPay: toNumber(row.forPay),
    finishedPrice: toNumber(row.finishedPrice),
    currencyCode: WB_CURRENCY,
    warehouseName: toText(row.warehouseName),
    regionName: toText(row.oblastOkrugName),
    extensions: collectExtensions(body, SALE_ROW_FIELDS),
  };
}
