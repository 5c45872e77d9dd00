/**
 * Projection Builder - Document -> sales register entries
 *
 * Pure and deterministic: the same document always yields the same entries
 * with the same field and key order. Money and quantity are copied as the
 * document carries them.
 */

import { ProjectionError } from "./errors.js";
import { toSaleDate } from "./parsers/dates.js";

import type {
  Document,
  OzonPostingDocument,
  SalesRegisterEntry,
  WbSaleDocument,
  YmOrderDocument,
} from "../../types/index.js";

const PAYLOAD_VERSION = 1;

function requireKey(
  sourceRef: string,
  field: string,
  value: string | null | undefined
): string {
  if (value === null || value === undefined || value.trim() === "") {
    throw new ProjectionError(
      sourceRef,
      field,
      `Cannot build register key: ${field} is empty (raw payload ${sourceRef})`
    );
  }
  return value;
}

// ============================================================================
// Ozon
// ============================================================================

export function projectOzonPosting(
  document: OzonPostingDocument
): SalesRegisterEntry[] {
  if (document.statusNorm !== "DELIVERED") {
    return [];
  }

  const documentNo = requireKey(
    document.sourceRef,
    "posting_number",
    document.postingNumber
  );
  const eventTimeSource =
    document.deliveredAt ?? document.deliveringAt ?? document.fetchedAt;

  return document.lines.map(
    (line): SalesRegisterEntry => ({
      marketplace: "OZON",
      documentNo,
      lineId: requireKey(document.sourceRef, "line_id", line.lineId),
      scheme: document.scheme,
      documentType:
        document.scheme === "FBO" ? "OZON_FBO_POSTING" : "OZON_FBS_POSTING",
      documentVersion: document.documentVersion,
      registratorRef: document.sourceRef,
      eventTimeSource,
      saleDate: toSaleDate(eventTimeSource),
      sourceUpdatedAt: document.inProcessAt,
      statusSource: document.statusSource,
      statusNorm: document.statusNorm,
      sellerSku: line.offerId,
      mpItemId: line.productId,
      barcode: null,
      title: line.name,
      qty: line.qty,
      priceList: line.priceList,
      discountTotal: line.discountTotal,
      priceEffective: line.priceEffective,
      amountLine: line.amountLine,
      currencyCode: line.currencyCode,
      payloadVersion: PAYLOAD_VERSION,
      extra: {
        orderId: document.orderId,
        orderNumber: document.orderNumber,
        substatus: document.substatus,
        linePosition: line.position,
      },
    })
  );
}

// ============================================================================
// Wildberries
// ============================================================================

export function projectWbSale(document: WbSaleDocument): SalesRegisterEntry[] {
  // Returns stay out of the register
  if (document.eventType !== "sale") {
    return [];
  }

  const srid = requireKey(document.sourceRef, "srid", document.srid);

  return [
    {
      marketplace: "WB",
      documentNo: srid,
      lineId: srid,
      scheme: "WB",
      documentType: "WB_SALE_EVENT",
      documentVersion: document.documentVersion,
      registratorRef: document.sourceRef,
      eventTimeSource: document.saleDate,
      saleDate: toSaleDate(document.saleDate),
      sourceUpdatedAt: document.lastChangeDate,
      statusSource: document.eventType,
      statusNorm: document.statusNorm,
      sellerSku: document.supplierArticle,
      mpItemId: document.nmId,
      barcode: document.barcode,
      title: document.brand,
      qty: document.qty,
      priceList: document.priceList,
      discountTotal: document.discountTotal,
      priceEffective: document.priceEffective,
      amountLine: document.amountLine,
      currencyCode: document.currencyCode,
      payloadVersion: PAYLOAD_VERSION,
      extra: {
        saleId: document.saleId,
        orderId: document.orderId,
        forPay: document.forPay,
        finishedPrice: document.finishedPrice,
        warehouseName: document.warehouseName,
        regionName: document.regionName,
      },
    },
  ];
}

// ============================================================================
// Yandex Market
// ============================================================================

export function projectYmOrder(
  document: YmOrderDocument
): SalesRegisterEntry[] {
  const documentNo = requireKey(document.sourceRef, "order_id", document.orderId);
  const eventTimeSource =
    document.deliveredAt ?? document.statusUpdatedAt ?? document.fetchedAt;

  const entries: SalesRegisterEntry[] = [];
  for (const line of document.lines) {
    // Item status wins over the order status when the item carries one
    const statusNorm = line.statusNorm ?? document.statusNorm;
    if (statusNorm !== "DELIVERED") {
      continue;
    }

    entries.push({
      marketplace: "YM",
      documentNo,
      lineId: requireKey(document.sourceRef, "item_id", line.lineId),
      scheme: "YM",
      documentType: "YM_ORDER",
      documentVersion: document.documentVersion,
      registratorRef: document.sourceRef,
      eventTimeSource,
      saleDate: toSaleDate(eventTimeSource),
      sourceUpdatedAt: document.statusUpdatedAt,
      statusSource: line.statusSource ?? document.statusSource,
      statusNorm,
      sellerSku: line.shopSku ?? line.offerId,
      mpItemId: line.shopSku ?? line.offerId,
      barcode: null,
      title: line.name,
      qty: line.qty,
      priceList: line.priceList,
      discountTotal: line.discountTotal,
      priceEffective: line.priceEffective,
      amountLine: line.amountLine,
      currencyCode: document.currencyCode,
      payloadVersion: PAYLOAD_VERSION,
      extra: {
        substatus: document.substatus,
        itemsTotal: document.itemsTotal,
        linePosition: line.position,
      },
    });
  }
  return entries;
}

// ============================================================================
// Dispatch
// ============================================================================

export function projectDocument(document: Document): SalesRegisterEntry[] {
  switch (document.kind) {
    case "OZON_FBS_POSTING":
    case "OZON_FBO_POSTING":
      return projectOzonPosting(document);
    case "WB_SALE_EVENT":
      return projectWbSale(document);
    case "YM_ORDER":
      return projectYmOrder(document);
  }
}
