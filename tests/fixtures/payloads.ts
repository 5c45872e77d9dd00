/**
 * Marketplace records and raw payloads for tests
 */

import type { RawPayload, SalesRegisterEntry, SourceId } from "../../src/types/index.js";

const DOCUMENT_TYPES: Record<SourceId, string> = {
  OZON_FBS: "posting_fbs",
  OZON_FBO: "posting_fbo",
  WB_SALES: "sale",
  YM_ORDERS: "order",
};

export function rawPayload(
  source: SourceId,
  body: unknown,
  overrides: Partial<RawPayload> = {}
): RawPayload {
  return {
    id: "raw-1",
    source,
    documentType: DOCUMENT_TYPES[source],
    businessKey: "key-1",
    fetchedAt: "2024-03-05T10:00:00.000Z",
    body,
    contentHash: "hash-1",
    documentVersion: 1,
    ...overrides,
  };
}

// ============================================================================
// Ozon
// ============================================================================

export function ozonPosting(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    posting_number: "P1",
    order_id: 9001,
    order_number: "9001-1",
    status: "delivered",
    substatus: "posting_received",
    created_at: "2024-03-01T08:00:00Z",
    in_process_at: "2024-03-01T09:00:00Z",
    delivering_date: "2024-03-02T12:00:00Z",
    delivered_at: "2024-03-03T15:30:00Z",
    products: [
      { product_id: "A", offer_id: "SKU-A", name: "Kettle", quantity: 1, price: "1000.00", currency_code: "RUB" },
      { product_id: "B", offer_id: "SKU-B", name: "Mug", quantity: 2, price: 250, currency_code: "RUB" },
    ],
    ...overrides,
  };
}

// ============================================================================
// Wildberries
// ============================================================================

export function wbSaleRow(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    srid: "WB100",
    date: "2024-03-04T11:20:00",
    lastChangeDate: "2024-03-04T12:00:00",
    saleID: "S1001",
    odid: 555,
    nmId: 123456,
    supplierArticle: "ART-1",
    barcode: "2000000000011",
    brand: "Acme",
    subject: "Kettles",
    totalPrice: 800,
    discountPercent: 37.5,
    discount: 300,
    priceWithDisc: 500,
    forPay: 430.5,
    finishedPrice: 480,
    warehouseName: "Koledino",
    oblastOkrugName: "Central",
    ...overrides,
  };
}

// ============================================================================
// Yandex Market
// ============================================================================

export function ymOrder(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: 7001,
    status: "DELIVERED",
    substatus: "DELIVERY_SERVICE_DELIVERED",
    creationDate: "01-03-2024 10:00:00",
    statusUpdateDate: "05-03-2024 18:45:00",
    currency: "RUR",
    itemsTotal: 1500,
    delivery: { dates: { realDeliveryDate: "05-03-2024" } },
    items: [
      { id: 11, offerId: "OF-1", shopSku: "SHOP-1", offerName: "Blender", count: 1, price: 1200, subsidy: 100 },
      { id: 12, offerId: "OF-2", offerName: "Lid", count: 3, price: 100 },
    ],
    ...overrides,
  };
}

// ============================================================================
// Register
// ============================================================================

export function registerEntry(overrides: Partial<SalesRegisterEntry> = {}): SalesRegisterEntry {
  return {
    marketplace: "WB",
    documentNo: "WB100",
    lineId: "WB100",
    scheme: "WB",
    documentType: "WB_SALE_EVENT",
    documentVersion: 1,
    registratorRef: "raw-1",
    eventTimeSource: "2024-03-04T11:20:00.000Z",
    saleDate: "2024-03-04",
    sourceUpdatedAt: null,
    statusSource: "sale",
    statusNorm: "DELIVERED",
    sellerSku: "ART-1",
    mpItemId: "123456",
    barcode: "2000000000011",
    title: "Acme",
    qty: 1,
    priceList: 800,
    discountTotal: 300,
    priceEffective: 500,
    amountLine: 500,
    currencyCode: "RUB",
    payloadVersion: 1,
    extra: null,
    ...overrides,
  };
}
