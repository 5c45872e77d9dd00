/**
 * Parsed per-source documents
 *
 * A closed union discriminated by `kind`. Every variant keeps the fields of
 * the source record it does not model in `extensions`.
 */

export type StatusNorm =
  | "DELIVERED"
  | "CANCELLED"
  | "PROCESSING"
  | "IN_DELIVERY"
  | "RETURNED"
  | "UNKNOWN";

export const STATUS_NORMS: readonly StatusNorm[] = [
  "DELIVERED",
  "CANCELLED",
  "PROCESSING",
  "IN_DELIVERY",
  "RETURNED",
  "UNKNOWN",
];

export function isStatusNorm(value: string): value is StatusNorm {
  return STATUS_NORMS.some((status) => status === value);
}

export type DocumentKind =
  | "OZON_FBS_POSTING"
  | "OZON_FBO_POSTING"
  | "WB_SALE_EVENT"
  | "YM_ORDER";

export interface DocumentMeta {
  documentVersion: number;
  /** RawPayload id */
  sourceRef: string;
  fetchedAt: string;
  extensions: Record<string, unknown>;
}

// ============================================================================
// Ozon
// ============================================================================

export interface OzonPostingLine {
  lineId: string;
  position: number;
  productId: string | null;
  offerId: string | null;
  name: string | null;
  qty: number;
  priceList: number | null;
  discountTotal: number | null;
  priceEffective: number | null;
  amountLine: number | null;
  currencyCode: string | null;
  extensions: Record<string, unknown>;
}

export interface OzonPostingDocument extends DocumentMeta {
  kind: "OZON_FBS_POSTING" | "OZON_FBO_POSTING";
  scheme: "FBS" | "FBO";
  postingNumber: string;
  orderId: string | null;
  orderNumber: string | null;
  statusSource: string;
  statusNorm: StatusNorm;
  substatus: string | null;
  createdAt: string | null;
  inProcessAt: string | null;
  deliveringAt: string | null;
  deliveredAt: string | null;
  lines: OzonPostingLine[];
}

// ============================================================================
// Wildberries
// ============================================================================

export type WbEventType = "sale" | "return";

export interface WbSaleDocument extends DocumentMeta {
  kind: "WB_SALE_EVENT";
  srid: string;
  eventType: WbEventType;
  statusNorm: StatusNorm;
  saleId: string | null;
  orderId: string | null;
  saleDate: string;
  lastChangeDate: string | null;
  nmId: string | null;
  supplierArticle: string | null;
  barcode: string | null;
  brand: string | null;
  subject: string | null;
  qty: number;
  totalPrice: number | null;
  discountPercent: number | null;
  priceList: number | null;
  discountTotal: number | null;
  priceEffective: number | null;
  amountLine: number | null;
  forPay: number | null;
  finishedPrice: number | null;
  currencyCode: string;
  warehouseName: string | null;
  regionName: string | null;
}

// ============================================================================
// Yandex Market
// ============================================================================

export interface YmOrderLine {
  lineId: string;
  position: number;
  shopSku: string | null;
  offerId: string | null;
  name: string | null;
  qty: number;
  priceList: number | null;
  discountTotal: number | null;
  priceEffective: number | null;
  amountLine: number | null;
  statusSource: string | null;
  statusNorm: StatusNorm | null;
  extensions: Record<string, unknown>;
}

export interface YmOrderDocument extends DocumentMeta {
  kind: "YM_ORDER";
  orderId: string;
  statusSource: string;
  statusNorm: StatusNorm;
  substatus: string | null;
  createdAt: string | null;
  statusUpdatedAt: string | null;
  deliveredAt: string | null;
  currencyCode: string | null;
  itemsTotal: number | null;
  lines: YmOrderLine[];
}

export type Document = OzonPostingDocument | WbSaleDocument | YmOrderDocument;
