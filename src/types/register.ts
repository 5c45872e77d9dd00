/**
 * Sales register types
 */

import type { StatusNorm } from "./documents.js";
import type { Marketplace } from "./index.js";

export interface SalesRegisterKey {
  marketplace: Marketplace;
  documentNo: string;
  lineId: string;
}

/**
 * One sold line item. `loadedAtUtc` is assigned by the store on write.
 */
export interface SalesRegisterEntry extends SalesRegisterKey {
  scheme: string;
  documentType: string;
  documentVersion: number;
  registratorRef: string;
  eventTimeSource: string;
  saleDate: string;
  sourceUpdatedAt: string | null;
  statusSource: string;
  statusNorm: StatusNorm;
  sellerSku: string | null;
  mpItemId: string | null;
  barcode: string | null;
  title: string | null;
  qty: number;
  priceList: number | null;
  discountTotal: number | null;
  priceEffective: number | null;
  amountLine: number | null;
  currencyCode: string | null;
  payloadVersion: number;
  extra: Record<string, unknown> | null;
}

export interface StoredSalesRegisterEntry extends SalesRegisterEntry {
  loadedAtUtc: string;
}

export interface SalesRegisterFilters {
  /** Inclusive, YYYY-MM-DD */
  dateFrom?: string;
  /** Inclusive, YYYY-MM-DD */
  dateTo?: string;
  marketplace?: Marketplace;
  documentNo?: string;
  sellerSku?: string;
  mpItemId?: string;
  barcode?: string;
  statusNorm?: StatusNorm;
  limit?: number;
  offset?: number;
}

export interface SalesRegisterPage {
  items: StoredSalesRegisterEntry[];
  total: number;
  limit: number;
  offset: number;
}

export interface DailyStat {
  saleDate: string;
  marketplace: Marketplace;
  lines: number;
  qty: number;
  amount: number;
}

export interface MarketplaceStat {
  marketplace: Marketplace;
  lines: number;
  documents: number;
  qty: number;
  amount: number;
  firstSaleDate: string | null;
  lastSaleDate: string | null;
}
