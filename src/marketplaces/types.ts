/**
 * Page fetcher contracts the connectors call.
 *
 * Records come back untyped; parsers validate them later against the raw copy.
 */

// ============================================================================
// Ozon
// ============================================================================

export type OzonScheme = "FBS" | "FBO";

export interface OzonPostingPageRequest {
  scheme: OzonScheme;
  /** Processing-date window; Ozon filters `since`/`to` by in_process_at */
  since: string;
  to: string;
  /** FBS only: postings whose status changed in [statusChangedFrom, to] */
  statusChangedFrom?: string;
  limit: number;
  offset: number;
}

export interface OzonPostingPage {
  postings: unknown[];
  hasNext: boolean;
}

export interface OzonPostingFetcher {
  fetchPostings(
    request: OzonPostingPageRequest,
    signal?: AbortSignal
  ): Promise<OzonPostingPage>;
}

// ============================================================================
// Wildberries
// ============================================================================

export interface WbSalesPageRequest {
  /** Rows with lastChangeDate at or after this moment */
  dateFrom: string;
}

export interface WbSalesFetcher {
  fetchSales(
    request: WbSalesPageRequest,
    signal?: AbortSignal
  ): Promise<unknown[]>;
}

// ============================================================================
// Yandex Market
// ============================================================================

export interface YmOrdersPageRequest {
  updatedAtFrom: string;
  updatedAtTo: string;
  /** 1-based */
  page: number;
  pageSize: number;
}

export interface YmOrdersPage {
  orders: unknown[];
  pagesCount: number | null;
}

export interface YmOrdersFetcher {
  fetchOrders(
    request: YmOrdersPageRequest,
    signal?: AbortSignal
  ): Promise<YmOrdersPage>;
}
