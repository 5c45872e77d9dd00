/**
 * Yandex Market Partner API client (campaign orders)
 */

import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { apiLogger } from "../logger.js";
import { MarketplaceApiError, RateLimitedHttpClient } from "./http.js";

import type { YandexMarketCredentials } from "../config.js";
import type {
  YmOrdersFetcher,
  YmOrdersPage,
  YmOrdersPageRequest,
} from "./types.js";

const RATE_LIMIT_MS = 300;

const OrdersResponseSchema = Type.Object({
  orders: Type.Array(Type.Unknown()),
  pager: Type.Optional(
    Type.Object({
      pagesCount: Type.Optional(Type.Number()),
    })
  ),
});

export class YandexMarketClient implements YmOrdersFetcher {
  private http = new RateLimitedHttpClient("yandex-market", RATE_LIMIT_MS);

  constructor(private credentials: YandexMarketCredentials) {}

  async fetchOrders(
    request: YmOrdersPageRequest,
    signal?: AbortSignal
  ): Promise<YmOrdersPage> {
    const params = new URLSearchParams({
      updatedAtFrom: request.updatedAtFrom,
      updatedAtTo: request.updatedAtTo,
      page: String(request.page),
      pageSize: String(request.pageSize),
    });
    const url = `${this.credentials.baseUrl}/campaigns/${this.credentials.campaignId}/orders?${params.toString()}`;
    apiLogger.info(
      {
        campaignId: this.credentials.campaignId,
        page: request.page,
        updatedAtFrom: request.updatedAtFrom,
      },
      "Fetching Yandex Market orders page"
    );

    const body = await this.http.requestJson({
      url,
      headers: { Authorization: `Bearer ${this.credentials.apiKey}` },
      signal,
    });

    if (!Value.Check(OrdersResponseSchema, body)) {
      throw new MarketplaceApiError(
        "Unexpected Yandex Market orders response shape",
        200,
        false
      );
    }
    return {
      orders: body.orders,
      pagesCount: body.pager?.pagesCount ?? null,
    };
  }
}
