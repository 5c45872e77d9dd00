/**
 * Wildberries statistics API client (supplier sales feed)
 */

import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { apiLogger } from "../logger.js";
import { MarketplaceApiError, RateLimitedHttpClient } from "./http.js";

import type { WildberriesCredentials } from "../config.js";
import type { WbSalesFetcher, WbSalesPageRequest } from "./types.js";

// The statistics API allows one call per minute per method
const RATE_LIMIT_MS = 60_000;

const SalesResponseSchema = Type.Array(Type.Unknown());

export class WildberriesClient implements WbSalesFetcher {
  private http = new RateLimitedHttpClient("wildberries", RATE_LIMIT_MS);

  constructor(private credentials: WildberriesCredentials) {}

  async fetchSales(
    request: WbSalesPageRequest,
    signal?: AbortSignal
  ): Promise<unknown[]> {
    const params = new URLSearchParams({
      dateFrom: request.dateFrom,
      flag: "0",
    });
    const url = `${this.credentials.baseUrl}/api/v1/supplier/sales?${params.toString()}`;
    apiLogger.info({ dateFrom: request.dateFrom }, "Fetching WB sales page");

    const body = await this.http.requestJson({
      url,
      headers: { Authorization: this.credentials.apiKey },
      signal,
    });

    // An empty feed comes back as null
    if (body === null) {
      return [];
    }
    if (!Value.Check(SalesResponseSchema, body)) {
      throw new MarketplaceApiError(
        "Unexpected WB sales response shape",
        200,
        false
      );
    }
    return body;
  }
}
