/**
 * Ozon Seller API client (FBS and FBO posting lists)
 */

import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { apiLogger } from "../logger.js";
import { MarketplaceApiError, RateLimitedHttpClient } from "./http.js";

import type { OzonCredentials } from "../config.js";
import type {
  OzonPostingFetcher,
  OzonPostingPage,
  OzonPostingPageRequest,
} from "./types.js";

const RATE_LIMIT_MS = 500;

const POSTING_LIST_PATHS = {
  FBS: "/v3/posting/fbs/list",
  FBO: "/v2/posting/fbo/list",
} as const;

// FBS wraps postings in result.postings, FBO returns result as the array
const FbsEnvelopeSchema = Type.Object({
  result: Type.Object({
    postings: Type.Array(Type.Unknown()),
    has_next: Type.Optional(Type.Boolean()),
  }),
});

const FboEnvelopeSchema = Type.Object({
  result: Type.Array(Type.Unknown()),
});

export class OzonClient implements OzonPostingFetcher {
  private http = new RateLimitedHttpClient("ozon", RATE_LIMIT_MS);

  constructor(private credentials: OzonCredentials) {}

  async fetchPostings(
    request: OzonPostingPageRequest,
    signal?: AbortSignal
  ): Promise<OzonPostingPage> {
    const url = `${this.credentials.baseUrl}${POSTING_LIST_PATHS[request.scheme]}`;
    apiLogger.info(
      {
        scheme: request.scheme,
        since: request.since,
        to: request.to,
        statusChangedFrom: request.statusChangedFrom,
        offset: request.offset,
      },
      "Fetching Ozon postings page"
    );

    const body = await this.http.requestJson({
      method: "POST",
      url,
      headers: {
        "Client-Id": this.credentials.clientId,
        "Api-Key": this.credentials.apiKey,
      },
      body: {
        dir: "ASC",
        filter: {
          since: request.since,
          to: request.to,
          ...(request.statusChangedFrom !== undefined
            ? {
                last_changed_status_date: {
                  from: request.statusChangedFrom,
                  to: request.to,
                },
              }
            : {}),
        },
        limit: request.limit,
        offset: request.offset,
        with: { analytics_data: true, financial_data: true },
      },
      signal,
    });

    if (request.scheme === "FBS") {
      if (!Value.Check(FbsEnvelopeSchema, body)) {
        throw new MarketplaceApiError(
          "Unexpected Ozon FBS posting list response shape",
          200,
          false
        );
      }
      return {
        postings: body.result.postings,
        hasNext: body.result.has_next ?? false,
      };
    }

    if (!Value.Check(FboEnvelopeSchema, body)) {
      throw new MarketplaceApiError(
        "Unexpected Ozon FBO posting list response shape",
        200,
        false
      );
    }
    // FBO has no has_next flag: a full page means there may be more
    return {
      postings: body.result,
      hasNext: body.result.length >= request.limit,
    };
  }
}
