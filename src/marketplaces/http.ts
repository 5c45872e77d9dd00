/**
 * Shared HTTP plumbing for marketplace API clients
 */

import { apiLogger } from "../logger.js";

// ============================================================================
// Errors
// ============================================================================

export class MarketplaceApiError extends Error {
  code = "MARKETPLACE_API_ERROR" as const;
  readonly status: number | null;
  /** Network failures, 5xx and 429 are worth retrying */
  readonly transient: boolean;

  constructor(message: string, status: number | null, transient?: boolean) {
    super(message);
    this.name = "MarketplaceApiError";
    this.status = status;
    this.transient = transient ?? isTransientStatus(status);
  }
}

export function isTransientStatus(status: number | null): boolean {
  return status === null || status === 429 || status >= 500;
}

// ============================================================================
// Rate Limited Client
// ============================================================================

export interface HttpRequest {
  method?: "GET" | "POST";
  url: string;
  headers?: Record<string, string>;
  body?: unknown;
  signal?: AbortSignal;
}

export class RateLimitedHttpClient {
  private lastRequestTime = 0;

  constructor(
    private readonly name: string,
    private readonly minIntervalMs: number
  ) {}

  /**
   * Send a request and return the parsed JSON body.
   *
   * Non-2xx responses and network failures raise MarketplaceApiError.
   * An abort through `signal` propagates unchanged.
   */
  async requestJson(request: HttpRequest): Promise<unknown> {
    await this.waitForSlot(request.signal);

    const method = request.method ?? "GET";
    const url = request.url;
    apiLogger.debug(
      { api: this.name, method, url },
      "Sending request to marketplace API"
    );

    const headers: Record<string, string> = {
      Accept: "application/json",
      ...request.headers,
    };
    let body: string | undefined;
    if (request.body !== undefined) {
      headers["Content-Type"] = "application/json";
      body = JSON.stringify(request.body);
    }

    const startTime = performance.now();
    let response: Response;
    try {
      response = await fetch(url, {
        method,
        headers,
        body,
        signal: request.signal,
      });
    } catch (error) {
      if (request.signal?.aborted === true) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      apiLogger.warn(
        { api: this.name, method, url, error: message },
        "Marketplace API request failed"
      );
      throw new MarketplaceApiError(
        `${this.name} request failed: ${message}`,
        null
      );
    }
    const duration = Math.round(performance.now() - startTime);

    apiLogger.debug(
      {
        api: this.name,
        method,
        url,
        status: response.status,
        statusText: response.statusText,
        duration: `${String(duration)}ms`,
      },
      "Received response from marketplace API"
    );

    if (!response.ok) {
      const text = await response.text();
      apiLogger.error(
        {
          api: this.name,
          url,
          status: response.status,
          statusText: response.statusText,
          body: text.slice(0, 500),
        },
        "Marketplace API returned an error"
      );
      throw new MarketplaceApiError(
        `${this.name} responded ${String(response.status)} ${response.statusText}`,
        response.status
      );
    }

    try {
      return await response.json();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new MarketplaceApiError(
        `${this.name} returned invalid JSON: ${message}`,
        response.status,
        false
      );
    }
  }

  private async waitForSlot(signal?: AbortSignal): Promise<void> {
    const elapsed = Date.now() - this.lastRequestTime;

    if (elapsed < this.minIntervalMs) {
      const waitTime = this.minIntervalMs - elapsed;
      apiLogger.debug(
        { api: this.name, waitTime },
        "Rate limiting: waiting before request"
      );
      await new Promise((resolve) => setTimeout(resolve, waitTime));
    }
    signal?.throwIfAborted();

    this.lastRequestTime = Date.now();
  }
}
