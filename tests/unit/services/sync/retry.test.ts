import { describe, it, expect, vi } from "vitest";

import { MarketplaceApiError } from "../../../../src/marketplaces/http.js";
import {
  computeBackoff,
  isPermanentError,
  sleep,
  withRetry,
} from "../../../../src/services/sync/retry.js";

import type { RetryConfig } from "../../../../src/config.js";

const RETRY: RetryConfig = {
  maxAttempts: 4,
  initialBackoffMs: 100,
  backoffMultiplier: 2,
  maxBackoffMs: 300,
};

describe("services/sync/retry", () => {
  describe("computeBackoff", () => {
    it("should grow exponentially up to the cap", () => {
      expect([0, 1, 2, 3].map((n) => computeBackoff(n, RETRY))).toEqual([
        100, 200, 300, 300,
      ]);
    });
  });

  describe("isPermanentError", () => {
    it("should follow the transient flag of API errors", () => {
      expect(isPermanentError(new MarketplaceApiError("boom", 503))).toBe(false);
      expect(isPermanentError(new MarketplaceApiError("slow down", 429))).toBe(false);
      expect(isPermanentError(new MarketplaceApiError("offline", null))).toBe(false);
      expect(isPermanentError(new MarketplaceApiError("bad request", 400))).toBe(true);
    });

    it("should treat credential problems as permanent", () => {
      expect(isPermanentError(new Error("Missing credentials for Ozon"))).toBe(true);
      expect(isPermanentError(new Error("Unauthorized"))).toBe(true);
      expect(isPermanentError(new Error("socket hang up"))).toBe(false);
    });
  });

  describe("withRetry", () => {
    it("should retry until the call succeeds", async () => {
      const waits: number[] = [];
      const onRetry = vi.fn();
      const fn = vi
        .fn<(attempt: number) => Promise<string>>()
        .mockRejectedValueOnce(new Error("first"))
        .mockRejectedValueOnce(new Error("second"))
        .mockResolvedValue("done");

      const result = await withRetry(fn, RETRY, {
        sleep: (ms) => {
          waits.push(ms);
          return Promise.resolve();
        },
        onRetry,
      });

      expect(result).toBe("done");
      expect(fn).toHaveBeenCalledTimes(3);
      expect(fn.mock.calls.map((call) => call[0])).toEqual([0, 1, 2]);
      expect(waits).toEqual([100, 200]);
      expect(onRetry.mock.calls.map((call) => call[1])).toEqual([1, 2]);
    });

    it("should rethrow the last error once attempts run out", async () => {
      let calls = 0;
      const promise = withRetry(
        () => {
          calls++;
          return Promise.reject(new Error(`attempt ${String(calls)}`));
        },
        RETRY,
        { sleep: () => Promise.resolve() }
      );

      await expect(promise).rejects.toThrow("attempt 4");
      expect(calls).toBe(4);
    });

    it("should not retry a permanent error", async () => {
      const fn = vi
        .fn<(attempt: number) => Promise<string>>()
        .mockRejectedValue(new MarketplaceApiError("Forbidden", 403));

      await expect(
        withRetry(fn, RETRY, { sleep: () => Promise.resolve() })
      ).rejects.toThrow("Forbidden");
      expect(fn).toHaveBeenCalledTimes(1);
    });

    it("should stop once the signal is aborted", async () => {
      const controller = new AbortController();
      const fn = vi.fn<(attempt: number) => Promise<string>>(() => {
        controller.abort();
        return Promise.reject(new Error("network"));
      });

      await expect(
        withRetry(fn, RETRY, {
          signal: controller.signal,
          sleep: () => Promise.resolve(),
        })
      ).rejects.toThrow("network");
      expect(fn).toHaveBeenCalledTimes(1);
    });
  });

  describe("sleep", () => {
    it("should reject with the abort reason", async () => {
      const controller = new AbortController();
      const pending = sleep(10_000, controller.signal);
      controller.abort(new Error("stopped"));

      await expect(pending).rejects.toThrow("stopped");
    });

    it("should reject at once when already aborted", async () => {
      await expect(sleep(10, AbortSignal.abort(new Error("gone")))).rejects.toThrow(
        "gone"
      );
    });
  });
});
