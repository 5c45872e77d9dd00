import { describe, it, expect, afterEach, vi } from "vitest";

import { SYNC_DEFAULTS, loadConfig } from "../../src/config.js";

const ENV_NAMES = [
  "DATABASE_URL",
  "PORT",
  "OZON_CLIENT_ID",
  "OZON_API_KEY",
  "WB_API_KEY",
  "YM_API_KEY",
  "YM_CAMPAIGN_ID",
  "SYNC_INTERVAL_MINUTES",
  "SYNC_MAX_ATTEMPTS",
  "SYNC_ENABLED_CONNECTORS",
  "SYNC_LEASE_DURATION_MS",
  "SYNC_STATUS_HORIZON_DAYS",
];

function clearEnv(): void {
  for (const name of ENV_NAMES) {
    vi.stubEnv(name, "");
  }
}

describe("config", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("should fall back to defaults", () => {
    clearEnv();

    const config = loadConfig();

    expect(config.server.port).toBe(3000);
    expect(config.ozon).toBeNull();
    expect(config.wildberries).toBeNull();
    expect(config.yandexMarket).toBeNull();
    expect(config.sync.intervalMinutes).toBe(SYNC_DEFAULTS.intervalMinutes);
    expect(config.sync.retry.maxAttempts).toBe(5);
    expect(config.sync.leaseDurationMs).toBe(1_800_000);
    expect(config.sync.statusHorizonDays).toBe(30);
    expect(config.sync.enabledConnectors).toBeNull();
  });

  it("should read marketplace credentials only when complete", () => {
    clearEnv();
    vi.stubEnv("OZON_CLIENT_ID", "test-client");
    vi.stubEnv("OZON_API_KEY", "test-secret");
    vi.stubEnv("YM_API_KEY", "test-secret");

    const config = loadConfig();

    expect(config.ozon).toEqual({
      clientId: "test-client",
      apiKey: "test-secret",
      baseUrl: "https://api-seller.ozon.ru",
    });
    expect(config.yandexMarket).toBeNull();
  });

  it("should parse numeric settings and the connector list", () => {
    clearEnv();
    vi.stubEnv("SYNC_INTERVAL_MINUTES", "5");
    vi.stubEnv("SYNC_MAX_ATTEMPTS", "2");
    vi.stubEnv("SYNC_LEASE_DURATION_MS", "90000");
    vi.stubEnv("SYNC_STATUS_HORIZON_DAYS", "14");
    vi.stubEnv("SYNC_ENABLED_CONNECTORS", " wb_sales, OZON_FBS ,");

    const config = loadConfig();

    expect(config.sync.intervalMinutes).toBe(5);
    expect(config.sync.leaseDurationMs).toBe(90_000);
    expect(config.sync.statusHorizonDays).toBe(14);
    expect(config.sync.retry).toEqual({ ...SYNC_DEFAULTS.retry, maxAttempts: 2 });
    expect(config.sync.enabledConnectors).toEqual(["WB_SALES", "OZON_FBS"]);
  });

  it("should reject invalid values", () => {
    clearEnv();
    vi.stubEnv("PORT", "abc");
    expect(() => loadConfig()).toThrow('Invalid value for PORT: "abc" (expected integer)');

    vi.stubEnv("PORT", "");
    vi.stubEnv("SYNC_ENABLED_CONNECTORS", "WB_SALES,AMAZON");
    expect(() => loadConfig()).toThrow(
      'Unknown connector in SYNC_ENABLED_CONNECTORS: "AMAZON"'
    );
  });
});
