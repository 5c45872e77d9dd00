import "dotenv/config";

import type { ConnectorId } from "./types/index.js";

// ============================================================================
// Environment Helpers
// ============================================================================

function readString(name: string): string | undefined {
  const value = process.env[name];
  return value !== undefined && value.trim() !== "" ? value.trim() : undefined;
}

function readInt(name: string, fallback: number): number {
  const raw = readString(name);
  if (raw === undefined) {
    return fallback;
  }
  const parsed = Number.parseInt(raw, 10);
  if (Number.isNaN(parsed) || parsed < 0) {
    throw new Error(`Invalid value for ${name}: "${raw}" (expected integer)`);
  }
  return parsed;
}

// ============================================================================
// Configuration Types
// ============================================================================

export interface OzonCredentials {
  clientId: string;
  apiKey: string;
  baseUrl: string;
}

export interface WildberriesCredentials {
  apiKey: string;
  baseUrl: string;
}

export interface YandexMarketCredentials {
  apiKey: string;
  campaignId: string;
  baseUrl: string;
}

export interface RetryConfig {
  maxAttempts: number;
  initialBackoffMs: number;
  backoffMultiplier: number;
  maxBackoffMs: number;
}

export interface SyncConfig {
  intervalMinutes: number;
  overlapMinutes: number;
  initialLookbackDays: number;
  statusHorizonDays: number;
  maxPages: number;
  runTimeoutMs: number;
  leaseDurationMs: number;
  retry: RetryConfig;
  enabledConnectors: ConnectorId[] | null;
}

export interface AppConfig {
  databaseUrl: string;
  server: { port: number; host: string };
  ozon: OzonCredentials | null;
  wildberries: WildberriesCredentials | null;
  yandexMarket: YandexMarketCredentials | null;
  sync: SyncConfig;
}

// ============================================================================
// Defaults
// ============================================================================

export const SYNC_DEFAULTS = {
  intervalMinutes: 15,
  overlapMinutes: 30,
  initialLookbackDays: 30,
  statusHorizonDays: 30,
  maxPages: 100,
  runTimeoutMs: 10 * 60 * 1000,
  leaseDurationMs: 30 * 60 * 1000,
  retry: {
    maxAttempts: 5,
    initialBackoffMs: 1000,
    backoffMultiplier: 2,
    maxBackoffMs: 60_000,
  },
} as const;

const CONNECTOR_IDS: readonly ConnectorId[] = [
  "OZON_FBS",
  "OZON_FBO",
  "WB_SALES",
  "YM_ORDERS",
];

function isConnectorId(value: string): value is ConnectorId {
  return CONNECTOR_IDS.some((id) => id === value);
}

function parseEnabledConnectors(raw: string | undefined): ConnectorId[] | null {
  if (raw === undefined) {
    return null;
  }
  const ids = raw
    .split(",")
    .map((part) => part.trim().toUpperCase())
    .filter((part) => part !== "");
  for (const id of ids) {
    if (!isConnectorId(id)) {
      throw new Error(
        `Unknown connector in SYNC_ENABLED_CONNECTORS: "${id}" (expected one of ${CONNECTOR_IDS.join(", ")})`
      );
    }
  }
  return ids.filter(isConnectorId);
}

// ============================================================================
// Loader
// ============================================================================

export function loadConfig(): AppConfig {
  const ozonClientId = readString("OZON_CLIENT_ID");
  const ozonApiKey = readString("OZON_API_KEY");
  const wbApiKey = readString("WB_API_KEY");
  const ymApiKey = readString("YM_API_KEY");
  const ymCampaignId = readString("YM_CAMPAIGN_ID");

  return {
    databaseUrl:
      readString("DATABASE_URL") ??
      "postgresql://localhost:5432/sales_pipeline",
    server: {
      port: readInt("PORT", 3000),
      host: readString("HOST") ?? "0.0.0.0",
    },
    ozon:
      ozonClientId !== undefined && ozonApiKey !== undefined
        ? {
            clientId: ozonClientId,
            apiKey: ozonApiKey,
            baseUrl: readString("OZON_BASE_URL") ?? "https://api-seller.ozon.ru",
          }
        : null,
    wildberries:
      wbApiKey !== undefined
        ? {
            apiKey: wbApiKey,
            baseUrl:
              readString("WB_STATISTICS_BASE_URL") ??
              "https://statistics-api.wildberries.ru",
          }
        : null,
    yandexMarket:
      ymApiKey !== undefined && ymCampaignId !== undefined
        ? {
            apiKey: ymApiKey,
            campaignId: ymCampaignId,
            baseUrl:
              readString("YM_BASE_URL") ?? "https://api.partner.market.yandex.ru",
          }
        : null,
    sync: {
      intervalMinutes: readInt(
        "SYNC_INTERVAL_MINUTES",
        SYNC_DEFAULTS.intervalMinutes
      ),
      overlapMinutes: readInt(
        "SYNC_OVERLAP_MINUTES",
        SYNC_DEFAULTS.overlapMinutes
      ),
      initialLookbackDays: readInt(
        "SYNC_INITIAL_LOOKBACK_DAYS",
        SYNC_DEFAULTS.initialLookbackDays
      ),
      statusHorizonDays: readInt(
        "SYNC_STATUS_HORIZON_DAYS",
        SYNC_DEFAULTS.statusHorizonDays
      ),
      maxPages: readInt("SYNC_MAX_PAGES", SYNC_DEFAULTS.maxPages),
      runTimeoutMs: readInt("SYNC_RUN_TIMEOUT_MS", SYNC_DEFAULTS.runTimeoutMs),
      leaseDurationMs: readInt(
        "SYNC_LEASE_DURATION_MS",
        SYNC_DEFAULTS.leaseDurationMs
      ),
      retry: {
        ...SYNC_DEFAULTS.retry,
        maxAttempts: readInt(
          "SYNC_MAX_ATTEMPTS",
          SYNC_DEFAULTS.retry.maxAttempts
        ),
      },
      enabledConnectors: parseEnabledConnectors(
        readString("SYNC_ENABLED_CONNECTORS")
      ),
    },
  };
}

export const config = loadConfig();
