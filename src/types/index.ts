/**
 * Core domain types shared by connectors, parsers, projection and stores
 */

// ============================================================================
// Sources & Marketplaces
// ============================================================================

export type SourceId = "OZON_FBS" | "OZON_FBO" | "WB_SALES" | "YM_ORDERS";

/** One connector per source feed */
export type ConnectorId = SourceId;

export type Marketplace = "OZON" | "WB" | "YM";

export type FulfillmentScheme = "FBS" | "FBO" | "WB" | "YM";

export interface SourceDescriptor {
  marketplace: Marketplace;
  documentType: string;
  scheme: FulfillmentScheme;
}

export const SOURCES: Record<SourceId, SourceDescriptor> = {
  OZON_FBS: { marketplace: "OZON", documentType: "posting_fbs", scheme: "FBS" },
  OZON_FBO: { marketplace: "OZON", documentType: "posting_fbo", scheme: "FBO" },
  WB_SALES: { marketplace: "WB", documentType: "sale", scheme: "WB" },
  YM_ORDERS: { marketplace: "YM", documentType: "order", scheme: "YM" },
};

export const SOURCE_IDS: readonly SourceId[] = [
  "OZON_FBS",
  "OZON_FBO",
  "WB_SALES",
  "YM_ORDERS",
];

export const MARKETPLACES: readonly Marketplace[] = ["OZON", "WB", "YM"];

export function isSourceId(value: string): value is SourceId {
  return SOURCE_IDS.some((id) => id === value);
}

export function isMarketplace(value: string): value is Marketplace {
  return MARKETPLACES.some((mp) => mp === value);
}

// ============================================================================
// Raw Payloads
// ============================================================================

/**
 * One API record as a connector produced it, before it is stored.
 */
export interface FetchedPayload {
  source: SourceId;
  documentType: string;
  businessKey: string;
  fetchedAt: string;
  body: unknown;
}

/**
 * Stored, immutable copy of one API record.
 */
export interface RawPayload extends FetchedPayload {
  id: string;
  contentHash: string;
  documentVersion: number;
}

// ============================================================================
// Checkpoints & Runs
// ============================================================================

export type RunState =
  | "Idle"
  | "Fetching"
  | "Parsing"
  | "Projecting"
  | "Upserting"
  | "Committed"
  | "PartiallyFailed"
  | "Failed";

export type TerminalRunState = Extract<
  RunState,
  "Committed" | "PartiallyFailed" | "Failed"
>;

export interface Checkpoint {
  connector: ConnectorId;
  /** ISO-8601 UTC time the next window starts from, null before the first run */
  cursor: string | null;
  lastRunStatus: TerminalRunState | null;
  lastRunAt: string | null;
  lastSuccessAt: string | null;
}

export type FailureStage = "PARSE" | "PROJECT";

export interface ItemFailure {
  rawPayloadId: string;
  businessKey: string;
  stage: FailureStage;
  message: string;
}

export interface RunCounts {
  fetched: number;
  reprocessed: number;
  parsed: number;
  projected: number;
  upserted: number;
  failed: number;
}

export interface RunOutcome {
  runId: string;
  connector: ConnectorId;
  status: TerminalRunState;
  startedAt: string;
  finishedAt: string;
  cursorBefore: string | null;
  cursorAfter: string | null;
  counts: RunCounts;
  failures: ItemFailure[];
  errorMessage: string | null;
}

export type {
  Document,
  DocumentKind,
  DocumentMeta,
  OzonPostingDocument,
  OzonPostingLine,
  StatusNorm,
  WbSaleDocument,
  WbEventType,
  YmOrderDocument,
  YmOrderLine,
} from "./documents.js";

export { STATUS_NORMS, isStatusNorm } from "./documents.js";

export type {
  SalesRegisterEntry,
  SalesRegisterKey,
  StoredSalesRegisterEntry,
  SalesRegisterFilters,
  SalesRegisterPage,
  DailyStat,
  MarketplaceStat,
} from "./register.js";
