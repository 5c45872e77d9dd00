import type { Insertable, Selectable, Updateable } from "kysely";

// ============================================================================
// Column Conventions
// ============================================================================
//
// Timestamps are ISO-8601 UTC strings, JSON documents are serialized text and
// money is double precision, so the same queries run on PostgreSQL and SQLite.

export type RunStatusColumn = "Committed" | "PartiallyFailed" | "Failed";

export type FailureStageColumn = "PARSE" | "PROJECT";

export type FailureStatusColumn = "PENDING" | "RESOLVED";

// ============================================================================
// Table Definitions
// ============================================================================

export interface RawPayloadsTable {
  id: string;
  source: string;
  document_type: string;
  business_key: string;
  fetched_at: string;
  body: string;
  content_hash: string;
  document_version: number;
  created_at: string;
}

export interface SyncCheckpointsTable {
  connector: string;
  cursor: string | null;
  last_run_status: RunStatusColumn | null;
  last_run_at: string | null;
  last_success_at: string | null;
  locked_by: string | null;
  locked_until: string | null;
  updated_at: string;
}

export interface SyncRunsTable {
  id: string;
  connector: string;
  status: RunStatusColumn;
  started_at: string;
  finished_at: string;
  cursor_before: string | null;
  cursor_after: string | null;
  fetched: number;
  reprocessed: number;
  parsed: number;
  projected: number;
  upserted: number;
  failed: number;
  error_message: string | null;
}

export interface SyncFailuresTable {
  id: string;
  run_id: string;
  connector: string;
  raw_payload_id: string;
  business_key: string;
  stage: FailureStageColumn;
  error_message: string;
  attempts: number;
  status: FailureStatusColumn;
  created_at: string;
  updated_at: string;
}

export interface SalesRegisterTable {
  marketplace: string;
  document_no: string;
  line_id: string;
  scheme: string;
  document_type: string;
  document_version: number;
  registrator_ref: string;
  event_time_source: string;
  sale_date: string;
  source_updated_at: string | null;
  status_source: string;
  status_norm: string;
  seller_sku: string | null;
  mp_item_id: string | null;
  barcode: string | null;
  title: string | null;
  qty: number;
  price_list: number | null;
  discount_total: number | null;
  price_effective: number | null;
  amount_line: number | null;
  currency_code: string | null;
  payload_version: number;
  extra: string | null;
  loaded_at_utc: string;
}

// ============================================================================
// Database Interface
// ============================================================================

export interface Database {
  raw_payloads: RawPayloadsTable;
  sync_checkpoints: SyncCheckpointsTable;
  sync_runs: SyncRunsTable;
  sync_failures: SyncFailuresTable;
  sales_register: SalesRegisterTable;
}

// ============================================================================
// Helper Types for Kysely Operations
// ============================================================================

// Raw Payloads
export type RawPayloadRow = Selectable<RawPayloadsTable>;
export type NewRawPayloadRow = Insertable<RawPayloadsTable>;

// Sync Checkpoints
export type SyncCheckpointRow = Selectable<SyncCheckpointsTable>;
export type NewSyncCheckpointRow = Insertable<SyncCheckpointsTable>;
export type SyncCheckpointUpdate = Updateable<SyncCheckpointsTable>;

// Sync Runs
export type SyncRunRow = Selectable<SyncRunsTable>;
export type NewSyncRunRow = Insertable<SyncRunsTable>;

// Sync Failures
export type SyncFailureRow = Selectable<SyncFailuresTable>;
export type NewSyncFailureRow = Insertable<SyncFailuresTable>;
export type SyncFailureUpdate = Updateable<SyncFailuresTable>;

// Sales Register
export type SalesRegisterRow = Selectable<SalesRegisterTable>;
export type NewSalesRegisterRow = Insertable<SalesRegisterTable>;
