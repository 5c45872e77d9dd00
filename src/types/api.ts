/**
 * API Request/Response Types
 */

// ============================================================================
// Common Response Types
// ============================================================================

export interface PaginationMeta {
  total: number;
  limit: number;
  offset: number;
  hasMore: boolean;
}

export interface ApiResponse<T> {
  data: T;
  meta?: {
    pagination?: PaginationMeta;
  };
}

export interface ApiError {
  error: string;
  message: string;
  details?: Record<string, unknown>;
  requestId?: string;
}

// ============================================================================
// Sync DTOs
// ============================================================================

export interface CheckpointDto {
  connector: string;
  cursor: string | null;
  lastRunStatus: string | null;
  lastRunAt: string | null;
  lastSuccessAt: string | null;
  lockedBy: string | null;
  lockedUntil: string | null;
  running: boolean;
}

export interface SyncRunDto {
  id: string;
  connector: string;
  status: string;
  startedAt: string;
  finishedAt: string | null;
  cursorBefore: string | null;
  cursorAfter: string | null;
  counts: {
    fetched: number;
    reprocessed: number;
    parsed: number;
    projected: number;
    upserted: number;
    failed: number;
  };
  errorMessage: string | null;
}

export interface SyncFailureDto {
  id: string;
  runId: string;
  connector: string;
  rawPayloadId: string;
  businessKey: string;
  stage: string;
  errorMessage: string;
  attempts: number;
  status: string;
  createdAt: string;
  updatedAt: string;
}
