/**
 * Source connector contract
 */

import type { Checkpoint, ConnectorId, FetchedPayload } from "../../../types/index.js";

export interface ConnectorOptions {
  overlapMinutes: number;
  initialLookbackDays: number;
  maxPages: number;
  /**
   * Ozon: days of postings (by processing date) rescanned on every run so
   * later status changes are picked up. Defaults to initialLookbackDays.
   */
  statusHorizonDays?: number;
  /** Records per page; each connector has its own default */
  pageSize?: number;
  now?: () => Date;
}

export interface FetchResult {
  payloads: FetchedPayload[];
  /** Cursor to commit when the run succeeds */
  checkpoint: string | null;
  pages: number;
  /** True when maxPages stopped paging before the feed was exhausted */
  truncated: boolean;
}

export interface SourceConnector {
  readonly id: ConnectorId;
  fetch(
    checkpoint: Checkpoint,
    options?: { signal?: AbortSignal }
  ): Promise<FetchResult>;
}
