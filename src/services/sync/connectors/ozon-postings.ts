/**
 * Ozon FBS / FBO posting connector
 *
 * Ozon filters the posting list by processing date, so a posting that is
 * delivered days after it entered processing falls outside a window that
 * only follows the cursor. Every run therefore rescans a trailing horizon
 * of processing dates. FBS narrows that scan to postings whose status
 * changed since the cursor minus the overlap; FBO has no such filter and
 * returns the whole horizon.
 */

import { syncLogger } from "../../../logger.js";
import { SOURCES } from "../../../types/index.js";
import { businessKeyOf, daysBefore, windowStart } from "./common.js";

import type { ConnectorOptions, FetchResult, SourceConnector } from "./types.js";
import type { OzonPostingFetcher, OzonScheme } from "../../../marketplaces/types.js";
import type { Checkpoint, FetchedPayload } from "../../../types/index.js";

const DEFAULT_PAGE_SIZE = 1000;

export class OzonPostingsConnector implements SourceConnector {
  readonly id: "OZON_FBS" | "OZON_FBO";
  private readonly pageSize: number;
  private readonly statusHorizonDays: number;
  private readonly now: () => Date;

  constructor(
    private readonly scheme: OzonScheme,
    private readonly client: OzonPostingFetcher,
    private readonly options: ConnectorOptions
  ) {
    this.id = scheme === "FBS" ? "OZON_FBS" : "OZON_FBO";
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    this.statusHorizonDays = options.statusHorizonDays ?? options.initialLookbackDays;
    this.now = options.now ?? (() => new Date());
  }

  async fetch(
    checkpoint: Checkpoint,
    options: { signal?: AbortSignal } = {}
  ): Promise<FetchResult> {
    const now = this.now();
    const changedFrom = windowStart(checkpoint.cursor, now, this.options);
    const horizon = daysBefore(now, this.statusHorizonDays);
    const since = (changedFrom < horizon ? changedFrom : horizon).toISOString();
    const to = now.toISOString();
    const { documentType } = SOURCES[this.id];

    const payloads: FetchedPayload[] = [];
    let pages = 0;
    let hasNext = true;

    while (hasNext && pages < this.options.maxPages) {
      const page = await this.client.fetchPostings(
        {
          scheme: this.scheme,
          since,
          to,
          ...(this.scheme === "FBS"
            ? { statusChangedFrom: changedFrom.toISOString() }
            : {}),
          limit: this.pageSize,
          offset: pages * this.pageSize,
        },
        options.signal
      );
      pages++;

      const fetchedAt = new Date().toISOString();
      for (const posting of page.postings) {
        payloads.push({
          source: this.id,
          documentType,
          businessKey: businessKeyOf(posting, "posting_number"),
          fetchedAt,
          body: posting,
        });
      }
      hasNext = page.hasNext && page.postings.length > 0;
    }

    // Pages come in processing order, not status-change order: a cut-off
    // scan says nothing about how far status changes were seen
    const truncated = hasNext;
    if (truncated) {
      syncLogger.warn(
        { connector: this.id, pages },
        "Page limit reached before the posting window was exhausted"
      );
    }

    return {
      payloads,
      checkpoint: truncated ? checkpoint.cursor : to,
      pages,
      truncated,
    };
  }
}
