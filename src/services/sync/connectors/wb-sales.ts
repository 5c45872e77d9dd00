/**
 * Wildberries sales connector
 *
 * The statistics feed returns rows with lastChangeDate >= dateFrom. The next
 * page starts 1 ms after the greatest lastChangeDate of the previous one.
 */

import { syncLogger } from "../../../logger.js";
import { SOURCES } from "../../../types/index.js";
import { businessKeyOf, laterOf, recordTime, windowStart } from "./common.js";

import type { ConnectorOptions, FetchResult, SourceConnector } from "./types.js";
import type { WbSalesFetcher } from "../../../marketplaces/types.js";
import type { Checkpoint, FetchedPayload } from "../../../types/index.js";

const DEFAULT_PAGE_SIZE = 80_000;

export class WbSalesConnector implements SourceConnector {
  readonly id = "WB_SALES" as const;
  private readonly pageSize: number;
  private readonly now: () => Date;

  constructor(
    private readonly client: WbSalesFetcher,
    private readonly options: ConnectorOptions
  ) {
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    this.now = options.now ?? (() => new Date());
  }

  async fetch(
    checkpoint: Checkpoint,
    options: { signal?: AbortSignal } = {}
  ): Promise<FetchResult> {
    const { documentType } = SOURCES[this.id];
    let dateFrom = windowStart(checkpoint.cursor, this.now(), this.options).toISOString();

    const payloads: FetchedPayload[] = [];
    let latestChange: string | null = null;
    let pages = 0;
    let exhausted = false;

    while (!exhausted && pages < this.options.maxPages) {
      const rows = await this.client.fetchSales({ dateFrom }, options.signal);
      pages++;

      const fetchedAt = new Date().toISOString();
      let pageLatest: string | null = null;
      for (const row of rows) {
        payloads.push({
          source: this.id,
          documentType,
          businessKey: businessKeyOf(row, "srid"),
          fetchedAt,
          body: row,
        });
        pageLatest = laterOf(pageLatest, recordTime(row, "lastChangeDate"));
      }
      latestChange = laterOf(latestChange, pageLatest);

      if (rows.length < this.pageSize || pageLatest === null) {
        exhausted = true;
      } else {
        dateFrom = new Date(Date.parse(pageLatest) + 1).toISOString();
      }
    }

    const truncated = !exhausted;
    if (truncated) {
      syncLogger.warn(
        { connector: this.id, pages },
        "Page limit reached before the sales feed was exhausted"
      );
    }

    return {
      payloads,
      checkpoint: latestChange ?? checkpoint.cursor,
      pages,
      truncated,
    };
  }
}
