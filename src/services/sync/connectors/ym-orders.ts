/**
 * Yandex Market orders connector
 */

import { syncLogger } from "../../../logger.js";
import { SOURCES } from "../../../types/index.js";
import { businessKeyOf, laterOf, recordTime, windowStart } from "./common.js";

import type { ConnectorOptions, FetchResult, SourceConnector } from "./types.js";
import type { YmOrdersFetcher } from "../../../marketplaces/types.js";
import type { Checkpoint, FetchedPayload } from "../../../types/index.js";

const DEFAULT_PAGE_SIZE = 50;

export class YmOrdersConnector implements SourceConnector {
  readonly id = "YM_ORDERS" as const;
  private readonly pageSize: number;
  private readonly now: () => Date;

  constructor(
    private readonly client: YmOrdersFetcher,
    private readonly options: ConnectorOptions
  ) {
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    this.now = options.now ?? (() => new Date());
  }

  async fetch(
    checkpoint: Checkpoint,
    options: { signal?: AbortSignal } = {}
  ): Promise<FetchResult> {
    const now = this.now();
    const updatedAtFrom = windowStart(checkpoint.cursor, now, this.options).toISOString();
    const updatedAtTo = now.toISOString();
    const { documentType } = SOURCES[this.id];

    const payloads: FetchedPayload[] = [];
    let latestUpdate: string | null = null;
    let pages = 0;
    let exhausted = false;

    while (!exhausted && pages < this.options.maxPages) {
      const page = await this.client.fetchOrders(
        { updatedAtFrom, updatedAtTo, page: pages + 1, pageSize: this.pageSize },
        options.signal
      );
      pages++;

      const fetchedAt = new Date().toISOString();
      for (const order of page.orders) {
        payloads.push({
          source: this.id,
          documentType,
          businessKey: businessKeyOf(order, "id"),
          fetchedAt,
          body: order,
        });
        latestUpdate = laterOf(latestUpdate, recordTime(order, "statusUpdateDate"));
      }

      exhausted =
        page.orders.length < this.pageSize ||
        (page.pagesCount !== null && pages >= page.pagesCount);
    }

    const truncated = !exhausted;
    if (truncated) {
      syncLogger.warn(
        { connector: this.id, pages },
        "Page limit reached before the order window was exhausted"
      );
    }

    return {
      payloads,
      checkpoint: truncated ? (latestUpdate ?? checkpoint.cursor) : updatedAtTo,
      pages,
      truncated,
    };
  }
}
