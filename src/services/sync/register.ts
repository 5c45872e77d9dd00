/**
 * Sales Register Store - Idempotent upsert target and read-only query
 *
 * One row per (marketplace, document_no, line_id). A write replaces the
 * whole row, and only when the stored document_version is not newer than
 * the incoming one, so arrival order never decides which version wins.
 */

import { sql, type Kysely } from "kysely";

import { dbLogger } from "../../logger.js";
import { isMarketplace, isStatusNorm } from "../../types/index.js";
import { RegisterStorageError } from "./errors.js";
import { isRecord } from "./parsers/common.js";

import type {
  Database,
  NewSalesRegisterRow,
  SalesRegisterRow,
} from "../../db/types.js";
import type {
  DailyStat,
  MarketplaceStat,
  SalesRegisterEntry,
  SalesRegisterFilters,
  SalesRegisterKey,
  SalesRegisterPage,
  StoredSalesRegisterEntry,
} from "../../types/index.js";

// ============================================================================
// Types & Constants
// ============================================================================

export interface RegisterUpsertResult {
  received: number;
  /** Entries left after collapsing duplicate keys in the batch */
  applied: number;
  /** Rows inserted or replaced; the rest were older than the stored row */
  written: number;
}

const DEFAULT_CHUNK_SIZE = 50;
const DEFAULT_QUERY_LIMIT = 100;
const MAX_QUERY_LIMIT = 1000;

// ============================================================================
// Helper Functions
// ============================================================================

export function registerKeyOf(key: SalesRegisterKey): string {
  return [key.marketplace, key.documentNo, key.lineId].join("\u0000");
}

/**
 * Collapse entries sharing a key: the highest document_version wins,
 * the later entry wins a tie.
 */
export function dedupeByKey(
  entries: SalesRegisterEntry[]
): SalesRegisterEntry[] {
  const byKey = new Map<string, SalesRegisterEntry>();
  for (const entry of entries) {
    const key = registerKeyOf(entry);
    const current = byKey.get(key);
    if (!current || entry.documentVersion >= current.documentVersion) {
      byKey.set(key, entry);
    }
  }
  return [...byKey.values()];
}

function toRow(entry: SalesRegisterEntry, loadedAt: string): NewSalesRegisterRow {
  return {
    marketplace: entry.marketplace,
    document_no: entry.documentNo,
    line_id: entry.lineId,
    scheme: entry.scheme,
    document_type: entry.documentType,
    document_version: entry.documentVersion,
    registrator_ref: entry.registratorRef,
    event_time_source: entry.eventTimeSource,
    sale_date: entry.saleDate,
    source_updated_at: entry.sourceUpdatedAt,
    status_source: entry.statusSource,
    status_norm: entry.statusNorm,
    seller_sku: entry.sellerSku,
    mp_item_id: entry.mpItemId,
    barcode: entry.barcode,
    title: entry.title,
    qty: entry.qty,
    price_list: entry.priceList,
    discount_total: entry.discountTotal,
    price_effective: entry.priceEffective,
    amount_line: entry.amountLine,
    currency_code: entry.currencyCode,
    payload_version: entry.payloadVersion,
    extra: entry.extra === null ? null : JSON.stringify(entry.extra),
    loaded_at_utc: loadedAt,
  };
}

function parseExtra(raw: string | null): Record<string, unknown> | null {
  if (raw === null) {
    return null;
  }
  const parsed: unknown = JSON.parse(raw);
  return isRecord(parsed) ? parsed : null;
}

function fromRow(row: SalesRegisterRow): StoredSalesRegisterEntry {
  if (!isMarketplace(row.marketplace)) {
    throw new RegisterStorageError(
      `Unknown marketplace "${row.marketplace}" in sales register`
    );
  }
  if (!isStatusNorm(row.status_norm)) {
    throw new RegisterStorageError(
      `Unknown status "${row.status_norm}" in sales register`
    );
  }
  return {
    marketplace: row.marketplace,
    documentNo: row.document_no,
    lineId: row.line_id,
    scheme: row.scheme,
    documentType: row.document_type,
    documentVersion: row.document_version,
    registratorRef: row.registrator_ref,
    eventTimeSource: row.event_time_source,
    saleDate: row.sale_date,
    sourceUpdatedAt: row.source_updated_at,
    statusSource: row.status_source,
    statusNorm: row.status_norm,
    sellerSku: row.seller_sku,
    mpItemId: row.mp_item_id,
    barcode: row.barcode,
    title: row.title,
    qty: Number(row.qty),
    priceList: row.price_list === null ? null : Number(row.price_list),
    discountTotal:
      row.discount_total === null ? null : Number(row.discount_total),
    priceEffective:
      row.price_effective === null ? null : Number(row.price_effective),
    amountLine: row.amount_line === null ? null : Number(row.amount_line),
    currencyCode: row.currency_code,
    payloadVersion: row.payload_version,
    extra: parseExtra(row.extra),
    loadedAtUtc: row.loaded_at_utc,
  };
}

// ============================================================================
// Sales Register Service
// ============================================================================

export class SalesRegisterService {
  private chunkSize: number;

  constructor(
    private db: Kysely<Database>,
    options: { chunkSize?: number } = {}
  ) {
    this.chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
  }

  /**
   * Apply a batch of entries atomically.
   *
   * The whole batch runs in one transaction: on failure nothing is visible
   * and the caller may retry the batch as a whole.
   */
  async upsert(
    entries: SalesRegisterEntry[],
    loadedAt: Date = new Date()
  ): Promise<RegisterUpsertResult> {
    const unique = dedupeByKey(entries);
    if (unique.length === 0) {
      return { received: entries.length, applied: 0, written: 0 };
    }

    const loadedAtUtc = loadedAt.toISOString();
    let written = 0;

    try {
      await this.db.transaction().execute(async (trx) => {
        for (let i = 0; i < unique.length; i += this.chunkSize) {
          const chunk = unique
            .slice(i, i + this.chunkSize)
            .map((entry) => toRow(entry, loadedAtUtc));

          const result = await trx
            .insertInto("sales_register")
            .values(chunk)
            .onConflict((oc) =>
              oc
                .columns(["marketplace", "document_no", "line_id"])
                .doUpdateSet((eb) => ({
                  scheme: eb.ref("excluded.scheme"),
                  document_type: eb.ref("excluded.document_type"),
                  document_version: eb.ref("excluded.document_version"),
                  registrator_ref: eb.ref("excluded.registrator_ref"),
                  event_time_source: eb.ref("excluded.event_time_source"),
                  sale_date: eb.ref("excluded.sale_date"),
                  source_updated_at: eb.ref("excluded.source_updated_at"),
                  status_source: eb.ref("excluded.status_source"),
                  status_norm: eb.ref("excluded.status_norm"),
                  seller_sku: eb.ref("excluded.seller_sku"),
                  mp_item_id: eb.ref("excluded.mp_item_id"),
                  barcode: eb.ref("excluded.barcode"),
                  title: eb.ref("excluded.title"),
                  qty: eb.ref("excluded.qty"),
                  price_list: eb.ref("excluded.price_list"),
                  discount_total: eb.ref("excluded.discount_total"),
                  price_effective: eb.ref("excluded.price_effective"),
                  amount_line: eb.ref("excluded.amount_line"),
                  currency_code: eb.ref("excluded.currency_code"),
                  payload_version: eb.ref("excluded.payload_version"),
                  extra: eb.ref("excluded.extra"),
                  loaded_at_utc: eb.ref("excluded.loaded_at_utc"),
                }))
                .whereRef(
                  "sales_register.document_version",
                  "<=",
                  "excluded.document_version"
                )
            )
            .executeTakeFirst();

          written += Number(result.numInsertedOrUpdatedRows ?? 0);
        }
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      dbLogger.error(
        { error: message, entries: unique.length },
        "Sales register upsert failed"
      );
      throw new RegisterStorageError(`Sales register upsert failed: ${message}`, {
        cause: error,
      });
    }

    dbLogger.debug(
      { received: entries.length, applied: unique.length, written },
      "Sales register upsert completed"
    );

    return { received: entries.length, applied: unique.length, written };
  }

  async getByKey(key: SalesRegisterKey): Promise<StoredSalesRegisterEntry | null> {
    const row = await this.db
      .selectFrom("sales_register")
      .selectAll()
      .where("marketplace", "=", key.marketplace)
      .where("document_no", "=", key.documentNo)
      .where("line_id", "=", key.lineId)
      .executeTakeFirst();

    return row ? fromRow(row) : null;
  }

  /**
   * Entries produced from one raw payload.
   */
  async getByRegistrator(
    registratorRef: string
  ): Promise<StoredSalesRegisterEntry[]> {
    const rows = await this.db
      .selectFrom("sales_register")
      .selectAll()
      .where("registrator_ref", "=", registratorRef)
      .orderBy("line_id")
      .execute();

    return rows.map(fromRow);
  }

  async query(filters: SalesRegisterFilters = {}): Promise<SalesRegisterPage> {
    const limit = Math.min(
      Math.max(filters.limit ?? DEFAULT_QUERY_LIMIT, 1),
      MAX_QUERY_LIMIT
    );
    const offset = Math.max(filters.offset ?? 0, 0);

    let base = this.db.selectFrom("sales_register");

    if (filters.dateFrom !== undefined) {
      base = base.where("sale_date", ">=", filters.dateFrom);
    }
    if (filters.dateTo !== undefined) {
      base = base.where("sale_date", "<=", filters.dateTo);
    }
    if (filters.marketplace !== undefined) {
      base = base.where("marketplace", "=", filters.marketplace);
    }
    if (filters.documentNo !== undefined) {
      base = base.where("document_no", "=", filters.documentNo);
    }
    if (filters.sellerSku !== undefined) {
      base = base.where("seller_sku", "=", filters.sellerSku);
    }
    if (filters.mpItemId !== undefined) {
      base = base.where("mp_item_id", "=", filters.mpItemId);
    }
    if (filters.barcode !== undefined) {
      base = base.where("barcode", "=", filters.barcode);
    }
    if (filters.statusNorm !== undefined) {
      base = base.where("status_norm", "=", filters.statusNorm);
    }

    const countRow = await base
      .select((eb) => eb.fn.countAll<number | string>().as("total"))
      .executeTakeFirst();

    const rows = await base
      .selectAll()
      .orderBy("sale_date", "desc")
      .orderBy("marketplace")
      .orderBy("document_no")
      .orderBy("line_id")
      .limit(limit)
      .offset(offset)
      .execute();

    return {
      items: rows.map(fromRow),
      total: Number(countRow?.total ?? 0),
      limit,
      offset,
    };
  }

  /**
   * Lines, quantity and amount per sale date and marketplace.
   */
  async dailyStats(
    filters: Pick<SalesRegisterFilters, "dateFrom" | "dateTo" | "marketplace">
  ): Promise<DailyStat[]> {
    let query = this.db
      .selectFrom("sales_register")
      .select((eb) => [
        "sale_date",
        "marketplace",
        eb.fn.countAll<number | string>().as("lines"),
        eb.fn.sum<number | string>("qty").as("qty"),
        eb.fn
          .coalesce(eb.fn.sum<number | string>("amount_line"), sql<number>`0`)
          .as("amount"),
      ])
      .groupBy(["sale_date", "marketplace"])
      .orderBy("sale_date")
      .orderBy("marketplace");

    if (filters.dateFrom !== undefined) {
      query = query.where("sale_date", ">=", filters.dateFrom);
    }
    if (filters.dateTo !== undefined) {
      query = query.where("sale_date", "<=", filters.dateTo);
    }
    if (filters.marketplace !== undefined) {
      query = query.where("marketplace", "=", filters.marketplace);
    }

    const rows = await query.execute();
    return rows.flatMap((row) => {
      const marketplace = row.marketplace;
      if (!isMarketplace(marketplace)) {
        return [];
      }
      return [
        {
          saleDate: row.sale_date,
          marketplace,
          lines: Number(row.lines),
          qty: Number(row.qty),
          amount: Number(row.amount),
        },
      ];
    });
  }

  /**
   * Totals and date coverage per marketplace.
   */
  async marketplaceStats(): Promise<MarketplaceStat[]> {
    const rows = await this.db
      .selectFrom("sales_register")
      .select((eb) => [
        "marketplace",
        eb.fn.countAll<number | string>().as("lines"),
        eb.fn
          .count<number | string>("document_no")
          .distinct()
          .as("documents"),
        eb.fn.sum<number | string>("qty").as("qty"),
        eb.fn
          .coalesce(eb.fn.sum<number | string>("amount_line"), sql<number>`0`)
          .as("amount"),
        eb.fn.min("sale_date").as("first_sale_date"),
        eb.fn.max("sale_date").as("last_sale_date"),
      ])
      .groupBy("marketplace")
      .orderBy("marketplace")
      .execute();

    const stats: MarketplaceStat[] = [];
    for (const row of rows) {
      const marketplace: string = row.marketplace;
      if (!isMarketplace(marketplace)) {
        continue;
      }
      stats.push({
        marketplace,
        lines: Number(row.lines),
        documents: Number(row.documents),
        qty: Number(row.qty),
        amount: Number(row.amount),
        firstSaleDate: row.first_sale_date,
        lastSaleDate: row.last_sale_date,
      });
    }
    return stats;
  }
}
