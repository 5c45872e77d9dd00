/**
 * Schema definition built with Kysely's schema builder.
 *
 * Column types stay within what PostgreSQL and SQLite both accept.
 */

import { sql, type Kysely } from "kysely";

import type { Database } from "./types.js";

export const TABLE_NAMES = [
  "raw_payloads",
  "sync_checkpoints",
  "sync_runs",
  "sync_failures",
  "sales_register",
] as const;

export type TableName = (typeof TABLE_NAMES)[number];

// ============================================================================
// Create
// ============================================================================

export async function createSchema(db: Kysely<Database>): Promise<void> {
  // Raw store: one record per (source, document_type, business_key, fetched_at)
  await db.schema
    .createTable("raw_payloads")
    .ifNotExists()
    .addColumn("id", "varchar(36)", (col) => col.primaryKey())
    .addColumn("source", "varchar(32)", (col) => col.notNull())
    .addColumn("document_type", "varchar(64)", (col) => col.notNull())
    .addColumn("business_key", "varchar(255)", (col) => col.notNull())
    .addColumn("fetched_at", "varchar(32)", (col) => col.notNull())
    .addColumn("body", "text", (col) => col.notNull())
    .addColumn("content_hash", "varchar(64)", (col) => col.notNull())
    .addColumn("document_version", "integer", (col) => col.notNull())
    .addColumn("created_at", "varchar(32)", (col) => col.notNull())
    .addUniqueConstraint("raw_payloads_identity_unique", [
      "source",
      "document_type",
      "business_key",
      "fetched_at",
    ])
    .execute();

  await db.schema
    .createIndex("raw_payloads_business_key_idx")
    .ifNotExists()
    .on("raw_payloads")
    .columns(["source", "business_key", "document_version"])
    .execute();

  await db.schema
    .createTable("sync_checkpoints")
    .ifNotExists()
    .addColumn("connector", "varchar(32)", (col) => col.primaryKey())
    .addColumn("cursor", "varchar(32)")
    .addColumn("last_run_status", "varchar(32)")
    .addColumn("last_run_at", "varchar(32)")
    .addColumn("last_success_at", "varchar(32)")
    .addColumn("locked_by", "varchar(255)")
    .addColumn("locked_until", "varchar(32)")
    .addColumn("updated_at", "varchar(32)", (col) => col.notNull())
    .execute();

  await db.schema
    .createTable("sync_runs")
    .ifNotExists()
    .addColumn("id", "varchar(36)", (col) => col.primaryKey())
    .addColumn("connector", "varchar(32)", (col) => col.notNull())
    .addColumn("status", "varchar(32)", (col) => col.notNull())
    .addColumn("started_at", "varchar(32)", (col) => col.notNull())
    .addColumn("finished_at", "varchar(32)", (col) => col.notNull())
    .addColumn("cursor_before", "varchar(32)")
    .addColumn("cursor_after", "varchar(32)")
    .addColumn("fetched", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("reprocessed", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("parsed", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("projected", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("upserted", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("failed", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("error_message", "text")
    .execute();

  await db.schema
    .createIndex("sync_runs_connector_started_idx")
    .ifNotExists()
    .on("sync_runs")
    .columns(["connector", "started_at"])
    .execute();

  await db.schema
    .createTable("sync_failures")
    .ifNotExists()
    .addColumn("id", "varchar(36)", (col) => col.primaryKey())
    .addColumn("run_id", "varchar(36)", (col) => col.notNull())
    .addColumn("connector", "varchar(32)", (col) => col.notNull())
    .addColumn("raw_payload_id", "varchar(36)", (col) =>
      col.notNull().unique()
    )
    .addColumn("business_key", "varchar(255)", (col) => col.notNull())
    .addColumn("stage", "varchar(16)", (col) => col.notNull())
    .addColumn("error_message", "text", (col) => col.notNull())
    .addColumn("attempts", "integer", (col) => col.notNull().defaultTo(1))
    .addColumn("status", "varchar(16)", (col) => col.notNull())
    .addColumn("created_at", "varchar(32)", (col) => col.notNull())
    .addColumn("updated_at", "varchar(32)", (col) => col.notNull())
    .execute();

  await db.schema
    .createIndex("sync_failures_pending_idx")
    .ifNotExists()
    .on("sync_failures")
    .columns(["connector", "status"])
    .execute();

  await db.schema
    .createTable("sales_register")
    .ifNotExists()
    .addColumn("marketplace", "varchar(16)", (col) => col.notNull())
    .addColumn("document_no", "varchar(255)", (col) => col.notNull())
    .addColumn("line_id", "varchar(255)", (col) => col.notNull())
    .addColumn("scheme", "varchar(16)", (col) => col.notNull())
    .addColumn("document_type", "varchar(64)", (col) => col.notNull())
    .addColumn("document_version", "integer", (col) => col.notNull())
    .addColumn("registrator_ref", "varchar(36)", (col) => col.notNull())
    .addColumn("event_time_source", "varchar(32)", (col) => col.notNull())
    .addColumn("sale_date", "varchar(10)", (col) => col.notNull())
    .addColumn("source_updated_at", "varchar(32)")
    .addColumn("status_source", "varchar(64)", (col) => col.notNull())
    .addColumn("status_norm", "varchar(32)", (col) => col.notNull())
    .addColumn("seller_sku", "varchar(255)")
    .addColumn("mp_item_id", "varchar(255)")
    .addColumn("barcode", "varchar(255)")
    .addColumn("title", "text")
    .addColumn("qty", "double precision", (col) => col.notNull())
    .addColumn("price_list", "double precision")
    .addColumn("discount_total", "double precision")
    .addColumn("price_effective", "double precision")
    .addColumn("amount_line", "double precision")
    .addColumn("currency_code", "varchar(8)")
    .addColumn("payload_version", "integer", (col) => col.notNull())
    .addColumn("extra", "text")
    .addColumn("loaded_at_utc", "varchar(32)", (col) => col.notNull())
    .addPrimaryKeyConstraint("sales_register_pk", [
      "marketplace",
      "document_no",
      "line_id",
    ])
    .execute();

  await db.schema
    .createIndex("sales_register_sale_date_idx")
    .ifNotExists()
    .on("sales_register")
    .columns(["sale_date", "marketplace"])
    .execute();

  await db.schema
    .createIndex("sales_register_seller_sku_idx")
    .ifNotExists()
    .on("sales_register")
    .column("seller_sku")
    .execute();

  await db.schema
    .createIndex("sales_register_registrator_idx")
    .ifNotExists()
    .on("sales_register")
    .column("registrator_ref")
    .execute();
}

// ============================================================================
// Drop
// ============================================================================

export async function dropSchema(db: Kysely<Database>): Promise<void> {
  for (const table of [...TABLE_NAMES].reverse()) {
    await db.schema.dropTable(table).ifExists().execute();
  }
}

// ============================================================================
// Introspection
// ============================================================================

export interface TableStat {
  table_name: TableName;
  row_count: number;
}

export async function countTableRows(
  db: Kysely<Database>
): Promise<TableStat[]> {
  const stats: TableStat[] = [];
  for (const table of TABLE_NAMES) {
    const result = await sql<{
      count: number | string;
    }>`SELECT count(*) AS count FROM ${sql.table(table)}`.execute(db);
    stats.push({
      table_name: table,
      row_count: Number(result.rows[0]?.count ?? 0),
    });
  }
  return stats;
}

export async function listTables(db: Kysely<Database>): Promise<string[]> {
  const tables = await db.introspection.getTables();
  return tables.map((t) => t.name).sort();
}
