/**
 * Failure Service - Items that failed parsing or projection
 *
 * A pending failure points at its raw payload; the next run of the same
 * connector reprocesses it from the Raw Store instead of re-fetching.
 */

import { randomUUID } from "node:crypto";

import type { Database, SyncFailureRow } from "../../db/types.js";
import type { ConnectorId, ItemFailure } from "../../types/index.js";
import type { Kysely } from "kysely";

export interface FailureFilters {
  connector?: ConnectorId;
  status?: "PENDING" | "RESOLVED";
  limit?: number;
  offset?: number;
}

export class SyncFailureService {
  constructor(private db: Kysely<Database>) {}

  /**
   * Raw payload ids still waiting to be reprocessed, oldest first.
   */
  async listPendingPayloadIds(
    connector: ConnectorId,
    limit = 1000
  ): Promise<string[]> {
    const rows = await this.db
      .selectFrom("sync_failures")
      .select("raw_payload_id")
      .where("connector", "=", connector)
      .where("status", "=", "PENDING")
      .orderBy("created_at")
      .limit(limit)
      .execute();

    return rows.map((row) => row.raw_payload_id);
  }

  /**
   * Record failures of one run. A payload that failed before keeps its row
   * with the attempt counter bumped and the latest error. Joins the
   * caller's transaction when the service was built on one.
   */
  async record(
    runId: string,
    connector: ConnectorId,
    failures: ItemFailure[]
  ): Promise<void> {
    if (failures.length === 0) {
      return;
    }
    const now = new Date().toISOString();

    const write = async (trx: Kysely<Database>): Promise<void> => {
      for (const failure of failures) {
        await trx
          .insertInto("sync_failures")
          .values({
            id: randomUUID(),
            run_id: runId,
            connector,
            raw_payload_id: failure.rawPayloadId,
            business_key: failure.businessKey,
            stage: failure.stage,
            error_message: failure.message,
            attempts: 1,
            status: "PENDING",
            created_at: now,
            updated_at: now,
          })
          .onConflict((oc) =>
            oc.column("raw_payload_id").doUpdateSet((eb) => ({
              run_id: runId,
              stage: failure.stage,
              error_message: failure.message,
              attempts: eb("sync_failures.attempts", "+", 1),
              status: "PENDING",
              updated_at: now,
            }))
          )
          .execute();
      }
    };

    if (this.db.isTransaction) {
      await write(this.db);
    } else {
      await this.db.transaction().execute(write);
    }
  }

  /**
   * Mark reprocessed payloads as resolved.
   */
  async resolve(rawPayloadIds: string[]): Promise<number> {
    if (rawPayloadIds.length === 0) {
      return 0;
    }
    const result = await this.db
      .updateTable("sync_failures")
      .set({ status: "RESOLVED", updated_at: new Date().toISOString() })
      .where("raw_payload_id", "in", rawPayloadIds)
      .where("status", "=", "PENDING")
      .executeTakeFirst();

    return Number(result.numUpdatedRows);
  }

  async list(filters: FailureFilters = {}): Promise<SyncFailureRow[]> {
    let query = this.db
      .selectFrom("sync_failures")
      .selectAll()
      .orderBy("updated_at", "desc")
      .limit(filters.limit ?? 50)
      .offset(filters.offset ?? 0);

    if (filters.connector !== undefined) {
      query = query.where("connector", "=", filters.connector);
    }
    if (filters.status !== undefined) {
      query = query.where("status", "=", filters.status);
    }

    return await query.execute();
  }

  async countPending(connector?: ConnectorId): Promise<number> {
    let query = this.db
      .selectFrom("sync_failures")
      .select((eb) => eb.fn.countAll<number | string>().as("count"))
      .where("status", "=", "PENDING");

    if (connector !== undefined) {
      query = query.where("connector", "=", connector);
    }

    const row = await query.executeTakeFirst();
    return Number(row?.count ?? 0);
  }
}
