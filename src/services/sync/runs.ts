/**
 * Run outcome records
 */

import type { Database, SyncRunRow } from "../../db/types.js";
import type { ConnectorId, RunOutcome } from "../../types/index.js";
import type { Kysely } from "kysely";

export interface RunFilters {
  connector?: ConnectorId;
  limit?: number;
}

export class SyncRunService {
  constructor(private db: Kysely<Database>) {}

  async record(outcome: RunOutcome): Promise<void> {
    await this.db
      .insertInto("sync_runs")
      .values({
        id: outcome.runId,
        connector: outcome.connector,
        status: outcome.status,
        started_at: outcome.startedAt,
        finished_at: outcome.finishedAt,
        cursor_before: outcome.cursorBefore,
        cursor_after: outcome.cursorAfter,
        fetched: outcome.counts.fetched,
        reprocessed: outcome.counts.reprocessed,
        parsed: outcome.counts.parsed,
        projected: outcome.counts.projected,
        upserted: outcome.counts.upserted,
        failed: outcome.counts.failed,
        error_message: outcome.errorMessage,
      })
      .execute();
  }

  async list(filters: RunFilters = {}): Promise<SyncRunRow[]> {
    let query = this.db
      .selectFrom("sync_runs")
      .selectAll()
      .orderBy("started_at", "desc")
      .limit(filters.limit ?? 20);

    if (filters.connector !== undefined) {
      query = query.where("connector", "=", filters.connector);
    }

    return await query.execute();
  }

  async latest(connector: ConnectorId): Promise<SyncRunRow | null> {
    const row = await this.db
      .selectFrom("sync_runs")
      .selectAll()
      .where("connector", "=", connector)
      .orderBy("started_at", "desc")
      .limit(1)
      .executeTakeFirst();

    return row ?? null;
  }
}
