/**
 * Checkpoint Service - Durable cursor and run status per connector
 *
 * The checkpoint row also carries a lease (locked_by / locked_until) that
 * keeps two processes from running the same connector at once.
 */

import { isSourceId } from "../../types/index.js";
import { LeaseLostError } from "./errors.js";

import type { Database, SyncCheckpointRow } from "../../db/types.js";
import type {
  Checkpoint,
  ConnectorId,
  TerminalRunState,
} from "../../types/index.js";
import type { Kysely } from "kysely";

// ============================================================================
// Helper Functions
// ============================================================================

function toCheckpoint(row: SyncCheckpointRow): Checkpoint | null {
  if (!isSourceId(row.connector)) {
    return null;
  }
  return {
    connector: row.connector,
    cursor: row.cursor,
    lastRunStatus: row.last_run_status,
    lastRunAt: row.last_run_at,
    lastSuccessAt: row.last_success_at,
  };
}

export function emptyCheckpoint(connector: ConnectorId): Checkpoint {
  return {
    connector,
    cursor: null,
    lastRunStatus: null,
    lastRunAt: null,
    lastSuccessAt: null,
  };
}

export interface LeaseInfo {
  lockedBy: string | null;
  lockedUntil: string | null;
}

// ============================================================================
// Checkpoint Service
// ============================================================================

export class SyncCheckpointService {
  constructor(private db: Kysely<Database>) {}

  /**
   * Get the checkpoint for a connector.
   *
   * A connector that never ran gets an empty checkpoint (cursor null).
   */
  async get(connector: ConnectorId): Promise<Checkpoint> {
    const row = await this.db
      .selectFrom("sync_checkpoints")
      .selectAll()
      .where("connector", "=", connector)
      .executeTakeFirst();

    return (row ? toCheckpoint(row) : null) ?? emptyCheckpoint(connector);
  }

  async list(): Promise<(Checkpoint & LeaseInfo)[]> {
    const rows = await this.db
      .selectFrom("sync_checkpoints")
      .selectAll()
      .orderBy("connector")
      .execute();

    return rows.flatMap((row) => {
      const checkpoint = toCheckpoint(row);
      return checkpoint
        ? [
            {
              ...checkpoint,
              lockedBy: row.locked_by,
              lockedUntil: row.locked_until,
            },
          ]
        : [];
    });
  }

  /**
   * Record a finished run.
   *
   * `cursor` is written only for runs that advance it; a failed run keeps
   * the previous cursor so the same window is fetched again. With
   * `leaseHolder` set the write applies only while that worker still holds
   * the lease, and throws LeaseLostError otherwise.
   */
  async commit(
    connector: ConnectorId,
    outcome: { status: TerminalRunState; cursor: string | null; at: Date },
    leaseHolder?: string
  ): Promise<void> {
    const at = outcome.at.toISOString();
    const advances = outcome.status !== "Failed";

    await this.ensureRow(connector);

    let query = this.db
      .updateTable("sync_checkpoints")
      .set({
        last_run_status: outcome.status,
        last_run_at: at,
        updated_at: at,
        ...(advances
          ? { cursor: outcome.cursor, last_success_at: at }
          : {}),
      })
      .where("connector", "=", connector);
    if (leaseHolder !== undefined) {
      query = query.where("locked_by", "=", leaseHolder);
    }

    const result = await query.executeTakeFirst();
    if (leaseHolder !== undefined && Number(result.numUpdatedRows) === 0) {
      throw new LeaseLostError(connector, leaseHolder);
    }
  }

  /**
   * Move the cursor by hand (operator reset or backfill).
   */
  async setCursor(connector: ConnectorId, cursor: string | null): Promise<void> {
    const now = new Date().toISOString();
    await this.ensureRow(connector);
    await this.db
      .updateTable("sync_checkpoints")
      .set({ cursor, updated_at: now })
      .where("connector", "=", connector)
      .execute();
  }

  // ==========================================================================
  // Lease
  // ==========================================================================

  /**
   * Take the connector lease. Returns false while another worker holds an
   * unexpired lease.
   */
  async acquireLease(
    connector: ConnectorId,
    workerId: string,
    leaseDurationMs: number
  ): Promise<boolean> {
    const now = new Date();
    const nowIso = now.toISOString();
    const lockedUntil = new Date(now.getTime() + leaseDurationMs).toISOString();

    await this.ensureRow(connector);

    const result = await this.db
      .updateTable("sync_checkpoints")
      .set({ locked_by: workerId, locked_until: lockedUntil, updated_at: nowIso })
      .where("connector", "=", connector)
      .where((eb) =>
        eb.or([
          eb("locked_by", "is", null),
          eb("locked_by", "=", workerId),
          eb("locked_until", "is", null),
          eb("locked_until", "<", nowIso),
        ])
      )
      .executeTakeFirst();

    return Number(result.numUpdatedRows) > 0;
  }

  /**
   * Push the expiry of a lease this worker holds. Returns false when the
   * lease was taken over or released.
   */
  async renewLease(
    connector: ConnectorId,
    workerId: string,
    leaseDurationMs: number
  ): Promise<boolean> {
    const now = new Date();
    const result = await this.db
      .updateTable("sync_checkpoints")
      .set({
        locked_until: new Date(now.getTime() + leaseDurationMs).toISOString(),
        updated_at: now.toISOString(),
      })
      .where("connector", "=", connector)
      .where("locked_by", "=", workerId)
      .executeTakeFirst();

    return Number(result.numUpdatedRows) > 0;
  }

  async releaseLease(connector: ConnectorId, workerId: string): Promise<void> {
    await this.db
      .updateTable("sync_checkpoints")
      .set({
        locked_by: null,
        locked_until: null,
        updated_at: new Date().toISOString(),
      })
      .where("connector", "=", connector)
      .where("locked_by", "=", workerId)
      .execute();
  }

  private async ensureRow(connector: ConnectorId): Promise<void> {
    await this.db
      .insertInto("sync_checkpoints")
      .values({
        connector,
        cursor: null,
        last_run_status: null,
        last_run_at: null,
        last_success_at: null,
        locked_by: null,
        locked_until: null,
        updated_at: new Date().toISOString(),
      })
      .onConflict((oc) => oc.column("connector").doNothing())
      .execute();
  }
}
