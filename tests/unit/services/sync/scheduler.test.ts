import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";

import { SyncOrchestrator } from "../../../../src/services/sync/orchestrator.js";
import { SyncRunService } from "../../../../src/services/sync/runs.js";
import { SyncScheduler } from "../../../../src/services/sync/scheduler.js";
import { createTestDb } from "../../../helpers/db.js";

import type { Database } from "../../../../src/db/types.js";
import type {
  FetchResult,
  SourceConnector,
} from "../../../../src/services/sync/connectors/types.js";
import type { Kysely } from "kysely";

class EmptyConnector implements SourceConnector {
  readonly id = "YM_ORDERS" as const;
  calls = 0;

  fetch(): Promise<FetchResult> {
    this.calls++;
    return Promise.resolve({ payloads: [], checkpoint: null, pages: 1, truncated: false });
  }
}

describe("services/sync/scheduler", () => {
  let db: Kysely<Database>;
  let connector: EmptyConnector;
  let orchestrator: SyncOrchestrator;

  beforeEach(async () => {
    db = await createTestDb();
    connector = new EmptyConnector();
    orchestrator = new SyncOrchestrator(db, [connector], {
      retry: { maxAttempts: 1, initialBackoffMs: 1, backoffMultiplier: 2, maxBackoffMs: 1 },
      runTimeoutMs: 5_000,
      leaseDurationMs: 60_000,
      workerId: "test-worker",
    });
  });

  afterEach(async () => {
    vi.useRealTimers();
    await db.destroy();
  });

  it("should run every connector on start and wait for it on stop", async () => {
    const scheduler = new SyncScheduler(orchestrator, { intervalMinutes: 60 });

    scheduler.start();
    expect(scheduler.running).toBe(true);
    await scheduler.stop();

    expect(scheduler.running).toBe(false);
    expect(connector.calls).toBe(1);
    expect(await new SyncRunService(db).list()).toHaveLength(1);
  });

  it("should wait for the first interval when runOnStart is off", async () => {
    vi.useFakeTimers();
    const scheduler = new SyncScheduler(orchestrator, {
      intervalMinutes: 1,
      runOnStart: false,
    });

    scheduler.start();
    expect(connector.calls).toBe(0);

    await vi.advanceTimersByTimeAsync(60_000);
    await scheduler.stop();

    expect(connector.calls).toBe(1);
  });

  it("should ignore a second start", async () => {
    const scheduler = new SyncScheduler(orchestrator, { intervalMinutes: 60 });

    scheduler.start();
    scheduler.start();
    await scheduler.stop();

    expect(connector.calls).toBe(1);
  });
});
