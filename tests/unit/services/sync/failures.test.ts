import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { SyncFailureService } from "../../../../src/services/sync/failures.js";
import { SyncRunService } from "../../../../src/services/sync/runs.js";
import { createTestDb } from "../../../helpers/db.js";

import type { Database } from "../../../../src/db/types.js";
import type { ItemFailure, RunOutcome } from "../../../../src/types/index.js";
import type { Kysely } from "kysely";

function failure(rawPayloadId: string, message = "bad record"): ItemFailure {
  return {
    rawPayloadId,
    businessKey: `key-${rawPayloadId}`,
    stage: "PARSE",
    message,
  };
}

describe("services/sync/failures", () => {
  let db: Kysely<Database>;
  let failures: SyncFailureService;

  beforeEach(async () => {
    db = await createTestDb();
    failures = new SyncFailureService(db);
  });

  afterEach(async () => {
    await db.destroy();
  });

  it("should record failures as pending", async () => {
    await failures.record("run-1", "WB_SALES", [failure("r1"), failure("r2")]);

    expect(await failures.countPending("WB_SALES")).toBe(2);
    expect(await failures.countPending("OZON_FBS")).toBe(0);
    expect((await failures.listPendingPayloadIds("WB_SALES")).sort()).toEqual([
      "r1",
      "r2",
    ]);
  });

  it("should bump attempts when the same payload fails again", async () => {
    await failures.record("run-1", "WB_SALES", [failure("r1", "first")]);
    await failures.record("run-2", "WB_SALES", [failure("r1", "second")]);

    const [row] = await failures.list({ connector: "WB_SALES" });
    expect(row?.attempts).toBe(2);
    expect(row?.run_id).toBe("run-2");
    expect(row?.error_message).toBe("second");
    expect(await failures.countPending()).toBe(1);
  });

  it("should resolve pending failures", async () => {
    await failures.record("run-1", "WB_SALES", [failure("r1"), failure("r2")]);

    expect(await failures.resolve(["r1", "missing"])).toBe(1);
    expect(await failures.resolve(["r1"])).toBe(0);
    expect(await failures.resolve([])).toBe(0);
    expect(await failures.listPendingPayloadIds("WB_SALES")).toEqual(["r2"]);

    const resolved = await failures.list({ status: "RESOLVED" });
    expect(resolved.map((row) => row.raw_payload_id)).toEqual(["r1"]);
  });

  it("should reopen a resolved failure that fails again", async () => {
    await failures.record("run-1", "WB_SALES", [failure("r1")]);
    await failures.resolve(["r1"]);
    await failures.record("run-2", "WB_SALES", [failure("r1")]);

    expect(await failures.listPendingPayloadIds("WB_SALES")).toEqual(["r1"]);
  });

  it("should do nothing for an empty batch", async () => {
    await failures.record("run-1", "WB_SALES", []);

    expect(await failures.countPending()).toBe(0);
  });
});

describe("services/sync/runs", () => {
  let db: Kysely<Database>;
  let runs: SyncRunService;

  function outcome(runId: string, startedAt: string): RunOutcome {
    return {
      runId,
      connector: "OZON_FBS",
      status: "Committed",
      startedAt,
      finishedAt: startedAt,
      cursorBefore: null,
      cursorAfter: "2024-03-05T10:00:00.000Z",
      counts: {
        fetched: 3,
        reprocessed: 0,
        parsed: 3,
        projected: 5,
        upserted: 5,
        failed: 0,
      },
      failures: [],
      errorMessage: null,
    };
  }

  beforeEach(async () => {
    db = await createTestDb();
    runs = new SyncRunService(db);
  });

  afterEach(async () => {
    await db.destroy();
  });

  it("should store run outcomes and return the latest first", async () => {
    await runs.record(outcome("run-1", "2024-03-05T10:00:00.000Z"));
    await runs.record(outcome("run-2", "2024-03-05T11:00:00.000Z"));

    const listed = await runs.list({ connector: "OZON_FBS" });
    expect(listed.map((row) => row.id)).toEqual(["run-2", "run-1"]);
    expect(listed[0]?.projected).toBe(5);
    expect(listed[0]?.cursor_after).toBe("2024-03-05T10:00:00.000Z");

    expect((await runs.latest("OZON_FBS"))?.id).toBe("run-2");
    expect(await runs.latest("WB_SALES")).toBeNull();
  });

  it("should limit the listing", async () => {
    await runs.record(outcome("run-1", "2024-03-05T10:00:00.000Z"));
    await runs.record(outcome("run-2", "2024-03-05T11:00:00.000Z"));

    expect(await runs.list({ limit: 1 })).toHaveLength(1);
  });
});
