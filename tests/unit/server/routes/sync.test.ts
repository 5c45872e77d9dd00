import Fastify, { type FastifyInstance } from "fastify";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

import { db } from "../../../../src/db/connection.js";
import { TABLE_NAMES } from "../../../../src/db/schema.js";
import { errorHandler } from "../../../../src/server/plugins/error-handler.js";
import { registerSyncRoutes } from "../../../../src/server/routes/sync.js";
import { SyncOrchestrator } from "../../../../src/services/sync/orchestrator.js";
import { wbSaleRow } from "../../../fixtures/payloads.js";

import type {
  FetchResult,
  SourceConnector,
} from "../../../../src/services/sync/connectors/types.js";
import type { FetchedPayload, RunOutcome } from "../../../../src/types/index.js";

vi.mock("../../../../src/db/connection.js", async () => {
  const { createTestDb } = await import("../../../helpers/db.js");
  return {
    db: await createTestDb(),
    checkConnection: () => Promise.resolve(true),
  };
});

const CURSOR = "2024-03-05T12:00:00.000Z";

class StubConnector implements SourceConnector {
  readonly id = "WB_SALES" as const;

  constructor(private next: () => Promise<FetchResult>) {}

  fetch(): Promise<FetchResult> {
    return this.next();
  }
}

function fetchResult(bodies: Record<string, unknown>[]): FetchResult {
  return {
    payloads: bodies.map((body): FetchedPayload => ({
      source: "WB_SALES",
      documentType: "sale",
      businessKey: String(body.srid),
      fetchedAt: CURSOR,
      body,
    })),
    checkpoint: CURSOR,
    pages: 1,
    truncated: false,
  };
}

describe("server/routes/sync", () => {
  let app: FastifyInstance;
  let orchestrator: SyncOrchestrator;

  async function buildApp(connector: SourceConnector): Promise<void> {
    orchestrator = new SyncOrchestrator(db, [connector], {
      retry: { maxAttempts: 1, initialBackoffMs: 1, backoffMultiplier: 2, maxBackoffMs: 1 },
      runTimeoutMs: 5_000,
      leaseDurationMs: 60_000,
      workerId: "test-worker",
    });
    app = Fastify({ logger: false });
    await app.register(errorHandler);
    await app.register(
      (api) => {
        registerSyncRoutes(api, { orchestrator: () => orchestrator });
      },
      { prefix: "/api/v1" }
    );
    await app.ready();
  }

  function nextOutcome(): Promise<RunOutcome> {
    return new Promise((resolve) => {
      const off = orchestrator.onRunOutcome((outcome) => {
        off();
        resolve(outcome);
      });
    });
  }

  beforeEach(async () => {
    for (const table of TABLE_NAMES) {
      await db.deleteFrom(table).execute();
    }
  });

  afterEach(async () => {
    await app.close();
  });

  it("should list configured connectors that never ran", async () => {
    await buildApp(new StubConnector(() => Promise.resolve(fetchResult([]))));

    const response = await app.inject({ method: "GET", url: "/api/v1/sync/checkpoints" });

    expect(response.statusCode).toBe(200);
    expect(response.json().data).toEqual([
      {
        connector: "WB_SALES",
        cursor: null,
        lastRunStatus: null,
        lastRunAt: null,
        lastSuccessAt: null,
        lockedBy: null,
        lockedUntil: null,
        running: false,
      },
    ]);
  });

  it("should start a run in the background and expose its outcome", async () => {
    await buildApp(
      new StubConnector(() => Promise.resolve(fetchResult([wbSaleRow({ srid: "WB1" })])))
    );
    const finished = nextOutcome();

    const response = await app.inject({ method: "POST", url: "/api/v1/sync/wb_sales/run" });

    expect(response.statusCode).toBe(202);
    expect(response.json()).toEqual({
      data: {
        connector: "WB_SALES",
        accepted: true,
        message: "Run of WB_SALES started",
      },
    });
    expect((await finished).status).toBe("Committed");

    const runs = await app.inject({ method: "GET", url: "/api/v1/sync/runs?connector=WB_SALES" });
    const [run] = runs.json().data;
    expect(run).toMatchObject({
      connector: "WB_SALES",
      status: "Committed",
      cursorBefore: null,
      cursorAfter: CURSOR,
      counts: { fetched: 1, parsed: 1, projected: 1, upserted: 1, failed: 0 },
      errorMessage: null,
    });

    const checkpoints = await app.inject({ method: "GET", url: "/api/v1/sync/checkpoints" });
    expect(checkpoints.json().data[0]).toMatchObject({
      connector: "WB_SALES",
      cursor: CURSOR,
      lastRunStatus: "Committed",
    });
  });

  it("should list item failures", async () => {
    await buildApp(
      new StubConnector(() =>
        Promise.resolve(fetchResult([wbSaleRow({ srid: "WB9", date: "not-a-date" })]))
      )
    );
    const finished = nextOutcome();
    await app.inject({ method: "POST", url: "/api/v1/sync/WB_SALES/run" });
    await finished;

    const response = await app.inject({
      method: "GET",
      url: "/api/v1/sync/failures?status=PENDING",
    });

    expect(response.statusCode).toBe(200);
    expect(response.json().data).toHaveLength(1);
    expect(response.json().data[0]).toMatchObject({
      connector: "WB_SALES",
      businessKey: "WB9",
      stage: "PARSE",
      attempts: 1,
      status: "PENDING",
    });
  });

  it("should refuse a second run while one is in flight", async () => {
    let release: (result: FetchResult) => void = () => undefined;
    const pending = new Promise<FetchResult>((resolve) => {
      release = resolve;
    });
    await buildApp(new StubConnector(() => pending));
    const finished = nextOutcome();

    const first = await app.inject({ method: "POST", url: "/api/v1/sync/WB_SALES/run" });
    const second = await app.inject({ method: "POST", url: "/api/v1/sync/WB_SALES/run" });
    release(fetchResult([]));
    await finished;

    expect(first.statusCode).toBe(202);
    expect(second.statusCode).toBe(409);
    expect(second.json()).toMatchObject({
      error: "CONFLICT",
      message: "Connector WB_SALES is already running",
    });
  });

  it("should answer 404 for connectors that are unknown or not configured", async () => {
    await buildApp(new StubConnector(() => Promise.resolve(fetchResult([]))));

    const missing = await app.inject({ method: "POST", url: "/api/v1/sync/YM_ORDERS/run" });
    const unknown = await app.inject({ method: "POST", url: "/api/v1/sync/bogus/run" });

    expect(missing.statusCode).toBe(404);
    expect(missing.json().message).toBe("Connector YM_ORDERS is not configured");
    expect(unknown.statusCode).toBe(404);
    expect(unknown.json().message).toBe("Connector bogus is not configured");
  });

  it("should validate the runs query", async () => {
    await buildApp(new StubConnector(() => Promise.resolve(fetchResult([]))));

    const response = await app.inject({ method: "GET", url: "/api/v1/sync/runs?connector=BAD" });

    expect(response.statusCode).toBe(400);
  });
});
