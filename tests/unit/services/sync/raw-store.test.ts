import { describe, it, expect, beforeEach, afterEach } from "vitest";

import {
  RawStoreService,
  canonicalJson,
  computeContentHash,
} from "../../../../src/services/sync/raw-store.js";
import { createTestDb } from "../../../helpers/db.js";

import type { Database } from "../../../../src/db/types.js";
import type { FetchedPayload } from "../../../../src/types/index.js";
import type { Kysely } from "kysely";

function fetched(body: unknown, fetchedAt: string, businessKey = "P1"): FetchedPayload {
  return {
    source: "OZON_FBS",
    documentType: "posting_fbs",
    businessKey,
    fetchedAt,
    body,
  };
}

describe("services/sync/raw-store", () => {
  let db: Kysely<Database>;
  let store: RawStoreService;

  beforeEach(async () => {
    db = await createTestDb();
    store = new RawStoreService(db);
  });

  afterEach(async () => {
    await db.destroy();
  });

  describe("computeContentHash", () => {
    it("should ignore key order", () => {
      expect(canonicalJson({ b: 1, a: { d: 2, c: 3 } })).toBe(
        '{"a":{"c":3,"d":2},"b":1}'
      );
      expect(computeContentHash({ b: 1, a: 2 })).toBe(
        computeContentHash({ a: 2, b: 1 })
      );
    });

    it("should differ for different content", () => {
      expect(computeContentHash({ a: 1 })).not.toBe(computeContentHash({ a: 2 }));
    });
  });

  describe("append", () => {
    it("should start a business key at version 1", async () => {
      const [stored] = await store.append([
        fetched({ status: "delivering" }, "2024-03-01T10:00:00.000Z"),
      ]);

      expect(stored?.documentVersion).toBe(1);
      expect(stored?.body).toEqual({ status: "delivering" });
      expect(stored?.contentHash).toBe(computeContentHash({ status: "delivering" }));
    });

    it("should keep the version for identical content and bump it on change", async () => {
      const stored = await store.append([
        fetched({ status: "delivering" }, "2024-03-01T10:00:00.000Z"),
        fetched({ status: "delivering" }, "2024-03-01T11:00:00.000Z"),
        fetched({ status: "delivered" }, "2024-03-01T12:00:00.000Z"),
      ]);

      expect(stored.map((p) => p.documentVersion)).toEqual([1, 1, 2]);
      expect(new Set(stored.map((p) => p.id)).size).toBe(3);
    });

    it("should version business keys independently", async () => {
      const stored = await store.append([
        fetched({ v: 1 }, "2024-03-01T10:00:00.000Z", "P1"),
        fetched({ v: 2 }, "2024-03-01T10:00:00.000Z", "P2"),
      ]);

      expect(stored.map((p) => p.documentVersion)).toEqual([1, 1]);
    });

    it("should resolve a repeated identity to the stored record", async () => {
      const [first] = await store.append([
        fetched({ v: 1 }, "2024-03-01T10:00:00.000Z"),
      ]);
      const [second] = await store.append([
        fetched({ v: 1 }, "2024-03-01T10:00:00.000Z"),
      ]);

      expect(second?.id).toBe(first?.id);
      expect(await store.getHistory("OZON_FBS", "P1")).toHaveLength(1);
    });
  });

  describe("reads", () => {
    it("should return payloads by id in the requested order", async () => {
      const [a, b] = await store.append([
        fetched({ v: 1 }, "2024-03-01T10:00:00.000Z", "P1"),
        fetched({ v: 1 }, "2024-03-01T10:00:00.000Z", "P2"),
      ]);
      if (!a || !b) throw new Error("append returned too few payloads");

      const loaded = await store.getByIds([b.id, "missing", a.id]);

      expect(loaded.map((p) => p.businessKey)).toEqual(["P2", "P1"]);
      expect(await store.getById("missing")).toBeNull();
    });

    it("should return the history oldest first", async () => {
      await store.append([
        fetched({ v: 2 }, "2024-03-02T10:00:00.000Z"),
        fetched({ v: 1 }, "2024-03-01T10:00:00.000Z"),
      ]);

      const history = await store.getHistory("OZON_FBS", "P1");

      expect(history.map((p) => p.fetchedAt)).toEqual([
        "2024-03-01T10:00:00.000Z",
        "2024-03-02T10:00:00.000Z",
      ]);
    });

    it("should count payloads per source", async () => {
      await store.append([
        fetched({ v: 1 }, "2024-03-01T10:00:00.000Z", "P1"),
        fetched({ v: 1 }, "2024-03-01T10:00:00.000Z", "P2"),
      ]);

      expect(await store.countBySource()).toEqual([
        { source: "OZON_FBS", count: 2 },
      ]);
    });
  });
});
