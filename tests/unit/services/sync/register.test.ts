import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { RegisterStorageError } from "../../../../src/services/sync/errors.js";
import {
  SalesRegisterService,
  dedupeByKey,
} from "../../../../src/services/sync/register.js";
import { registerEntry } from "../../../fixtures/payloads.js";
import { createTestDb } from "../../../helpers/db.js";

import type { Database } from "../../../../src/db/types.js";
import type { Kysely } from "kysely";

const LOADED_AT = new Date("2024-03-06T00:00:00.000Z");

describe("services/sync/register", () => {
  let db: Kysely<Database>;
  let register: SalesRegisterService;

  beforeEach(async () => {
    db = await createTestDb();
    register = new SalesRegisterService(db, { chunkSize: 2 });
  });

  afterEach(async () => {
    await db.destroy();
  });

  describe("dedupeByKey", () => {
    it("should keep the highest version and the later entry on a tie", () => {
      const result = dedupeByKey([
        registerEntry({ documentVersion: 2, amountLine: 200 }),
        registerEntry({ documentVersion: 1, amountLine: 100 }),
        registerEntry({ documentVersion: 2, amountLine: 300 }),
        registerEntry({ lineId: "other", amountLine: 7 }),
      ]);

      expect(result.map((e) => [e.lineId, e.amountLine])).toEqual([
        ["WB100", 300],
        ["other", 7],
      ]);
    });
  });

  describe("upsert", () => {
    it("should store a complete row", async () => {
      const result = await register.upsert(
        [registerEntry({ extra: { saleId: "S1001" } })],
        LOADED_AT
      );

      expect(result).toEqual({ received: 1, applied: 1, written: 1 });
      const stored = await register.getByKey({
        marketplace: "WB",
        documentNo: "WB100",
        lineId: "WB100",
      });
      expect(stored).toEqual({
        ...registerEntry({ extra: { saleId: "S1001" } }),
        loadedAtUtc: "2024-03-06T00:00:00.000Z",
      });
    });

    it("should be idempotent for the same batch", async () => {
      const batch = [
        registerEntry(),
        registerEntry({ lineId: "L2" }),
        registerEntry({ lineId: "L3" }),
      ];

      await register.upsert(batch, LOADED_AT);
      const first = await register.query();
      await register.upsert(batch, LOADED_AT);
      const second = await register.query();

      expect(second).toEqual(first);
      expect(second.total).toBe(3);
    });

    it("should not let an older version overwrite a newer one", async () => {
      await register.upsert([registerEntry({ documentVersion: 2, amountLine: 200 })]);
      const result = await register.upsert([
        registerEntry({ documentVersion: 1, amountLine: 100 }),
      ]);

      expect(result.written).toBe(0);
      const stored = await register.getByKey(registerEntry());
      expect(stored?.documentVersion).toBe(2);
      expect(stored?.amountLine).toBe(200);
    });

    it("should replace the row when a newer version arrives", async () => {
      await register.upsert([
        registerEntry({ documentVersion: 1, amountLine: 100, title: "Old" }),
      ]);
      await register.upsert([
        registerEntry({ documentVersion: 2, amountLine: 200, title: null }),
      ]);

      const stored = await register.getByKey(registerEntry());
      expect(stored?.documentVersion).toBe(2);
      expect(stored?.amountLine).toBe(200);
      expect(stored?.title).toBeNull();
    });

    it("should leave other keys untouched", async () => {
      await register.upsert([
        registerEntry({ lineId: "L1", amountLine: 1 }),
        registerEntry({ lineId: "L2", amountLine: 2 }),
      ]);
      await register.upsert([registerEntry({ lineId: "L1", amountLine: 10 })]);

      const other = await register.getByKey(registerEntry({ lineId: "L2" }));
      expect(other?.amountLine).toBe(2);
    });

    it("should wrap storage failures in RegisterStorageError", async () => {
      await db.schema.dropTable("sales_register").execute();

      await expect(register.upsert([registerEntry()])).rejects.toBeInstanceOf(
        RegisterStorageError
      );
    });
  });

  describe("query", () => {
    beforeEach(async () => {
      await register.upsert([
        registerEntry({ documentNo: "W1", lineId: "W1", saleDate: "2024-03-01", sellerSku: "A", qty: 1, amountLine: 100 }),
        registerEntry({ documentNo: "W2", lineId: "W2", saleDate: "2024-03-02", sellerSku: "B", qty: 2, amountLine: 50 }),
        registerEntry({ marketplace: "OZON", documentNo: "P1", lineId: "A_1", saleDate: "2024-03-02", sellerSku: "A", qty: 1, amountLine: 70 }),
        registerEntry({ marketplace: "OZON", documentNo: "P1", lineId: "B_2", saleDate: "2024-03-02", sellerSku: "C", qty: 3, amountLine: 30 }),
      ]);
    });

    it("should order by sale date descending then key", async () => {
      const page = await register.query();

      expect(page.items.map((e) => `${e.marketplace}/${e.lineId}`)).toEqual([
        "OZON/A_1",
        "OZON/B_2",
        "WB/W2",
        "WB/W1",
      ]);
      expect(page.total).toBe(4);
      expect(page.limit).toBe(100);
      expect(page.offset).toBe(0);
    });

    it("should filter by marketplace, date range and product", async () => {
      expect((await register.query({ marketplace: "WB" })).total).toBe(2);
      expect((await register.query({ dateFrom: "2024-03-02" })).total).toBe(3);
      expect((await register.query({ dateTo: "2024-03-01" })).total).toBe(1);

      const bySku = await register.query({ sellerSku: "A" });
      expect(bySku.items.map((e) => e.documentNo)).toEqual(["P1", "W1"]);
    });

    it("should page with limit and offset", async () => {
      const page = await register.query({ limit: 2, offset: 2 });

      expect(page.items.map((e) => e.lineId)).toEqual(["W2", "W1"]);
      expect(page.total).toBe(4);
    });

    it("should compute daily and marketplace totals", async () => {
      expect(await register.dailyStats({ marketplace: "OZON" })).toEqual([
        { saleDate: "2024-03-02", marketplace: "OZON", lines: 2, qty: 4, amount: 100 },
      ]);

      expect(await register.marketplaceStats()).toEqual([
        {
          marketplace: "OZON",
          lines: 2,
          documents: 1,
          qty: 4,
          amount: 100,
          firstSaleDate: "2024-03-02",
          lastSaleDate: "2024-03-02",
        },
        {
          marketplace: "WB",
          lines: 2,
          documents: 2,
          qty: 3,
          amount: 150,
          firstSaleDate: "2024-03-01",
          lastSaleDate: "2024-03-02",
        },
      ]);
    });

    it("should find entries by registrator", async () => {
      const entries = await register.getByRegistrator("raw-1");

      expect(entries).toHaveLength(4);
    });
  });
});
