import { describe, it, expect } from "vitest";

import { ParseError } from "../../../../../src/services/sync/errors.js";
import {
  detectWbEventType,
  parseWbSale,
} from "../../../../../src/services/sync/parsers/wildberries.js";
import { rawPayload, wbSaleRow } from "../../../../fixtures/payloads.js";

describe("services/sync/parsers/wildberries", () => {
  describe("detectWbEventType", () => {
    it("should treat R-prefixed sale ids as returns", () => {
      expect(detectWbEventType("R1001", 1)).toBe("return");
    });

    it("should treat negative quantities as returns", () => {
      expect(detectWbEventType("S1001", -1)).toBe("return");
    });

    it("should default to sale", () => {
      expect(detectWbEventType("S1001", null)).toBe("sale");
      expect(detectWbEventType(null, null)).toBe("sale");
    });
  });

  describe("parseWbSale", () => {
    it("should parse a sale row", () => {
      const doc = parseWbSale(
        rawPayload("WB_SALES", wbSaleRow(), { id: "raw-wb", businessKey: "WB100" })
      );

      expect(doc).toMatchObject({
        kind: "WB_SALE_EVENT",
        sourceRef: "raw-wb",
        srid: "WB100",
        eventType: "sale",
        statusNorm: "DELIVERED",
        saleId: "S1001",
        orderId: "555",
        nmId: "123456",
        saleDate: "2024-03-04T11:20:00.000Z",
        lastChangeDate: "2024-03-04T12:00:00.000Z",
        qty: 1,
        priceList: 800,
        discountTotal: 300,
        priceEffective: 500,
        amountLine: 500,
        forPay: 430.5,
        currencyCode: "RUB",
        regionName: "Central",
      });
      expect(doc.extensions).toEqual({});
    });

    it("should mark returns as RETURNED", () => {
      const doc = parseWbSale(rawPayload("WB_SALES", wbSaleRow({ saleID: "R1001" })));

      expect(doc.eventType).toBe("return");
      expect(doc.statusNorm).toBe("RETURNED");
    });

    it("should accept numeric strings for money", () => {
      const doc = parseWbSale(
        rawPayload("WB_SALES", wbSaleRow({ priceWithDisc: "499.90", quantity: 2 }))
      );

      expect(doc.priceEffective).toBe(499.9);
      expect(doc.amountLine).toBe(999.8);
    });

    it("should keep unmodelled fields as extensions", () => {
      const doc = parseWbSale(rawPayload("WB_SALES", wbSaleRow({ isSupply: true })));

      expect(doc.extensions).toEqual({ isSupply: true });
    });

    it("should raise ParseError without srid", () => {
      const row = wbSaleRow();
      delete row.srid;

      expect(() => parseWbSale(rawPayload("WB_SALES", row))).toThrow(ParseError);
    });

    it("should raise ParseError for an unrecognized date", () => {
      try {
        parseWbSale(rawPayload("WB_SALES", wbSaleRow({ date: "soon" })));
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ParseError);
        if (error instanceof ParseError) {
          expect(error.issues).toEqual([
            { path: "/date", message: 'Unrecognized date "soon"' },
          ]);
        }
      }
    });
  });
});
