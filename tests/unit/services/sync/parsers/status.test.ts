import { describe, it, expect } from "vitest";

import {
  normalizeOzonStatus,
  normalizeYmStatus,
} from "../../../../../src/services/sync/parsers/status.js";

describe("services/sync/parsers/status", () => {
  describe("normalizeOzonStatus", () => {
    it.each([
      ["awaiting_packaging", "PROCESSING"],
      ["awaiting_deliver", "PROCESSING"],
      ["acceptance_in_progress", "PROCESSING"],
      ["delivering", "IN_DELIVERY"],
      ["driver_pickup", "IN_DELIVERY"],
      ["delivered", "DELIVERED"],
      ["cancelled", "CANCELLED"],
      ["not_accepted", "CANCELLED"],
      ["returned", "RETURNED"],
    ])("should map %s to %s", (status, expected) => {
      expect(normalizeOzonStatus(status)).toBe(expected);
    });

    it("should ignore case and surrounding whitespace", () => {
      expect(normalizeOzonStatus(" Delivered ")).toBe("DELIVERED");
    });

    it("should map unknown statuses to UNKNOWN", () => {
      expect(normalizeOzonStatus("teleported")).toBe("UNKNOWN");
    });

    it("should not resolve object prototype members", () => {
      expect(normalizeOzonStatus("constructor")).toBe("UNKNOWN");
      expect(normalizeOzonStatus("toString")).toBe("UNKNOWN");
    });
  });

  describe("normalizeYmStatus", () => {
    it.each([
      ["DELIVERED", "DELIVERED"],
      ["PICKUP", "DELIVERED"],
      ["PROCESSING", "PROCESSING"],
      ["UNPAID", "PROCESSING"],
      ["DELIVERY", "IN_DELIVERY"],
      ["CANCELLED", "CANCELLED"],
      ["CANCELLED_IN_DELIVERY", "CANCELLED"],
      ["PARTIALLY_RETURNED", "RETURNED"],
    ])("should map %s to %s", (status, expected) => {
      expect(normalizeYmStatus(status)).toBe(expected);
    });

    it("should map unknown statuses to UNKNOWN", () => {
      expect(normalizeYmStatus("LOST")).toBe("UNKNOWN");
    });

    it("should not resolve object prototype members", () => {
      expect(normalizeYmStatus("__proto__")).toBe("UNKNOWN");
    });
  });
});
