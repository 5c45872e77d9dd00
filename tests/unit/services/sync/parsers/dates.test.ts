import { describe, it, expect } from "vitest";

import {
  parseSourceDate,
  toSaleDate,
} from "../../../../../src/services/sync/parsers/dates.js";

describe("services/sync/parsers/dates", () => {
  describe("parseSourceDate", () => {
    it("should convert zoned RFC 3339 timestamps to UTC", () => {
      expect(parseSourceDate("2024-03-01T10:00:00+03:00")).toBe(
        "2024-03-01T07:00:00.000Z"
      );
      expect(parseSourceDate("2024-03-01T10:00:00Z")).toBe(
        "2024-03-01T10:00:00.000Z"
      );
    });

    it("should read naive date-times as UTC", () => {
      expect(parseSourceDate("2024-03-01 10:00:00")).toBe(
        "2024-03-01T10:00:00.000Z"
      );
      expect(parseSourceDate("2024-03-01T10:00:00")).toBe(
        "2024-03-01T10:00:00.000Z"
      );
    });

    it("should keep fractional seconds", () => {
      expect(parseSourceDate("2024-03-01T10:00:00.5")).toBe(
        "2024-03-01T10:00:00.500Z"
      );
    });

    it("should parse day-first forms", () => {
      expect(parseSourceDate("05-03-2024 18:45:00")).toBe(
        "2024-03-05T18:45:00.000Z"
      );
      expect(parseSourceDate("05-03-2024")).toBe("2024-03-05T00:00:00.000Z");
    });

    it("should parse plain ISO dates", () => {
      expect(parseSourceDate("2024-03-05")).toBe("2024-03-05T00:00:00.000Z");
    });

    it("should reject overflowed calendar dates", () => {
      expect(parseSourceDate("31-02-2024")).toBeNull();
      expect(parseSourceDate("2024-02-30")).toBeNull();
    });

    it("should return null for empty or unrecognized values", () => {
      expect(parseSourceDate(null)).toBeNull();
      expect(parseSourceDate(undefined)).toBeNull();
      expect(parseSourceDate("   ")).toBeNull();
      expect(parseSourceDate("yesterday")).toBeNull();
    });
  });

  describe("toSaleDate", () => {
    it("should return the UTC calendar date", () => {
      expect(toSaleDate("2024-03-03T23:59:59.000Z")).toBe("2024-03-03");
    });
  });
});
