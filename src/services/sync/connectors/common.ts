/**
 * Helpers shared by connectors
 */

import { computeContentHash } from "../raw-store.js";
import { isRecord } from "../parsers/common.js";
import { parseSourceDate } from "../parsers/dates.js";

import type { ConnectorOptions } from "./types.js";

const MINUTE_MS = 60_000;
const DAY_MS = 24 * 60 * MINUTE_MS;

export function daysBefore(now: Date, days: number): Date {
  return new Date(now.getTime() - days * DAY_MS);
}

/**
 * Start of the next fetch window: the cursor minus the overlap, or the
 * initial lookback when no cursor exists yet.
 */
export function windowStart(
  cursor: string | null,
  now: Date,
  options: Pick<ConnectorOptions, "overlapMinutes" | "initialLookbackDays">
): Date {
  const cursorMs = cursor === null ? Number.NaN : Date.parse(cursor);
  if (Number.isNaN(cursorMs)) {
    return daysBefore(now, options.initialLookbackDays);
  }
  return new Date(cursorMs - options.overlapMinutes * MINUTE_MS);
}

/**
 * Business key from a record field. Records without one get a content-hash
 * key so they are still stored and fail parsing visibly.
 */
export function businessKeyOf(record: unknown, field: string): string {
  if (isRecord(record)) {
    const value = record[field];
    if (typeof value === "string" && value.trim() !== "") {
      return value;
    }
    if (typeof value === "number" && Number.isFinite(value)) {
      return String(value);
    }
  }
  return `unkeyed:${computeContentHash(record).slice(0, 16)}`;
}

/**
 * Record timestamp as ISO-8601 UTC, null when absent or unparseable.
 */
export function recordTime(record: unknown, field: string): string | null {
  if (!isRecord(record)) {
    return null;
  }
  const value = record[field];
  return typeof value === "string" ? parseSourceDate(value) : null;
}

export function laterOf(a: string | null, b: string | null): string | null {
  if (a === null) return b;
  if (b === null) return a;
  return Date.parse(b) > Date.parse(a) ? b : a;
}
