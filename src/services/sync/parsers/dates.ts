/**
 * Date handling for marketplace timestamps.
 *
 * Sources mix RFC 3339, naive "YYYY-MM-DD HH:MM:SS" and day-first
 * "DD-MM-YYYY" forms. Naive values are read as UTC.
 */

const ZONED_DATETIME =
  /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})$/i;
const NAIVE_DATETIME =
  /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,9}))?$/;
const DAY_FIRST_DATETIME = /^(\d{2})-(\d{2})-(\d{4}) (\d{2}):(\d{2}):(\d{2})$/;
const DAY_FIRST_DATE = /^(\d{2})-(\d{2})-(\d{4})$/;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

function fromParts(
  year: string,
  month: string,
  day: string,
  hour = "0",
  minute = "0",
  second = "0",
  fraction = ""
): string | null {
  const y = Number(year);
  const mo = Number(month);
  const d = Number(day);
  const ms = fraction === "" ? 0 : Math.floor(Number(`0.${fraction}`) * 1000);
  const time = Date.UTC(y, mo - 1, d, Number(hour), Number(minute), Number(second), ms);
  const date = new Date(time);

  // Reject overflowed values such as 31-02-2024
  if (
    date.getUTCFullYear() !== y ||
    date.getUTCMonth() !== mo - 1 ||
    date.getUTCDate() !== d
  ) {
    return null;
  }
  return date.toISOString();
}

/**
 * Normalize a marketplace timestamp to ISO-8601 UTC, or null when the
 * value is not a recognized date.
 */
export function parseSourceDate(value: string | null | undefined): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  const text = value.trim();
  if (text === "") {
    return null;
  }

  if (ZONED_DATETIME.test(text)) {
    const time = Date.parse(text);
    return Number.isNaN(time) ? null : new Date(time).toISOString();
  }

  let match = NAIVE_DATETIME.exec(text);
  if (match) {
    const [, y = "", mo = "", d = "", h, mi, s, frac] = match;
    return fromParts(y, mo, d, h, mi, s, frac ?? "");
  }

  match = DAY_FIRST_DATETIME.exec(text);
  if (match) {
    const [, d = "", mo = "", y = "", h, mi, s] = match;
    return fromParts(y, mo, d, h, mi, s);
  }

  match = DAY_FIRST_DATE.exec(text);
  if (match) {
    const [, d = "", mo = "", y = ""] = match;
    return fromParts(y, mo, d);
  }

  match = ISO_DATE.exec(text);
  if (match) {
    const [, y = "", mo = "", d = ""] = match;
    return fromParts(y, mo, d);
  }

  return null;
}

/** UTC calendar date (YYYY-MM-DD) of an ISO timestamp */
export function toSaleDate(iso: string): string {
  return iso.slice(0, 10);
}
