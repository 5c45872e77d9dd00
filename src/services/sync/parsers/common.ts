/**
 * Shared helpers for document parsers
 */

import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { ParseError, type ParseIssue } from "../errors.js";

import type { RawPayload } from "../../../types/index.js";

const MAX_ISSUES = 10;

// ============================================================================
// Schema Building Blocks
// ============================================================================

/** Decimal number that may arrive as a JSON string ("1234.50") */
export const NumericSchema = Type.Union([
  Type.Number(),
  Type.String({ pattern: "^\\s*-?\\d+(\\.\\d+)?\\s*$" }),
]);

/** Identifier that may arrive as a number or a string */
export const IdentifierSchema = Type.Union([
  Type.Number(),
  Type.String({ minLength: 1 }),
]);

export function Nullable<T extends TSchema>(schema: T) {
  return Type.Optional(Type.Union([schema, Type.Null()]));
}

// ============================================================================
// Validation
// ============================================================================

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Check `value` against `schema`, throwing ParseError with the collected
 * issues on failure.
 */
export function validate<T extends TSchema>(
  schema: T,
  value: unknown,
  payload: RawPayload,
  basePath = ""
): Static<T> {
  if (Value.Check(schema, value)) {
    return value;
  }

  const issues: ParseIssue[] = [];
  for (const error of Value.Errors(schema, value)) {
    issues.push({ path: `${basePath}${error.path}`, message: error.message });
    if (issues.length >= MAX_ISSUES) {
      break;
    }
  }
  throw new ParseError(payload, issues);
}

/**
 * The record's own fields not in `known`, with keys in sorted order.
 */
export function collectExtensions(
  record: Record<string, unknown>,
  known: readonly string[]
): Record<string, unknown> {
  const knownSet = new Set(known);
  const extensions: Record<string, unknown> = {};
  for (const key of Object.keys(record).sort()) {
    if (!knownSet.has(key)) {
      extensions[key] = record[key];
    }
  }
  return extensions;
}

// ============================================================================
// Value Conversion
// ============================================================================

export function toNumber(value: number | string | null | undefined): number | null {
  if (value === null || value === undefined) {
    return null;
  }
  return typeof value === "number" ? value : Number(value.trim());
}

export function toIdentifier(
  value: number | string | null | undefined
): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  const text = String(value).trim();
  return text === "" ? null : text;
}

export function toText(value: string | null | undefined): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  const text = value.trim();
  return text === "" ? null : text;
}

export function multiply(price: number | null, qty: number): number | null {
  return price === null ? null : price * qty;
}
