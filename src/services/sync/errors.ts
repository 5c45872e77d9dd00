/**
 * Pipeline error types
 */

import type { RunState, SourceId } from "../../types/index.js";

export interface ParseIssue {
  path: string;
  message: string;
}

/**
 * A raw payload that fails required-field validation.
 */
export class ParseError extends Error {
  code = "PARSE_ERROR" as const;
  readonly payloadId: string;
  readonly source: SourceId;
  readonly businessKey: string;
  readonly issues: ParseIssue[];

  constructor(
    payload: { id: string; source: SourceId; businessKey: string },
    issues: ParseIssue[]
  ) {
    const summary = issues
      .slice(0, 3)
      .map((issue) => `${issue.path || "/"}: ${issue.message}`)
      .join("; ");
    super(
      `Cannot parse ${payload.source} payload ${payload.businessKey}: ${summary}`
    );
    this.name = "ParseError";
    this.payloadId = payload.id;
    this.source = payload.source;
    this.businessKey = payload.businessKey;
    this.issues = issues;
  }
}

/**
 * A document that lacks a component of the register natural key.
 */
export class ProjectionError extends Error {
  code = "PROJECTION_ERROR" as const;
  readonly sourceRef: string;
  readonly field: string;

  constructor(sourceRef: string, field: string, message: string) {
    super(message);
    this.name = "ProjectionError";
    this.sourceRef = sourceRef;
    this.field = field;
  }
}

export class RegisterStorageError extends Error {
  code = "REGISTER_STORAGE_ERROR" as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RegisterStorageError";
  }
}

export class InvalidTransitionError extends Error {
  code = "INVALID_TRANSITION" as const;
  readonly from: RunState;
  readonly to: RunState;

  constructor(from: RunState, to: RunState) {
    super(`Invalid sync run transition: ${from} -> ${to}`);
    this.name = "InvalidTransitionError";
    this.from = from;
    this.to = to;
  }
}

export class SyncTimeoutError extends Error {
  code = "SYNC_TIMEOUT" as const;

  constructor(timeoutMs: number) {
    super(`Fetch exceeded the run timeout of ${String(timeoutMs)}ms`);
    this.name = "SyncTimeoutError";
  }
}

/**
 * The connector lease passed to another worker before the run committed.
 */
export class LeaseLostError extends Error {
  code = "LEASE_LOST" as const;
  readonly connector: string;

  constructor(connector: string, workerId: string) {
    super(`Lease on ${connector} is no longer held by ${workerId}`);
    this.name = "LeaseLostError";
    this.connector = connector;
  }
}
