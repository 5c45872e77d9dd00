/**
 * Sync Orchestrator - One run per connector from fetch to commit
 *
 * Fetch -> Raw Store -> parse -> project -> register upsert -> checkpoint.
 * Item failures are recorded and the run continues; fetch or storage
 * exhaustion fails the run and leaves the checkpoint where it was.
 */

import { randomUUID } from "node:crypto";
import { hostname } from "node:os";

import { syncLogger } from "../../logger.js";
import { SyncCheckpointService } from "./checkpoints.js";
import { SyncTimeoutError } from "./errors.js";
import { SyncFailureService } from "./failures.js";
import { parseDocument } from "./parsers/index.js";
import { projectDocument } from "./projection.js";
import { RawStoreService } from "./raw-store.js";
import { SalesRegisterService } from "./register.js";
import { withRetry } from "./retry.js";
import { RunStateMachine } from "./run-state.js";
import { SyncRunService } from "./runs.js";

import type { SourceConnector, FetchResult } from "./connectors/types.js";
import type { RetryOptions } from "./retry.js";
import type { RetryConfig } from "../../config.js";
import type { Database } from "../../db/types.js";
import type {
  Checkpoint,
  ConnectorId,
  Document,
  ItemFailure,
  RawPayload,
  RunCounts,
  RunOutcome,
  RunState,
  SalesRegisterEntry,
  TerminalRunState,
} from "../../types/index.js";
import type { Kysely } from "kysely";

// ============================================================================
// Types
// ============================================================================

export interface OrchestratorOptions {
  retry: RetryConfig;
  runTimeoutMs: number;
  leaseDurationMs: number;
  workerId?: string;
  /** Replaces the backoff timer, mainly in tests */
  sleep?: RetryOptions["sleep"];
}

export interface SkippedRun {
  connector: ConnectorId;
  status: "Skipped";
  reason: string;
}

export type RunResult = RunOutcome | SkippedRun;

export interface SyncProgress {
  connector: ConnectorId;
  phase: RunState;
  counts: RunCounts;
}

type ProgressCallback = (progress: SyncProgress) => void;
type RunOutcomeListener = (outcome: RunOutcome) => void | Promise<void>;

interface ParsedItem {
  raw: RawPayload;
  document: Document;
}

// ============================================================================
// Helper Functions
// ============================================================================

function emptyCounts(): RunCounts {
  return { fetched: 0, reprocessed: 0, parsed: 0, projected: 0, upserted: 0, failed: 0 };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Settle with `promise`, or reject as soon as `signal` aborts.
 */
function abortable<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(signal.reason);
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      reject(signal.reason);
    };
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}

export function createWorkerId(): string {
  return `${hostname()}-${String(process.pid)}-${Math.random().toString(36).slice(2, 8)}`;
}

// ============================================================================
// Sync Orchestrator
// ============================================================================

export class SyncOrchestrator {
  private readonly db: Kysely<Database>;
  private readonly rawStore: RawStoreService;
  private readonly checkpoints: SyncCheckpointService;
  private readonly failures: SyncFailureService;
  private readonly runs: SyncRunService;
  private readonly register: SalesRegisterService;
  private readonly connectors: Map<ConnectorId, SourceConnector>;
  private readonly inFlight = new Set<ConnectorId>();
  private readonly listeners = new Set<RunOutcomeListener>();
  private readonly workerId: string;
  private onProgress?: ProgressCallback;

  constructor(
    db: Kysely<Database>,
    connectors: Iterable<SourceConnector>,
    private readonly options: OrchestratorOptions
  ) {
    this.db = db;
    this.rawStore = new RawStoreService(db);
    this.checkpoints = new SyncCheckpointService(db);
    this.failures = new SyncFailureService(db);
    this.runs = new SyncRunService(db);
    this.register = new SalesRegisterService(db);
    this.connectors = new Map([...connectors].map((c) => [c.id, c]));
    this.workerId = options.workerId ?? createWorkerId();
  }

  get connectorIds(): ConnectorId[] {
    return [...this.connectors.keys()];
  }

  setProgressCallback(callback: ProgressCallback): void {
    this.onProgress = callback;
  }

  /**
   * Register a listener for finished runs. Returns an unsubscribe function.
   */
  onRunOutcome(listener: RunOutcomeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  isRunning(connector: ConnectorId): boolean {
    return this.inFlight.has(connector);
  }

  /**
   * Run every configured connector concurrently.
   */
  async runAll(): Promise<RunResult[]> {
    return await Promise.all(this.connectorIds.map((id) => this.runConnector(id)));
  }

  /**
   * Run one connector. At most one run per connector is active: a second
   * call while one is in flight, here or in another process, is skipped.
   */
  async runConnector(id: ConnectorId): Promise<RunResult> {
    const connector = this.connectors.get(id);
    if (!connector) {
      throw new Error(`Connector ${id} is not configured`);
    }

    if (this.inFlight.has(id)) {
      syncLogger.info({ connector: id }, "Run already in progress, skipping");
      return { connector: id, status: "Skipped", reason: "Run already in progress" };
    }

    this.inFlight.add(id);
    try {
      const acquired = await this.checkpoints.acquireLease(
        id,
        this.workerId,
        this.options.leaseDurationMs
      );
      if (!acquired) {
        syncLogger.info({ connector: id }, "Lease held by another worker, skipping");
        return {
          connector: id,
          status: "Skipped",
          reason: "Lease held by another worker",
        };
      }

      const stopHeartbeat = this.startHeartbeat(id);
      try {
        return await this.execute(connector);
      } finally {
        stopHeartbeat();
        await this.checkpoints.releaseLease(id, this.workerId);
      }
    } finally {
      this.inFlight.delete(id);
    }
  }

  // ==========================================================================
  // Run
  // ==========================================================================

  private async execute(connector: SourceConnector): Promise<RunOutcome> {
    const id = connector.id;
    const runId = randomUUID();
    const startedAt = new Date().toISOString();
    const machine = new RunStateMachine();
    const counts = emptyCounts();
    const itemFailures: ItemFailure[] = [];

    const checkpoint = await this.checkpoints.get(id);
    let status: TerminalRunState = "Failed";
    let cursorAfter = checkpoint.cursor;
    let runError: string | null = null;

    const enter = (phase: RunState): void => {
      machine.transition(phase);
      this.onProgress?.({ connector: id, phase, counts: { ...counts } });
    };

    syncLogger.info({ connector: id, runId, cursor: checkpoint.cursor }, "Sync run started");

    try {
      const pendingIds = await this.failures.listPendingPayloadIds(id);
      const reprocess = await this.rawStore.getByIds(pendingIds);
      counts.reprocessed = reprocess.length;

      enter("Fetching");
      const fetched = await this.fetchWithTimeout(connector, checkpoint);
      const stored = await this.rawStore.append(fetched.payloads);
      counts.fetched = stored.length;

      enter("Parsing");
      const payloads = [...reprocess, ...stored];
      const parsed = this.parseAll(payloads, itemFailures);
      counts.parsed = parsed.length;

      enter("Projecting");
      const entries = this.projectAll(parsed, itemFailures);
      counts.projected = entries.length;

      enter("Upserting");
      const upsert = await withRetry(() => this.register.upsert(entries), this.options.retry, {
        sleep: this.options.sleep,
        onRetry: (error, attempt, delayMs) => {
          syncLogger.warn(
            { connector: id, attempt, delayMs, error: errorMessage(error) },
            "Register upsert failed, retrying"
          );
        },
      });
      counts.upserted = upsert.written;

      const superseded = this.supersededFailures(itemFailures, payloads, parsed);
      const remaining = itemFailures.filter((f) => !superseded.has(f.rawPayloadId));
      itemFailures.length = 0;
      itemFailures.push(...remaining);
      counts.failed = itemFailures.length;

      const finalStatus = itemFailures.length > 0 ? "PartiallyFailed" : "Committed";
      const failedIds = new Set(itemFailures.map((f) => f.rawPayloadId));

      // Failures, resolutions and the cursor land together or not at all
      await this.db.transaction().execute(async (trx) => {
        const failures = new SyncFailureService(trx);
        await failures.record(runId, id, itemFailures);
        await failures.resolve(
          reprocess.map((raw) => raw.id).filter((rawId) => !failedIds.has(rawId))
        );
        await new SyncCheckpointService(trx).commit(
          id,
          { status: finalStatus, cursor: fetched.checkpoint, at: new Date() },
          this.workerId
        );
      });

      status = finalStatus;
      cursorAfter = fetched.checkpoint;
      enter(status);
    } catch (error) {
      runError = errorMessage(error);
      status = "Failed";
      cursorAfter = checkpoint.cursor;
      machine.fail();
      syncLogger.error({ connector: id, runId, error: runError }, "Sync run failed");
      await this.checkpoints.commit(id, { status, cursor: checkpoint.cursor, at: new Date() });
    }

    const outcome: RunOutcome = {
      runId,
      connector: id,
      status,
      startedAt,
      finishedAt: new Date().toISOString(),
      cursorBefore: checkpoint.cursor,
      cursorAfter,
      counts,
      failures: itemFailures,
      errorMessage: runError,
    };

    await this.runs.record(outcome);
    syncLogger.info(
      { connector: id, runId, status, ...counts },
      "Sync run finished"
    );
    await this.notify(outcome);

    return outcome;
  }

  /**
   * Keep the lease alive while the run lasts, renewing at a third of its
   * duration.
   */
  private startHeartbeat(id: ConnectorId): () => void {
    const leaseMs = this.options.leaseDurationMs;
    const timer = setInterval(() => {
      this.checkpoints.renewLease(id, this.workerId, leaseMs).then(
        (held) => {
          if (!held) {
            syncLogger.warn({ connector: id }, "Lease lost during run");
          }
        },
        (error: unknown) => {
          syncLogger.error(
            { connector: id, error: errorMessage(error) },
            "Lease renewal failed"
          );
        }
      );
    }, Math.max(1, Math.floor(leaseMs / 3)));

    return () => {
      clearInterval(timer);
    };
  }

  private async fetchWithTimeout(
    connector: SourceConnector,
    checkpoint: Checkpoint
  ): Promise<FetchResult> {
    const timeoutMs = this.options.runTimeoutMs;
    const controller = new AbortController();
    const timer = setTimeout(() => {
      controller.abort(new SyncTimeoutError(timeoutMs));
    }, timeoutMs);

    try {
      return await withRetry(
        () =>
          abortable(
            connector.fetch(checkpoint, { signal: controller.signal }),
            controller.signal
          ),
        this.options.retry,
        {
          signal: controller.signal,
          sleep: this.options.sleep,
          onRetry: (error, attempt, delayMs) => {
            syncLogger.warn(
              { connector: connector.id, attempt, delayMs, error: errorMessage(error) },
              "Fetch failed, retrying"
            );
          },
        }
      );
    } catch (error) {
      if (controller.signal.aborted) {
        throw new SyncTimeoutError(timeoutMs);
      }
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }

  private parseAll(payloads: RawPayload[], failures: ItemFailure[]): ParsedItem[] {
    const parsed: ParsedItem[] = [];
    for (const raw of payloads) {
      try {
        parsed.push({ raw, document: parseDocument(raw) });
      } catch (error) {
        failures.push({
          rawPayloadId: raw.id,
          businessKey: raw.businessKey,
          stage: "PARSE",
          message: errorMessage(error),
        });
      }
    }
    return parsed;
  }

  private projectAll(items: ParsedItem[], failures: ItemFailure[]): SalesRegisterEntry[] {
    const entries: SalesRegisterEntry[] = [];
    for (const { raw, document } of items) {
      try {
        entries.push(...projectDocument(document));
      } catch (error) {
        failures.push({
          rawPayloadId: raw.id,
          businessKey: raw.businessKey,
          stage: "PROJECT",
          message: errorMessage(error),
        });
      }
    }
    return entries;
  }

  /**
   * Failures of payloads that a newer version of the same document, parsed
   * in this run, replaces.
   */
  private supersededFailures(
    failures: ItemFailure[],
    payloads: RawPayload[],
    parsed: ParsedItem[]
  ): Set<string> {
    const latestParsed = new Map<string, number>();
    for (const { raw } of parsed) {
      const current = latestParsed.get(raw.businessKey) ?? 0;
      latestParsed.set(raw.businessKey, Math.max(current, raw.documentVersion));
    }
    const versions = new Map(payloads.map((raw) => [raw.id, raw.documentVersion]));

    const superseded = new Set<string>();
    for (const failure of failures) {
      const newest = latestParsed.get(failure.businessKey);
      const version = versions.get(failure.rawPayloadId);
      if (newest !== undefined && version !== undefined && newest > version) {
        superseded.add(failure.rawPayloadId);
      }
    }
    return superseded;
  }

  private async notify(outcome: RunOutcome): Promise<void> {
    for (const listener of this.listeners) {
      try {
        await listener(outcome);
      } catch (error) {
        syncLogger.error(
          { connector: outcome.connector, error: errorMessage(error) },
          "Run outcome listener failed"
        );
      }
    }
  }
}
