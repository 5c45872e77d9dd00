/**
 * Sync Scheduler - Periodic runs per connector
 */

import { syncLogger } from "../../logger.js";

import type { RunResult, SyncOrchestrator } from "./orchestrator.js";
import type { ConnectorId } from "../../types/index.js";

export interface SchedulerOptions {
  intervalMinutes: number;
  /** Start one run per connector right away instead of after the first interval */
  runOnStart?: boolean;
}

export class SyncScheduler {
  private timers = new Map<ConnectorId, NodeJS.Timeout>();
  private active = new Map<ConnectorId, Promise<RunResult | null>>();
  private stopped = true;

  constructor(
    private readonly orchestrator: SyncOrchestrator,
    private readonly options: SchedulerOptions
  ) {}

  get running(): boolean {
    return !this.stopped;
  }

  start(): void {
    if (!this.stopped) {
      return;
    }
    this.stopped = false;
    const intervalMs = this.options.intervalMinutes * 60_000;

    for (const id of this.orchestrator.connectorIds) {
      const timer = setInterval(() => {
        this.trigger(id);
      }, intervalMs);
      this.timers.set(id, timer);

      if (this.options.runOnStart !== false) {
        this.trigger(id);
      }
    }

    syncLogger.info(
      { connectors: this.orchestrator.connectorIds, intervalMinutes: this.options.intervalMinutes },
      "Scheduler started"
    );
  }

  /**
   * Stop scheduling and wait for in-flight runs to finish.
   */
  async stop(): Promise<void> {
    this.stopped = true;
    for (const timer of this.timers.values()) {
      clearInterval(timer);
    }
    this.timers.clear();

    await Promise.all(this.active.values());
    syncLogger.info("Scheduler stopped");
  }

  private trigger(id: ConnectorId): void {
    if (this.stopped || this.active.has(id)) {
      return;
    }

    const run = this.orchestrator
      .runConnector(id)
      .catch((error: unknown) => {
        syncLogger.error(
          { connector: id, error: error instanceof Error ? error.message : String(error) },
          "Scheduled run crashed"
        );
        return null;
      })
      .finally(() => {
        this.active.delete(id);
      });

    this.active.set(id, run);
  }
}
