/**
 * Default wiring of the orchestrator from configuration
 */

import { config } from "../../config.js";
import { db } from "../../db/connection.js";
import { buildConnectors } from "./connectors/index.js";
import { SyncOrchestrator } from "./orchestrator.js";

let shared: SyncOrchestrator | null = null;

/**
 * Process-wide orchestrator over the configured connectors. Sharing one
 * instance keeps the in-process single-flight guard effective across the
 * API, the worker and the CLI.
 */
export function getOrchestrator(): SyncOrchestrator {
  shared ??= new SyncOrchestrator(db, buildConnectors(config).values(), {
    retry: config.sync.retry,
    runTimeoutMs: config.sync.runTimeoutMs,
    leaseDurationMs: config.sync.leaseDurationMs,
  });
  return shared;
}
