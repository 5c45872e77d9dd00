// Sync Services - Re-exports
export { RawStoreService, computeContentHash, canonicalJson } from "./raw-store.js";
export { SyncCheckpointService, emptyCheckpoint } from "./checkpoints.js";
export { SyncFailureService, type FailureFilters } from "./failures.js";
export { SyncRunService, type RunFilters } from "./runs.js";
export {
  SalesRegisterService,
  dedupeByKey,
  registerKeyOf,
  type RegisterUpsertResult,
} from "./register.js";
export { parseDocument } from "./parsers/index.js";
export { projectDocument } from "./projection.js";
export { withRetry, computeBackoff, isPermanentError } from "./retry.js";
export { RunStateMachine, canTransition, isTerminal } from "./run-state.js";
export {
  SyncOrchestrator,
  createWorkerId,
  type OrchestratorOptions,
  type RunResult,
  type SkippedRun,
  type SyncProgress,
} from "./orchestrator.js";
export { SyncScheduler, type SchedulerOptions } from "./scheduler.js";
export { getOrchestrator } from "./runtime.js";
export { buildConnectors, type SourceConnector } from "./connectors/index.js";
export * from "./errors.js";
