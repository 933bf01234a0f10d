export { KeyedMutex, type Release } from "./keyed-mutex.js";
export {
  IngestionOrchestrator,
  isTerminalState,
  type IngestionRunResult,
  type IngestionState,
  type IngestionStore,
  type OrchestratorDeps,
  type ProgressCallback,
  type ProgressEvent,
  type RunError,
  type RunManyOptions,
  type RunOptions,
} from "./orchestrator.js";
export { runPool } from "./worker-pool.js";
