export { BaseWorker, type BaseWorkerOptions, type WorkerContext, type WorkerType } from './worker/base-worker.js';
export { ShutdownController, MAX_SLEEP_SLICE_MS } from './worker/shutdown.js';
export { isWorkerType, parseTypeReference, resolveWorkerType } from './worker/registry.js';
export {
  WorkerManager,
  MANAGED_WORKER_FLAG,
  type RunnerCommand,
  type StopResult,
  type WorkerManagerOptions,
  type WorkerStatus,
} from './manager/worker-manager.js';
export { PsProcessTable, parsePsLine, type ProcessEntry, type ProcessTable } from './manager/process-table.js';
export { isWorkerRunning } from './manager/liveness.js';
export { OperationTracker, type OperationHandle } from './monitoring/operation-tracker.js';
export { FileStatusStore, type StatusStore } from './monitoring/status-store.js';
export { formatDuration, formatStatus } from './monitoring/format.js';
export type { CycleStats, OperationStats, StatusSnapshot, WorkerPhase } from './monitoring/types.js';
export {
  WorkerLogger,
  createConsoleOutput,
  createFileOutput,
  createMemoryOutput,
  type LogEntry,
  type LogLevel,
  type LogOutput,
} from './logger.js';
export * from './errors.js';
export {
  resolveWorkerConfig,
  type JsonValue,
  type WorkerConfig,
  type WorkerOptions,
  type WorkerParams,
} from './config.js';
