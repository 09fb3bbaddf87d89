/**
 * Error types for worker management and the worker loop.
 *
 * Manager errors (registration, start, stop) propagate to the caller so an
 * outer layer can translate them. Loop errors (work cycles, status
 * persistence) are captured, logged and never propagated.
 */

/**
 * Base class for all worker framework errors.
 */
export abstract class WorkerError extends Error {
  /**
   * Human-readable suggestion for how to resolve this error.
   */
  abstract readonly suggestion: string;

  /**
   * Error category for logging and monitoring.
   */
  abstract readonly category: ErrorCategory;

  constructor(message: string, public readonly cause?: Error) {
    super(message);
    this.name = this.constructor.name;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Error categories for classification and monitoring.
 */
export type ErrorCategory =
  | 'registration'
  | 'state'
  | 'process'
  | 'work'
  | 'persistence';

/**
 * Thrown when a worker type reference cannot be resolved, or resolves to
 * something that is not a concrete worker.
 */
export class RegistrationError extends WorkerError {
  readonly category: ErrorCategory = 'registration';
  readonly suggestion = 'Use "<module path>#<ExportName>" pointing at a class that extends BaseWorker and implements getWorkerId() and doWork().';

  constructor(
    public readonly workerName: string,
    public readonly typeReference: string,
    reason: string,
    cause?: Error
  ) {
    super(`Cannot register worker ${workerName} (${typeReference}): ${reason}`, cause);
  }
}

/**
 * Thrown when a worker name was never registered with the manager.
 */
export class UnknownWorkerError extends WorkerError {
  readonly category: ErrorCategory = 'state';
  readonly suggestion = 'Register the worker before starting it.';

  constructor(
    public readonly workerName: string,
    public readonly availableWorkers: string[]
  ) {
    super(
      `Unknown worker: ${workerName}. Available workers: ${availableWorkers.length > 0 ? availableWorkers.join(', ') : '(none)'}`
    );
  }
}

export class AlreadyRunningError extends WorkerError {
  readonly category: ErrorCategory = 'state';
  readonly suggestion = 'Stop the worker first, or query its status instead.';

  constructor(public readonly workerName: string) {
    super(`Worker ${workerName} is already running`);
  }
}

export class NotRunningError extends WorkerError {
  readonly category: ErrorCategory = 'state';
  readonly suggestion = 'Start the worker before stopping it.';

  constructor(public readonly workerName: string) {
    super(`Worker ${workerName} is not running`);
  }
}

/**
 * Thrown when the operating system refuses to spawn a worker process.
 */
export class StartError extends WorkerError {
  readonly category: ErrorCategory = 'process';
  readonly suggestion = 'Check that the runner command exists and is executable.';

  constructor(
    public readonly workerName: string,
    cause: Error
  ) {
    super(`Failed to start worker ${workerName}: ${cause.message}`, cause);
  }
}

/**
 * Thrown when the liveness marker says a worker is running but no matching
 * process shows up in the process table.
 */
export class ProcessNotFoundError extends WorkerError {
  readonly category: ErrorCategory = 'process';
  readonly suggestion = 'The pid file may be stale or the pid reused. Remove the pid file if the worker is gone.';

  constructor(
    public readonly workerName: string,
    public readonly workerId: string
  ) {
    super(`Could not find process for worker ${workerName} (${workerId})`);
  }
}

/**
 * Wraps an error raised by a worker's doWork(). Logged, never propagated.
 */
export class WorkCycleError extends WorkerError {
  readonly category: ErrorCategory = 'work';
  readonly suggestion = 'The loop keeps running. Inspect the worker log for the failing cycle.';

  constructor(
    public readonly workerId: string,
    public readonly cycle: number,
    cause: Error
  ) {
    super(`Error in work cycle ${cycle} of ${workerId}: ${cause.message}`, cause);
  }
}

/**
 * Wraps a failure to write or remove status files. Logged, never propagated.
 */
export class StatusPersistenceError extends WorkerError {
  readonly category: ErrorCategory = 'persistence';
  readonly suggestion = 'Check that the stats directory exists and is writable.';

  constructor(
    public readonly workerId: string,
    public readonly path: string,
    cause: Error
  ) {
    super(`Error writing status files for ${workerId} at ${path}: ${cause.message}`, cause);
  }
}

/**
 * Type guard to check if an error is a worker framework error.
 */
export function isWorkerError(error: unknown): error is WorkerError {
  return error instanceof WorkerError;
}

/**
 * Extracts error category from any error.
 */
export function getErrorCategory(error: unknown): ErrorCategory | 'unknown' {
  if (isWorkerError(error)) {
    return error.category;
  }
  return 'unknown';
}

/**
 * Normalises anything thrown into an Error.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
