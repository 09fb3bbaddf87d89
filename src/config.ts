/**
 * Configuration for workers and the worker manager.
 *
 * Values come from, in increasing precedence: built-in defaults, environment
 * variables, explicit options.
 */

import path from 'path';
import { isLogLevel, type LogLevel } from './logger.js';

/**
 * JSON-compatible value accepted as a worker parameter.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Operator-supplied parameters consumed by a worker's business logic.
 */
export type WorkerParams = Record<string, JsonValue>;

/**
 * Immutable configuration held by a worker for its lifetime.
 */
export interface WorkerConfig {
  readonly workerId: string;

  /**
   * Directory for `<workerId>.log`.
   * Default: WORKER_LOG_DIR, then the current directory
   */
  readonly logDir: string;

  /**
   * Directory for `<workerId>.json`, `.stats` and `.pid`.
   * Default: WORKER_STATS_DIR, then logDir
   */
  readonly statsDir: string;

  /**
   * Seconds between the start of one cycle and the start of the next.
   * Default: 600
   */
  readonly waitSeconds: number;

  /**
   * Number of cycles after which the loop stops. `null` runs until cancelled.
   * Default: null
   */
  readonly maxCycles: number | null;

  readonly logLevel: LogLevel;

  readonly params: Readonly<WorkerParams>;
}

/**
 * Options accepted by a worker constructor. Everything is optional.
 */
export interface WorkerOptions {
  workerId?: string;
  logDir?: string;
  statsDir?: string;
  waitSeconds?: number;
  maxCycles?: number | null;
  logLevel?: LogLevel;
  params?: WorkerParams;

  /**
   * Register SIGINT/SIGTERM handlers while the loop runs.
   * Default: true
   */
  handleSignals?: boolean;
}

export const DEFAULT_WAIT_SECONDS = 600;

/**
 * Grace period between SIGTERM and SIGKILL when stopping a worker.
 */
export const DEFAULT_GRACE_PERIOD_MS = 5000;

type Env = Record<string, string | undefined>;

function parseNumberEnv(env: Env, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

/**
 * Builds a complete worker configuration from options, environment and
 * defaults.
 *
 * @param defaultWorkerId - id used when neither options nor env provide one
 */
export function resolveWorkerConfig(
  options: WorkerOptions,
  defaultWorkerId: string,
  env: Env = process.env
): WorkerConfig {
  const logDir = options.logDir ?? env.WORKER_LOG_DIR ?? process.cwd();
  const envLevel = env.WORKER_LOG_LEVEL;

  const config: WorkerConfig = {
    workerId: options.workerId || defaultWorkerId,
    logDir: path.resolve(logDir),
    statsDir: path.resolve(options.statsDir ?? env.WORKER_STATS_DIR ?? logDir),
    waitSeconds: options.waitSeconds ?? parseNumberEnv(env, 'WORKER_WAIT_SECONDS') ?? DEFAULT_WAIT_SECONDS,
    maxCycles:
      options.maxCycles !== undefined ? options.maxCycles : parseNumberEnv(env, 'WORKER_MAX_CYCLES') ?? null,
    logLevel: options.logLevel ?? (envLevel && isLogLevel(envLevel) ? envLevel : 'info'),
    params: Object.freeze({ ...(options.params ?? {}) }),
  };

  validateWorkerConfig(config);
  return Object.freeze(config);
}

/**
 * Validates worker configuration.
 *
 * @throws Error if configuration is invalid
 */
export function validateWorkerConfig(config: WorkerConfig): void {
  if (!config.workerId) {
    throw new Error('workerId must not be empty');
  }
  if (/[\\/]/.test(config.workerId)) {
    throw new Error(`workerId must not contain path separators: ${config.workerId}`);
  }
  if (!Number.isFinite(config.waitSeconds) || config.waitSeconds < 0) {
    throw new Error('waitSeconds must be non-negative');
  }
  if (config.maxCycles !== null && (!Number.isInteger(config.maxCycles) || config.maxCycles < 0)) {
    throw new Error('maxCycles must be a non-negative integer');
  }
}

/**
 * Directories used by the worker manager.
 */
export interface ManagerDirectories {
  logDir: string;
  statsDir: string;
}

/**
 * Resolves manager directories. Default log dir is `./logs`.
 */
export function resolveManagerDirectories(
  options: Partial<ManagerDirectories>,
  env: Env = process.env
): ManagerDirectories {
  const logDir = path.resolve(options.logDir ?? env.WORKER_LOG_DIR ?? path.join(process.cwd(), 'logs'));
  return {
    logDir,
    statsDir: path.resolve(options.statsDir ?? env.WORKER_STATS_DIR ?? logDir),
  };
}
