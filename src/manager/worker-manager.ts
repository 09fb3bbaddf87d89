/**
 * WorkerManager - starts, stops and inspects worker processes
 *
 * Workers are registered under a logical name with a type reference
 * (`<module>#<Export>`). Each one runs as a detached child process launched
 * through the CLI's `run` command; afterwards the manager only observes it
 * through the status files and the OS process table.
 */

import { spawn, type ChildProcess } from 'child_process';
import path from 'path';
import { DEFAULT_GRACE_PERIOD_MS, resolveManagerDirectories, type WorkerParams } from '../config.js';
import {
  AlreadyRunningError,
  NotRunningError,
  ProcessNotFoundError,
  RegistrationError,
  StartError,
  UnknownWorkerError,
  toError,
} from '../errors.js';
import { WorkerLogger } from '../logger.js';
import { FileStatusStore } from '../monitoring/status-store.js';
import type { StatusSnapshot } from '../monitoring/types.js';
import { resolveWorkerType } from '../worker/registry.js';
import { isWorkerRunning } from './liveness.js';
import { PsProcessTable, type ProcessEntry, type ProcessTable } from './process-table.js';

/**
 * Flag added to every command line the manager launches. stop() only
 * signals processes that carry it.
 */
export const MANAGED_WORKER_FLAG = '--managed';

const UNIQUE_ID_PREFIX = 'worker_manager_';
const STOP_POLL_INTERVAL_MS = 100;

/**
 * Command used to launch the CLI. `run ...` arguments are appended.
 */
export interface RunnerCommand {
  command: string;
  args: string[];
}

export interface WorkerManagerOptions {
  /**
   * Default: WORKER_LOG_DIR, then ./logs
   */
  logDir?: string;

  /**
   * Default: WORKER_STATS_DIR, then logDir
   */
  statsDir?: string;

  /**
   * Default: the current Node binary running the bundled CLI (dist/cli.js)
   */
  runner?: RunnerCommand;

  processTable?: ProcessTable;

  /**
   * Time between SIGTERM and SIGKILL.
   * Default: 5000
   */
  gracePeriodMs?: number;

  logger?: WorkerLogger;
}

export interface WorkerStatus {
  name: string;
  status: 'running' | 'stopped';
  pid?: number;
  /** Process start time (epoch seconds) from the process table. */
  start_time?: number | null;
  /** Last stored snapshot, or an empty object when none exists. */
  stats: StatusSnapshot | Record<string, never>;
}

export interface StopResult {
  pid: number;
  /** True when the process ignored SIGTERM and was killed. */
  forced: boolean;
}

function defaultRunner(): RunnerCommand {
  // Bundled layout: dist/index.js next to dist/cli.js
  return { command: process.execPath, args: [path.join(__dirname, 'cli.js')] };
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class WorkerManager {
  readonly logDir: string;
  readonly statsDir: string;

  private readonly availableWorkers = new Map<string, string>();
  private readonly runner: RunnerCommand;
  private readonly processTable: ProcessTable;
  private readonly gracePeriodMs: number;
  private readonly logger: WorkerLogger;
  private readonly store: FileStatusStore;

  constructor(options: WorkerManagerOptions = {}) {
    const directories = resolveManagerDirectories(options);
    this.logDir = directories.logDir;
    this.statsDir = directories.statsDir;
    this.runner = options.runner ?? defaultRunner();
    this.processTable = options.processTable ?? new PsProcessTable();
    this.gracePeriodMs = options.gracePeriodMs ?? DEFAULT_GRACE_PERIOD_MS;
    this.logger = options.logger ?? new WorkerLogger({ channel: 'periodic_worker.manager' });
    this.store = new FileStatusStore(this.statsDir, this.logger);
  }

  /**
   * Registers a worker type under a logical name.
   *
   * @throws RegistrationError if the name contains whitespace or the reference
   * does not resolve to a worker class
   */
  async register(name: string, typeReference: string): Promise<void> {
    // stop() finds the process by the unique id as one command-line token
    if (!name || /\s/.test(name)) {
      throw new RegistrationError(
        name,
        typeReference,
        'worker names must be non-empty and contain no whitespace'
      );
    }
    try {
      await resolveWorkerType(typeReference);
    } catch (error) {
      const cause = toError(error);
      throw new RegistrationError(name, typeReference, cause.message, cause);
    }
    this.availableWorkers.set(name, typeReference);
    this.logger.debug(`Registered worker ${name}`, { typeReference });
  }

  /**
   * Worker id used for every worker this manager launches. Also the key of
   * its pid and status files.
   */
  getUniqueId(name: string): string {
    return `${UNIQUE_ID_PREFIX}${name}`;
  }

  listWorkers(): string[] {
    return [...this.availableWorkers.keys()];
  }

  /**
   * Launches a registered worker as a detached process.
   *
   * @returns pid of the launched process
   * @throws UnknownWorkerError, AlreadyRunningError, StartError
   */
  async start(name: string, params: WorkerParams = {}): Promise<number> {
    const typeReference = this.availableWorkers.get(name);
    if (typeReference === undefined) {
      throw new UnknownWorkerError(name, this.listWorkers());
    }
    if (await this.isRunning(name)) {
      throw new AlreadyRunningError(name);
    }

    const args = [
      ...this.runner.args,
      'run',
      '--worker-type', typeReference,
      '--worker-id', this.getUniqueId(name),
      '--log-dir', this.logDir,
      '--stats-dir', this.statsDir,
      '--worker-params', JSON.stringify(params),
      MANAGED_WORKER_FLAG,
    ];

    const pid = await new Promise<number>((resolve, reject) => {
      let child: ChildProcess;
      try {
        child = spawn(this.runner.command, args, {
          detached: true,
          stdio: 'ignore',
        });
      } catch (error) {
        reject(new StartError(name, toError(error)));
        return;
      }

      child.once('error', (error) => reject(new StartError(name, error)));
      child.once('spawn', () => {
        child.unref();
        if (child.pid === undefined) {
          reject(new StartError(name, new Error('spawned process has no pid')));
          return;
        }
        resolve(child.pid);
      });
    });

    this.logger.info(`Started worker ${name}`, { pid, workerId: this.getUniqueId(name) });
    return pid;
  }

  /**
   * Stops a running worker: SIGTERM, then SIGKILL after the grace period.
   *
   * @throws NotRunningError, ProcessNotFoundError
   */
  async stop(name: string): Promise<StopResult> {
    if (!(await this.isRunning(name))) {
      throw new NotRunningError(name);
    }

    const workerId = this.getUniqueId(name);
    const entry = await this.findProcess(workerId);
    if (!entry) {
      throw new ProcessNotFoundError(name, workerId);
    }

    this.logger.info(`Stopping worker ${name}`, { pid: entry.pid });
    if (!this.signal(entry.pid, 'SIGTERM')) {
      return { pid: entry.pid, forced: false };
    }

    const deadline = Date.now() + this.gracePeriodMs;
    while (Date.now() < deadline) {
      if (!this.processTable.exists(entry.pid)) {
        return { pid: entry.pid, forced: false };
      }
      await sleep(STOP_POLL_INTERVAL_MS);
    }

    if (!this.processTable.exists(entry.pid)) {
      return { pid: entry.pid, forced: false };
    }
    this.logger.warn(`Worker ${name} did not exit within ${this.gracePeriodMs}ms, killing it`, {
      pid: entry.pid,
    });
    this.signal(entry.pid, 'SIGKILL');
    return { pid: entry.pid, forced: true };
  }

  async isRunning(name: string): Promise<boolean> {
    return isWorkerRunning(this.getUniqueId(name), this.store, this.processTable);
  }

  /**
   * Liveness plus the stored snapshot. pid and start time come from the
   * process table, never from the snapshot.
   */
  async status(name: string): Promise<WorkerStatus> {
    const workerId = this.getUniqueId(name);
    const running = await this.isRunning(name);
    const stats = (await this.store.read(workerId)) ?? {};

    if (running) {
      const entry = await this.findProcess(workerId);
      if (entry) {
        return {
          name,
          status: 'running',
          pid: entry.pid,
          start_time: await this.processTable.startTime(entry.pid),
          stats,
        };
      }
    }

    return { name, status: 'stopped', stats };
  }

  async statusAll(): Promise<Record<string, WorkerStatus>> {
    const result: Record<string, WorkerStatus> = {};
    for (const name of this.availableWorkers.keys()) {
      result[name] = await this.status(name);
    }
    return result;
  }

  private async findProcess(workerId: string): Promise<ProcessEntry | undefined> {
    const entries = await this.processTable.list();
    return entries.find((entry) => {
      if (entry.pid === process.pid) {
        return false;
      }
      const tokens = entry.command.split(/\s+/);
      return tokens.includes(workerId) && tokens.includes(MANAGED_WORKER_FLAG);
    });
  }

  /**
   * Sends a signal. Returns false when the process is already gone.
   */
  private signal(pid: number, signal: NodeJS.Signals): boolean {
    try {
      this.processTable.kill(pid, signal);
      return true;
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ESRCH') {
        return false;
      }
      throw error;
    }
  }
}
