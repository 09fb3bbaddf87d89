/**
 * BaseWorker - the periodic worker loop
 *
 * Drives one worker through its lifecycle:
 *
 *   initializing -> running -> (waiting <-> running)* -> stopped
 *
 * Subclasses implement getWorkerId() and doWork(), and may implement setup()
 * and cleanup(). The framework runs its own setup/cleanup steps around those
 * hooks, so an override extends the default behaviour and cannot drop it.
 *
 * Each worker process publishes its status to the StatusStore after every
 * cycle and every successful tracked operation, and keeps a pid file while
 * it runs.
 */

import { mkdirSync } from 'fs';
import path from 'path';
import {
  resolveWorkerConfig,
  type WorkerConfig,
  type WorkerOptions,
  type WorkerParams,
} from '../config.js';
import { WorkCycleError, toError } from '../errors.js';
import { WorkerLogger, createConsoleOutput, createFileOutput } from '../logger.js';
import { OperationTracker } from '../monitoring/operation-tracker.js';
import { FileStatusStore, type StatusStore } from '../monitoring/status-store.js';
import { systemClock, type Clock, type CycleStats, type StatusSnapshot } from '../monitoring/types.js';
import { ShutdownController } from './shutdown.js';

/**
 * What every extension point receives. `logger` is the single logging sink
 * for this worker run.
 */
export interface WorkerContext {
  workerId: string;
  config: WorkerConfig;
  params: Readonly<WorkerParams>;
  logger: WorkerLogger;
}

export interface BaseWorkerOptions extends WorkerOptions {
  /**
   * Where status snapshots and the pid file go.
   * Default: FileStatusStore on config.statsDir
   */
  statusStore?: StatusStore;

  /**
   * Echo log lines to the console in addition to the log file.
   * Default: true
   */
  logToConsole?: boolean;

  clock?: Clock;
}

/**
 * A concrete worker class, as resolved from a type reference.
 */
export type WorkerType = new (options?: BaseWorkerOptions) => BaseWorker;

export abstract class BaseWorker {
  readonly workerId: string;
  readonly config: WorkerConfig;
  readonly logger: WorkerLogger;

  protected readonly statusStore: StatusStore;
  protected readonly tracker: OperationTracker;

  private readonly shutdown = new ShutdownController();
  private readonly handleSignals: boolean;
  private readonly clock: Clock;
  private readonly stats: CycleStats;
  private started = false;

  constructor(options: BaseWorkerOptions = {}) {
    this.config = resolveWorkerConfig(options, this.getWorkerId());
    this.workerId = this.config.workerId;
    this.handleSignals = options.handleSignals ?? true;
    this.clock = options.clock ?? systemClock;

    this.logger = new WorkerLogger({
      channel: `periodic_worker.${this.workerId}`,
      minLevel: this.config.logLevel,
      outputs: options.logToConsole === false ? [] : [createConsoleOutput()],
    });
    this.statusStore = options.statusStore ?? new FileStatusStore(this.config.statsDir, this.logger);
    this.tracker = new OperationTracker({
      logger: this.logger,
      clock: this.clock,
      onCompleted: () => this.publishStatus(),
    });

    this.stats = {
      worker_id: this.workerId,
      status: 'initializing',
      total_work_cycles: 0,
      total_processing_time: 0,
      last_work_cycle_time: 0,
      last_work_cycle_start: 0,
      last_work_cycle_end: 0,
      start_time: null,
    };
  }

  /**
   * Default identifier for this worker type. Called from the constructor,
   * so it must not depend on subclass fields.
   */
  abstract getWorkerId(): string;

  /**
   * One unit of work. Errors are logged and the loop carries on.
   */
  abstract doWork(context: WorkerContext): Promise<void> | void;

  /**
   * Runs once before the first cycle.
   */
  setup(_context: WorkerContext): Promise<void> | void {}

  /**
   * Runs once when the loop stops, whatever stopped it.
   */
  cleanup(_context: WorkerContext): Promise<void> | void {}

  get params(): Readonly<WorkerParams> {
    return this.config.params;
  }

  get context(): WorkerContext {
    return {
      workerId: this.workerId,
      config: this.config,
      params: this.config.params,
      logger: this.logger,
    };
  }

  get phase(): CycleStats['status'] {
    return this.stats.status;
  }

  /**
   * Asks the loop to stop at the next checkpoint. In-flight work finishes.
   */
  requestShutdown(): void {
    this.shutdown.request();
  }

  isShutdownRequested(): boolean {
    return this.shutdown.isRequested;
  }

  /**
   * Tracks `fn` as one attempt of the named operation. Failed attempts are
   * not counted and the error is re-thrown.
   *
   * @example
   * await this.trackOperation('process_articles', async () => {
   *   await processArticles();
   * });
   */
  trackOperation<T>(name: string, fn: () => T | Promise<T>): Promise<T> {
    return this.tracker.track(name, fn);
  }

  /**
   * Alias of trackOperation().
   */
  calcOne<T>(name: string, fn: () => T | Promise<T>): Promise<T> {
    return this.trackOperation(name, fn);
  }

  /**
   * Fresh snapshot of cycle and operation stats.
   */
  getStatus(): StatusSnapshot {
    return {
      ...this.stats,
      operations: this.tracker.snapshot(),
      timestamp: this.clock(),
    };
  }

  getStatusString(): string {
    return this.tracker.summary();
  }

  /**
   * Main worker loop. Resolves once the worker has stopped.
   */
  async run(): Promise<void> {
    if (this.started) {
      throw new Error(`Worker ${this.workerId} has already been run`);
    }
    this.started = true;

    let removeSignalHandlers: (() => void) | null = null;

    try {
      this.openLogFile();

      if (this.handleSignals) {
        removeSignalHandlers = this.shutdown.installSignalHandlers((signal) => {
          this.logger.info(`Received signal ${signal}. Requesting shutdown...`);
        });
      }

      await this.statusStore.writeLivenessMarker(this.workerId, process.pid);

      this.logger.info(`Starting ${this.constructor.name} worker`);
      this.logger.info(`Worker ID: ${this.workerId}`);
      this.logger.info(`Wait time: ${this.config.waitSeconds} seconds`);
      this.logger.info(`Max cycles: ${this.config.maxCycles ?? 'unlimited'}`);

      this.stats.status = 'running';
      await this.runSetup();
      await this.runCycles();
    } catch (error) {
      this.logger.error('Unexpected error in worker', toError(error));
    } finally {
      this.stats.status = 'stopped';
      try {
        await this.publishStatus();
      } catch (error) {
        this.logger.error('Error publishing final status', toError(error));
      }
      await this.runCleanup();
      try {
        await this.statusStore.removeLivenessMarker(this.workerId);
      } catch (error) {
        this.logger.error('Error removing liveness marker', toError(error));
      }
      if (removeSignalHandlers) {
        removeSignalHandlers();
      }
      this.logger.info(`Worker ${this.workerId} stopped`);
    }
  }

  private openLogFile(): void {
    mkdirSync(this.config.logDir, { recursive: true });
    mkdirSync(this.config.statsDir, { recursive: true });

    const logFile = path.join(this.config.logDir, `${this.workerId}.log`);
    this.logger.addOutput(createFileOutput(logFile));
    this.logger.info(`Logging initialized for worker ${this.workerId}`);
    this.logger.info(`Log file: ${logFile}`);
  }

  private async runSetup(): Promise<void> {
    try {
      await this.setup(this.context);
    } catch (error) {
      // Setup failures are not fatal: the loop still runs its cycles.
      this.logger.error('Error in worker setup', toError(error));
    }
    this.logger.info('Worker setup completed');
  }

  private async runCleanup(): Promise<void> {
    try {
      await this.cleanup(this.context);
    } catch (error) {
      this.logger.error('Error in worker cleanup', toError(error));
    }
    this.logger.info('Worker cleanup completed');
  }

  private async runCycles(): Promise<void> {
    const { maxCycles, waitSeconds } = this.config;
    let cycleCount = 0;

    while (!this.shutdown.isRequested) {
      if (maxCycles !== null && cycleCount >= maxCycles) {
        this.logger.info(`Reached max cycles limit (${maxCycles})`);
        break;
      }

      this.stats.status = 'running';
      const startTime = this.clock();
      try {
        this.logger.info(`Starting work cycle ${cycleCount + 1}`);
        await this.doWork(this.context);
        this.logger.info('Work cycle completed successfully');
      } catch (error) {
        this.logger.error(
          'Error in work cycle',
          new WorkCycleError(this.workerId, cycleCount + 1, toError(error))
        );
      }
      const endTime = this.clock();

      this.updateCycleStats(startTime, endTime);
      cycleCount += 1;

      this.stats.status = 'waiting';
      await this.publishStatus();

      if (!this.shutdown.isRequested && waitSeconds > 0) {
        const sleepSeconds = Math.max(0, waitSeconds - (endTime - startTime));
        this.logger.info(`Waiting ${sleepSeconds.toFixed(1)} seconds before next cycle`);
        await this.shutdown.sleep(sleepSeconds * 1000);
      }
    }
  }

  private updateCycleStats(startTime: number, endTime: number): void {
    const processingTime = endTime - startTime;
    this.stats.total_work_cycles += 1;
    this.stats.total_processing_time += processingTime;
    this.stats.last_work_cycle_time = processingTime;
    this.stats.last_work_cycle_start = startTime;
    this.stats.last_work_cycle_end = endTime;
    if (this.stats.start_time === null) {
      this.stats.start_time = startTime;
    }
  }

  private publishStatus(): Promise<void> {
    return this.statusStore.report(this.workerId, this.getStatus());
  }
}
