/**
 * OperationTracker - per-operation counters and throughput rates
 *
 * Only successful attempts count. A failed attempt is logged and re-thrown,
 * leaving the counters untouched, so a growing cycle count with a flat
 * operation count is the visible sign of a failing worker.
 */

import { toError } from '../errors.js';
import type { WorkerLogger } from '../logger.js';
import { formatOperationLines } from './format.js';
import { systemClock, type Clock, type OperationStats } from './types.js';

/**
 * An attempt returned by begin(), passed back to end().
 */
export interface OperationHandle {
  readonly name: string;
  readonly startedAt: number;
}

export interface OperationTrackerOptions {
  logger: WorkerLogger;

  /**
   * Called after every successful completion, typically to publish status.
   */
  onCompleted?: (name: string, stats: OperationStats) => void | Promise<void>;

  clock?: Clock;
}

const SECONDS_PER_HOUR = 3600;

export class OperationTracker {
  private readonly operations = new Map<string, OperationStats>();
  private readonly logger: WorkerLogger;
  private readonly onCompleted?: OperationTrackerOptions['onCompleted'];
  private readonly clock: Clock;

  constructor(options: OperationTrackerOptions) {
    this.logger = options.logger;
    this.onCompleted = options.onCompleted;
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Marks the start of an attempt. The first attempt for a name sets the
   * baseline time for its rate.
   */
  begin(name: string): OperationHandle {
    const now = this.clock();
    if (!this.operations.has(name)) {
      this.operations.set(name, {
        count: 0,
        total_duration: 0,
        start_time: now,
        rate_per_hour: 0,
      });
    }
    return { name, startedAt: now };
  }

  /**
   * Closes an attempt. Must be called exactly once per begin().
   */
  async end(handle: OperationHandle, success: boolean, error?: unknown): Promise<void> {
    const stats = this.operations.get(handle.name);
    if (!stats) {
      throw new Error(`Operation ${handle.name} was never started`);
    }

    if (!success) {
      this.logger.error(`Error in operation ${handle.name}`, toError(error));
      return;
    }

    const endedAt = this.clock();
    stats.count += 1;
    stats.total_duration += endedAt - handle.startedAt;

    const elapsed = endedAt - stats.start_time;
    if (elapsed > 0) {
      stats.rate_per_hour = stats.count / (elapsed / SECONDS_PER_HOUR);
    }

    if (this.onCompleted) {
      await this.onCompleted(handle.name, { ...stats });
    }
  }

  /**
   * Runs `fn` as one attempt of `name`, re-throwing its failure.
   */
  async track<T>(name: string, fn: () => T | Promise<T>): Promise<T> {
    const handle = this.begin(name);
    let result: T;
    try {
      result = await fn();
    } catch (error) {
      await this.end(handle, false, error);
      throw error;
    }
    await this.end(handle, true);
    return result;
  }

  get(name: string): OperationStats | undefined {
    const stats = this.operations.get(name);
    return stats ? { ...stats } : undefined;
  }

  /**
   * Copy of every operation's stats, keyed by name.
   */
  snapshot(): Record<string, OperationStats> {
    const result: Record<string, OperationStats> = {};
    for (const [name, stats] of this.operations) {
      result[name] = { ...stats };
    }
    return result;
  }

  /**
   * One `<name>: <rate>/hour (<count> total)` line per operation.
   */
  summary(): string {
    if (this.operations.size === 0) {
      return 'No operations completed yet';
    }
    return formatOperationLines(this.snapshot()).join('\n');
  }
}
