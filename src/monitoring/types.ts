/**
 * Status snapshot shapes written to `<worker_id>.json`.
 *
 * Field names are snake_case because they are the on-disk format read by
 * other tools. Times are epoch seconds, durations seconds.
 */

import { z } from 'zod';

export type WorkerPhase = 'initializing' | 'running' | 'waiting' | 'stopped';

export interface OperationStats {
  count: number;
  total_duration: number;
  /** First invocation time, the baseline for rate_per_hour. */
  start_time: number;
  rate_per_hour: number;
}

export interface CycleStats {
  worker_id: string;
  status: WorkerPhase;
  total_work_cycles: number;
  total_processing_time: number;
  last_work_cycle_time: number;
  last_work_cycle_start: number;
  last_work_cycle_end: number;
  /** Start of the first cycle; null until one has run. */
  start_time: number | null;
}

export interface StatusSnapshot extends CycleStats {
  operations: Record<string, OperationStats>;
  /** Capture time of this snapshot. */
  timestamp: number;
}

const operationStatsSchema = z.object({
  count: z.number(),
  total_duration: z.number(),
  start_time: z.number(),
  rate_per_hour: z.number(),
});

export const statusSnapshotSchema = z.object({
  worker_id: z.string(),
  status: z.enum(['initializing', 'running', 'waiting', 'stopped']),
  total_work_cycles: z.number(),
  total_processing_time: z.number(),
  last_work_cycle_time: z.number(),
  last_work_cycle_start: z.number(),
  last_work_cycle_end: z.number(),
  start_time: z.number().nullable(),
  operations: z.record(operationStatsSchema),
  timestamp: z.number(),
});

/**
 * Current time in epoch seconds.
 */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now() / 1000;
