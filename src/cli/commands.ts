/**
 * Implementations of the `run` and `status` commands.
 *
 * They return their output and exit code instead of printing and exiting,
 * so the commander wiring in index.ts stays thin.
 */

import path from 'path';
import type { WorkerParams } from '../config.js';
import { toError } from '../errors.js';
import { isWorkerRunning } from '../manager/liveness.js';
import { PsProcessTable, type ProcessTable } from '../manager/process-table.js';
import { formatOperationLines } from '../monitoring/format.js';
import { FileStatusStore } from '../monitoring/status-store.js';
import type { StatusSnapshot } from '../monitoring/types.js';
import type { BaseWorker, WorkerType } from '../worker/base-worker.js';
import { resolveWorkerType } from '../worker/registry.js';
import {
  formatZodError,
  parseWorkerParams,
  runCommandSchema,
  statusCommandSchema,
  type RunCommandOptions,
  type StatusCommandOptions,
} from './schemas.js';

export interface CommandResult {
  exitCode: number;
  stdout: string[];
  stderr: string[];
}

function failure(message: string, stdout: string[] = []): CommandResult {
  return { exitCode: 1, stdout, stderr: [message] };
}

/**
 * Constructs the worker named by `--worker-type` and runs it to completion.
 */
export async function runCommand(rawOptions: RunCommandOptions): Promise<CommandResult> {
  const parsed = runCommandSchema.safeParse(rawOptions);
  if (!parsed.success) {
    return failure(`Error: ${formatZodError(parsed.error)}`);
  }
  const options = parsed.data;

  let params: WorkerParams;
  try {
    params = parseWorkerParams(options.workerParams);
  } catch (error) {
    return failure(`Error: ${toError(error).message}`);
  }

  let WorkerClass: WorkerType;
  try {
    WorkerClass = await resolveWorkerType(options.workerType);
  } catch (error) {
    return failure(`Error importing worker type '${options.workerType}': ${toError(error).message}`);
  }

  const stdout: string[] = [];
  if (options.verbose) {
    stdout.push(`Creating worker: ${options.workerType}`);
  }

  // Absent flags stay undefined so WORKER_* environment defaults apply.
  let worker: BaseWorker;
  try {
    worker = new WorkerClass({
      workerId: options.workerId,
      logDir: options.logDir,
      statsDir: options.statsDir,
      waitSeconds: options.waitSeconds,
      maxCycles: options.maxCycles,
      logLevel: options.verbose ? 'debug' : undefined,
      params,
    });
  } catch (error) {
    return failure(`Error creating worker: ${toError(error).message}`, stdout);
  }

  if (options.verbose) {
    const { config } = worker;
    stdout.push(`Log directory: ${config.logDir}`);
    stdout.push(`Stats directory: ${config.statsDir}`);
    stdout.push(`Wait seconds: ${config.waitSeconds}`);
    stdout.push(`Max cycles: ${config.maxCycles ?? 'unlimited'}`);
    stdout.push(`Worker parameters: ${JSON.stringify(config.params, null, 2)}`);
    stdout.push(`Starting worker with ID: ${worker.workerId}`);
  }

  await worker.run();
  return { exitCode: 0, stdout, stderr: [] };
}

type StatusWithLiveness = StatusSnapshot & { is_running: boolean };

/**
 * Text block for one worker.
 */
export function formatWorkerStatus(workerId: string, status: StatusSnapshot, running: boolean): string[] {
  const lines = [
    `Worker: ${workerId}`,
    `Status: ${status.status} (${running ? 'running' : 'stopped'})`,
    `Total Cycles: ${status.total_work_cycles}`,
  ];

  if (status.last_work_cycle_time) {
    lines.push(`Last Cycle: ${status.last_work_cycle_time.toFixed(2)}s`);
  }

  const operationLines = formatOperationLines(status.operations);
  if (operationLines.length > 0) {
    lines.push('Operations:');
    lines.push(...operationLines.map((line) => `  ${line}`));
  }
  return lines;
}

/**
 * Reports stored status for one worker id or for every worker in the stats
 * directory.
 */
export async function statusCommand(
  rawOptions: StatusCommandOptions,
  processTable: ProcessTable = new PsProcessTable()
): Promise<CommandResult> {
  const parsed = statusCommandSchema.safeParse(rawOptions);
  if (!parsed.success) {
    return failure(`Error: ${formatZodError(parsed.error)}`);
  }
  const options = parsed.data;

  const store = new FileStatusStore(path.resolve(options.statsDir));

  if (options.workerId) {
    const status = await store.read(options.workerId);
    if (!status) {
      return failure(`No status found for worker '${options.workerId}'`);
    }
    const running = await isWorkerRunning(options.workerId, store, processTable);
    if (options.format === 'json') {
      const withLiveness: StatusWithLiveness = { ...status, is_running: running };
      return { exitCode: 0, stdout: [JSON.stringify(withLiveness, null, 2)], stderr: [] };
    }
    return { exitCode: 0, stdout: formatWorkerStatus(options.workerId, status, running), stderr: [] };
  }

  const workerIds = await store.list();
  const workers: Array<{ workerId: string; status: StatusSnapshot; running: boolean }> = [];
  for (const workerId of workerIds) {
    const status = await store.read(workerId);
    if (status) {
      workers.push({ workerId, status, running: await isWorkerRunning(workerId, store, processTable) });
    }
  }

  if (workers.length === 0) {
    return { exitCode: 0, stdout: ['No worker status files found'], stderr: [] };
  }

  if (options.format === 'json') {
    const result: Record<string, StatusWithLiveness> = {};
    for (const { workerId, status, running } of workers) {
      result[workerId] = { ...status, is_running: running };
    }
    return { exitCode: 0, stdout: [JSON.stringify(result, null, 2)], stderr: [] };
  }

  const stdout: string[] = [];
  for (const { workerId, status, running } of workers) {
    stdout.push(...formatWorkerStatus(workerId, status, running), '');
  }
  return { exitCode: 0, stdout, stderr: [] };
}
