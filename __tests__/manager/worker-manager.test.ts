import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import type { ChildProcess } from 'child_process';
import { EventEmitter } from 'events';
import { existsSync } from 'fs';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';

jest.mock('child_process', () => ({
  spawn: jest.fn(),
  execFile: jest.fn(),
}));

import { spawn } from 'child_process';
import {
  AlreadyRunningError,
  NotRunningError,
  ProcessNotFoundError,
  RegistrationError,
  StartError,
  UnknownWorkerError,
} from '../../src/errors.js';
import { WorkerLogger } from '../../src/logger.js';
import type { ProcessEntry, ProcessTable } from '../../src/manager/process-table.js';
import { WorkerManager } from '../../src/manager/worker-manager.js';
import { FileStatusStore } from '../../src/monitoring/status-store.js';
import type { StatusSnapshot } from '../../src/monitoring/types.js';

const mockSpawn = jest.mocked(spawn);

const FIXTURE_MODULE = join(__dirname, '..', 'fixtures', 'workers.ts');
const COUNTER_REF = `${FIXTURE_MODULE}#CounterWorker`;
const WORKER_PID = 4242;

/**
 * In-memory process table. Processes exit on SIGTERM unless told otherwise.
 */
class FakeProcessTable implements ProcessTable {
  entries: ProcessEntry[] = [];
  startTimes = new Map<number, number>();
  alive = new Set<number>();
  signals: Array<{ pid: number; signal: NodeJS.Signals }> = [];
  ignoreSigterm = false;

  addProcess(pid: number, command: string, startTime: number | null = null): void {
    this.entries.push({ pid, command });
    if (startTime !== null) {
      this.startTimes.set(pid, startTime);
    }
    this.alive.add(pid);
  }

  async list(): Promise<ProcessEntry[]> {
    return this.entries.filter((entry) => this.alive.has(entry.pid));
  }

  exists(pid: number): boolean {
    return this.alive.has(pid);
  }

  async startTime(pid: number): Promise<number | null> {
    return this.alive.has(pid) ? this.startTimes.get(pid) ?? null : null;
  }

  kill(pid: number, signal: NodeJS.Signals): void {
    if (!this.alive.has(pid)) {
      throw Object.assign(new Error(`kill ESRCH`), { code: 'ESRCH' });
    }
    this.signals.push({ pid, signal });
    if (signal === 'SIGKILL' || !this.ignoreSigterm) {
      this.alive.delete(pid);
    }
  }
}

function createMockChild(pid: number | undefined): ChildProcess {
  const child = new EventEmitter() as ChildProcess;
  Object.assign(child, { pid, unref: jest.fn() });
  return child;
}

function managedCommand(workerId: string): string {
  return `node cli.js run --worker-type ${COUNTER_REF} --worker-id ${workerId} --managed`;
}

describe('WorkerManager', () => {
  let logDir: string;
  let processTable: FakeProcessTable;
  let manager: WorkerManager;

  beforeEach(async () => {
    jest.clearAllMocks();
    logDir = await mkdtemp(join(tmpdir(), 'test-worker-manager-'));
    processTable = new FakeProcessTable();
    manager = new WorkerManager({
      logDir,
      runner: { command: 'node', args: ['cli.js'] },
      processTable,
      logger: new WorkerLogger({ outputs: [] }),
    });
    await manager.register('counter', COUNTER_REF);
  });

  afterEach(async () => {
    await rm(logDir, { recursive: true, force: true });
  });

  async function simulateRunning(name: string, command?: string): Promise<void> {
    const workerId = manager.getUniqueId(name);
    await writeFile(join(logDir, `${workerId}.pid`), String(WORKER_PID), 'utf-8');
    processTable.addProcess(WORKER_PID, command ?? managedCommand(workerId), 1700000000);
  }

  describe('register', () => {
    it('lists registered workers', async () => {
      await manager.register('counter_default', FIXTURE_MODULE);

      expect(manager.listWorkers()).toEqual(['counter', 'counter_default']);
    });

    it('rejects names containing whitespace', async () => {
      const registering = manager.register('daily report', COUNTER_REF);

      await expect(registering).rejects.toBeInstanceOf(RegistrationError);
      await expect(registering).rejects.toThrow(
        `Cannot register worker daily report (${COUNTER_REF}): worker names must be non-empty and contain no whitespace`
      );
      expect(manager.listWorkers()).toEqual(['counter']);
    });

    it('rejects references that are not worker classes', async () => {
      const registering = manager.register('broken', `${FIXTURE_MODULE}#NotAWorker`);

      await expect(registering).rejects.toBeInstanceOf(RegistrationError);
      await expect(registering).rejects.toThrow(
        `Cannot register worker broken (${FIXTURE_MODULE}#NotAWorker): NotAWorker in ${FIXTURE_MODULE} is not a worker class`
      );
      expect(manager.listWorkers()).toEqual(['counter']);
    });
  });

  it('derives the unique id from the name', () => {
    expect(manager.getUniqueId('counter')).toBe('worker_manager_counter');
  });

  it('defaults statsDir to logDir', () => {
    expect(manager.statsDir).toBe(logDir);
  });

  describe('start', () => {
    it('rejects unknown workers without spawning', async () => {
      const starting = manager.start('missing');

      await expect(starting).rejects.toBeInstanceOf(UnknownWorkerError);
      await expect(starting).rejects.toThrow('Unknown worker: missing. Available workers: counter');
      expect(mockSpawn).not.toHaveBeenCalled();
    });

    it('spawns a detached managed worker process', async () => {
      const child = createMockChild(5151);
      mockSpawn.mockImplementation(() => {
        setImmediate(() => child.emit('spawn'));
        return child;
      });

      await expect(manager.start('counter', { batch_size: 5 })).resolves.toBe(5151);

      expect(mockSpawn).toHaveBeenCalledWith(
        'node',
        [
          'cli.js',
          'run',
          '--worker-type',
          COUNTER_REF,
          '--worker-id',
          'worker_manager_counter',
          '--log-dir',
          logDir,
          '--stats-dir',
          logDir,
          '--worker-params',
          '{"batch_size":5}',
          '--managed',
        ],
        { detached: true, stdio: 'ignore' }
      );
      expect(child.unref).toHaveBeenCalled();
    });

    it('serialises empty params as {}', async () => {
      mockSpawn.mockImplementation(() => {
        const child = createMockChild(5151);
        setImmediate(() => child.emit('spawn'));
        return child;
      });

      await manager.start('counter');

      const args = mockSpawn.mock.calls[0][1];
      expect(args?.[args.indexOf('--worker-params') + 1]).toBe('{}');
    });

    it('refuses to start a running worker', async () => {
      await simulateRunning('counter');

      await expect(manager.start('counter')).rejects.toBeInstanceOf(AlreadyRunningError);
      expect(mockSpawn).not.toHaveBeenCalled();
    });

    it('wraps spawn error events', async () => {
      mockSpawn.mockImplementation(() => {
        const child = createMockChild(undefined);
        setImmediate(() => child.emit('error', new Error('spawn node ENOENT')));
        return child;
      });

      const starting = manager.start('counter');

      await expect(starting).rejects.toBeInstanceOf(StartError);
      await expect(starting).rejects.toThrow('Failed to start worker counter: spawn node ENOENT');
    });

    it('wraps synchronous spawn failures', async () => {
      mockSpawn.mockImplementation(() => {
        throw new Error('spawn EACCES');
      });

      await expect(manager.start('counter')).rejects.toThrow(
        'Failed to start worker counter: spawn EACCES'
      );
    });
  });

  describe('stop', () => {
    it('rejects workers that are not running', async () => {
      await expect(manager.stop('counter')).rejects.toBeInstanceOf(NotRunningError);
      expect(processTable.signals).toEqual([]);
    });

    it('only signals processes that carry the managed flag', async () => {
      await simulateRunning('counter', 'node cli.js run --worker-id worker_manager_counter');

      const stopping = manager.stop('counter');

      await expect(stopping).rejects.toBeInstanceOf(ProcessNotFoundError);
      await expect(stopping).rejects.toThrow(
        'Could not find process for worker counter (worker_manager_counter)'
      );
      expect(processTable.signals).toEqual([]);
    });

    it('does not match a worker whose id merely starts with the unique id', async () => {
      await simulateRunning('counter', managedCommand('worker_manager_counter_eu'));

      await expect(manager.stop('counter')).rejects.toBeInstanceOf(ProcessNotFoundError);
    });

    it('stops a worker with SIGTERM', async () => {
      await simulateRunning('counter');

      await expect(manager.stop('counter')).resolves.toEqual({ pid: WORKER_PID, forced: false });
      expect(processTable.signals).toEqual([{ pid: WORKER_PID, signal: 'SIGTERM' }]);
    });

    it('kills a worker that ignores SIGTERM after the grace period', async () => {
      manager = new WorkerManager({
        logDir,
        runner: { command: 'node', args: ['cli.js'] },
        processTable,
        gracePeriodMs: 200,
        logger: new WorkerLogger({ outputs: [] }),
      });
      await manager.register('counter', COUNTER_REF);
      await simulateRunning('counter');
      processTable.ignoreSigterm = true;

      await expect(manager.stop('counter')).resolves.toEqual({ pid: WORKER_PID, forced: true });
      expect(processTable.signals).toEqual([
        { pid: WORKER_PID, signal: 'SIGTERM' },
        { pid: WORKER_PID, signal: 'SIGKILL' },
      ]);
    });
  });

  describe('isRunning', () => {
    it('is false without a pid file', async () => {
      await expect(manager.isRunning('counter')).resolves.toBe(false);
    });

    it('is true when the recorded pid is alive', async () => {
      await simulateRunning('counter');

      await expect(manager.isRunning('counter')).resolves.toBe(true);
    });

    it('treats a stale pid file as not running and leaves it in place', async () => {
      await simulateRunning('counter');
      processTable.alive.delete(WORKER_PID);

      await expect(manager.isRunning('counter')).resolves.toBe(false);
      expect(existsSync(join(logDir, 'worker_manager_counter.pid'))).toBe(true);
    });
  });

  describe('status', () => {
    const snapshot: StatusSnapshot = {
      worker_id: 'worker_manager_counter',
      status: 'waiting',
      total_work_cycles: 2,
      total_processing_time: 0.4,
      last_work_cycle_time: 0.2,
      last_work_cycle_start: 1700000010,
      last_work_cycle_end: 1700000010.2,
      start_time: 1700000000,
      operations: {},
      timestamp: 1700000011,
    };

    it('reports a running worker with its process details', async () => {
      await new FileStatusStore(logDir).report('worker_manager_counter', snapshot);
      await simulateRunning('counter');

      await expect(manager.status('counter')).resolves.toEqual({
        name: 'counter',
        status: 'running',
        pid: WORKER_PID,
        start_time: 1700000000,
        stats: snapshot,
      });
    });

    it('reports a stopped worker with its last snapshot', async () => {
      await new FileStatusStore(logDir).report('worker_manager_counter', snapshot);

      await expect(manager.status('counter')).resolves.toEqual({
        name: 'counter',
        status: 'stopped',
        stats: snapshot,
      });
    });

    it('reports empty stats for a worker that never ran', async () => {
      await expect(manager.status('counter')).resolves.toEqual({
        name: 'counter',
        status: 'stopped',
        stats: {},
      });
    });

    it('covers every registered worker', async () => {
      await manager.register('counter_default', FIXTURE_MODULE);
      await simulateRunning('counter');

      const all = await manager.statusAll();

      expect(Object.keys(all)).toEqual(['counter', 'counter_default']);
      expect(all.counter.status).toBe('running');
      expect(all.counter_default.status).toBe('stopped');
    });
  });
});
