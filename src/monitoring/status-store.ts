/**
 * StatusStore - durable worker status and liveness markers
 *
 * Each worker id owns three files in the stats directory:
 * - `<id>.json`  structured snapshot
 * - `<id>.stats` human-readable rendering of the same snapshot
 * - `<id>.pid`   decimal process id, present while the worker runs
 *
 * Writes go through a temp file and a rename so readers never see a
 * half-written file. Reports are applied one at a time in call order, so
 * with concurrent operations the last report wins. Nothing here throws at
 * the worker: failures are logged and swallowed.
 */

import fs from 'fs/promises';
import path from 'path';
import { StatusPersistenceError, toError } from '../errors.js';
import { WorkerLogger } from '../logger.js';
import { formatStatus } from './format.js';
import { statusSnapshotSchema, type StatusSnapshot } from './types.js';

export interface StatusStore {
  /**
   * Persists a snapshot. Never rejects.
   */
  report(workerId: string, snapshot: StatusSnapshot): Promise<void>;

  /**
   * Last successfully written snapshot, or null when missing or unreadable.
   */
  read(workerId: string): Promise<StatusSnapshot | null>;

  writeLivenessMarker(workerId: string, pid: number): Promise<void>;

  removeLivenessMarker(workerId: string): Promise<void>;

  readLivenessMarker(workerId: string): Promise<number | null>;
}

const STATUS_EXTENSION = '.json';
const STATS_EXTENSION = '.stats';
const PID_EXTENSION = '.pid';

let tempFileCounter = 0;

/**
 * Writes `content` to `filePath` atomically. Every call gets its own temp file.
 */
async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  tempFileCounter += 1;
  const tempPath = `${filePath}.${process.pid}.${tempFileCounter}.tmp`;
  try {
    await fs.writeFile(tempPath, content, 'utf-8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

/**
 * File-based status store rooted at a stats directory.
 */
export class FileStatusStore implements StatusStore {
  private pendingReport: Promise<void> = Promise.resolve();

  constructor(
    public readonly statsDir: string,
    private readonly logger: WorkerLogger = new WorkerLogger({ channel: 'periodic_worker.status' })
  ) {}

  statusPath(workerId: string): string {
    return path.join(this.statsDir, `${workerId}${STATUS_EXTENSION}`);
  }

  statsPath(workerId: string): string {
    return path.join(this.statsDir, `${workerId}${STATS_EXTENSION}`);
  }

  pidPath(workerId: string): string {
    return path.join(this.statsDir, `${workerId}${PID_EXTENSION}`);
  }

  report(workerId: string, snapshot: StatusSnapshot): Promise<void> {
    const write = this.pendingReport.then(() => this.writeReport(workerId, snapshot));
    this.pendingReport = write;
    return write;
  }

  private async writeReport(workerId: string, snapshot: StatusSnapshot): Promise<void> {
    try {
      await fs.mkdir(this.statsDir, { recursive: true });
      await writeFileAtomic(this.statsPath(workerId), formatStatus(snapshot));
      await writeFileAtomic(this.statusPath(workerId), JSON.stringify(snapshot, null, 2));
    } catch (error) {
      this.logger.error(
        'Failed to persist worker status',
        new StatusPersistenceError(workerId, this.statsDir, toError(error))
      );
    }
  }

  async read(workerId: string): Promise<StatusSnapshot | null> {
    let content: string;
    try {
      content = await fs.readFile(this.statusPath(workerId), 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
        this.logger.warn(`Error reading status file for ${workerId}`, { error: toError(error).message });
      }
      return null;
    }

    try {
      const parsed = statusSnapshotSchema.safeParse(JSON.parse(content));
      if (!parsed.success) {
        this.logger.warn(`Ignoring invalid status file for ${workerId}`, {
          issues: parsed.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        });
        return null;
      }
      return parsed.data;
    } catch (error) {
      this.logger.warn(`Ignoring corrupt status file for ${workerId}`, { error: toError(error).message });
      return null;
    }
  }

  /**
   * Worker ids that have a structured status file, sorted.
   */
  async list(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.statsDir);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return [];
      }
      throw error;
    }
    return entries
      .filter((entry) => entry.endsWith(STATUS_EXTENSION))
      .map((entry) => entry.slice(0, -STATUS_EXTENSION.length))
      .sort();
  }

  async writeLivenessMarker(workerId: string, pid: number): Promise<void> {
    const pidPath = this.pidPath(workerId);
    try {
      await fs.mkdir(this.statsDir, { recursive: true });
      await writeFileAtomic(pidPath, String(pid));
      this.logger.debug(`PID file written: ${pidPath}`);
    } catch (error) {
      this.logger.error(
        'Error writing PID file',
        new StatusPersistenceError(workerId, pidPath, toError(error))
      );
    }
  }

  async removeLivenessMarker(workerId: string): Promise<void> {
    const pidPath = this.pidPath(workerId);
    try {
      await fs.rm(pidPath, { force: true });
      this.logger.debug(`PID file removed: ${pidPath}`);
    } catch (error) {
      this.logger.error(
        'Error removing PID file',
        new StatusPersistenceError(workerId, pidPath, toError(error))
      );
    }
  }

  async readLivenessMarker(workerId: string): Promise<number | null> {
    try {
      const content = await fs.readFile(this.pidPath(workerId), 'utf-8');
      const pid = Number.parseInt(content.trim(), 10);
      return Number.isInteger(pid) && pid > 0 ? pid : null;
    } catch {
      return null;
    }
  }
}
