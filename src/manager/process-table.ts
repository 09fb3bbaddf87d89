/**
 * Access to the operating system's process table.
 *
 * The manager never talks to a worker directly; it reads pid files and
 * cross-checks them here. Tests substitute their own ProcessTable.
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import pidusage from 'pidusage';

const execFileAsync = promisify(execFile);

export interface ProcessEntry {
  pid: number;

  /**
   * Full command line, arguments joined by spaces.
   */
  command: string;
}

export interface ProcessTable {
  list(): Promise<ProcessEntry[]>;

  /**
   * Whether a process with this pid currently exists.
   */
  exists(pid: number): boolean;

  /**
   * Process start time in epoch seconds, or null when the process is gone.
   */
  startTime(pid: number): Promise<number | null>;

  kill(pid: number, signal: NodeJS.Signals): void;
}

const PS_LINE = /^\s*(\d+)\s+(\S.*?)\s*$/;

/**
 * Parses one line of `ps -axo pid=,command=` output.
 */
export function parsePsLine(line: string): ProcessEntry | null {
  const match = PS_LINE.exec(line);
  if (!match) {
    return null;
  }
  return {
    pid: Number(match[1]),
    command: match[2],
  };
}

/**
 * ProcessTable backed by `ps` for command lines, pidusage for process
 * metrics and process.kill() for signals.
 */
export class PsProcessTable implements ProcessTable {
  async list(): Promise<ProcessEntry[]> {
    const { stdout } = await execFileAsync('ps', ['-axo', 'pid=,command='], {
      maxBuffer: 16 * 1024 * 1024,
    });

    const entries: ProcessEntry[] = [];
    for (const line of stdout.split('\n')) {
      const entry = parsePsLine(line);
      if (entry) {
        entries.push(entry);
      }
    }
    return entries;
  }

  exists(pid: number): boolean {
    try {
      process.kill(pid, 0);
      return true;
    } catch (error) {
      // EPERM: the process exists but belongs to another user.
      return (error as NodeJS.ErrnoException).code === 'EPERM';
    }
  }

  async startTime(pid: number): Promise<number | null> {
    try {
      const stats = await pidusage(pid);
      return (stats.timestamp - stats.elapsed) / 1000;
    } catch {
      // pidusage rejects once the process has exited
      return null;
    }
  }

  kill(pid: number, signal: NodeJS.Signals): void {
    process.kill(pid, signal);
  }
}
