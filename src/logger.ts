/**
 * Logging for worker processes.
 *
 * A WorkerLogger is created once per worker run and handed to every
 * extension point. Entries go to one or more outputs: the console and a
 * size-rotated log file named after the worker id.
 */

import { appendFileSync, existsSync, mkdirSync, renameSync, rmSync, statSync } from 'fs';
import { dirname } from 'path';
import chalk from 'chalk';
import { getErrorCategory } from './errors.js';

/**
 * Log levels for filtering and prioritization.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured log entry.
 */
export interface LogEntry {
  level: LogLevel;

  /**
   * Wall-clock time the entry was created.
   */
  time: Date;

  /**
   * Logger channel, e.g. `periodic_worker.<worker id>`.
   */
  channel: string;

  message: string;

  error?: {
    name: string;
    message: string;
    category: string;
    stack?: string;
  };

  context?: Record<string, unknown>;
}

export type LogOutput = (entry: LogEntry) => void;

/**
 * Logger configuration.
 */
export interface LoggerConfig {
  /**
   * Channel name written on every line.
   * Default: 'periodic_worker'
   */
  channel: string;

  /**
   * Minimum log level to output.
   * Default: 'info'
   */
  minLevel: LogLevel;

  /**
   * Whether to include stack traces in error logs.
   * Default: true
   */
  includeStackTraces: boolean;

  /**
   * Destinations for every entry that passes the level filter.
   * Default: console only
   */
  outputs: LogOutput[];
}

export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVEL_PRIORITY;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Formats a date as `YYYY-MM-DD HH:MM:SS` in local time.
 */
export function formatDateTime(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    formatTime(date)
  );
}

/**
 * Formats a date as `HH:MM:SS` in local time.
 */
export function formatTime(date: Date): string {
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

function renderMessage(entry: LogEntry): string {
  let text = entry.message;
  if (entry.context && Object.keys(entry.context).length > 0) {
    text += ` ${JSON.stringify(entry.context)}`;
  }
  if (entry.error?.stack) {
    text += `\n${entry.error.stack}`;
  } else if (entry.error) {
    text += `: ${entry.error.name}: ${entry.error.message}`;
  }
  return text;
}

/**
 * Renders an entry as a log file line.
 */
export function formatFileLine(entry: LogEntry): string {
  return `${formatDateTime(entry.time)} - ${entry.channel} - ${entry.level.toUpperCase()} - ${renderMessage(entry)}`;
}

/**
 * Renders an entry as a console line.
 */
export function formatConsoleLine(entry: LogEntry): string {
  return `${formatTime(entry.time)} - ${entry.level.toUpperCase()} - ${renderMessage(entry)}`;
}

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  debug: chalk.dim,
  info: (text) => text,
  warn: chalk.yellow,
  error: chalk.red,
};

/**
 * Console output. Warnings and errors go to stderr.
 */
export function createConsoleOutput(): LogOutput {
  return (entry) => {
    const line = LEVEL_COLORS[entry.level](formatConsoleLine(entry));
    if (entry.level === 'warn' || entry.level === 'error') {
      console.error(line);
    } else {
      console.log(line);
    }
  };
}

export interface FileOutputOptions {
  /**
   * Size at which the file is rotated.
   * Default: 10 MiB
   */
  maxBytes: number;

  /**
   * Number of rotated files kept (`<file>.1` is the newest).
   * Default: 5
   */
  backupCount: number;
}

export const DEFAULT_FILE_OUTPUT_OPTIONS: FileOutputOptions = {
  maxBytes: 10 * 1024 * 1024,
  backupCount: 5,
};

/**
 * Rotates `<file>` to `<file>.1`, shifting older backups up and dropping the
 * one past `backupCount`.
 */
function rotate(filePath: string, backupCount: number): void {
  if (backupCount <= 0) {
    rmSync(filePath, { force: true });
    return;
  }
  rmSync(`${filePath}.${backupCount}`, { force: true });
  for (let index = backupCount - 1; index >= 1; index--) {
    const source = `${filePath}.${index}`;
    if (existsSync(source)) {
      renameSync(source, `${filePath}.${index + 1}`);
    }
  }
  renameSync(filePath, `${filePath}.1`);
}

/**
 * Appends entries to a log file, rotating it by size. Writes are synchronous
 * so the last lines before process exit reach the file.
 */
export function createFileOutput(
  filePath: string,
  options: Partial<FileOutputOptions> = {}
): LogOutput {
  const { maxBytes, backupCount } = { ...DEFAULT_FILE_OUTPUT_OPTIONS, ...options };
  mkdirSync(dirname(filePath), { recursive: true });

  return (entry) => {
    const line = `${formatFileLine(entry)}\n`;
    if (existsSync(filePath) && statSync(filePath).size + Buffer.byteLength(line) > maxBytes) {
      rotate(filePath, backupCount);
    }
    appendFileSync(filePath, line);
  };
}

const DEFAULT_CONFIG: LoggerConfig = {
  channel: 'periodic_worker',
  minLevel: 'info',
  includeStackTraces: true,
  outputs: [createConsoleOutput()],
};

/**
 * Worker logger with pluggable outputs.
 */
export class WorkerLogger {
  private config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.config.outputs = [...this.config.outputs];
  }

  get channel(): string {
    return this.config.channel;
  }

  /**
   * Attaches another destination, e.g. the worker's log file once it is open.
   */
  addOutput(output: LogOutput): void {
    this.config.outputs.push(output);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, { context });
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, { context });
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, { context });
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('error', message, { error, context });
  }

  private log(
    level: LogLevel,
    message: string,
    options: { error?: Error; context?: Record<string, unknown> } = {}
  ): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.config.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      level,
      time: new Date(),
      channel: this.config.channel,
      message,
      context: options.context,
    };

    if (options.error) {
      const error = options.error;
      entry.error = {
        name: error.name,
        message: error.message,
        category: getErrorCategory(error),
      };
      if (this.config.includeStackTraces && error.stack) {
        entry.error.stack = error.stack;
      }
    }

    for (const output of this.config.outputs) {
      try {
        output(entry);
      } catch (outputError) {
        // A broken sink must not take the worker down; report on stderr instead.
        console.error(
          `Log output failed for ${this.config.channel}:`,
          outputError instanceof Error ? outputError.message : String(outputError)
        );
      }
    }
  }
}

/**
 * Collects entries in memory. Useful as an output in tests and embedding code.
 */
export function createMemoryOutput(): LogOutput & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const output = (entry: LogEntry): void => {
    entries.push(entry);
  };
  return Object.assign(output, { entries });
}
