import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import { existsSync, readFileSync } from 'fs';
import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { NotRunningError } from '../src/errors.js';
import {
  createConsoleOutput,
  createFileOutput,
  createMemoryOutput,
  formatConsoleLine,
  formatDateTime,
  formatFileLine,
  WorkerLogger,
  type LogEntry,
} from '../src/logger.js';

const FIXED_TIME = new Date(2024, 0, 15, 9, 5, 3);

function entry(overrides: Partial<LogEntry> = {}): LogEntry {
  return {
    level: 'info',
    time: FIXED_TIME,
    channel: 'periodic_worker.feed_worker',
    message: 'hello',
    ...overrides,
  };
}

describe('WorkerLogger', () => {
  it('drops entries below the minimum level', () => {
    const output = createMemoryOutput();
    const logger = new WorkerLogger({ minLevel: 'warn', outputs: [output] });

    logger.debug('debug');
    logger.info('info');
    logger.warn('warn');
    logger.error('error');

    expect(output.entries.map((logged) => logged.level)).toEqual(['warn', 'error']);
  });

  it('attaches error details and category', () => {
    const output = createMemoryOutput();
    const logger = new WorkerLogger({ channel: 'test', outputs: [output] });

    logger.error('stop failed', new NotRunningError('feed'), { attempt: 2 });

    const [logged] = output.entries;
    expect(logged.channel).toBe('test');
    expect(logged.context).toEqual({ attempt: 2 });
    expect(logged.error?.name).toBe('NotRunningError');
    expect(logged.error?.message).toBe('Worker feed is not running');
    expect(logged.error?.category).toBe('state');
    expect(logged.error?.stack).toContain('NotRunningError: Worker feed is not running');
  });

  it('omits stack traces when disabled', () => {
    const output = createMemoryOutput();
    const logger = new WorkerLogger({ includeStackTraces: false, outputs: [output] });

    logger.error('failed', new Error('boom'));

    expect(output.entries[0].error).toEqual({ name: 'Error', message: 'boom', category: 'unknown' });
  });

  it('sends entries to outputs added later', () => {
    const first = createMemoryOutput();
    const second = createMemoryOutput();
    const logger = new WorkerLogger({ outputs: [first] });

    logger.info('before');
    logger.addOutput(second);
    logger.info('after');

    expect(first.entries).toHaveLength(2);
    expect(second.entries.map((logged) => logged.message)).toEqual(['after']);
  });

  it('keeps logging when one output throws', () => {
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => {});
    const output = createMemoryOutput();
    const logger = new WorkerLogger({
      channel: 'test',
      outputs: [
        () => {
          throw new Error('disk full');
        },
        output,
      ],
    });

    logger.info('still here');

    expect(output.entries).toHaveLength(1);
    expect(errorSpy).toHaveBeenCalledWith('Log output failed for test:', 'disk full');
    errorSpy.mockRestore();
  });
});

describe('formatting', () => {
  it('formats local date and time', () => {
    expect(formatDateTime(FIXED_TIME)).toBe('2024-01-15 09:05:03');
  });

  it('formats file lines with channel and context', () => {
    expect(formatFileLine(entry({ context: { cycle: 3 } }))).toBe(
      '2024-01-15 09:05:03 - periodic_worker.feed_worker - INFO - hello {"cycle":3}'
    );
  });

  it('formats console lines', () => {
    expect(formatConsoleLine(entry({ level: 'warn' }))).toBe('09:05:03 - WARN - hello');
  });

  it('appends the stack, or the error when there is none', () => {
    const withStack = entry({
      level: 'error',
      error: { name: 'Error', message: 'boom', category: 'unknown', stack: 'Error: boom\n    at here' },
    });
    const withoutStack = entry({
      level: 'error',
      error: { name: 'Error', message: 'boom', category: 'unknown' },
    });

    expect(formatConsoleLine(withStack)).toBe('09:05:03 - ERROR - hello\nError: boom\n    at here');
    expect(formatConsoleLine(withoutStack)).toBe('09:05:03 - ERROR - hello: Error: boom');
  });
});

describe('createConsoleOutput', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('writes info to stdout and warnings to stderr', () => {
    const logSpy = jest.spyOn(console, 'log').mockImplementation(() => {});
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => {});
    const output = createConsoleOutput();

    output(entry());
    output(entry({ level: 'warn', message: 'careful' }));

    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(logSpy.mock.calls[0][0]).toBe('09:05:03 - INFO - hello');
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(String(errorSpy.mock.calls[0][0])).toContain('09:05:03 - WARN - careful');
  });
});

describe('createFileOutput', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'test-logger-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('creates the directory and appends lines', () => {
    const filePath = join(dir, 'nested', 'feed_worker.log');
    const output = createFileOutput(filePath);

    output(entry({ message: 'one' }));
    output(entry({ message: 'two' }));

    expect(readFileSync(filePath, 'utf-8')).toBe(
      '2024-01-15 09:05:03 - periodic_worker.feed_worker - INFO - one\n' +
        '2024-01-15 09:05:03 - periodic_worker.feed_worker - INFO - two\n'
    );
  });

  it('rotates by size and keeps backupCount files', () => {
    const filePath = join(dir, 'feed_worker.log');
    // each line is 60 bytes: 33 bytes of prefix, 26 of message, newline
    const output = createFileOutput(filePath, { maxBytes: 100, backupCount: 2 });
    const line = (letter: string): string => `2024-01-15 09:05:03 - c - INFO - ${letter.repeat(26)}\n`;

    for (const letter of ['a', 'b', 'c', 'd']) {
      output(entry({ channel: 'c', message: letter.repeat(26) }));
    }

    expect(readFileSync(filePath, 'utf-8')).toBe(line('d'));
    expect(readFileSync(`${filePath}.1`, 'utf-8')).toBe(line('c'));
    expect(readFileSync(`${filePath}.2`, 'utf-8')).toBe(line('b'));
    expect(existsSync(`${filePath}.3`)).toBe(false);
  });
});
