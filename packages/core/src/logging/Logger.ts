/**
 * Logger - leveled run log for demeter-lint.
 *
 * A RunLogger hands each entry to its targets, and every target has its
 * own threshold: the terminal target writes to stderr (stdout carries the
 * report), the file target keeps a timestamped log of the whole run.
 * Context is rendered as `key=value` pairs.
 *
 *   const logger = createLogger('info', { logFile: '.demeter-lint/check.log' });
 *   logger.info('Checking files', { count: 150 });
 *   // [INFO] Checking files count=150
 *   await logger.close();
 */

import { createWriteStream, mkdirSync, statSync, type WriteStream } from 'fs';
import { dirname, resolve } from 'path';
import type { Logger, LogLevel } from '@demeter-lint/types';

export type { Logger, LogLevel };

export type LogSeverity = 'error' | 'warn' | 'info' | 'debug' | 'trace';

/** Most verbose severity each level lets through */
const LEVEL_LIMIT: Record<LogLevel, number> = {
  silent: 0,
  errors: 1,
  warnings: 2,
  info: 3,
  debug: 5,
};

const SEVERITY_RANK: Record<LogSeverity, number> = {
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
  trace: 5,
};

export interface LogEntry {
  severity: LogSeverity;
  message: string;
  context?: Record<string, unknown>;
}

export interface LogTarget {
  readonly level: LogLevel;
  write(entry: LogEntry): void;
  close?(): Promise<void>;
}

/** `[WARN] Skipping file path=app/x.py reason="bad encoding"` */
function renderEntry(entry: LogEntry): string {
  const label = `[${entry.severity.toUpperCase()}]`;
  const pairs = Object.entries(entry.context ?? {}).map(([key, value]) => `${key}=${renderValue(value)}`);
  return [label, entry.message, ...pairs].join(' ');
}

function renderValue(value: unknown): string {
  if (typeof value === 'string') return value === '' || /[\s="]/.test(value) ? JSON.stringify(value) : value;
  if (value === null || typeof value !== 'object') return String(value);
  try {
    return JSON.stringify(value);
  } catch {
    // cyclic context objects
    return '[unserializable]';
  }
}

/** Entries at or above `level`, one line each, to stderr unless `write` says otherwise */
export function terminalTarget(
  level: LogLevel,
  write: (line: string) => void = line => process.stderr.write(`${line}\n`),
): LogTarget {
  return {
    level,
    write: entry => write(renderEntry(entry)),
  };
}

/**
 * Timestamped lines through a write stream. The file is truncated when the
 * target is created; parent directories are created as needed.
 */
export class LogFileTarget implements LogTarget {
  private readonly stream: WriteStream;

  constructor(
    readonly path: string,
    readonly level: LogLevel = 'debug',
  ) {
    const file = resolve(path);
    mkdirSync(dirname(file), { recursive: true });
    if (statSync(file, { throwIfNoEntry: false })?.isDirectory()) {
      throw new Error(`Cannot write log file: '${file}' is a directory`);
    }

    this.stream = createWriteStream(file, { flags: 'w' });
    this.stream.on('error', (error: Error) => {
      process.stderr.write(`[WARN] Log file write failed: ${error.message}\n`);
    });
  }

  write(entry: LogEntry): void {
    this.stream.write(`${new Date().toISOString()} ${renderEntry(entry)}\n`);
  }

  /** Resolves once everything written so far is flushed */
  close(): Promise<void> {
    return new Promise(done => {
      this.stream.end(done);
    });
  }
}

export class RunLogger implements Logger {
  constructor(private readonly targets: readonly LogTarget[]) {}

  error(message: string, context?: Record<string, unknown>): void {
    this.log({ severity: 'error', message, context });
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log({ severity: 'warn', message, context });
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log({ severity: 'info', message, context });
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log({ severity: 'debug', message, context });
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.log({ severity: 'trace', message, context });
  }

  async close(): Promise<void> {
    for (const target of this.targets) {
      await target.close?.();
    }
  }

  private log(entry: LogEntry): void {
    for (const target of this.targets) {
      if (SEVERITY_RANK[entry.severity] <= LEVEL_LIMIT[target.level]) target.write(entry);
    }
  }
}

/** Logger with no targets. Default for library entry points. */
export const silentLogger: Logger = new RunLogger([]);

/**
 * Terminal logging at `level`; with `logFile`, a file target that always
 * records everything down to debug as well.
 */
export function createLogger(level: LogLevel, options: { logFile?: string } = {}): RunLogger {
  const targets: LogTarget[] = [terminalTarget(level)];
  if (options.logFile) targets.push(new LogFileTarget(options.logFile));
  return new RunLogger(targets);
}
