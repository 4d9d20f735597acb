/**
 * Logger tests - per-target thresholds, key=value context, the log file
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';

import { readFileSync, mkdtempSync, mkdirSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

import {
  LogFileTarget,
  RunLogger,
  createLogger,
  silentLogger,
  terminalTarget,
  type LogLevel,
} from '@demeter-lint/core';

function logEverything(level: LogLevel): string[] {
  const lines: string[] = [];
  const logger = new RunLogger([terminalTarget(level, line => lines.push(line))]);
  logger.error('e');
  logger.warn('w');
  logger.info('i');
  logger.debug('d');
  logger.trace('t');
  return lines;
}

describe('RunLogger', () => {
  describe('terminal target', () => {
    it('should write nothing when silent', () => {
      assert.deepStrictEqual(logEverything('silent'), []);
    });

    it('should write errors and warnings at warnings level', () => {
      assert.deepStrictEqual(logEverything('warnings'), ['[ERROR] e', '[WARN] w']);
    });

    it('should write everything at debug level', () => {
      assert.deepStrictEqual(logEverything('debug'), ['[ERROR] e', '[WARN] w', '[INFO] i', '[DEBUG] d', '[TRACE] t']);
    });

    it('should render context as key=value pairs', () => {
      const lines: string[] = [];
      const logger = new RunLogger([terminalTarget('info', line => lines.push(line))]);

      logger.info('Check complete', { files: 3, path: 'app/x.py', reason: 'bad encoding', skipped: ['a'] });

      assert.deepStrictEqual(lines, [
        '[INFO] Check complete files=3 path=app/x.py reason="bad encoding" skipped=["a"]',
      ]);
    });

    it('should survive a cyclic context value', () => {
      const lines: string[] = [];
      const node: Record<string, unknown> = { kind: 'Name' };
      node.parent = node;

      new RunLogger([terminalTarget('debug', line => lines.push(line))]).debug('Visiting', { node });

      assert.deepStrictEqual(lines, ['[DEBUG] Visiting node=[unserializable]']);
    });
  });

  it('should apply each target its own threshold', () => {
    const quiet: string[] = [];
    const verbose: string[] = [];
    const logger = new RunLogger([
      terminalTarget('errors', line => quiet.push(line)),
      terminalTarget('debug', line => verbose.push(line)),
    ]);

    logger.error('failed');
    logger.debug('resolved');

    assert.deepStrictEqual(quiet, ['[ERROR] failed']);
    assert.deepStrictEqual(verbose, ['[ERROR] failed', '[DEBUG] resolved']);
  });

  it('should accept calls on the silent logger', () => {
    assert.doesNotThrow(() => silentLogger.error('dropped', { code: 1 }));
  });
});

describe('LogFileTarget', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'demeter-lint-logger-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should write timestamped lines at or above its level', async () => {
    const path = join(dir, 'nested', 'check.log');
    const logger = new RunLogger([new LogFileTarget(path, 'info')]);

    logger.info('Checking', { files: 2 });
    logger.debug('hidden');
    await logger.close();

    const lines = readFileSync(path, 'utf-8').trimEnd().split('\n');
    assert.strictEqual(lines.length, 1);
    assert.match(lines[0], /^\d{4}-\d{2}-\d{2}T\S+Z \[INFO\] Checking files=2$/);
  });

  it('should refuse a path that is a directory', () => {
    const path = join(dir, 'logs');
    mkdirSync(path);

    assert.throws(() => new LogFileTarget(path), {
      message: `Cannot write log file: '${path}' is a directory`,
    });
  });

  it('should record debug output whatever the terminal level', async () => {
    const path = join(dir, 'check.log');
    const logger = createLogger('silent', { logFile: path });

    logger.debug('Resolved receiver', { qname: 'app.Car' });
    await logger.close();

    assert.match(readFileSync(path, 'utf-8'), /\[DEBUG\] Resolved receiver qname=app\.Car\n$/);
  });
});
