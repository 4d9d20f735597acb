/**
 * check command action tests - options, report output and exit codes
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { existsSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

import { ConfigError, DiagnosticCollector } from '@demeter-lint/core';
import {
  checkAction,
  exitCodeFor,
  getLogLevel,
  type CheckOutput,
} from '../../../packages/cli/src/commands/checkAction.js';

const CHAIN_LINE = 'app/service.py:3:9: W9006 '
  + 'Law of Demeter: Chain access (self.a.b.c) exceeds one level. Create delegated method.';

function captureOutput(): CheckOutput & { stdout: string[]; stderr: string[] } {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    out: line => stdout.push(line),
    err: line => stderr.push(line),
  };
}

describe('checkAction', () => {
  let projectDir: string;

  beforeEach(() => {
    projectDir = mkdtempSync(join(tmpdir(), 'demeter-lint-cli-'));
    mkdirSync(join(projectDir, 'app'));
  });

  afterEach(() => {
    rmSync(projectDir, { recursive: true, force: true });
  });

  function writeChain(): void {
    writeFileSync(join(projectDir, 'app', 'service.py'), 'class Car:\n    def drive(self):\n        self.a.b.c()\n');
  }

  it('should print the report with a summary and fail on violations', async () => {
    writeChain();
    const output = captureOutput();

    const code = await checkAction(projectDir, {}, output);

    assert.strictEqual(code, 1);
    assert.deepStrictEqual(output.stdout, [[
      CHAIN_LINE,
      '',
      'Found 1 problem: 1 warning',
      '  W9006    1  structural coupling  -> demeter-lint check --category coupling',
    ].join('\n')]);
  });

  it('should pass a clean project', async () => {
    writeFileSync(join(projectDir, 'app', 'service.py'), 'def add(a, b):\n    return a + b\n');
    const output = captureOutput();

    assert.strictEqual(await checkAction(projectDir, {}, output), 0);
    assert.deepStrictEqual(output.stdout, ['No issues found.']);
  });

  it('should print nothing for a clean project when quiet', async () => {
    const output = captureOutput();

    assert.strictEqual(await checkAction(projectDir, { quiet: true }, output), 0);
    assert.deepStrictEqual(output.stdout, []);
  });

  it('should print only violations when quiet', async () => {
    writeChain();
    const output = captureOutput();

    await checkAction(projectDir, { quiet: true }, output);

    assert.deepStrictEqual(output.stdout, [CHAIN_LINE]);
  });

  it('should narrow the report to one category', async () => {
    writeChain();
    const output = captureOutput();

    const code = await checkAction(projectDir, { category: 'stubs' }, output);

    assert.strictEqual(code, 0);
    assert.deepStrictEqual(output.stdout, ['No issues found.']);
  });

  it('should print JSON when asked', async () => {
    writeChain();
    const output = captureOutput();

    await checkAction(projectDir, { format: 'json' }, output);

    const parsed: unknown = JSON.parse(output.stdout.join('\n'));
    assert.ok(typeof parsed === 'object' && parsed !== null && 'summary' in parsed);
    assert.deepStrictEqual(parsed.summary, { total: 1, fatal: 0, errors: 0, warnings: 1, info: 0 });
  });

  it('should append provenance when explaining', async () => {
    writeChain();
    const output = captureOutput();

    await checkAction(projectDir, { explain: true, quiet: true }, output);

    assert.deepStrictEqual(output.stdout, [`${CHAIN_LINE} [receiver: local]`]);
  });

  it('should write diagnostics.log when asked', async () => {
    writeChain();

    await checkAction(projectDir, { writeDiagnostics: true }, captureOutput());

    assert.ok(existsSync(join(projectDir, '.demeter-lint', 'diagnostics.log')));
  });

  it('should list categories without checking', async () => {
    const output = captureOutput();

    assert.strictEqual(await checkAction(projectDir, { listCategories: true }, output), 0);
    assert.strictEqual(output.stdout[0], 'Available diagnostic categories:');
    assert.ok(output.stdout.includes('  stubs'));
    assert.ok(output.stdout.includes('    Codes: W9019'));
  });

  it('should reject unknown formats and categories', async () => {
    await assert.rejects(checkAction(projectDir, { format: 'xml' }, captureOutput()), (error: unknown) => {
      assert.ok(error instanceof ConfigError);
      assert.strictEqual(error.message, 'Unknown format: xml');
      assert.strictEqual(error.code, 'ERR_INVALID_OPTION');
      return true;
    });
    await assert.rejects(checkAction(projectDir, { category: 'style' }, captureOutput()), {
      message: 'Unknown category: style',
    });
  });

  it('should send config warnings to stderr', async () => {
    mkdirSync(join(projectDir, '.demeter-lint'));
    writeFileSync(join(projectDir, '.demeter-lint', 'config.json'), '{ broken');
    const output = captureOutput();

    await checkAction(projectDir, {}, output);

    assert.strictEqual(output.stderr[1], 'Using default configuration');
  });
});

describe('exitCodeFor', () => {
  it('should return 2 when only errors remain', () => {
    const collector = new DiagnosticCollector();
    collector.add({ code: 'ERR_FILE_UNREADABLE', severity: 'error', message: 'gone', source: 'discovery' });

    assert.strictEqual(exitCodeFor(collector), 2);
  });

  it('should return 1 for violations even with errors present', () => {
    const collector = new DiagnosticCollector();
    collector.add({ code: 'ERR_FILE_UNREADABLE', severity: 'error', message: 'gone', source: 'discovery' });
    collector.add({ code: 'W9019', severity: 'warning', message: 'stub', source: 'coupling' });

    assert.strictEqual(exitCodeFor(collector), 1);
  });

  it('should return 0 for parse warnings alone', () => {
    const collector = new DiagnosticCollector();
    collector.add({ code: 'ERR_PARSE_FAILURE', severity: 'warning', message: 'skip', source: 'parser' });

    assert.strictEqual(exitCodeFor(collector), 0);
  });
});

describe('getLogLevel', () => {
  it('should prefer --log-level, then --quiet, then config', () => {
    assert.strictEqual(getLogLevel({ logLevel: 'debug', quiet: true }), 'debug');
    assert.strictEqual(getLogLevel({ quiet: true }, 'info'), 'errors');
    assert.strictEqual(getLogLevel({}, 'info'), 'info');
    assert.strictEqual(getLogLevel({}), 'warnings');
  });

  it('should reject unknown levels', () => {
    assert.throws(() => getLogLevel({ logLevel: 'loud' }), {
      message: 'Unknown log level: loud',
    });
  });
});
