/**
 * DiagnosticReporter and DiagnosticWriter tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

import {
  DiagnosticCollector,
  DiagnosticReporter,
  DiagnosticWriter,
  isReportFormat,
} from '@demeter-lint/core';

const CHAIN_MESSAGE = 'Law of Demeter: Chain access (self.a.b.c) exceeds one level. Create delegated method.';
const STUB_MESSAGE = 'Dependency extlib is uninferable. Create stubs/extlib.pyi so the linter can resolve its types.';

function sampleCollector(): DiagnosticCollector {
  const collector = new DiagnosticCollector();
  collector.add({
    code: 'W9006',
    severity: 'warning',
    message: CHAIN_MESSAGE,
    file: 'app/service.py',
    line: 3,
    column: 8,
    source: 'coupling',
    provenance: 'local',
  });
  collector.add({
    code: 'W9019',
    severity: 'warning',
    message: STUB_MESSAGE,
    file: 'app/client.py',
    line: 5,
    column: 11,
    source: 'coupling',
    provenance: 'external',
  });
  return collector;
}

describe('DiagnosticReporter', () => {
  describe('text', () => {
    it('should list diagnostics ordered by file and line', () => {
      const reporter = new DiagnosticReporter(sampleCollector());

      assert.strictEqual(reporter.report({ format: 'text' }), [
        `app/client.py:5:12: W9019 ${STUB_MESSAGE}`,
        `app/service.py:3:9: W9006 ${CHAIN_MESSAGE}`,
      ].join('\n'));
    });

    it('should append receiver provenance when explaining', () => {
      const reporter = new DiagnosticReporter(sampleCollector());

      const lines = reporter.report({ format: 'text', explain: true }).split('\n');

      assert.strictEqual(lines[1], `app/service.py:3:9: W9006 ${CHAIN_MESSAGE} [receiver: local]`);
    });

    it('should end with a categorized summary', () => {
      const reporter = new DiagnosticReporter(sampleCollector());

      const lines = reporter.report({ format: 'text', includeSummary: true }).split('\n');

      assert.deepStrictEqual(lines.slice(2), [
        '',
        'Found 2 problems: 2 warnings',
        '  W9006    1  structural coupling  -> demeter-lint check --category coupling',
        '  W9019    1  missing stubs  -> demeter-lint check --category stubs',
      ]);
    });

    it('should print suggestions and file-only locations', () => {
      const collector = new DiagnosticCollector();
      collector.add({
        code: 'ERR_PARSE_FAILURE',
        severity: 'warning',
        message: 'Cannot parse',
        file: 'app/broken.py',
        source: 'parser',
        suggestion: 'Fix the syntax error',
      });

      assert.strictEqual(
        new DiagnosticReporter(collector).report({ format: 'text' }),
        'app/broken.py: ERR_PARSE_FAILURE Cannot parse\n    hint: Fix the syntax error'
      );
    });

    it('should say so when there is nothing to report', () => {
      const reporter = new DiagnosticReporter(new DiagnosticCollector());

      assert.strictEqual(reporter.report({ format: 'text', includeSummary: true }), 'No issues found.');
      assert.strictEqual(reporter.summary(), 'No issues found.');
    });
  });

  describe('json', () => {
    it('should include sorted violation records and summary counts', () => {
      const reporter = new DiagnosticReporter(sampleCollector());

      const parsed: unknown = JSON.parse(reporter.report({ format: 'json', includeSummary: true }));

      assert.ok(typeof parsed === 'object' && parsed !== null && 'violations' in parsed && 'summary' in parsed);
      assert.ok(Array.isArray(parsed.violations));
      assert.strictEqual(parsed.violations.length, 2);
      assert.deepStrictEqual(parsed.violations[1], {
        code: 'W9006',
        severity: 'warning',
        file: 'app/service.py',
        line: 3,
        column: 9,
        message: CHAIN_MESSAGE,
        provenance: 'local',
        suggestion: null,
      });
      assert.deepStrictEqual(parsed.summary, { total: 2, fatal: 0, errors: 0, warnings: 2, info: 0 });
    });

    it('should leave the summary out unless asked', () => {
      const reporter = new DiagnosticReporter(new DiagnosticCollector());

      assert.strictEqual(reporter.report({ format: 'json' }), '{\n  "violations": []\n}');
    });
  });

  describe('csv', () => {
    it('should quote text fields and double inner quotes', () => {
      const collector = new DiagnosticCollector();
      collector.add({
        code: 'W9006',
        severity: 'warning',
        message: 'Say "hi"',
        file: 'app/service.py',
        line: 3,
        column: 8,
        source: 'coupling',
        provenance: 'unknown',
      });

      assert.strictEqual(new DiagnosticReporter(collector).report({ format: 'csv' }), [
        'file,line,column,severity,code,message,provenance,suggestion',
        '"app/service.py",3,9,"warning","W9006","Say ""hi""","unknown",',
      ].join('\n'));
    });
  });

  describe('stats', () => {
    it('should order codes by count, then by code', () => {
      const collector = sampleCollector();
      collector.add({ code: 'W9019', severity: 'warning', message: STUB_MESSAGE, source: 'coupling' });

      const stats = new DiagnosticReporter(collector).getCategorizedStats();

      assert.deepStrictEqual(stats.byCode.map(entry => [entry.code, entry.count]), [['W9019', 2], ['W9006', 1]]);
    });

    it('should list fatal and error counts in the summary line', () => {
      const collector = new DiagnosticCollector();
      collector.add({ code: 'ERR_CONFIG_INVALID', severity: 'fatal', message: 'bad', source: 'config' });
      collector.add({ code: 'ERR_FILE_UNREADABLE', severity: 'error', message: 'gone', source: 'files' });

      assert.strictEqual(new DiagnosticReporter(collector).summary(), 'Found 2 problems: 1 fatal, 1 error');
    });
  });

  it('should recognize report formats', () => {
    assert.strictEqual(isReportFormat('csv'), true);
    assert.strictEqual(isReportFormat('xml'), false);
  });
});

describe('DiagnosticWriter', () => {
  it('should write diagnostics.log into the state directory', () => {
    const dir = mkdtempSync(join(tmpdir(), 'demeter-lint-diagnostics-'));
    try {
      const stateDir = join(dir, '.demeter-lint');

      const path = new DiagnosticWriter().write(sampleCollector(), stateDir);

      assert.strictEqual(path, join(stateDir, 'diagnostics.log'));
      assert.strictEqual(readFileSync(path, 'utf-8').split('\n').length, 2);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
