/**
 * DiagnosticCollector and CollectorSink tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import {
  DiagnosticCollector,
  CollectorSink,
  LanguageError,
  ConfigError,
} from '@demeter-lint/core';

describe('DiagnosticCollector', () => {
  describe('addError', () => {
    it('should take code, severity, location and suggestion from a LinterError', () => {
      const collector = new DiagnosticCollector();

      collector.addError('parser', new LanguageError(
        'Cannot parse app/broken.py',
        'ERR_PARSE_FAILURE',
        { filePath: 'app/broken.py', lineNumber: 4, column: 2 },
        'Fix the syntax error'
      ));

      const [diagnostic] = collector.getAll();
      assert.strictEqual(diagnostic.code, 'ERR_PARSE_FAILURE');
      assert.strictEqual(diagnostic.severity, 'warning');
      assert.strictEqual(diagnostic.file, 'app/broken.py');
      assert.strictEqual(diagnostic.line, 4);
      assert.strictEqual(diagnostic.column, 2);
      assert.strictEqual(diagnostic.source, 'parser');
      assert.strictEqual(diagnostic.suggestion, 'Fix the syntax error');
      assert.strictEqual(typeof diagnostic.timestamp, 'number');
    });

    it('should record plain errors as ERR_UNKNOWN', () => {
      const collector = new DiagnosticCollector();

      collector.addError('cli', new Error('boom'));

      const [diagnostic] = collector.getAll();
      assert.strictEqual(diagnostic.code, 'ERR_UNKNOWN');
      assert.strictEqual(diagnostic.severity, 'error');
      assert.strictEqual(diagnostic.message, 'boom');
    });
  });

  describe('queries', () => {
    it('should report severities', () => {
      const collector = new DiagnosticCollector();
      assert.strictEqual(collector.hasWarnings(), false);
      assert.strictEqual(collector.hasErrors(), false);

      collector.add({ code: 'W9006', severity: 'warning', message: 'chain', source: 'coupling' });
      assert.strictEqual(collector.hasWarnings(), true);
      assert.strictEqual(collector.hasErrors(), false);

      collector.addError('config', new ConfigError('bad', 'ERR_CONFIG_INVALID'));
      assert.strictEqual(collector.hasFatal(), true);
      assert.strictEqual(collector.hasErrors(), true);
      assert.strictEqual(collector.count(), 2);
    });

    it('should filter by code and file', () => {
      const collector = new DiagnosticCollector();
      collector.add({ code: 'W9006', severity: 'warning', message: 'a', file: 'a.py', source: 'coupling' });
      collector.add({ code: 'W9019', severity: 'warning', message: 'b', file: 'b.py', source: 'coupling' });
      collector.add({ code: 'W9006', severity: 'warning', message: 'c', file: 'b.py', source: 'coupling' });

      assert.deepStrictEqual(collector.getByCode('W9006').map(d => d.message), ['a', 'c']);
      assert.deepStrictEqual(collector.getByFile('b.py').map(d => d.message), ['b', 'c']);

      collector.retainCodes(['W9019']);
      assert.deepStrictEqual(collector.getAll().map(d => d.message), ['b']);

      collector.clear();
      assert.strictEqual(collector.count(), 0);
    });

    it('should return a copy from getAll', () => {
      const collector = new DiagnosticCollector();
      collector.add({ code: 'W9006', severity: 'warning', message: 'a', source: 'coupling' });

      collector.getAll().pop();

      assert.strictEqual(collector.count(), 1);
    });

    it('should write one JSON object per line', () => {
      const collector = new DiagnosticCollector();
      collector.add({ code: 'W9006', severity: 'warning', message: 'a', source: 'coupling' });
      collector.add({ code: 'W9019', severity: 'warning', message: 'b', source: 'coupling' });

      const lines = collector.toDiagnosticsLog().split('\n');

      assert.strictEqual(lines.length, 2);
      const parsed: unknown = JSON.parse(lines[1]);
      assert.ok(typeof parsed === 'object' && parsed !== null && 'code' in parsed);
      assert.strictEqual(parsed.code, 'W9019');
    });
  });
});

describe('CollectorSink', () => {
  it('should record violations as warnings at their primary location', () => {
    const collector = new DiagnosticCollector();
    const sink = new CollectorSink(collector, 'coupling', '/project');

    sink.emit('W9006', 'chain', [
      { file: '/project/app/service.py', line: 3, column: 8 },
      { file: '/project/app/models.py', line: 1, column: 0 },
    ], 'local');

    const [diagnostic] = collector.getAll();
    assert.strictEqual(diagnostic.severity, 'warning');
    assert.strictEqual(diagnostic.file, 'app/service.py');
    assert.strictEqual(diagnostic.line, 3);
    assert.strictEqual(diagnostic.column, 8);
    assert.strictEqual(diagnostic.provenance, 'local');
    assert.deepStrictEqual(diagnostic.related, [{ file: '/project/app/models.py', line: 1, column: 0 }]);
  });

  it('should keep absolute paths without a root and leave related unset for one location', () => {
    const collector = new DiagnosticCollector();
    const sink = new CollectorSink(collector, 'coupling');

    sink.emit('W9019', 'stub', [{ file: '/project/app/client.py', line: 5, column: 11 }]);

    const [diagnostic] = collector.getAll();
    assert.strictEqual(diagnostic.file, '/project/app/client.py');
    assert.strictEqual(diagnostic.related, undefined);
    assert.strictEqual(diagnostic.provenance, undefined);
  });
});
