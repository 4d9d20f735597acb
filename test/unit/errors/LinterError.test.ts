/**
 * LinterError hierarchy tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  LinterError,
  ConfigError,
  FileAccessError,
  LanguageError,
  AnalysisError,
} from '@demeter-lint/core';

describe('LinterError', () => {
  it('should carry code, severity, context and suggestion', () => {
    const error = new ConfigError(
      'Config error: bad',
      'ERR_CONFIG_INVALID',
      { filePath: '/project/.demeter-lint/config.yaml' },
      'Fix it'
    );

    assert.ok(error instanceof LinterError);
    assert.ok(error instanceof Error);
    assert.strictEqual(error.name, 'ConfigError');
    assert.strictEqual(error.severity, 'fatal');
    assert.deepStrictEqual(error.toJSON(), {
      code: 'ERR_CONFIG_INVALID',
      severity: 'fatal',
      message: 'Config error: bad',
      context: { filePath: '/project/.demeter-lint/config.yaml' },
      suggestion: 'Fix it',
    });
  });

  it('should give each subclass its severity', () => {
    assert.strictEqual(new FileAccessError('x', 'ERR_FILE_UNREADABLE').severity, 'error');
    assert.strictEqual(new LanguageError('x', 'ERR_PARSE_FAILURE').severity, 'warning');
    assert.strictEqual(new AnalysisError('x', 'ERR_ANALYSIS_INTERNAL').severity, 'error');
  });

  it('should default to an empty context', () => {
    const error = new LanguageError('Cannot parse', 'ERR_PARSE_FAILURE');

    assert.deepStrictEqual(error.context, {});
    assert.strictEqual(error.suggestion, undefined);
  });

  it('should be caught by subclass', () => {
    try {
      throw new FileAccessError('Missing', 'ERR_PROJECT_NOT_FOUND');
    } catch (error) {
      assert.ok(error instanceof FileAccessError);
      assert.ok(!(error instanceof ConfigError));
    }
  });
});
