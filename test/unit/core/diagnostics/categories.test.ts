/**
 * Diagnostic categories - both mapping directions
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import {
  DIAGNOSTIC_CATEGORIES,
  CODE_TO_CATEGORY,
  isDiagnosticCategoryKey,
  getCategoryForCode,
  getCodesForCategory,
} from '@demeter-lint/core';

describe('diagnostic categories', () => {
  it('should map each category to its codes', () => {
    assert.deepStrictEqual(getCodesForCategory('coupling'), ['W9006']);
    assert.deepStrictEqual(getCodesForCategory('stubs'), ['W9019']);
    assert.deepStrictEqual(getCodesForCategory('parsing'), ['ERR_PARSE_FAILURE', 'ERR_FILE_UNREADABLE']);
  });

  it('should derive code lookups with the narrowing command', () => {
    assert.deepStrictEqual(getCategoryForCode('W9019'), {
      name: 'missing stubs',
      checkCommand: 'demeter-lint check --category stubs',
    });
    assert.strictEqual(getCategoryForCode('W0000'), undefined);
  });

  it('should cover every category code in the reverse map', () => {
    const codes = Object.values(DIAGNOSTIC_CATEGORIES).flatMap(category => category.codes);

    assert.deepStrictEqual(Object.keys(CODE_TO_CATEGORY).sort(), [...codes].sort());
  });

  it('should recognize category keys', () => {
    assert.strictEqual(isDiagnosticCategoryKey('coupling'), true);
    assert.strictEqual(isDiagnosticCategoryKey('Coupling'), false);
    assert.strictEqual(isDiagnosticCategoryKey('style'), false);
  });
});
