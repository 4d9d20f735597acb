/**
 * Diagnostic Categories - Single source of truth for category/code mappings
 *
 * Categories are defined once and both mapping directions are derived:
 * - DIAGNOSTIC_CATEGORIES: category → codes (used by `check --category`)
 * - CODE_TO_CATEGORY: code → category metadata (used by DiagnosticReporter)
 */

/**
 * Category definition with human-readable metadata and associated codes
 */
export interface DiagnosticCategory {
  /** Human-readable name for display */
  readonly name: string;
  /** What this category checks */
  readonly description: string;
  /** Diagnostic codes that belong to this category */
  readonly codes: readonly string[];
}

export type DiagnosticCategoryKey = 'coupling' | 'stubs' | 'parsing';

export const DIAGNOSTIC_CATEGORIES: Record<DiagnosticCategoryKey, DiagnosticCategory> = {
  coupling: {
    name: 'Structural Coupling',
    description: 'Method chains and stranger hand-offs that break the Law of Demeter',
    codes: ['W9006'],
  },
  stubs: {
    name: 'Missing Stubs',
    description: 'Chains through external modules that cannot be inferred without a stub file',
    codes: ['W9019'],
  },
  parsing: {
    name: 'Source Files',
    description: 'Files that could not be read or parsed and were skipped',
    codes: ['ERR_PARSE_FAILURE', 'ERR_FILE_UNREADABLE'],
  },
};

export function isDiagnosticCategoryKey(value: string): value is DiagnosticCategoryKey {
  return Object.keys(DIAGNOSTIC_CATEGORIES).includes(value);
}

/**
 * Metadata for code-to-category lookup
 */
export interface CodeCategoryInfo {
  /** Human-readable name for the issue type */
  name: string;
  /** CLI command that narrows output to this category */
  checkCommand: string;
}

/**
 * Derived mapping: code → category metadata
 */
export const CODE_TO_CATEGORY: Record<string, CodeCategoryInfo> = (() => {
  const result: Record<string, CodeCategoryInfo> = {};

  for (const [categoryKey, category] of Object.entries(DIAGNOSTIC_CATEGORIES)) {
    for (const code of category.codes) {
      result[code] = {
        name: category.name.toLowerCase(),
        checkCommand: `demeter-lint check --category ${categoryKey}`,
      };
    }
  }

  return result;
})();

export function getCategoryForCode(code: string): CodeCategoryInfo | undefined {
  return CODE_TO_CATEGORY[code];
}

export function getCodesForCategory(category: DiagnosticCategoryKey): readonly string[] {
  return DIAGNOSTIC_CATEGORIES[category].codes;
}
