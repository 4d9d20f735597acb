/**
 * Diagnostics - violation collection, reporting, and logging
 *
 * - DiagnosticCollector: Collects violations and skipped-file errors
 * - CollectorSink: DiagnosticSink feeding a collector
 * - DiagnosticReporter: Renders report records as text, JSON or CSV
 * - DiagnosticWriter: Writes diagnostics.log
 * - categories: Single source of truth for diagnostic category mappings
 */

export { DiagnosticCollector, CollectorSink } from './DiagnosticCollector.js';
export type { Diagnostic, DiagnosticInput } from './DiagnosticCollector.js';

export { DiagnosticReporter, REPORT_FORMATS, isReportFormat } from './DiagnosticReporter.js';
export type {
  ReportFormat,
  ReportOptions,
  ReportRecord,
  SummaryStats,
  CategoryCount,
  CategorizedSummaryStats,
} from './DiagnosticReporter.js';

export { DiagnosticWriter } from './DiagnosticWriter.js';

export {
  DIAGNOSTIC_CATEGORIES,
  CODE_TO_CATEGORY,
  isDiagnosticCategoryKey,
  getCategoryForCode,
  getCodesForCategory,
} from './categories.js';
export type {
  DiagnosticCategory,
  DiagnosticCategoryKey,
  CodeCategoryInfo,
} from './categories.js';
