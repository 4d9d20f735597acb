/**
 * DiagnosticReporter - renders the result of a check run.
 *
 * Every diagnostic is first turned into a ReportRecord: where it is, its
 * code and message, and the receiver provenance that `--explain` adds.
 * The formats only differ in how records are laid out:
 *
 *   text   app/service.py:3:9: W9006 Law of Demeter: ... [receiver: local]
 *   json   { "violations": [ReportRecord...], "summary": {...} }
 *   csv    one row per record, header first
 *
 * Text locations use 1-based columns, as editors and CI annotations expect.
 */

import type { ProvenanceClass } from '@demeter-lint/types';
import type { Diagnostic, DiagnosticCollector } from './DiagnosticCollector.js';
import { CODE_TO_CATEGORY } from './categories.js';

export type ReportFormat = 'text' | 'json' | 'csv';

export const REPORT_FORMATS: readonly ReportFormat[] = ['text', 'json', 'csv'];

export function isReportFormat(value: string): value is ReportFormat {
  return REPORT_FORMATS.some(format => format === value);
}

export interface ReportOptions {
  format: ReportFormat;
  includeSummary?: boolean;
  /** Show the receiver provenance of each violation */
  explain?: boolean;
}

/** One reported line, independent of the output format */
export interface ReportRecord {
  code: string;
  severity: Diagnostic['severity'];
  file: string | null;
  line: number | null;
  /** 1-based */
  column: number | null;
  message: string;
  provenance: ProvenanceClass | null;
  suggestion: string | null;
}

export interface SummaryStats {
  total: number;
  fatal: number;
  errors: number;
  warnings: number;
  info: number;
}

export interface CategoryCount {
  code: string;
  count: number;
  name: string;
  checkCommand: string;
}

export interface CategorizedSummaryStats extends SummaryStats {
  byCode: CategoryCount[];
}

const NOTHING_FOUND = 'No issues found.';

const CSV_COLUMNS: readonly (keyof ReportRecord)[] = [
  'file', 'line', 'column', 'severity', 'code', 'message', 'provenance', 'suggestion',
];

type Renderer = (records: ReportRecord[], reporter: DiagnosticReporter, options: ReportOptions) => string;

const RENDERERS: Record<ReportFormat, Renderer> = {
  text: renderText,
  json: renderJson,
  csv: renderCsv,
};

export class DiagnosticReporter {
  constructor(private readonly collector: DiagnosticCollector) {}

  report(options: ReportOptions): string {
    return RENDERERS[options.format](this.records(), this, options);
  }

  /** Records ordered by file, line, column, then code */
  records(): ReportRecord[] {
    return this.collector.getAll()
      .map(toRecord)
      .sort((a, b) =>
        (a.file ?? '').localeCompare(b.file ?? '')
        || (a.line ?? 0) - (b.line ?? 0)
        || (a.column ?? 0) - (b.column ?? 0)
        || a.code.localeCompare(b.code));
  }

  /** `Found 3 problems: 1 error, 2 warnings` */
  summary(): string {
    const stats = this.getStats();
    if (stats.total === 0) return NOTHING_FOUND;

    const parts = [
      count(stats.fatal, 'fatal', 'fatal'),
      count(stats.errors, 'error', 'errors'),
      count(stats.warnings, 'warning', 'warnings'),
      count(stats.info, 'info', 'info'),
    ].filter((part): part is string => part !== null);
    return `Found ${count(stats.total, 'problem', 'problems')}: ${parts.join(', ')}`;
  }

  /** Summary line, then one line per code with the command that narrows to it */
  categorizedSummary(): string {
    const stats = this.getCategorizedStats();
    if (stats.total === 0) return NOTHING_FOUND;

    const width = Math.max(...stats.byCode.map(entry => entry.code.length));
    return [
      this.summary(),
      ...stats.byCode.map(entry =>
        `  ${entry.code.padEnd(width)}  ${String(entry.count).padStart(3)}  ${entry.name}  -> ${entry.checkCommand}`),
    ].join('\n');
  }

  getStats(): SummaryStats {
    const stats: SummaryStats = { total: 0, fatal: 0, errors: 0, warnings: 0, info: 0 };
    for (const diagnostic of this.collector.getAll()) {
      stats.total++;
      switch (diagnostic.severity) {
        case 'fatal':
          stats.fatal++;
          break;
        case 'error':
          stats.errors++;
          break;
        case 'warning':
          stats.warnings++;
          break;
        case 'info':
          stats.info++;
          break;
      }
    }
    return stats;
  }

  /** Counts per code, most frequent first (ties by code) */
  getCategorizedStats(): CategorizedSummaryStats {
    const counts = new Map<string, number>();
    for (const diagnostic of this.collector.getAll()) {
      counts.set(diagnostic.code, (counts.get(diagnostic.code) ?? 0) + 1);
    }

    const byCode = [...counts].map(([code, total]): CategoryCount => {
      const category = CODE_TO_CATEGORY[code];
      return {
        code,
        count: total,
        name: category?.name ?? code,
        checkCommand: category?.checkCommand ?? 'demeter-lint check',
      };
    });
    byCode.sort((a, b) => b.count - a.count || a.code.localeCompare(b.code));
    return { ...this.getStats(), byCode };
  }
}

function toRecord(diagnostic: Diagnostic): ReportRecord {
  return {
    code: diagnostic.code,
    severity: diagnostic.severity,
    file: diagnostic.file ?? null,
    line: diagnostic.line ?? null,
    column: diagnostic.column === undefined ? null : diagnostic.column + 1,
    message: diagnostic.message,
    provenance: diagnostic.provenance ?? null,
    suggestion: diagnostic.suggestion ?? null,
  };
}

function count(value: number, singular: string, plural: string): string | null {
  if (value === 0) return null;
  return `${value} ${value === 1 ? singular : plural}`;
}

// ─── Formats ─────────────────────────────────────────────────────────

/** `file:line:column:` with whatever parts are known */
function locationOf(record: ReportRecord): string {
  if (!record.file) return '';
  const parts = [record.file, record.line, record.line === null ? null : record.column]
    .filter(part => part !== null);
  return `${parts.join(':')}: `;
}

function renderText(records: ReportRecord[], reporter: DiagnosticReporter, options: ReportOptions): string {
  if (records.length === 0) return NOTHING_FOUND;

  const lines: string[] = [];
  for (const record of records) {
    const receiver = options.explain && record.provenance ? ` [receiver: ${record.provenance}]` : '';
    lines.push(`${locationOf(record)}${record.code} ${record.message}${receiver}`);
    if (record.suggestion) lines.push(`    hint: ${record.suggestion}`);
  }
  if (options.includeSummary) lines.push('', reporter.categorizedSummary());
  return lines.join('\n');
}

function renderJson(records: ReportRecord[], reporter: DiagnosticReporter, options: ReportOptions): string {
  const document = options.includeSummary
    ? { violations: records, summary: reporter.getStats() }
    : { violations: records };
  return JSON.stringify(document, null, 2);
}

function renderCsv(records: ReportRecord[]): string {
  const rows = records.map(record => CSV_COLUMNS.map(column => csvField(record[column])).join(','));
  return [CSV_COLUMNS.join(','), ...rows].join('\n');
}

/** Text is always quoted, with inner quotes doubled; numbers and nulls are bare */
function csvField(value: string | number | null): string {
  if (value === null) return '';
  if (typeof value === 'number') return String(value);
  return `"${value.replace(/"/g, '""')}"`;
}
