/**
 * DiagnosticCollector - Collects and filters diagnostics from a check run
 *
 * Violations arrive through the DiagnosticSink interface (see
 * CollectorSink); skipped files arrive as LinterError instances. Both end
 * up as Diagnostic entries.
 *
 * Usage:
 *   const collector = new DiagnosticCollector();
 *   const checker = new CouplingChecker(program, { sink: new CollectorSink(collector, 'coupling') });
 *
 *   if (collector.getByCode('W9006').length > 0) process.exitCode = 1;
 */

import { relative, sep } from 'path';
import type { DiagnosticSink, ProvenanceClass, SourceLocation } from '@demeter-lint/types';
import { LinterError } from '../errors/LinterError.js';

/**
 * Diagnostic entry - unified format for violations and skipped files
 */
export interface Diagnostic {
  code: string;
  severity: 'fatal' | 'error' | 'warning' | 'info';
  message: string;
  file?: string;
  line?: number;
  column?: number;
  /** Component that produced the entry */
  source: string;
  timestamp: number;
  suggestion?: string;
  /** Extra locations beyond the primary one */
  related?: SourceLocation[];
  /** Provenance of the offending receiver, for violations */
  provenance?: ProvenanceClass;
}

/**
 * Diagnostic input (without timestamp, which is auto-generated)
 */
export type DiagnosticInput = Omit<Diagnostic, 'timestamp'>;

export class DiagnosticCollector {
  private diagnostics: Diagnostic[] = [];

  /**
   * Add an error as a diagnostic.
   *
   * LinterError instances provide code, severity, context and suggestion.
   * Plain Error instances become generic errors with code 'ERR_UNKNOWN'.
   */
  addError(source: string, error: Error): void {
    if (error instanceof LinterError) {
      this.add({
        code: error.code,
        severity: error.severity,
        message: error.message,
        file: error.context.filePath,
        line: error.context.lineNumber,
        column: error.context.column,
        source,
        suggestion: error.suggestion,
      });
    } else {
      this.add({
        code: 'ERR_UNKNOWN',
        severity: 'error',
        message: error.message,
        source,
      });
    }
  }

  /**
   * Add a diagnostic directly.
   * Timestamp is set automatically.
   */
  add(diagnostic: DiagnosticInput): void {
    this.diagnostics.push({
      ...diagnostic,
      timestamp: Date.now(),
    });
  }

  /**
   * All diagnostics, as a copy.
   */
  getAll(): Diagnostic[] {
    return [...this.diagnostics];
  }

  getByCode(code: string): Diagnostic[] {
    return this.diagnostics.filter(d => d.code === code);
  }

  getByFile(file: string): Diagnostic[] {
    return this.diagnostics.filter(d => d.file === file);
  }

  hasFatal(): boolean {
    return this.diagnostics.some(d => d.severity === 'fatal');
  }

  /**
   * Check if any error (including fatal) exists.
   */
  hasErrors(): boolean {
    return this.diagnostics.some(d => d.severity === 'error' || d.severity === 'fatal');
  }

  hasWarnings(): boolean {
    return this.diagnostics.some(d => d.severity === 'warning');
  }

  count(): number {
    return this.diagnostics.length;
  }

  /**
   * Keep only diagnostics whose code is listed.
   */
  retainCodes(codes: readonly string[]): void {
    this.diagnostics = this.diagnostics.filter(d => codes.includes(d.code));
  }

  /**
   * Format diagnostics as JSON lines (one JSON object per line).
   */
  toDiagnosticsLog(): string {
    return this.diagnostics.map(d => JSON.stringify(d)).join('\n');
  }

  clear(): void {
    this.diagnostics = [];
  }
}

/**
 * DiagnosticSink that records violations into a collector as warnings.
 * The first location is the primary one. With `root`, file paths are
 * stored relative to it (forward slashes).
 */
export class CollectorSink implements DiagnosticSink {
  constructor(
    private readonly collector: DiagnosticCollector,
    private readonly source: string,
    private readonly root?: string,
  ) {}

  emit(code: string, message: string, locations: readonly SourceLocation[], provenance?: ProvenanceClass): void {
    const [primary, ...related] = locations;
    this.collector.add({
      code,
      severity: 'warning',
      message,
      file: primary?.file ? this.displayPath(primary.file) : undefined,
      line: primary?.line,
      column: primary?.column,
      source: this.source,
      related: related.length > 0 ? related : undefined,
      provenance,
    });
  }

  private displayPath(file: string): string {
    return this.root ? relative(this.root, file).split(sep).join('/') : file;
  }
}
