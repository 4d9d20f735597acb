/**
 * DiagnosticWriter - Writes diagnostics to <stateDir>/diagnostics.log
 *
 * JSON lines format (one JSON object per line), so the file can be
 * grepped or streamed through jq.
 *
 * Usage:
 *   new DiagnosticWriter().write(collector, '/project/.demeter-lint');
 */

import { writeFileSync, existsSync, mkdirSync } from 'fs';
import { join, dirname } from 'path';

import type { DiagnosticCollector } from './DiagnosticCollector.js';

export class DiagnosticWriter {
  /**
   * Overwrite diagnostics.log, creating the directory when missing.
   * @returns path of the written file
   */
  write(collector: DiagnosticCollector, stateDir: string): string {
    const logPath = this.getLogPath(stateDir);

    const dir = dirname(logPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }

    writeFileSync(logPath, collector.toDiagnosticsLog(), 'utf-8');
    return logPath;
  }

  getLogPath(stateDir: string): string {
    return join(stateDir, 'diagnostics.log');
  }
}
