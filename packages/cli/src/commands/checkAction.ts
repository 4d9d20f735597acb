/**
 * Check command action - loads config, runs the ProjectAnalyzer, prints
 * the report and decides the exit code.
 *
 * Kept apart from check.ts so the command can be driven from tests
 * without commander or process.exit.
 */

import { resolve, join } from 'path';
import {
  ProjectAnalyzer,
  DiagnosticReporter,
  DiagnosticWriter,
  DIAGNOSTIC_CATEGORIES,
  CONFIG_DIR,
  ConfigError,
  createLogger,
  loadConfig,
  getCodesForCategory,
  isDiagnosticCategoryKey,
  isReportFormat,
} from '@demeter-lint/core';
import type { DiagnosticCollector, ReportFormat } from '@demeter-lint/core';
import { isLogLevel, LOG_LEVELS } from '@demeter-lint/types';
import type { LogLevel } from '@demeter-lint/types';

/** Codes that fail the run */
export const FAILING_CODES: readonly string[] = ['W9006', 'W9019'];

export interface CheckOptions {
  format?: string;
  category?: string;
  listCategories?: boolean;
  logLevel?: string;
  logFile?: string;
  quiet?: boolean;
  explain?: boolean;
  writeDiagnostics?: boolean;
}

/** Where the action writes; stdout/stderr by default */
export interface CheckOutput {
  out: (line: string) => void;
  err: (line: string) => void;
}

const consoleOutput: CheckOutput = {
  out: line => console.log(line),
  err: line => console.error(line),
};

function invalidOption(message: string, suggestion: string): ConfigError {
  return new ConfigError(message, 'ERR_INVALID_OPTION', {}, suggestion);
}

/**
 * Determine log level from CLI options.
 * Priority: --log-level > --quiet > config logLevel > 'warnings'
 */
export function getLogLevel(options: CheckOptions, configured?: LogLevel): LogLevel {
  if (options.logLevel !== undefined) {
    if (!isLogLevel(options.logLevel)) {
      throw invalidOption(
        `Unknown log level: ${options.logLevel}`,
        `Use one of: ${LOG_LEVELS.join(', ')}`
      );
    }
    return options.logLevel;
  }
  if (options.quiet) return 'errors';
  return configured ?? 'warnings';
}

export function listCategories(output: CheckOutput = consoleOutput): void {
  output.out('Available diagnostic categories:');
  output.out('');
  for (const [key, category] of Object.entries(DIAGNOSTIC_CATEGORIES)) {
    output.out(`  ${key}`);
    output.out(`    ${category.name}`);
    output.out(`    ${category.description}`);
    output.out(`    Codes: ${category.codes.join(', ')}`);
    output.out('');
  }
}

/**
 * Exit code for a finished run: 1 with any W9006/W9019 or fatal entry,
 * 2 when only errors (unreadable files, analyzer faults) remain, else 0.
 */
export function exitCodeFor(collector: DiagnosticCollector): number {
  if (collector.hasFatal() || FAILING_CODES.some(code => collector.getByCode(code).length > 0)) {
    return 1;
  }
  return collector.hasErrors() ? 2 : 0;
}

/**
 * @returns process exit code
 * @throws ConfigError on invalid options or configuration
 */
export async function checkAction(
  path: string,
  options: CheckOptions,
  output: CheckOutput = consoleOutput,
): Promise<number> {
  if (options.listCategories) {
    listCategories(output);
    return 0;
  }

  const formatName = options.format ?? 'text';
  if (!isReportFormat(formatName)) {
    throw invalidOption(`Unknown format: ${formatName}`, 'Use one of: text, json, csv');
  }
  const format: ReportFormat = formatName;

  const category = options.category;
  if (category !== undefined && !isDiagnosticCategoryKey(category)) {
    throw invalidOption(
      `Unknown category: ${category}`,
      `Available: ${Object.keys(DIAGNOSTIC_CATEGORIES).join(', ')}`
    );
  }

  const projectPath = resolve(path);
  const config = loadConfig(projectPath, { warn: message => output.err(message) });
  const logFile = options.logFile ? resolve(options.logFile) : undefined;
  const logger = createLogger(getLogLevel(options, config.logLevel), logFile ? { logFile } : undefined);

  try {
    const analyzer = new ProjectAnalyzer(projectPath, config, { logger });
    const { collector, files } = analyzer.analyze();
    logger.info('Check complete', { files: files.length, diagnostics: collector.count() });

    if (category !== undefined && isDiagnosticCategoryKey(category)) {
      collector.retainCodes(getCodesForCategory(category));
    }

    if (options.writeDiagnostics) {
      const logPath = new DiagnosticWriter().write(collector, join(projectPath, CONFIG_DIR));
      logger.info('Diagnostics written', { path: logPath });
    }

    const reporter = new DiagnosticReporter(collector);
    if (!(options.quiet && collector.count() === 0 && format === 'text')) {
      output.out(reporter.report({ format, includeSummary: !options.quiet, explain: options.explain }));
    }
    return exitCodeFor(collector);
  } finally {
    await logger.close();
  }
}
