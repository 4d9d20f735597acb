/**
 * Check command - report Law-of-Demeter violations in a Python project
 */

import { Command } from 'commander';
import { LinterError } from '@demeter-lint/core';
import { exitWithError } from '../utils/errorFormatter.js';
import { checkAction } from './checkAction.js';
import type { CheckOptions } from './checkAction.js';

export const checkCommand = new Command('check')
  .description('Check a Python project for Law-of-Demeter violations')
  .argument('[path]', 'Project path', '.')
  .option('-f, --format <format>', 'Output format: text, json or csv', 'text')
  .option('-c, --category <key>', 'Only report one diagnostic category')
  .option('--list-categories', 'List available diagnostic categories')
  .option('--explain', 'Show the provenance class of each violation receiver')
  .option('-q, --quiet', 'Only output violations')
  .option('--log-level <level>', 'Log level: silent, errors, warnings, info, debug')
  .option('--log-file <path>', 'Also write all log output to a file')
  .option('--write-diagnostics', 'Write .demeter-lint/diagnostics.log (JSON lines)')
  .addHelpText('after', `
Examples:
  demeter-lint check                     Check the current directory
  demeter-lint check src/app             Check another project root
  demeter-lint check --category stubs    Only missing-stub reports (W9019)
  demeter-lint check --format json       Machine-readable output for CI
  demeter-lint check --explain           Append receiver provenance to each line
`)
  .action(async (path: string, options: CheckOptions) => {
    try {
      process.exitCode = await checkAction(path, options);
    } catch (e) {
      if (e instanceof LinterError) {
        exitWithError(e.message, e.suggestion ? [e.suggestion] : undefined);
      }
      const error = e instanceof Error ? e : new Error(String(e));
      exitWithError(`Check failed: ${error.message}`, ['Run with --log-level debug for details']);
    }
  });
