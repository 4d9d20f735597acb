#!/usr/bin/env -S node --import tsx
/**
 * @demeter-lint/cli - command line front end for demeter-lint
 */

import { Command } from 'commander';
import { LINTER_VERSION } from '@demeter-lint/core';
import { checkCommand } from './commands/check.js';

const program = new Command();

program
  .name('demeter-lint')
  .description('Law-of-Demeter checks for Python projects')
  .version(LINTER_VERSION);

program.addCommand(checkCommand);

await program.parseAsync();
