#!/usr/bin/env node
/**
 * Perfscope CLI Entry Point
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { InputFileError, PerfscopeError, formatInputError } from 'perfscope-core';
import { VERSION } from '../index.js';
import { checkCommand, reportCommand, sizesCommand } from '../commands/index.js';

function createProgram(): Command {
  const program = new Command();

  program
    .name('perfscope')
    .description('Validate benchmark test suites and correlate measurement reports')
    .version(VERSION, '-v, --version', 'Output the current version');

  program.addCommand(checkCommand);
  program.addCommand(reportCommand);
  program.addCommand(sizesCommand);

  program.addHelpText(
    'after',
    `
Examples:
  $ perfscope check bench.json                     Validate every test suite
  $ perfscope check bench.json --json              Print the classification summary
  $ perfscope sizes bench.json --suite sorting     Show the sizes a suite runs at
  $ perfscope report bench.json --suite sorting    Correlate perfscope_tmp.json
  $ perfscope report bench.json -s sorting -r results.json -o report.json -c coords.csv
`
  );

  return program;
}

function printError(error: unknown): void {
  if (error instanceof InputFileError) {
    console.error(chalk.red(formatInputError(error.inputError)));
  } else if (error instanceof PerfscopeError) {
    console.error(chalk.red(`Error [${error.code}]: ${error.message}`));
    if (error.recovery) {
      console.error(chalk.gray(`  ${error.recovery.suggestion}`));
    }
  } else if (error instanceof Error) {
    console.error(chalk.red(`Error: ${error.message}`));
    if (process.env['DEBUG']) {
      console.error(error.stack);
    }
  } else {
    console.error(chalk.red('An unexpected error occurred'));
  }
}

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    printError(error);
    process.exit(1);
  }
}

void main();
