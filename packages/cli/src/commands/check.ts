/**
 * Check Command - perfscope check
 *
 * Classify an input file's declarations and validate its test suites.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { formatDataOptions, formatInputError } from 'perfscope-core';
import type { ClassificationSnapshot } from 'perfscope-core';
import { defaultContext, prepareInput } from '../services/pipeline.js';
import type { CommandContext } from '../services/pipeline.js';

export interface CheckOptions {
  /** Emit a JSON summary instead of text */
  json?: boolean;
  verbose?: boolean;
}

function printText(snapshot: ClassificationSnapshot): void {
  const summary = snapshot.summary();

  console.log();
  console.log(chalk.bold('Declarations'));
  console.log(chalk.gray('─'.repeat(50)));
  console.log(`  Valid:    ${summary.valid.length}`);
  console.log(`  Invalid:  ${summary.invalid.length}`);
  console.log(`  Unary:    ${summary.unary.join(', ') || chalk.gray('none')}`);
  console.log(`  Binary:   ${summary.binary.join(', ') || chalk.gray('none')}`);
  for (const { name, reason } of summary.invalid) {
    console.log(chalk.red(`  ✗ ${name}: ${reason}`));
  }
  for (const diagnostic of summary.diagnostics) {
    console.log(chalk.yellow(`  ! ${diagnostic.name}: ${diagnostic.message}`));
  }

  console.log();
  console.log(chalk.bold('Test data'));
  console.log(chalk.gray('─'.repeat(50)));
  for (const name of [...summary.unaryTestData, ...summary.binaryTestData]) {
    const entry = snapshot.testData(name);
    console.log(chalk.green(`  ✓ ${name}`) + chalk.gray(` (${entry?.arity ?? 'unknown'}, ${entry?.sizes.length ?? 0} inputs)`));
  }
  for (const { name, errors } of summary.invalidTestData) {
    console.log(chalk.red(`  ✗ ${name}`));
    for (const error of errors) {
      console.log(chalk.red(`      ${error}`));
    }
  }

  console.log();
  console.log(chalk.bold('Test suites'));
  console.log(chalk.gray('─'.repeat(50)));
  for (const [name, suite] of snapshot.testSuites) {
    console.log(
      chalk.green(`  ✓ ${name}`) + chalk.gray(` (${suite.programs.join(', ')}; ${formatDataOptions(suite.dataOptions)})`)
    );
  }
  for (const { name, errors } of snapshot.invalidTestSuites) {
    console.log(chalk.red(`  ✗ ${name}`));
    for (const error of errors) {
      console.log(chalk.red(`      ${formatInputError(error)}`));
    }
  }
  console.log();
}

/**
 * Returns the exit code: 1 when no test suite is valid
 */
export async function checkAction(
  input: string,
  options: CheckOptions,
  context: CommandContext = defaultContext()
): Promise<number> {
  const { snapshot } = await prepareInput(input, context, options.verbose);
  const exitCode = snapshot.testSuites.size > 0 ? 0 : 1;

  if (options.json) {
    console.log(JSON.stringify(snapshot.summary(), null, 2));
    return exitCode;
  }

  printText(snapshot);
  if (exitCode !== 0) {
    console.log(chalk.red('No valid test suites'));
  }
  return exitCode;
}

export const checkCommand = new Command('check')
  .description('Classify declarations and validate test suites in an input file')
  .argument('<input>', 'Input file (.json)')
  .option('--json', 'Output a JSON summary')
  .option('--verbose', 'Enable debug logging')
  .action(async (input: string, options: CheckOptions) => {
    process.exitCode = await checkAction(input, options);
  });
