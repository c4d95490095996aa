/**
 * Sizes Command - perfscope sizes
 *
 * Print the input sizes a test suite will be measured at.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { expectedSizes, formatDataOptions, formatDataSize } from 'perfscope-core';
import { defaultContext, prepareInput, requireTestSuite } from '../services/pipeline.js';
import type { CommandContext } from '../services/pipeline.js';

export interface SizesOptions {
  suite: string;
  json?: boolean;
  verbose?: boolean;
}

export async function sizesAction(
  input: string,
  options: SizesOptions,
  context: CommandContext = defaultContext()
): Promise<number> {
  const { snapshot } = await prepareInput(input, context, options.verbose);
  const suite = requireTestSuite(snapshot, options.suite);
  if (!suite) {
    return 1;
  }

  const sizes = expectedSizes(suite, snapshot);
  if (options.json) {
    console.log(JSON.stringify(sizes, null, 2));
    return 0;
  }

  console.log(chalk.bold(`${options.suite}: ${formatDataOptions(suite.dataOptions)}, ${sizes.length} size(s)`));
  console.log(sizes.map(formatDataSize).join(', '));
  return 0;
}

export const sizesCommand = new Command('sizes')
  .description('Show the input sizes of a test suite')
  .argument('<input>', 'Input file (.json)')
  .requiredOption('-s, --suite <id>', 'Test suite')
  .option('--json', 'Output JSON')
  .option('--verbose', 'Enable debug logging')
  .action(async (input: string, options: SizesOptions) => {
    process.exitCode = await sizesAction(input, options);
  });
