/**
 * Input pipeline shared by the commands: load, classify, validate.
 */

import * as path from 'node:path';
import chalk from 'chalk';
import {
  TableCapabilityOracle,
  classifyDeclarations,
  formatInputError,
  loadConfig,
  loadInputFile,
  validateTestSuites,
} from 'perfscope-core';
import type { ClassificationSnapshot, Logger, PerfscopeConfig, TestSuite } from 'perfscope-core';
import { createCliLogger } from './cli-logger.js';

export interface CommandContext {
  cwd: string;
  env: NodeJS.ProcessEnv;
}

export function defaultContext(): CommandContext {
  return { cwd: process.cwd(), env: process.env };
}

export interface PreparedInput {
  config: PerfscopeConfig;
  logger: Logger;
  snapshot: ClassificationSnapshot;
}

/**
 * Load the config and input file, classify every declaration and validate
 * every test suite.
 */
export async function prepareInput(
  inputPath: string,
  context: CommandContext,
  verbose = false
): Promise<PreparedInput> {
  const config = await loadConfig(context.cwd, context.env);
  const logger = createCliLogger(config.logLevel, verbose);

  const input = await loadInputFile(path.resolve(context.cwd, inputPath));
  const oracle = new TableCapabilityOracle(input.capabilities);
  const classified = await classifyDeclarations(input.declarations, oracle, {
    queryTimeoutMs: config.oracle.queryTimeoutMs,
    logger: logger.child('classify'),
  });
  const snapshot = validateTestSuites(input.testSuites, classified, { logger: logger.child('validate') });

  return { config, logger, snapshot };
}

/**
 * The named valid test suite, or null after printing why it is unusable
 */
export function requireTestSuite(snapshot: ClassificationSnapshot, id: string): TestSuite | null {
  const suite = snapshot.testSuites.get(id);
  if (suite) {
    return suite;
  }

  const invalid = snapshot.invalidTestSuites.find(s => s.name === id);
  if (invalid) {
    console.error(chalk.red(`Test suite '${id}' is invalid:`));
    for (const error of invalid.errors) {
      console.error(chalk.red(`  ${formatInputError(error)}`));
    }
  } else {
    console.error(chalk.red(`No test suite named '${id}'`));
  }
  return null;
}
