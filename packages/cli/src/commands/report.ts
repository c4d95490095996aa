/**
 * Report Command - perfscope report
 *
 * Correlate the measurement reports of one test suite into a benchmark
 * report, written as JSON and optionally as CSV coordinates.
 */

import { Command } from 'commander';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import chalk from 'chalk';
import {
  buildBenchmarkReport,
  correlateReports,
  expectedSizes,
  formatCoordinatesCsv,
  loadMeasurementReports,
  resolveOutputPath,
  serializeBenchmarkReport,
  toCoordinates,
} from 'perfscope-core';
import { defaultContext, prepareInput, requireTestSuite } from '../services/pipeline.js';
import type { CommandContext } from '../services/pipeline.js';

export interface ReportOptions {
  suite: string;
  /** Measurement report file; defaults to the configured one */
  reports?: string;
  /** Benchmark report output; stdout when absent */
  output?: string;
  /** CSV coordinates output; defaults to the suite's coordinates path */
  coords?: string;
  verbose?: boolean;
}

async function writeArtifact(filePath: string, content: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content);
}

export async function reportAction(
  input: string,
  options: ReportOptions,
  context: CommandContext = defaultContext()
): Promise<number> {
  const { config, logger, snapshot } = await prepareInput(input, context, options.verbose);
  const suite = requireTestSuite(snapshot, options.suite);
  if (!suite) {
    return 1;
  }

  const reportsPath = path.resolve(context.cwd, options.reports ?? config.reports.defaultFile);
  const raw = await loadMeasurementReports(reportsPath);
  const correlation = correlateReports(raw, { logger: logger.child('correlate') });
  const report = buildBenchmarkReport(suite, correlation, { expectedSizes: expectedSizes(suite, snapshot) });

  const json = serializeBenchmarkReport(report);
  if (options.output === undefined) {
    console.log(json);
  } else {
    const resolved = resolveOutputPath(config, options.output, context.cwd);
    await writeArtifact(resolved, json + '\n');
    console.log(chalk.green(`✓ Wrote benchmark report to ${resolved}`));
  }

  const coordsPath = options.coords ?? suite.analysisOptions.coordsPath;
  if (coordsPath !== null) {
    const resolved = resolveOutputPath(config, coordsPath, context.cwd);
    await writeArtifact(resolved, formatCoordinatesCsv(toCoordinates(report)));
    console.log(chalk.green(`✓ Wrote coordinates to ${resolved}`));
  }

  if (correlation.duplicates > 0) {
    console.log(chalk.yellow(`  ${correlation.duplicates} duplicate report(s) ignored`));
  }
  return 0;
}

export const reportCommand = new Command('report')
  .description('Correlate measurement reports into a benchmark report')
  .argument('<input>', 'Input file (.json)')
  .requiredOption('-s, --suite <id>', 'Test suite to report on')
  .option('-r, --reports <file>', 'Measurement report file')
  .option('-o, --output <file>', 'Benchmark report output file')
  .option('-c, --coords <file>', 'CSV coordinates output file')
  .option('--verbose', 'Enable debug logging')
  .action(async (input: string, options: ReportOptions) => {
    process.exitCode = await reportAction(input, options);
  });
