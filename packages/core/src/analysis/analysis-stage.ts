/**
 * Analysis Stage
 *
 * Applies a test suite's policy hooks to the fits produced by the
 * regression collaborator, and compares program runtimes size by size.
 */

import { dataSizeEquals, formatDataSize } from '../data-size/index.js';
import { createSilentLogger } from '../logging/index.js';
import type { Logger } from '../logging/index.js';
import type { BenchmarkReport, ProgramReports } from '../reports/types.js';
import type { AnalysisOptions } from '../test-suite/types.js';
import { modelLabel } from './linear-models.js';
import type {
  AnalysisResult,
  ModelStats,
  ProgramAnalysis,
  RegressionAnalyzer,
  RuntimeComparison,
  RuntimeOrdering,
} from './types.js';

export interface AnalysisStageOptions {
  logger?: Logger;
}

// ============================================================================
// Fits
// ============================================================================

/**
 * Filter, rank and truncate candidate fits
 */
export function selectFits(
  candidates: readonly ModelStats[],
  options: AnalysisOptions
): Pick<ProgramAnalysis, 'fits' | 'rejected'> {
  const accepted = candidates.filter(options.statsFilter);
  return {
    fits: accepted.sort(options.statsSort).slice(0, options.topModels),
    rejected: candidates.length - accepted.length,
  };
}

async function analyseProgram(
  program: ProgramReports,
  options: AnalysisOptions,
  analyzer: RegressionAnalyzer,
  logger: Logger
): Promise<ProgramAnalysis> {
  const candidates = await analyzer.fit({
    programId: program.programId,
    measurements: program.measurements,
    models: options.models,
    cvIters: options.cvIters,
    cvTrain: options.cvTrain,
  });

  const { fits, rejected } = selectFits(candidates, options);
  logger.debug(
    `${program.programId}: ${candidates.length} fit(s), ${candidates.length - rejected} accepted`,
    fits.map(f => modelLabel(f.model))
  );

  return { programId: program.programId, fits, rejected };
}

export async function analyseBenchmarkReport(
  report: BenchmarkReport,
  options: AnalysisOptions,
  analyzer: RegressionAnalyzer,
  stageOptions: AnalysisStageOptions = {}
): Promise<AnalysisResult> {
  const logger = stageOptions.logger ?? createSilentLogger();

  const programs = await Promise.all(report.reports.map(p => analyseProgram(p, options, analyzer, logger)));
  const comparisons = compareRuntimes(report, options);

  logger.info(`Analysed ${programs.length} program(s)`);
  return { report, programs, comparisons };
}

// ============================================================================
// Runtime comparison
// ============================================================================

function toOrdering(value: number): RuntimeOrdering {
  if (value < 0) return -1;
  if (value > 0) return 1;
  return 0;
}

function majority(orderings: readonly RuntimeOrdering[]): { ordering: RuntimeOrdering | undefined; agreement: number } {
  if (orderings.length === 0) {
    return { ordering: undefined, agreement: 0 };
  }

  const counts = new Map<RuntimeOrdering, number>();
  for (const ordering of orderings) {
    counts.set(ordering, (counts.get(ordering) ?? 0) + 1);
  }

  const ranked = [...counts.entries()].sort((a, b) => b[1] - a[1]);
  const [top, next] = ranked;
  if (!top || (next && next[1] === top[1])) {
    return { ordering: undefined, agreement: 0 };
  }
  return { ordering: top[0], agreement: top[1] / orderings.length };
}

export function compareProgramRuntimes(
  first: ProgramReports,
  second: ProgramReports,
  runtimeCompare: AnalysisOptions['runtimeCompare']
): RuntimeComparison {
  const perSize: RuntimeComparison['perSize'] = [];
  for (const a of first.measurements) {
    const b = second.measurements.find(m => dataSizeEquals(m.size, a.size));
    if (b) {
      perSize.push({ size: a.size, ordering: toOrdering(runtimeCompare(a.report.runtime, b.report.runtime)) });
    }
  }

  const { ordering, agreement } = majority(perSize.map(p => p.ordering));
  return { first: first.programId, second: second.programId, perSize, ordering, agreement };
}

/**
 * Every pair of programs, in report order
 */
export function compareRuntimes(report: BenchmarkReport, options: AnalysisOptions): RuntimeComparison[] {
  const comparisons: RuntimeComparison[] = [];
  report.reports.forEach((first, i) => {
    for (const second of report.reports.slice(i + 1)) {
      comparisons.push(compareProgramRuntimes(first, second, options.runtimeCompare));
    }
  });
  return comparisons;
}

export function describeComparison(comparison: RuntimeComparison): string {
  const { first, second, ordering, agreement, perSize } = comparison;
  if (ordering === undefined) {
    return `${first} vs ${second}: no consistent ordering over ${perSize.length} size(s)`;
  }
  const relation = ordering < 0 ? 'faster than' : ordering > 0 ? 'slower than' : 'as fast as';
  const disagreeing = perSize.filter(p => p.ordering !== ordering).map(p => formatDataSize(p.size));
  return (
    `${first} is ${relation} ${second} at ${Math.round(agreement * 100)}% of sizes` +
    (disagreeing.length > 0 ? ` (not at ${disagreeing.join(', ')})` : '')
  );
}
