/**
 * Analysis Types
 *
 * Interfaces towards the regression collaborator, which fits models to a
 * benchmark report. The fitting itself happens outside this package.
 */

import type { BenchmarkReport, SimpleReport } from '../reports/types.js';
import type { DataSize } from '../data-size/index.js';
import type { LinearModelSpec } from './linear-models.js';

/**
 * Goodness-of-fit statistics for one fitted model
 */
export interface ModelStats {
  model: LinearModelSpec;
  /** Fitted coefficients, a0 first */
  coefficients: number[];
  /** Cross-validated prediction error */
  predictedMse: number;
  rSquared: number;
  adjustedRSquared: number;
}

/** Model acceptance predicate */
export type StatsFilter = (stats: ModelStats) => boolean;

/** Model ranking comparator; negative means the first fits better */
export type StatsSort = (a: ModelStats, b: ModelStats) => number;

/** Runtime comparator; negative means the first runtime is better */
export type RuntimeCompare = (a: number, b: number) => number;

export interface AnalysisRequest {
  programId: string;
  measurements: Array<{ size: DataSize; report: SimpleReport }>;
  models: LinearModelSpec[];
  cvIters: number;
  cvTrain: number;
}

/**
 * External regression collaborator
 */
export interface RegressionAnalyzer {
  fit(request: AnalysisRequest): Promise<ModelStats[]>;
}

export interface ProgramAnalysis {
  programId: string;
  /** Accepted fits, best first, at most topModels */
  fits: ModelStats[];
  /** Fits the acceptance predicate rejected */
  rejected: number;
}

export type RuntimeOrdering = -1 | 0 | 1;

export interface RuntimeComparison {
  first: string;
  second: string;
  /** Ordering at each size both programs were measured at */
  perSize: Array<{ size: DataSize; ordering: RuntimeOrdering }>;
  /** Most frequent ordering, undefined without common sizes or on a tie */
  ordering: RuntimeOrdering | undefined;
  /** Fraction of sizes that agree with `ordering` */
  agreement: number;
}

export interface AnalysisResult {
  report: BenchmarkReport;
  programs: ProgramAnalysis[];
  comparisons: RuntimeComparison[];
}
