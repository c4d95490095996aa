/**
 * Test Suite Types
 */

import type { LinearModelSpec } from '../analysis/linear-models.js';
import type { RuntimeCompare, StatsFilter, StatsSort } from '../analysis/types.js';

/**
 * Where test inputs come from: user test data by name, or generated
 * inputs at sizes lower, lower + step, ... up to upper.
 */
export type DataOptions =
  | { kind: 'manual'; name: string }
  | { kind: 'generated'; lower: number; step: number; upper: number };

export interface AnalysisOptions {
  /** Models to fit */
  models: LinearModelSpec[];
  /** Cross-validation iterations */
  cvIters: number;
  /** Fraction of the data set used for cross-validation training */
  cvTrain: number;
  /** How many of the best models to report */
  topModels: number;
  statsFilter: StatsFilter;
  statsSort: StatsSort;
  runtimeCompare: RuntimeCompare;
  /** Graph of runtime results */
  graphPath: string | null;
  /** Report of results */
  reportPath: string | null;
  /** CSV of (size, runtime) coordinates */
  coordsPath: string | null;
}

export interface TestSuite {
  /** Programs to benchmark; empty means every suitable program */
  programs: string[];
  dataOptions: DataOptions;
  analysisOptions: AnalysisOptions;
  /** Passed through to the compiler */
  compilerFlags: string[];
  /** Whether to measure baselines */
  baseline: boolean;
  /** Evaluate results to normal form rather than weak head normal form */
  nf: boolean;
  /** Configuration handed to the benchmarking tool as-is */
  toolConfig: Record<string, unknown>;
}
