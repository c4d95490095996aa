/**
 * Report Types
 *
 * Raw measurement reports as written by the benchmarking tool, and the
 * normalized records derived from them.
 */

import type { DataSize } from '../data-size/index.js';
import type { DataOptions } from '../test-suite/types.js';

// ============================================================================
// Raw reports
// ============================================================================

export interface Estimate {
  point: number;
  lowerBound?: number | undefined;
  upperBound?: number | undefined;
}

export type OutlierEffect = 'Unaffected' | 'Slight' | 'Moderate' | 'Severe';

export interface OutlierVariance {
  effect: OutlierEffect;
  description: string;
  /** Fraction of variance explained by outliers */
  fraction: number;
}

export interface Regression {
  /** e.g. "time" */
  responder: string;
  /** Predictor name to estimate, e.g. "iters" */
  coefficients: Record<string, Estimate>;
  rSquare?: Estimate | undefined;
}

export interface RawAnalysis {
  mean: Estimate;
  stdDev: Estimate;
  outlierVariance: OutlierVariance;
  regressions: Regression[];
}

export interface RawMeasurementReport {
  /** Encodes program id, input size and baseline marker */
  name: string;
  /** Per-iteration measurements; only the count is used here */
  measurements: readonly unknown[];
  analysis: RawAnalysis;
}

// ============================================================================
// Parsed names and correlation
// ============================================================================

export type ParsedReportName =
  | { baseline: true; size: DataSize }
  | { baseline: false; size: DataSize; programId: string };

export interface CorrelatedEntry {
  size: DataSize;
  report: RawMeasurementReport;
}

export interface ProgramGroup {
  programId: string;
  /** Sorted by size */
  entries: CorrelatedEntry[];
}

export interface CorrelationResult {
  /** Sorted by program id */
  programs: ProgramGroup[];
  /** Sorted by size; null when the set had no baseline reports */
  baseline: CorrelatedEntry[] | null;
  /** The sizes every program (and the baseline) was measured at */
  sizes: DataSize[];
  /** Reports dropped because their (program, size) key was already taken */
  duplicates: number;
}

// ============================================================================
// Normalized reports
// ============================================================================

export interface SimpleReport {
  programId: string;
  size: DataSize;
  runtime: number;
  samples: number;
  stdDev: number;
  outlierEffect: OutlierEffect;
  outlierFraction: number;
}

export interface ProgramReports {
  programId: string;
  /** Sorted by size */
  measurements: Array<{ size: DataSize; report: SimpleReport }>;
}

export interface BenchmarkReport {
  programs: string[];
  dataOptions: DataOptions;
  nf: boolean;
  compilerFlags: string[];
  /** Sorted by program id */
  reports: ProgramReports[];
  /** One per measured size; empty without baselines */
  baselines: SimpleReport[];
}
