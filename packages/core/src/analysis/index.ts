/**
 * Analysis Module
 */

export type {
  ModelStats,
  StatsFilter,
  StatsSort,
  RuntimeCompare,
  AnalysisRequest,
  RegressionAnalyzer,
  ProgramAnalysis,
  RuntimeOrdering,
  RuntimeComparison,
  AnalysisResult,
} from './types.js';

export {
  polynomial,
  logarithmic,
  polylogarithmic,
  exponential,
  numPredictors,
  modelLabel,
  modelProblems,
  DEFAULT_MODELS,
  type LinearModelSpec,
} from './linear-models.js';

export {
  analyseBenchmarkReport,
  compareRuntimes,
  compareProgramRuntimes,
  describeComparison,
  selectFits,
  type AnalysisStageOptions,
} from './analysis-stage.js';
