/**
 * Test Suite Module
 *
 * Test suite configuration, defaults, numeric policy and validation.
 */

export type { DataOptions, AnalysisOptions, TestSuite } from './types.js';

export {
  MIN_INPUTS,
  MAX_PREDICTORS,
  MIN_CV_ITERS,
  MAX_CV_ITERS,
  MIN_CV_TRAIN,
  MAX_CV_TRAIN,
  DEFAULT_REPORT_FILE,
  BASELINE_ID,
} from './policy.js';

export {
  defaultTestSuite,
  defaultDataOptions,
  defaultAnalysisOptions,
  generatedCount,
  generatedRange,
  formatDataOptions,
} from './defaults.js';

export {
  TestSuiteValidator,
  validateTestSuite,
  validateTestSuites,
  type TestSuiteValidation,
  type ValidatorOptions,
} from './test-suite-validator.js';
