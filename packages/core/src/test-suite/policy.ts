/**
 * Numeric policy shared by classification and validation
 */

/** Minimum number of distinctly sized test inputs per test suite */
export const MIN_INPUTS = 20;

/** Maximum number of predictors of any regression model */
export const MAX_PREDICTORS = 10;

export const MIN_CV_ITERS = 100;
export const MAX_CV_ITERS = 500;

export const MIN_CV_TRAIN = 0.5;
export const MAX_CV_TRAIN = 0.8;

/** Default file the benchmarking harness writes its JSON report to */
export const DEFAULT_REPORT_FILE = 'perfscope_tmp.json';

/** Program id given to baseline measurements */
export const BASELINE_ID = 'baseline';
