/**
 * perfscope-core - Benchmark input validation and report correlation
 *
 * - Shape: parse type signatures into arity and argument shapes
 * - Classification: sort declarations into capability and test data buckets
 * - Test suites: defaults, numeric policy and validation
 * - Reports: parse report names, correlate and summarize measurements
 * - Analysis: apply model selection hooks and compare runtimes
 */

export const VERSION = '0.1.0';

// Errors and logging
export * from './errors/index.js';
export * from './logging/index.js';

// Configuration and input files
export * from './config/index.js';
export * from './input/index.js';

// Input validation pipeline
export * from './shape/index.js';
export * from './data-size/index.js';
export * from './classification/index.js';
export * from './test-suite/index.js';

// Measurement pipeline
export * from './reports/index.js';
export * from './analysis/index.js';
