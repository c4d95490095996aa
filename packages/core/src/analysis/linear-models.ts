/**
 * Linear model specifications
 *
 * The kinds of function fitted to (size, runtime) coordinates:
 *
 *   polynomial k        a0 + a1 x + ... + ak x^k
 *   logarithmic b k     a0 + a1 log_b(x) + ... + ak log_b^k(x)
 *   polylogarithmic b k a0 + a1 x log_b(x) + ... + ak x^k log_b^k(x)
 *   exponential b       a0 + a1 b^x
 */

import { MAX_PREDICTORS } from '../test-suite/policy.js';

export type LinearModelSpec =
  | { kind: 'polynomial'; degree: number }
  | { kind: 'logarithmic'; base: number; degree: number }
  | { kind: 'polylogarithmic'; base: number; degree: number }
  | { kind: 'exponential'; base: number };

export const polynomial = (degree: number): LinearModelSpec => ({ kind: 'polynomial', degree });
export const logarithmic = (base: number, degree: number): LinearModelSpec => ({ kind: 'logarithmic', base, degree });
export const polylogarithmic = (base: number, degree: number): LinearModelSpec => ({
  kind: 'polylogarithmic',
  base,
  degree,
});
export const exponential = (base: number): LinearModelSpec => ({ kind: 'exponential', base });

export function numPredictors(model: LinearModelSpec): number {
  return model.kind === 'exponential' ? 2 : model.degree + 1;
}

const POLYNOMIAL_NAMES = [
  'constant',
  'linear',
  'quadratic',
  'cubic',
  'quartic',
  'quintic',
  'sextic',
  'septic',
  'octic',
  'nonic',
];

export function modelLabel(model: LinearModelSpec): string {
  switch (model.kind) {
    case 'polynomial':
      return POLYNOMIAL_NAMES[model.degree] ?? `n^${model.degree}`;
    case 'logarithmic':
      return `log_${model.base}^${model.degree} n`;
    case 'polylogarithmic':
      return `n^${model.degree} log_${model.base}^${model.degree} n`;
    case 'exponential':
      return `${model.base}^n`;
  }
}

/**
 * Problems with a single model, empty when it is usable
 */
export function modelProblems(model: LinearModelSpec): string[] {
  const problems: string[] = [];
  const label = describeRaw(model);

  if (model.kind !== 'exponential' && (!Number.isInteger(model.degree) || model.degree < 0)) {
    problems.push(`${label}: degree must be a non-negative integer`);
  }
  if (model.kind !== 'polynomial' && (!Number.isInteger(model.base) || model.base < 2)) {
    problems.push(`${label}: base must be an integer of at least 2`);
  }
  if (problems.length === 0 && numPredictors(model) > MAX_PREDICTORS) {
    problems.push(`${modelLabel(model)} has ${numPredictors(model)} predictors; the maximum is ${MAX_PREDICTORS}`);
  }
  return problems;
}

function describeRaw(model: LinearModelSpec): string {
  switch (model.kind) {
    case 'polynomial':
      return `polynomial ${model.degree}`;
    case 'logarithmic':
      return `logarithmic ${model.base} ${model.degree}`;
    case 'polylogarithmic':
      return `polylogarithmic ${model.base} ${model.degree}`;
    case 'exponential':
      return `exponential ${model.base}`;
  }
}

export const DEFAULT_MODELS: readonly LinearModelSpec[] = [
  polynomial(0),
  polynomial(1),
  polynomial(2),
  polynomial(3),
  polynomial(4),
  logarithmic(2, 1),
  logarithmic(2, 2),
  polylogarithmic(2, 1),
  exponential(2),
];
