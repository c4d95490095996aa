/**
 * Schemas for user-supplied test suite records
 *
 * These check the shape of each field only. Bounds, cross-references and
 * capability requirements are the validator's job.
 */

import { z } from 'zod';
import type { RuntimeCompare, StatsFilter, StatsSort } from '../analysis/types.js';

export const TEST_SUITE_FIELDS = [
  'programs',
  'dataOptions',
  'analysisOptions',
  'compilerFlags',
  'baseline',
  'nf',
  'toolConfig',
] as const;

export const ANALYSIS_OPTION_FIELDS = [
  'models',
  'cvIters',
  'cvTrain',
  'topModels',
  'statsFilter',
  'statsSort',
  'runtimeCompare',
  'graphPath',
  'reportPath',
  'coordsPath',
] as const;

export const RecordSchema = z.record(z.string(), z.unknown());

export const DataOptionsSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('manual'), name: z.string().min(1, 'test data name must not be empty') }).strict(),
  z
    .object({
      kind: z.literal('generated'),
      lower: z.number().int('lower must be an integer'),
      step: z.number().int('step must be an integer'),
      upper: z.number().int('upper must be an integer'),
    })
    .strict(),
]);

export const LinearModelSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('polynomial'), degree: z.number() }).strict(),
  z.object({ kind: z.literal('logarithmic'), base: z.number(), degree: z.number() }).strict(),
  z.object({ kind: z.literal('polylogarithmic'), base: z.number(), degree: z.number() }).strict(),
  z.object({ kind: z.literal('exponential'), base: z.number() }).strict(),
]);

const isFunction = (value: unknown): boolean => typeof value === 'function';

export const StatsFilterSchema = z.custom<StatsFilter>(isFunction, { message: 'must be a function' });
export const StatsSortSchema = z.custom<StatsSort>(isFunction, { message: 'must be a function' });
export const RuntimeCompareSchema = z.custom<RuntimeCompare>(isFunction, { message: 'must be a function' });

export const OptionalPathSchema = z.string().min(1).nullable();

/**
 * One line per issue, prefixed with the path inside the field
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
