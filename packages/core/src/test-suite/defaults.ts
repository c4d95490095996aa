/**
 * Test suite defaults, overridden field by field by user settings
 */

import { DEFAULT_MODELS } from '../analysis/linear-models.js';
import type { AnalysisOptions, DataOptions, TestSuite } from './types.js';

export function defaultDataOptions(): DataOptions {
  return { kind: 'generated', lower: 5, step: 5, upper: 100 };
}

export function defaultAnalysisOptions(): AnalysisOptions {
  return {
    models: [...DEFAULT_MODELS],
    cvIters: 100,
    cvTrain: 0.7,
    topModels: 1,
    statsFilter: () => true,
    statsSort: () => 0,
    runtimeCompare: () => 0,
    graphPath: './TimeChecked.png',
    reportPath: null,
    coordsPath: null,
  };
}

export function defaultTestSuite(): TestSuite {
  return {
    programs: [],
    dataOptions: defaultDataOptions(),
    analysisOptions: defaultAnalysisOptions(),
    compilerFlags: [],
    baseline: false,
    nf: true,
    toolConfig: {},
  };
}

function isUsableRange(lower: number, step: number, upper: number): boolean {
  return Number.isSafeInteger(lower) && Number.isSafeInteger(step) && Number.isSafeInteger(upper) && step > 0 && lower <= upper;
}

/**
 * Number of sizes in lower, lower + step, ... up to upper. Zero unless the
 * bounds are safe integers with a positive step and lower <= upper.
 */
export function generatedCount(lower: number, step: number, upper: number): number {
  return isUsableRange(lower, step, upper) ? Math.floor((upper - lower) / step) + 1 : 0;
}

/**
 * lower, lower + step, ... while not above upper. Empty wherever
 * generatedCount is zero.
 */
export function generatedRange(lower: number, step: number, upper: number): number[] {
  return Array.from({ length: generatedCount(lower, step, upper) }, (_, i) => lower + i * step);
}

export function formatDataOptions(options: DataOptions): string {
  return options.kind === 'manual'
    ? `Manual "${options.name}"`
    : `Generated ${options.lower} ${options.step} ${options.upper}`;
}
