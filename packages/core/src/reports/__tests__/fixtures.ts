/**
 * Raw report builders shared by the report tests
 */

import type { RawMeasurementReport, Regression } from '../types.js';

export function rawReport(name: string, mean: number, regressions: Regression[] = []): RawMeasurementReport {
  return {
    name,
    measurements: [{}, {}, {}],
    analysis: {
      mean: { point: mean },
      stdDev: { point: mean / 10 },
      outlierVariance: { effect: 'Unaffected', description: 'no', fraction: 0.01 },
      regressions,
    },
  };
}

export function timeRegression(iters: number): Regression {
  return { responder: 'time', coefficients: { iters: { point: iters }, y: { point: 0.2 } } };
}

/** Reports for each program at each size, runtime = size / 10 * (program index + 1) */
export function programReports(programs: string[], sizes: number[]): RawMeasurementReport[] {
  return programs.flatMap((program, i) =>
    sizes.map(size => rawReport(`Input Size ${size}/${program}`, (size / 10) * (i + 1)))
  );
}

export function baselineReports(sizes: number[]): RawMeasurementReport[] {
  return sizes.map(size => rawReport(`Baseline for Input Size ${size}`, 0.1));
}
