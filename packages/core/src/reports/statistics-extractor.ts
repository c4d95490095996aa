/**
 * Statistics Extractor
 */

import type { DataSize } from '../data-size/index.js';
import type { RawMeasurementReport, SimpleReport } from './types.js';

const TIME_RESPONDER = 'time';
const ITERS_PREDICTOR = 'iters';

/**
 * Runtime per iteration: the "iters" coefficient of the single "time"
 * regression when there is one, otherwise the mean.
 */
export function extractRuntime(report: RawMeasurementReport): number {
  const timeRegressions = report.analysis.regressions.filter(r => r.responder === TIME_RESPONDER);
  if (timeRegressions.length === 1) {
    const iters = timeRegressions[0]?.coefficients[ITERS_PREDICTOR];
    if (iters !== undefined) {
      return iters.point;
    }
  }
  return report.analysis.mean.point;
}

export function toSimpleReport(report: RawMeasurementReport, programId: string, size: DataSize): SimpleReport {
  return {
    programId,
    size,
    runtime: extractRuntime(report),
    samples: report.measurements.length,
    stdDev: report.analysis.stdDev.point,
    outlierEffect: report.analysis.outlierVariance.effect,
    outlierFraction: report.analysis.outlierVariance.fraction,
  };
}
