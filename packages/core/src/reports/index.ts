/**
 * Reports Module
 *
 * Loading, correlating and normalizing raw benchmark measurements.
 */

export type {
  Estimate,
  OutlierEffect,
  OutlierVariance,
  Regression,
  RawAnalysis,
  RawMeasurementReport,
  ParsedReportName,
  CorrelatedEntry,
  ProgramGroup,
  CorrelationResult,
  SimpleReport,
  ProgramReports,
  BenchmarkReport,
} from './types.js';

export { parseReportName, isBaselineName } from './report-name-parser.js';
export { ReportCorrelator, correlateReports, type CorrelatorOptions } from './report-correlator.js';
export { toSimpleReport, extractRuntime } from './statistics-extractor.js';
export { parseMeasurementReports, loadMeasurementReports } from './report-loader.js';
export {
  buildBenchmarkReport,
  expectedSizes,
  serializeBenchmarkReport,
  parseBenchmarkReport,
  toCoordinates,
  formatCoordinatesCsv,
  BenchmarkReportSchema,
  type BuildReportOptions,
  type Coordinate,
} from './benchmark-report.js';
