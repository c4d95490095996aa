/**
 * Benchmark Report
 *
 * Turns a correlation result into the per-program dataset handed to the
 * regression collaborator, plus JSON and CSV forms of it.
 */

import { z } from 'zod';
import type { ClassificationSnapshot } from '../classification/index.js';
import { binarySize, distinctSizes, formatDataSize, sizeComponents, sizeSetsEqual, unarySize } from '../data-size/index.js';
import type { DataSize } from '../data-size/index.js';
import { Errors } from '../errors/index.js';
import { generatedRange } from '../test-suite/defaults.js';
import { BASELINE_ID } from '../test-suite/policy.js';
import { DataOptionsSchema, formatIssues } from '../test-suite/raw-schema.js';
import type { TestSuite } from '../test-suite/types.js';
import { toSimpleReport } from './statistics-extractor.js';
import type { BenchmarkReport, CorrelationResult, ProgramReports } from './types.js';

export interface BuildReportOptions {
  /** When given, the measured sizes must be exactly these */
  expectedSizes?: readonly DataSize[];
}

/**
 * Sizes a test suite is expected to be measured at. Generated data for
 * binary programs uses equal sizes for both inputs.
 */
export function expectedSizes(testSuite: TestSuite, snapshot: ClassificationSnapshot): DataSize[] {
  const options = testSuite.dataOptions;
  if (options.kind === 'manual') {
    return distinctSizes(snapshot.testData(options.name)?.sizes ?? []);
  }

  const first = testSuite.programs[0];
  const binary = first !== undefined && snapshot.classification(first)?.arity === 'binary';
  return generatedRange(options.lower, options.step, options.upper).map(n => (binary ? binarySize(n, n) : unarySize(n)));
}

export function buildBenchmarkReport(
  testSuite: TestSuite,
  correlation: CorrelationResult,
  options: BuildReportOptions = {}
): BenchmarkReport {
  const measured = correlation.programs.map(p => p.programId).sort();
  const expected = [...new Set(testSuite.programs)].sort();
  if (measured.length !== expected.length || measured.some((id, i) => id !== expected[i])) {
    throw Errors.programMismatch(expected, measured);
  }

  if (options.expectedSizes && !sizeSetsEqual(options.expectedSizes, correlation.sizes)) {
    throw Errors.unexpectedSizes(
      distinctSizes(options.expectedSizes).map(formatDataSize),
      correlation.sizes.map(formatDataSize)
    );
  }

  const reports: ProgramReports[] = correlation.programs.map(group => ({
    programId: group.programId,
    measurements: group.entries.map(entry => ({
      size: entry.size,
      report: toSimpleReport(entry.report, group.programId, entry.size),
    })),
  }));

  const baselines =
    testSuite.baseline && correlation.baseline
      ? correlation.baseline.map(entry => toSimpleReport(entry.report, BASELINE_ID, entry.size))
      : [];

  return {
    programs: [...testSuite.programs],
    dataOptions: testSuite.dataOptions,
    nf: testSuite.nf,
    compilerFlags: [...testSuite.compilerFlags],
    reports,
    baselines,
  };
}

// ============================================================================
// Serialization
// ============================================================================

const DataSizeSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('unary'), n: z.number().int() }),
  z.object({ kind: z.literal('binary'), n1: z.number().int(), n2: z.number().int() }),
]);

const SimpleReportSchema = z.object({
  programId: z.string(),
  size: DataSizeSchema,
  runtime: z.number(),
  samples: z.number().int().nonnegative(),
  stdDev: z.number(),
  outlierEffect: z.enum(['Unaffected', 'Slight', 'Moderate', 'Severe']),
  outlierFraction: z.number(),
});

export const BenchmarkReportSchema = z.object({
  programs: z.array(z.string()),
  dataOptions: DataOptionsSchema,
  nf: z.boolean(),
  compilerFlags: z.array(z.string()),
  reports: z.array(
    z.object({
      programId: z.string(),
      measurements: z.array(z.object({ size: DataSizeSchema, report: SimpleReportSchema })),
    })
  ),
  baselines: z.array(SimpleReportSchema),
});

export function serializeBenchmarkReport(report: BenchmarkReport): string {
  return JSON.stringify(report, null, 2);
}

export function parseBenchmarkReport(json: string, source = '<input>'): BenchmarkReport {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (error) {
    throw Errors.reportFile(source, `not valid JSON (${error instanceof Error ? error.message : String(error)})`);
  }
  const result = BenchmarkReportSchema.safeParse(data);
  if (!result.success) {
    throw Errors.reportFile(source, formatIssues(result.error));
  }
  return result.data;
}

// ============================================================================
// Coordinates
// ============================================================================

export interface Coordinate {
  programId: string;
  size: DataSize;
  runtime: number;
}

/**
 * (size, runtime) points of every program, then of the baselines
 */
export function toCoordinates(report: BenchmarkReport): Coordinate[] {
  const points: Coordinate[] = [];
  for (const program of report.reports) {
    for (const { size, report: simple } of program.measurements) {
      points.push({ programId: program.programId, size, runtime: simple.runtime });
    }
  }
  for (const baseline of report.baselines) {
    points.push({ programId: baseline.programId, size: baseline.size, runtime: baseline.runtime });
  }
  return points;
}

export function formatCoordinatesCsv(coordinates: readonly Coordinate[]): string {
  const binary = coordinates.some(c => c.size.kind === 'binary');
  const header = binary ? 'program,size1,size2,runtime' : 'program,size,runtime';
  const rows = coordinates.map(c => [csvField(c.programId), ...sizeComponents(c.size), c.runtime].join(','));
  return [header, ...rows].join('\n') + '\n';
}

function csvField(value: string): string {
  return /[",\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}
