/**
 * Report Loader
 *
 * Reads the benchmarking tool's JSON report file. The file holds either
 * `[toolName, toolVersion, reports]` or a bare array of reports.
 */

import * as fs from 'node:fs/promises';
import { z } from 'zod';
import { Errors, PerfscopeErrorCode } from '../errors/index.js';
import { formatIssues } from '../test-suite/raw-schema.js';
import type { Estimate, RawMeasurementReport } from './types.js';

const EstimateSchema = z.object({
  estPoint: z.number(),
  estError: z
    .object({
      confIntLDX: z.number(),
      confIntUDX: z.number(),
    })
    .optional(),
});

const ReportSchema = z.object({
  reportName: z.string(),
  reportMeasured: z.array(z.unknown()),
  reportAnalysis: z.object({
    anMean: EstimateSchema,
    anStdDev: EstimateSchema,
    anOutlierVar: z.object({
      ovEffect: z.enum(['Unaffected', 'Slight', 'Moderate', 'Severe']),
      ovDesc: z.string().default(''),
      ovFraction: z.number(),
    }),
    anRegress: z
      .array(
        z.object({
          regResponder: z.string(),
          regCoeffs: z.record(z.string(), EstimateSchema),
          regRSquare: EstimateSchema.optional(),
        })
      )
      .default([]),
  }),
});

const ToolReportFileSchema = z.tuple([z.string(), z.string(), z.array(ReportSchema)]);
const BareReportFileSchema = z.array(ReportSchema);

type RawEstimate = z.infer<typeof EstimateSchema>;
type RawReport = z.infer<typeof ReportSchema>;

function toEstimate(raw: RawEstimate): Estimate {
  return raw.estError
    ? { point: raw.estPoint, lowerBound: raw.estPoint - raw.estError.confIntLDX, upperBound: raw.estPoint + raw.estError.confIntUDX }
    : { point: raw.estPoint };
}

function toRawMeasurementReport(raw: RawReport): RawMeasurementReport {
  const analysis = raw.reportAnalysis;
  return {
    name: raw.reportName,
    measurements: raw.reportMeasured,
    analysis: {
      mean: toEstimate(analysis.anMean),
      stdDev: toEstimate(analysis.anStdDev),
      outlierVariance: {
        effect: analysis.anOutlierVar.ovEffect,
        description: analysis.anOutlierVar.ovDesc,
        fraction: analysis.anOutlierVar.ovFraction,
      },
      regressions: analysis.anRegress.map(regression => ({
        responder: regression.regResponder,
        coefficients: Object.fromEntries(
          Object.entries(regression.regCoeffs).map(([name, estimate]) => [name, toEstimate(estimate)])
        ),
        rSquare: regression.regRSquare ? toEstimate(regression.regRSquare) : undefined,
      })),
    },
  };
}

/**
 * Parse the contents of a report file
 */
export function parseMeasurementReports(json: string, source = '<input>'): RawMeasurementReport[] {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (error) {
    throw Errors.reportFile(source, `not valid JSON (${error instanceof Error ? error.message : String(error)})`);
  }

  // The tool's own layout starts with its name
  if (Array.isArray(data) && typeof data[0] === 'string') {
    const result = ToolReportFileSchema.safeParse(data);
    if (!result.success) {
      throw Errors.reportFile(source, formatIssues(result.error));
    }
    return result.data[2].map(toRawMeasurementReport);
  }

  const result = BareReportFileSchema.safeParse(data);
  if (!result.success) {
    throw Errors.reportFile(source, formatIssues(result.error));
  }
  return result.data.map(toRawMeasurementReport);
}

export async function loadMeasurementReports(filePath: string): Promise<RawMeasurementReport[]> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    const code = error instanceof Error && 'code' in error && error.code === 'ENOENT'
      ? PerfscopeErrorCode.FILE_NOT_FOUND
      : PerfscopeErrorCode.INVALID_FILE;
    throw Errors.reportFile(
      filePath,
      code === PerfscopeErrorCode.FILE_NOT_FOUND ? 'cannot locate report file' : `cannot read file (${String(error)})`,
      code
    );
  }
  return parseMeasurementReports(content, filePath);
}
