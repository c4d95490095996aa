/**
 * Report Correlator
 *
 * Groups raw reports by program and size and checks that every program,
 * and the baseline series if there is one, was measured at exactly the
 * same sizes. Any inconsistency aborts the pass: a partially correlated
 * dataset is never returned.
 */

import { compareDataSize, dataSizeEquals, distinctSizes, formatDataSize, sizeSetsEqual } from '../data-size/index.js';
import type { DataSize } from '../data-size/index.js';
import { Errors } from '../errors/index.js';
import { createSilentLogger } from '../logging/index.js';
import type { Logger } from '../logging/index.js';
import { isBaselineName, parseReportName } from './report-name-parser.js';
import type { CorrelatedEntry, CorrelationResult, ProgramGroup, RawMeasurementReport } from './types.js';

export interface CorrelatorOptions {
  logger?: Logger;
}

interface Keyed {
  size: DataSize;
  report: RawMeasurementReport;
}

export class ReportCorrelator {
  private readonly logger: Logger;
  private duplicates = 0;

  constructor(options: CorrelatorOptions = {}) {
    this.logger = options.logger ?? createSilentLogger();
  }

  correlate(reports: readonly RawMeasurementReport[]): CorrelationResult {
    this.duplicates = 0;

    if (reports.length === 0) {
      throw Errors.noReports('the report set is empty');
    }

    const baselineReports = reports.filter(r => isBaselineName(r.name));
    const programReports = reports.filter(r => !isBaselineName(r.name));

    if (programReports.length === 0) {
      throw Errors.noReports(`found ${baselineReports.length} baseline report(s) but no program reports`);
    }

    const programs = this.groupPrograms(programReports);
    const sizes = this.checkProgramSizes(programs);

    let baseline: CorrelatedEntry[] | null = null;
    if (baselineReports.length > 0) {
      baseline = this.collectBaseline(baselineReports);
      const baselineSizes = baseline.map(e => e.size);
      for (const group of programs) {
        const programSizes = group.entries.map(e => e.size);
        if (!sizeSetsEqual(baselineSizes, programSizes)) {
          throw Errors.baselineMismatch(group.programId, baselineSizes.map(formatDataSize), programSizes.map(formatDataSize));
        }
      }
    }

    this.logger.info(
      `Correlated ${reports.length} report(s): ${programs.length} program(s) at ${sizes.length} size(s)` +
        (baseline ? ', with baselines' : '')
    );

    return { programs, baseline, sizes, duplicates: this.duplicates };
  }

  private groupPrograms(reports: readonly RawMeasurementReport[]): ProgramGroup[] {
    const byProgram = new Map<string, Keyed[]>();

    for (const report of reports) {
      const parsed = parseReportName(report.name);
      if (parsed.baseline) continue;
      const entries = byProgram.get(parsed.programId) ?? [];
      entries.push({ size: parsed.size, report });
      byProgram.set(parsed.programId, entries);
    }

    return [...byProgram.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([programId, entries]) => ({ programId, entries: this.dedupe(entries, programId) }));
  }

  private collectBaseline(reports: readonly RawMeasurementReport[]): CorrelatedEntry[] {
    const entries: Keyed[] = [];
    for (const report of reports) {
      const parsed = parseReportName(report.name);
      entries.push({ size: parsed.size, report });
    }
    return this.dedupe(entries, 'baseline');
  }

  /**
   * Sort by size; the first report seen for a size wins.
   */
  private dedupe(entries: Keyed[], owner: string): CorrelatedEntry[] {
    const kept: CorrelatedEntry[] = [];
    for (const entry of entries) {
      if (kept.some(k => dataSizeEquals(k.size, entry.size))) {
        this.duplicates++;
        this.logger.warn(`Dropping duplicate report '${entry.report.name}' for ${owner} at size ${formatDataSize(entry.size)}`);
        continue;
      }
      kept.push(entry);
    }
    return kept.sort((a, b) => compareDataSize(a.size, b.size));
  }

  private checkProgramSizes(programs: ProgramGroup[]): DataSize[] {
    const [first, ...rest] = programs;
    if (!first) {
      throw Errors.noReports('no program reports');
    }

    const reference = first.entries.map(e => e.size);
    for (const group of rest) {
      const sizes = group.entries.map(e => e.size);
      if (!sizeSetsEqual(reference, sizes)) {
        throw Errors.sizeMismatch(
          group.programId,
          reference.map(formatDataSize),
          sizes.map(formatDataSize),
          `'${first.programId}'`
        );
      }
    }
    return distinctSizes(reference);
  }
}

export function correlateReports(
  reports: readonly RawMeasurementReport[],
  options: CorrelatorOptions = {}
): CorrelationResult {
  return new ReportCorrelator(options).correlate(reports);
}
