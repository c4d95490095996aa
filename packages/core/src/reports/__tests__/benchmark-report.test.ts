/**
 * Benchmark Report Tests
 */

import { describe, it, expect } from 'vitest';
import { TableCapabilityOracle, classifyDeclarations } from '../../classification/index.js';
import { binarySize, formatDataSize, unarySize } from '../../data-size/index.js';
import { defaultTestSuite } from '../../test-suite/defaults.js';
import type { TestSuite } from '../../test-suite/types.js';
import {
  buildBenchmarkReport,
  expectedSizes,
  formatCoordinatesCsv,
  parseBenchmarkReport,
  serializeBenchmarkReport,
  toCoordinates,
} from '../benchmark-report.js';
import { correlateReports } from '../report-correlator.js';
import { baselineReports, programReports } from './fixtures.js';

function suite(overrides: Partial<TestSuite>): TestSuite {
  return { ...defaultTestSuite(), ...overrides };
}

describe('buildBenchmarkReport', () => {
  it('should summarize every program at every size', () => {
    const correlation = correlateReports(programReports(['p1', 'p2'], [5, 10]));
    const report = buildBenchmarkReport(suite({ programs: ['p1', 'p2'] }), correlation);

    expect(report.programs).toEqual(['p1', 'p2']);
    expect(report.reports.map(r => r.programId)).toEqual(['p1', 'p2']);
    expect(report.reports[1]?.measurements.map(m => m.report.runtime)).toEqual([1, 2]);
    expect(report.baselines).toEqual([]);
  });

  it('should include baselines only when the test suite asks for them', () => {
    const correlation = correlateReports([...programReports(['p1'], [5, 10]), ...baselineReports([5, 10])]);

    expect(buildBenchmarkReport(suite({ programs: ['p1'] }), correlation).baselines).toEqual([]);

    const report = buildBenchmarkReport(suite({ programs: ['p1'], baseline: true }), correlation);
    expect(report.baselines.map(b => [b.programId, formatDataSize(b.size), b.runtime])).toEqual([
      ['baseline', '5', 0.1],
      ['baseline', '10', 0.1],
    ]);
  });

  it('should reject reports for other programs', () => {
    const correlation = correlateReports(programReports(['p1', 'p2'], [5, 10]));

    expect(() => buildBenchmarkReport(suite({ programs: ['p1'] }), correlation)).toThrow(
      'Reports cover programs [p1, p2] but the test suite has [p1]'
    );
  });

  it('should reject sizes the test suite does not produce', () => {
    const correlation = correlateReports(programReports(['p1'], [5, 10]));

    expect(() =>
      buildBenchmarkReport(suite({ programs: ['p1'] }), correlation, { expectedSizes: [unarySize(5), unarySize(15)] })
    ).toThrow('Reports were measured at sizes [5, 10] but the test suite produces [5, 15]');
  });
});

describe('expectedSizes', () => {
  const oracle = new TableCapabilityOracle({ generatable: ['[Int]'], evaluable: ['[Int]'] });

  it('should list the generated range for unary programs', async () => {
    const snapshot = await classifyDeclarations([{ name: 'sort', kind: 'function', type: '[Int] -> [Int]' }], oracle);
    const sizes = expectedSizes(suite({ programs: ['sort'] }), snapshot);

    expect(sizes).toHaveLength(20);
    expect(sizes[0]).toEqual(unarySize(5));
    expect(sizes[19]).toEqual(unarySize(100));
  });

  it('should pair generated sizes for binary programs', async () => {
    const snapshot = await classifyDeclarations(
      [{ name: 'merge', kind: 'function', type: '[Int] -> [Int] -> [Int]' }],
      oracle
    );
    const sizes = expectedSizes(suite({ programs: ['merge'] }), snapshot);

    expect(sizes[0]).toEqual(binarySize(5, 5));
  });

  it('should use the distinct sizes of manual test data', async () => {
    const annotated = [20, 2, ...Array.from({ length: 20 }, (_, i) => i + 1)].map(unarySize);
    const snapshot = await classifyDeclarations(
      [{ name: 'lists', kind: 'function', type: 'UnaryTestData [Int]', sizes: annotated }],
      oracle
    );
    const sizes = expectedSizes(suite({ dataOptions: { kind: 'manual', name: 'lists' } }), snapshot);

    expect(sizes.map(formatDataSize)).toEqual(Array.from({ length: 20 }, (_, i) => String(i + 1)));
  });

  it('should expect nothing from unknown test data', async () => {
    const snapshot = await classifyDeclarations([], oracle);

    expect(expectedSizes(suite({ dataOptions: { kind: 'manual', name: 'lists' } }), snapshot)).toEqual([]);
  });
});

describe('serialization', () => {
  it('should read back what it writes', () => {
    const correlation = correlateReports([...programReports(['p1'], [5, 10]), ...baselineReports([5, 10])]);
    const report = buildBenchmarkReport(suite({ programs: ['p1'], baseline: true }), correlation);

    expect(parseBenchmarkReport(serializeBenchmarkReport(report))).toEqual(report);
  });

  it('should reject JSON that is not a benchmark report', () => {
    expect(() => parseBenchmarkReport('{"programs": 3}', 'report.json')).toThrow(
      /^Invalid measurement report file report\.json: /
    );
  });
});

describe('coordinates', () => {
  it('should write unary coordinates as CSV', () => {
    const correlation = correlateReports([...programReports(['p1', 'p2'], [5, 10]), ...baselineReports([5, 10])]);
    const report = buildBenchmarkReport(suite({ programs: ['p1', 'p2'], baseline: true }), correlation);

    expect(formatCoordinatesCsv(toCoordinates(report))).toBe(
      'program,size,runtime\np1,5,0.5\np1,10,1\np2,5,1\np2,10,2\nbaseline,5,0.1\nbaseline,10,0.1\n'
    );
  });

  it('should write both components of binary sizes', () => {
    const csv = formatCoordinatesCsv([{ programId: 'merge', size: binarySize(5, 4), runtime: 0.25 }]);

    expect(csv).toBe('program,size1,size2,runtime\nmerge,5,4,0.25\n');
  });

  it('should quote program ids that need it', () => {
    const csv = formatCoordinatesCsv([{ programId: 'sort,"fast"', size: unarySize(5), runtime: 1 }]);

    expect(csv).toBe('program,size,runtime\n"sort,""fast""",5,1\n');
  });
});
