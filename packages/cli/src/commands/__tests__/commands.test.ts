/**
 * CLI Command Tests
 */

import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import type { MockInstance } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { parseBenchmarkReport } from 'perfscope-core';
import type { SnapshotSummary } from 'perfscope-core';
import { checkAction } from '../check.js';
import { reportAction } from '../report.js';
import { sizesAction } from '../sizes.js';
import type { CommandContext } from '../../services/pipeline.js';

const SIZES = Array.from({ length: 20 }, (_, i) => 5 * (i + 1));

const INPUT = {
  declarations: [
    { name: 'sort', kind: 'function', type: '[Int] -> [Int]' },
    { name: 'reverse', kind: 'function', type: '[Int] -> [Int]' },
    { name: 'Sortable', kind: 'type-class' },
  ],
  capabilities: { generatable: ['[Int]'], evaluable: ['[Int]'] },
  testSuites: {
    sorting: { programs: ['sort', 'reverse'], analysisOptions: { coordsPath: 'coords.csv' } },
    broken: { programs: ['missing'] },
  },
};

function measurement(name: string, mean: number) {
  return {
    reportName: name,
    reportMeasured: [[mean, 1]],
    reportAnalysis: {
      anMean: { estPoint: mean },
      anStdDev: { estPoint: 0 },
      anOutlierVar: { ovEffect: 'Unaffected', ovDesc: '', ovFraction: 0 },
      anRegress: [],
    },
  };
}

function loggedLines(spy: MockInstance<typeof console.log>): string[] {
  return spy.mock.calls.map(call => call.map(String).join(' '));
}

describe('commands', () => {
  let dir: string;
  let context: CommandContext;
  let log: MockInstance<typeof console.log>;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'perfscope-cli-'));
    context = { cwd: dir, env: { PERFSCOPE_LOG_LEVEL: 'error' } };
    await fs.writeFile(path.join(dir, 'bench.json'), JSON.stringify(INPUT));
    log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe('check', () => {
    it('should print a JSON summary', async () => {
      const code = await checkAction('bench.json', { json: true }, context);

      expect(code).toBe(0);
      const summary: SnapshotSummary = JSON.parse(loggedLines(log).join('\n'));
      expect(summary.unary).toEqual(['sort', 'reverse']);
      expect(summary.invalid).toEqual([{ name: 'Sortable', reason: "Type error: 'Sortable' is a type-class, not a function" }]);
      expect(summary.testSuites).toEqual(['sorting']);
      expect(summary.invalidTestSuites).toEqual([
        { name: 'broken', errors: ["Type error: program 'missing' is not defined in the input file"] },
      ]);
    });

    it('should fail when no test suite is valid', async () => {
      await fs.writeFile(
        path.join(dir, 'bench.json'),
        JSON.stringify({ ...INPUT, testSuites: { broken: INPUT.testSuites.broken } })
      );

      expect(await checkAction('bench.json', {}, context)).toBe(1);
    });
  });

  describe('sizes', () => {
    it('should list the sizes of a test suite', async () => {
      const code = await sizesAction('bench.json', { suite: 'sorting' }, context);

      expect(code).toBe(0);
      expect(loggedLines(log)[1]).toBe(SIZES.join(', '));
    });

    it('should refuse an invalid test suite', async () => {
      expect(await sizesAction('bench.json', { suite: 'broken' }, context)).toBe(1);
    });

    it('should refuse an unknown test suite', async () => {
      expect(await sizesAction('bench.json', { suite: 'nothing' }, context)).toBe(1);
    });
  });

  describe('report', () => {
    beforeEach(async () => {
      const reports = ['sort', 'reverse'].flatMap(program =>
        SIZES.map(n => measurement(`Input Size ${n}/${program}`, n / 1000))
      );
      await fs.writeFile(path.join(dir, 'perfscope_tmp.json'), JSON.stringify(['bench-tool', '1.0.0', reports]));
    });

    it('should write the benchmark report and coordinates', async () => {
      const code = await reportAction('bench.json', { suite: 'sorting', output: 'out/report.json' }, context);

      expect(code).toBe(0);
      const report = parseBenchmarkReport(await fs.readFile(path.join(dir, 'out', 'report.json'), 'utf-8'));
      expect(report.programs).toEqual(['sort', 'reverse']);
      expect(report.reports.map(r => r.programId)).toEqual(['reverse', 'sort']);
      expect(report.reports[0]?.measurements).toHaveLength(20);

      const csv = await fs.readFile(path.join(dir, 'coords.csv'), 'utf-8');
      const rows = csv.trimEnd().split('\n');
      expect(rows[0]).toBe('program,size,runtime');
      expect(rows[1]).toBe('reverse,5,0.005');
      expect(rows).toHaveLength(41);
    });

    it('should print the report when there is nowhere to write it', async () => {
      await fs.writeFile(
        path.join(dir, 'bench.json'),
        JSON.stringify({ ...INPUT, testSuites: { sorting: { programs: ['sort', 'reverse'] } } })
      );

      const code = await reportAction('bench.json', { suite: 'sorting' }, context);

      expect(code).toBe(0);
      const report = parseBenchmarkReport(loggedLines(log).join('\n'));
      expect(report.reports[1]?.measurements[19]?.report.runtime).toBe(0.1);
    });

    it('should leave the analysis report path to the analysis stage', async () => {
      await fs.writeFile(
        path.join(dir, 'bench.json'),
        JSON.stringify({
          ...INPUT,
          testSuites: { sorting: { programs: ['sort', 'reverse'], analysisOptions: { reportPath: 'results.txt' } } },
        })
      );

      const code = await reportAction('bench.json', { suite: 'sorting' }, context);

      expect(code).toBe(0);
      expect(parseBenchmarkReport(loggedLines(log).join('\n')).programs).toEqual(['sort', 'reverse']);
      await expect(fs.access(path.join(dir, 'results.txt'))).rejects.toThrow();
    });

    it('should fail on reports at sizes the suite does not produce', async () => {
      const reports = ['sort', 'reverse'].flatMap(program => [5, 10].map(n => measurement(`Input Size ${n}/${program}`, 1)));
      await fs.writeFile(path.join(dir, 'results.json'), JSON.stringify(reports));

      await expect(
        reportAction('bench.json', { suite: 'sorting', reports: 'results.json', output: 'report.json' }, context)
      ).rejects.toThrow('Reports were measured at sizes [5, 10] but the test suite produces');
    });
  });
});
