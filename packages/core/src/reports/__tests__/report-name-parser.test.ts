/**
 * Report Name Parser Tests
 */

import { describe, it, expect } from 'vitest';
import { PerfscopeErrorCode, ReportStructuralError } from '../../errors/index.js';
import { isBaselineName, parseReportName } from '../report-name-parser.js';

describe('parseReportName', () => {
  it('should parse a unary program report', () => {
    expect(parseReportName('Input Size 5/insertionSort')).toEqual({
      baseline: false,
      size: { kind: 'unary', n: 5 },
      programId: 'insertionSort',
    });
  });

  it('should parse a binary program report', () => {
    expect(parseReportName('Input Sizes (5, 4)/merge')).toEqual({
      baseline: false,
      size: { kind: 'binary', n1: 5, n2: 4 },
      programId: 'merge',
    });
  });

  it('should keep everything after the separator as the program id', () => {
    const parsed = parseReportName('Input Size 20/Data.List.sort');

    expect(parsed.baseline).toBe(false);
    expect(parsed.baseline === false && parsed.programId).toBe('Data.List.sort');
  });

  it('should parse baseline reports', () => {
    expect(parseReportName('Baseline for Input Size 5')).toEqual({ baseline: true, size: { kind: 'unary', n: 5 } });
    expect(parseReportName('Baseline for Input Sizes (3, 8)')).toEqual({
      baseline: true,
      size: { kind: 'binary', n1: 3, n2: 8 },
    });
  });

  it('should reject a name without a size', () => {
    expect(() => parseReportName('Input Size five/sort')).toThrow(
      `Invalid report name 'Input Size five/sort': expected "Input Size <n>" or "Input Sizes (<n>, <n>)"`
    );
  });

  it('should reject a program report without a separator', () => {
    expect(() => parseReportName('Input Size 5')).toThrow(
      `Invalid report name 'Input Size 5': expected "/" after the input size`
    );
  });

  it('should reject an empty program id', () => {
    expect(() => parseReportName('Input Size 5/')).toThrow(
      `Invalid report name 'Input Size 5/': missing program identifier`
    );
  });

  it('should reject a baseline name without a size', () => {
    expect(() => parseReportName('Baseline for size 5')).toThrow(`baseline name has no "Input Size"`);
  });

  it('should reject a baseline name that carries a program id', () => {
    expect(() => parseReportName('Baseline for Input Size 5/sort')).toThrow(
      `unexpected text after baseline size: "/sort"`
    );
  });

  it('should throw structural errors with a stable code', () => {
    try {
      parseReportName('garbage');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ReportStructuralError);
      expect(error instanceof ReportStructuralError && error.code).toBe(PerfscopeErrorCode.INVALID_REPORT_NAME);
    }
  });
});

describe('isBaselineName', () => {
  it('should look for the baseline marker anywhere in the name', () => {
    expect(isBaselineName('Baseline for Input Size 5')).toBe(true);
    expect(isBaselineName('group/Baseline for Input Size 5')).toBe(true);
    expect(isBaselineName('Input Size 5/sort')).toBe(false);
  });
});
