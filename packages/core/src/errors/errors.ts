/**
 * Fatal errors
 *
 * Errors that abort a whole pass (classification, correlation, file loading).
 * Per-item problems are never thrown; they are collected as InputError values.
 */

import type { InputError } from './input-error.js';

export enum PerfscopeErrorCode {
  // Input files
  INVALID_FILE_PATH = 'INVALID_FILE_PATH',
  FILE_NOT_FOUND = 'FILE_NOT_FOUND',
  INVALID_FILE = 'INVALID_FILE',

  // Classification
  ORACLE_UNAVAILABLE = 'ORACLE_UNAVAILABLE',

  // Correlation
  INVALID_REPORT_NAME = 'INVALID_REPORT_NAME',
  NO_REPORTS = 'NO_REPORTS',
  SIZE_MISMATCH = 'SIZE_MISMATCH',
  BASELINE_MISMATCH = 'BASELINE_MISMATCH',
  PROGRAM_MISMATCH = 'PROGRAM_MISMATCH',
}

export interface RecoveryHint {
  suggestion: string;
  command?: string;
}

export interface PerfscopeErrorDetails {
  code: PerfscopeErrorCode;
  message: string;
  details?: Record<string, unknown> | undefined;
  recovery?: RecoveryHint | undefined;
}

export class PerfscopeError extends Error {
  public readonly code: PerfscopeErrorCode;
  public readonly details?: Record<string, unknown> | undefined;
  public readonly recovery?: RecoveryHint | undefined;

  constructor(errorDetails: PerfscopeErrorDetails) {
    super(errorDetails.message);
    this.name = 'PerfscopeError';
    this.code = errorDetails.code;
    this.details = errorDetails.details;
    this.recovery = errorDetails.recovery;
  }

  /**
   * Plain object form, for JSON output
   */
  toJSON(): { code: PerfscopeErrorCode; message: string; details?: Record<string, unknown>; recovery?: RecoveryHint } {
    return {
      code: this.code,
      message: this.message,
      ...(this.details ? { details: this.details } : {}),
      ...(this.recovery ? { recovery: this.recovery } : {}),
    };
  }
}

/**
 * The capability oracle itself is unusable (as opposed to one query failing).
 */
export class CapabilityOracleError extends PerfscopeError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: PerfscopeErrorCode.ORACLE_UNAVAILABLE,
      message,
      details,
      recovery: { suggestion: 'Check that the capability oracle is configured and reachable' },
    });
    this.name = 'CapabilityOracleError';
  }
}

/**
 * A measurement report set that cannot be correlated.
 */
export class ReportStructuralError extends PerfscopeError {
  constructor(errorDetails: PerfscopeErrorDetails) {
    super(errorDetails);
    this.name = 'ReportStructuralError';
  }
}

/**
 * A user input or configuration file that cannot be used at all.
 */
export class InputFileError extends PerfscopeError {
  public readonly inputError: InputError;

  constructor(inputError: InputError, code: PerfscopeErrorCode, details?: Record<string, unknown>) {
    super({ code, message: inputError.message, details });
    this.name = 'InputFileError';
    this.inputError = inputError;
  }
}

/**
 * Error factory functions for common errors
 */
export const Errors = {
  invalidReportName(name: string, reason: string): ReportStructuralError {
    return new ReportStructuralError({
      code: PerfscopeErrorCode.INVALID_REPORT_NAME,
      message: `Invalid report name '${name}': ${reason}`,
      details: { name, reason },
      recovery: { suggestion: 'Report names must look like "Input Size 5/prog" or "Input Sizes (5, 4)/prog"' },
    });
  },

  noReports(reason: string): ReportStructuralError {
    return new ReportStructuralError({
      code: PerfscopeErrorCode.NO_REPORTS,
      message: `Incomplete report set: ${reason}`,
      details: { reason },
      recovery: { suggestion: 'Re-run the benchmarks and check that every program completed' },
    });
  },

  sizeMismatch(program: string, expected: string[], actual: string[], against: string): ReportStructuralError {
    return new ReportStructuralError({
      code: PerfscopeErrorCode.SIZE_MISMATCH,
      message: `Program '${program}' was measured at sizes [${actual.join(', ')}] but ${against} has [${expected.join(', ')}]`,
      details: { program, expected, actual, against },
      recovery: { suggestion: 'Every program must be measured at exactly the same input sizes' },
    });
  },

  baselineMismatch(program: string, baseline: string[], actual: string[]): ReportStructuralError {
    return new ReportStructuralError({
      code: PerfscopeErrorCode.BASELINE_MISMATCH,
      message: `Program '${program}' was measured at sizes [${actual.join(', ')}] but baselines cover [${baseline.join(', ')}]`,
      details: { program, baseline, actual },
      recovery: { suggestion: 'Baselines must be measured at the same sizes as the programs' },
    });
  },

  unexpectedSizes(expected: string[], actual: string[]): ReportStructuralError {
    return new ReportStructuralError({
      code: PerfscopeErrorCode.SIZE_MISMATCH,
      message: `Reports were measured at sizes [${actual.join(', ')}] but the test suite produces [${expected.join(', ')}]`,
      details: { expected, actual },
      recovery: { suggestion: 'Check that the reports were produced by this test suite' },
    });
  },

  programMismatch(expected: string[], actual: string[]): ReportStructuralError {
    return new ReportStructuralError({
      code: PerfscopeErrorCode.PROGRAM_MISMATCH,
      message: `Reports cover programs [${actual.join(', ')}] but the test suite has [${expected.join(', ')}]`,
      details: { expected, actual },
    });
  },

  reportFile(filePath: string, reason: string, code: PerfscopeErrorCode = PerfscopeErrorCode.INVALID_FILE): ReportStructuralError {
    return new ReportStructuralError({
      code,
      message: `Invalid measurement report file ${filePath}: ${reason}`,
      details: { filePath, reason },
    });
  },
};
