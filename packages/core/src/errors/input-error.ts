/**
 * Input errors
 *
 * Non-fatal problems with user inputs. These are accumulated against the
 * offending identifier so that other test suites in the same file stay usable.
 */

export type InputErrorKind =
  | 'file-path'
  | 'file'
  | 'test-suite'
  | 'data-options'
  | 'analysis-options'
  | 'type'
  | 'instance';

export interface InputError {
  kind: InputErrorKind;
  message: string;
}

const LABELS: Record<InputErrorKind, string> = {
  'file-path': 'File path error',
  file: 'File error',
  'test-suite': 'Test suite error',
  'data-options': 'Test data error',
  'analysis-options': 'Analysis options error',
  type: 'Type error',
  instance: 'Instance error',
};

export function formatInputError(error: InputError): string {
  return `${LABELS[error.kind]}: ${error.message}`;
}

export const InputErrors = {
  filePath: (message: string): InputError => ({ kind: 'file-path', message }),
  file: (message: string): InputError => ({ kind: 'file', message }),
  testSuite: (message: string): InputError => ({ kind: 'test-suite', message }),
  dataOptions: (message: string): InputError => ({ kind: 'data-options', message }),
  analysisOptions: (message: string): InputError => ({ kind: 'analysis-options', message }),
  type: (message: string): InputError => ({ kind: 'type', message }),
  instance: (message: string): InputError => ({ kind: 'instance', message }),
};
