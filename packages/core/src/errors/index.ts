export {
  PerfscopeErrorCode,
  PerfscopeError,
  CapabilityOracleError,
  ReportStructuralError,
  InputFileError,
  Errors,
  type RecoveryHint,
  type PerfscopeErrorDetails,
} from './errors.js';

export {
  InputErrors,
  formatInputError,
  type InputError,
  type InputErrorKind,
} from './input-error.js';
