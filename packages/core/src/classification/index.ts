/**
 * Classification Module
 *
 * Sorts user declarations into validity, arity and capability buckets.
 */

export type {
  DeclarationKind,
  Declaration,
  InvalidDeclaration,
  CapabilityName,
  CapabilityFlags,
  ClassifiedDeclaration,
  CapabilityDiagnostic,
  TestDataArity,
  TestDataEntry,
  InvalidTestData,
  InvalidTestSuite,
  SnapshotSummary,
} from './types.js';

export { ClassificationSnapshot, type SnapshotState } from './snapshot.js';

export {
  TableCapabilityOracle,
  CapabilityQueryTimeout,
  withQueryTimeout,
  type CapabilityOracle,
  type CapabilityTables,
} from './capability-oracle.js';

export {
  DeclarationClassifier,
  classifyDeclarations,
  type ClassifierOptions,
} from './declaration-classifier.js';
