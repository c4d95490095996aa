/**
 * Classification Types
 */

import type { DataSize } from '../data-size/index.js';
import type { InputError } from '../errors/index.js';
import type { ArityTag, ShapeDescriptor, TypeExpr } from '../shape/index.js';

// ============================================================================
// Declarations
// ============================================================================

export type DeclarationKind = 'function' | 'type-class' | 'data-type';

/**
 * A named definition from a user input file
 */
export interface Declaration {
  name: string;
  kind: DeclarationKind;
  /** Type signature text, when the definition has one */
  type?: string | undefined;
  /** Size of each input, for user-supplied test data */
  sizes?: readonly DataSize[] | undefined;
}

export interface InvalidDeclaration {
  declaration: Declaration;
  reason: InputError;
}

// ============================================================================
// Capabilities
// ============================================================================

export type CapabilityName = 'generatable' | 'evaluableArgument' | 'evaluableResult';

/**
 * Capabilities of a unary/binary function, each decided by the oracle
 */
export interface CapabilityFlags {
  /** Every argument type can be generated randomly */
  generatable: boolean;
  /** Every argument type can be fully evaluated */
  evaluableArgument: boolean;
  /** The result type can be fully evaluated */
  evaluableResult: boolean;
}

/**
 * One valid declaration: its arity tag plus capability flags.
 * Capabilities are null unless the declaration is unary or binary.
 */
export interface ClassifiedDeclaration {
  name: string;
  shape: ShapeDescriptor;
  arity: ArityTag;
  capabilities: CapabilityFlags | null;
}

/**
 * A capability query that failed for a single declaration
 */
export interface CapabilityDiagnostic {
  name: string;
  capability: CapabilityName;
  type: string;
  message: string;
}

// ============================================================================
// Test data
// ============================================================================

export type TestDataArity = 'unary' | 'binary';

export interface TestDataEntry {
  name: string;
  shape: ShapeDescriptor;
  arity: TestDataArity;
  /** One type for unary data, two for binary data */
  inputTypes: TypeExpr[];
  sizes: DataSize[];
}

export interface InvalidTestData {
  name: string;
  shape: ShapeDescriptor;
  errors: InputError[];
}

export interface InvalidTestSuite {
  name: string;
  errors: InputError[];
}

// ============================================================================
// Summary
// ============================================================================

/**
 * JSON-friendly view of a snapshot's buckets
 */
export interface SnapshotSummary {
  all: string[];
  invalid: Array<{ name: string; reason: string }>;
  valid: string[];
  nullary: string[];
  unary: string[];
  binary: string[];
  generatable: string[];
  evaluableArgument: string[];
  evaluableResult: string[];
  unaryTestData: string[];
  binaryTestData: string[];
  invalidTestData: Array<{ name: string; errors: string[] }>;
  testSuites: string[];
  invalidTestSuites: Array<{ name: string; errors: string[] }>;
  diagnostics: CapabilityDiagnostic[];
}
