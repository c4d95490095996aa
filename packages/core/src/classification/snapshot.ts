/**
 * Classification Snapshot
 *
 * The record of one input file's analysis. Valid declarations are kept as
 * one entry per identifier (arity tag + capability flags); the buckets are
 * views over those entries, so a declaration can never sit in two arity
 * buckets while capability buckets may overlap freely.
 */

import { formatInputError } from '../errors/index.js';
import type { ShapeDescriptor } from '../shape/index.js';
import type { TestSuite } from '../test-suite/types.js';
import type {
  CapabilityDiagnostic,
  CapabilityName,
  ClassifiedDeclaration,
  Declaration,
  InvalidDeclaration,
  InvalidTestData,
  InvalidTestSuite,
  SnapshotSummary,
  TestDataEntry,
} from './types.js';

export interface SnapshotState {
  declarations: readonly Declaration[];
  invalid: readonly InvalidDeclaration[];
  classified: ReadonlyMap<string, ClassifiedDeclaration>;
  testData: ReadonlyMap<string, TestDataEntry>;
  invalidTestData: readonly InvalidTestData[];
  testSuites: ReadonlyMap<string, TestSuite>;
  invalidTestSuites: readonly InvalidTestSuite[];
  diagnostics: readonly CapabilityDiagnostic[];
}

export class ClassificationSnapshot {
  private readonly state: SnapshotState;

  constructor(state: SnapshotState) {
    this.state = state;
  }

  /** Every declaration, in input order */
  get declarations(): readonly Declaration[] {
    return this.state.declarations;
  }

  get invalid(): readonly InvalidDeclaration[] {
    return this.state.invalid;
  }

  /** Valid declarations and their shapes */
  get valid(): ReadonlyMap<string, ShapeDescriptor> {
    const shapes = new Map<string, ShapeDescriptor>();
    for (const [name, entry] of this.state.classified) {
      shapes.set(name, entry.shape);
    }
    return shapes;
  }

  classification(name: string): ClassifiedDeclaration | undefined {
    return this.state.classified.get(name);
  }

  get nullaryFunctions(): string[] {
    return this.namesWhere(entry => entry.arity === 'nullary');
  }

  get unaryFunctions(): string[] {
    return this.namesWhere(entry => entry.arity === 'unary');
  }

  get binaryFunctions(): string[] {
    return this.namesWhere(entry => entry.arity === 'binary');
  }

  /** Functions in the given capability bucket */
  withCapability(capability: CapabilityName): string[] {
    return this.namesWhere(entry => entry.capabilities?.[capability] === true);
  }

  hasCapability(name: string, capability: CapabilityName): boolean {
    return this.state.classified.get(name)?.capabilities?.[capability] === true;
  }

  get unaryTestData(): string[] {
    return [...this.state.testData.values()].filter(d => d.arity === 'unary').map(d => d.name);
  }

  get binaryTestData(): string[] {
    return [...this.state.testData.values()].filter(d => d.arity === 'binary').map(d => d.name);
  }

  testData(name: string): TestDataEntry | undefined {
    return this.state.testData.get(name);
  }

  get invalidTestData(): readonly InvalidTestData[] {
    return this.state.invalidTestData;
  }

  get testSuites(): ReadonlyMap<string, TestSuite> {
    return this.state.testSuites;
  }

  get invalidTestSuites(): readonly InvalidTestSuite[] {
    return this.state.invalidTestSuites;
  }

  get diagnostics(): readonly CapabilityDiagnostic[] {
    return this.state.diagnostics;
  }

  /**
   * A copy with the given test suite results added
   */
  withTestSuites(valid: ReadonlyMap<string, TestSuite>, invalid: readonly InvalidTestSuite[]): ClassificationSnapshot {
    const testSuites = new Map(this.state.testSuites);
    for (const [name, suite] of valid) {
      testSuites.set(name, suite);
    }
    const invalidNames = new Set(invalid.map(s => s.name));
    for (const name of invalidNames) {
      testSuites.delete(name);
    }

    return new ClassificationSnapshot({
      ...this.state,
      testSuites,
      invalidTestSuites: [
        ...this.state.invalidTestSuites.filter(s => !invalidNames.has(s.name) && !valid.has(s.name)),
        ...invalid,
      ],
    });
  }

  summary(): SnapshotSummary {
    return {
      all: this.state.declarations.map(d => d.name),
      invalid: this.state.invalid.map(i => ({ name: i.declaration.name, reason: formatInputError(i.reason) })),
      valid: [...this.state.classified.keys()],
      nullary: this.nullaryFunctions,
      unary: this.unaryFunctions,
      binary: this.binaryFunctions,
      generatable: this.withCapability('generatable'),
      evaluableArgument: this.withCapability('evaluableArgument'),
      evaluableResult: this.withCapability('evaluableResult'),
      unaryTestData: this.unaryTestData,
      binaryTestData: this.binaryTestData,
      invalidTestData: this.state.invalidTestData.map(d => ({ name: d.name, errors: d.errors.map(formatInputError) })),
      testSuites: [...this.state.testSuites.keys()],
      invalidTestSuites: this.state.invalidTestSuites.map(s => ({ name: s.name, errors: s.errors.map(formatInputError) })),
      diagnostics: [...this.state.diagnostics],
    };
  }

  private namesWhere(predicate: (entry: ClassifiedDeclaration) => boolean): string[] {
    const names: string[] = [];
    for (const entry of this.state.classified.values()) {
      if (predicate(entry)) names.push(entry.name);
    }
    return names;
  }
}
