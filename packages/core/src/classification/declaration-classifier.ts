/**
 * Declaration Classifier
 *
 * Cascades declarations through shape parsing, arity bucketing and
 * capability queries, then picks out user-supplied test data.
 */

import { distinctSizes, formatDataSize } from '../data-size/index.js';
import { CapabilityOracleError, InputErrors } from '../errors/index.js';
import type { InputError } from '../errors/index.js';
import { createSilentLogger } from '../logging/index.js';
import type { Logger } from '../logging/index.js';
import { arityTag, parseShape, printType } from '../shape/index.js';
import type { ShapeDescriptor, TypeExpr } from '../shape/index.js';
import { MIN_INPUTS } from '../test-suite/policy.js';
import { withQueryTimeout } from './capability-oracle.js';
import type { CapabilityOracle } from './capability-oracle.js';
import { ClassificationSnapshot } from './snapshot.js';
import type {
  CapabilityDiagnostic,
  CapabilityFlags,
  CapabilityName,
  ClassifiedDeclaration,
  Declaration,
  InvalidDeclaration,
  InvalidTestData,
  TestDataArity,
  TestDataEntry,
} from './types.js';

// ============================================================================
// Types
// ============================================================================

export interface ClassifierOptions {
  /** Per-query timeout; 0 disables it */
  queryTimeoutMs?: number;
  logger?: Logger;
}

const TEST_DATA_TYPES: Record<string, { arity: TestDataArity; params: number }> = {
  UnaryTestData: { arity: 'unary', params: 1 },
  BinaryTestData: { arity: 'binary', params: 2 },
};

// ============================================================================
// Classifier
// ============================================================================

export class DeclarationClassifier {
  private readonly oracle: CapabilityOracle;
  private readonly queryTimeoutMs: number;
  private readonly logger: Logger;

  constructor(oracle: CapabilityOracle, options: ClassifierOptions = {}) {
    this.oracle = oracle;
    this.queryTimeoutMs = options.queryTimeoutMs ?? 0;
    this.logger = options.logger ?? createSilentLogger();
  }

  /**
   * Classify every declaration. Rejects with CapabilityOracleError when the
   * oracle is unusable; every other problem stays attached to its declaration.
   */
  async classify(declarations: readonly Declaration[]): Promise<ClassificationSnapshot> {
    const invalid: InvalidDeclaration[] = [];
    const classified = new Map<string, ClassifiedDeclaration>();
    const diagnostics: CapabilityDiagnostic[] = [];
    const accepted: Declaration[] = [];

    for (const declaration of declarations) {
      const shape = this.parseDeclaration(declaration, classified, invalid);
      if (!shape) continue;
      accepted.push(declaration);

      const arity = arityTag(shape);
      if (arity === 'unsupported') {
        this.logger.debug(`Ignoring '${declaration.name}': arity ${shape.arity} is not supported`);
      }

      const capabilities =
        arity === 'unary' || arity === 'binary'
          ? await this.queryCapabilities(declaration.name, shape, diagnostics)
          : null;

      classified.set(declaration.name, { name: declaration.name, shape, arity, capabilities });
    }

    const testData = new Map<string, TestDataEntry>();
    const invalidTestData: InvalidTestData[] = [];
    for (const declaration of accepted) {
      const entry = classified.get(declaration.name);
      if (!entry || entry.arity !== 'nullary') continue;
      await this.classifyTestData(declaration, entry.shape, testData, invalidTestData, diagnostics);
    }

    this.logger.info(
      `Classified ${declarations.length} declaration(s): ${classified.size} valid, ${invalid.length} invalid, ` +
        `${testData.size} test data`
    );

    return new ClassificationSnapshot({
      declarations: [...declarations],
      invalid,
      classified,
      testData,
      invalidTestData,
      testSuites: new Map(),
      invalidTestSuites: [],
      diagnostics,
    });
  }

  private parseDeclaration(
    declaration: Declaration,
    classified: ReadonlyMap<string, ClassifiedDeclaration>,
    invalid: InvalidDeclaration[]
  ): ShapeDescriptor | null {
    const reject = (reason: InputError): null => {
      invalid.push({ declaration, reason });
      this.logger.debug(`Invalid declaration '${declaration.name}': ${reason.message}`);
      return null;
    };

    if (declaration.kind !== 'function') {
      return reject(InputErrors.type(`'${declaration.name}' is a ${declaration.kind}, not a function`));
    }
    if (declaration.type === undefined) {
      return reject(InputErrors.type(`'${declaration.name}' has no type signature`));
    }
    if (classified.has(declaration.name) || invalid.some(i => i.declaration.name === declaration.name)) {
      return reject(InputErrors.type(`'${declaration.name}' is defined more than once`));
    }

    const result = parseShape(declaration.type);
    if (!result.success) {
      return reject(
        InputErrors.type(
          `cannot parse type of '${declaration.name}' at offset ${result.error.offset}: ${result.error.message}`
        )
      );
    }
    return result.shape;
  }

  private async queryCapabilities(
    name: string,
    shape: ShapeDescriptor,
    diagnostics: CapabilityDiagnostic[]
  ): Promise<CapabilityFlags> {
    const ask = (capability: CapabilityName, types: TypeExpr[], query: (type: string) => Promise<boolean>) =>
      this.queryAll(name, capability, types, query, diagnostics);

    return {
      generatable: await ask('generatable', shape.argumentTypes, t => this.oracle.isGeneratable(t)),
      evaluableArgument: await ask('evaluableArgument', shape.argumentTypes, t => this.oracle.isEvaluable(t)),
      evaluableResult: await ask('evaluableResult', [shape.resultType], t => this.oracle.isEvaluable(t)),
    };
  }

  /**
   * True when the query holds for every type. A failing query counts as
   * false and is recorded; an unusable oracle aborts the pass.
   */
  private async queryAll(
    name: string,
    capability: CapabilityName,
    types: TypeExpr[],
    query: (type: string) => Promise<boolean>,
    diagnostics: CapabilityDiagnostic[]
  ): Promise<boolean> {
    for (const type of types) {
      const text = printType(type);
      try {
        if (!(await withQueryTimeout(query(text), text, this.queryTimeoutMs))) {
          return false;
        }
      } catch (error) {
        if (error instanceof CapabilityOracleError) {
          throw error;
        }
        const message = error instanceof Error ? error.message : String(error);
        diagnostics.push({ name, capability, type: text, message });
        this.logger.warn(`Capability query '${capability}' failed for '${name}' (${text}): ${message}`);
        return false;
      }
    }
    return true;
  }

  private async classifyTestData(
    declaration: Declaration,
    shape: ShapeDescriptor,
    testData: Map<string, TestDataEntry>,
    invalidTestData: InvalidTestData[],
    diagnostics: CapabilityDiagnostic[]
  ): Promise<void> {
    const type = shape.type;
    const headName = type.kind === 'app' ? type.head : type;
    if (headName.kind !== 'con') return;
    const spec = TEST_DATA_TYPES[headName.name.slice(headName.name.lastIndexOf('.') + 1)];
    if (!spec) return;

    const name = declaration.name;
    const inputTypes = type.kind === 'app' ? type.args : [];
    if (inputTypes.length !== spec.params) {
      invalidTestData.push({
        name,
        shape,
        errors: [InputErrors.type(`'${name}' must have ${spec.params} type argument(s), found ${inputTypes.length}`)],
      });
      return;
    }

    const errors: InputError[] = [];
    const sizes = [...(declaration.sizes ?? [])];

    if (sizes.length === 0) {
      errors.push(InputErrors.dataOptions(`'${name}' has no size annotations`));
    } else {
      const wrongArity = sizes.filter(size => size.kind !== spec.arity);
      if (wrongArity.length > 0) {
        errors.push(
          InputErrors.dataOptions(
            `'${name}' is ${spec.arity} test data but has ${wrongArity.length} ${wrongArity[0]?.kind ?? ''} size annotation(s)`
          )
        );
      }
      const negative = sizes.filter(size =>
        size.kind === 'unary' ? size.n < 0 : size.n1 < 0 || size.n2 < 0
      );
      if (negative.length > 0) {
        errors.push(
          InputErrors.dataOptions(`'${name}' has negative sizes: ${negative.map(formatDataSize).join(', ')}`)
        );
      }
      const distinct = distinctSizes(sizes.filter(size => size.kind === spec.arity)).length;
      if (distinct < MIN_INPUTS) {
        errors.push(
          InputErrors.dataOptions(
            `'${name}' has ${distinct} distinctly sized input(s); at least ${MIN_INPUTS} are required`
          )
        );
      }
    }

    for (const inputType of inputTypes) {
      const evaluable = await this.queryAll(
        name,
        'evaluableArgument',
        [inputType],
        t => this.oracle.isEvaluable(t),
        diagnostics
      );
      if (!evaluable) {
        errors.push(InputErrors.instance(`input type '${printType(inputType)}' of '${name}' is not fully evaluable`));
      }
    }

    if (errors.length > 0) {
      invalidTestData.push({ name, shape, errors });
      return;
    }

    testData.set(name, { name, shape, arity: spec.arity, inputTypes, sizes });
  }
}

/**
 * Classify declarations with the given oracle
 */
export function classifyDeclarations(
  declarations: readonly Declaration[],
  oracle: CapabilityOracle,
  options: ClassifierOptions = {}
): Promise<ClassificationSnapshot> {
  return new DeclarationClassifier(oracle, options).classify(declarations);
}
