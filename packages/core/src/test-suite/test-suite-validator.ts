/**
 * Test Suite Validator
 *
 * Builds a TestSuite from defaults and user fields, then checks it against
 * a classification snapshot. Every check runs; errors are accumulated and
 * only turned into a result at the end.
 */

import { z } from 'zod';
import type { LinearModelSpec } from '../analysis/linear-models.js';
import { modelProblems } from '../analysis/linear-models.js';
import type { ClassificationSnapshot, ClassifiedDeclaration, TestDataEntry } from '../classification/index.js';
import { distinctSizes } from '../data-size/index.js';
import { InputErrors } from '../errors/index.js';
import type { InputError } from '../errors/index.js';
import { createSilentLogger } from '../logging/index.js';
import type { Logger } from '../logging/index.js';
import { printType, typesCompatible } from '../shape/index.js';
import { defaultAnalysisOptions, defaultTestSuite, formatDataOptions, generatedCount } from './defaults.js';
import {
  ANALYSIS_OPTION_FIELDS,
  DataOptionsSchema,
  LinearModelSchema,
  OptionalPathSchema,
  RecordSchema,
  RuntimeCompareSchema,
  StatsFilterSchema,
  StatsSortSchema,
  TEST_SUITE_FIELDS,
  formatIssues,
} from './raw-schema.js';
import { MAX_CV_ITERS, MAX_CV_TRAIN, MIN_CV_ITERS, MIN_CV_TRAIN, MIN_INPUTS } from './policy.js';
import type { AnalysisOptions, DataOptions, TestSuite } from './types.js';

// ============================================================================
// Types
// ============================================================================

export type TestSuiteValidation =
  | { success: true; testSuite: TestSuite }
  | { success: false; errors: InputError[] };

export interface ValidatorOptions {
  logger?: Logger;
}

type ProgramArity = 'unary' | 'binary';

// ============================================================================
// Field reading
// ============================================================================

/**
 * The field's value, the fallback when it is absent, or undefined when it
 * is present but malformed (after reporting why).
 */
function readField<S extends z.ZodTypeAny>(
  record: Record<string, unknown>,
  key: string,
  schema: S,
  fallback: z.infer<S>,
  report: (message: string) => void
): z.infer<S> | undefined {
  const value = record[key];
  if (value === undefined) {
    return fallback;
  }
  const result = schema.safeParse(value);
  if (result.success) {
    return result.data;
  }
  report(`${key}: ${formatIssues(result.error)}`);
  return undefined;
}

function unknownFields(record: Record<string, unknown>, known: readonly string[]): string[] {
  return Object.keys(record).filter(key => !known.includes(key));
}

// ============================================================================
// Validator
// ============================================================================

export class TestSuiteValidator {
  private readonly snapshot: ClassificationSnapshot;
  private readonly logger: Logger;

  constructor(snapshot: ClassificationSnapshot, options: ValidatorOptions = {}) {
    this.snapshot = snapshot;
    this.logger = options.logger ?? createSilentLogger();
  }

  validate(name: string, raw: unknown): TestSuiteValidation {
    const errors: InputError[] = [];

    const parsed = RecordSchema.safeParse(raw);
    if (!parsed.success) {
      return { success: false, errors: [InputErrors.testSuite(`'${name}' must be a record of test suite settings`)] };
    }
    const record = parsed.data;

    for (const field of unknownFields(record, TEST_SUITE_FIELDS)) {
      errors.push(InputErrors.testSuite(`'${name}' has unknown setting '${field}'`));
    }

    const defaults = defaultTestSuite();
    const suiteError = (message: string) => errors.push(InputErrors.testSuite(message));

    const programs = readField(record, 'programs', z.array(z.string()), defaults.programs, suiteError);
    const dataOptions = readField(
      record,
      'dataOptions',
      DataOptionsSchema,
      defaults.dataOptions,
      message => errors.push(InputErrors.dataOptions(message))
    );
    const rawAnalysis = readField(record, 'analysisOptions', RecordSchema, {}, message =>
      errors.push(InputErrors.analysisOptions(message))
    );
    const compilerFlags = readField(record, 'compilerFlags', z.array(z.string()), defaults.compilerFlags, suiteError);
    const baseline = readField(record, 'baseline', z.boolean(), defaults.baseline, suiteError);
    const nf = readField(record, 'nf', z.boolean(), defaults.nf, suiteError);
    const toolConfig = readField(record, 'toolConfig', RecordSchema, defaults.toolConfig, suiteError);

    const analysisOptions = rawAnalysis === undefined ? undefined : this.readAnalysisOptions(rawAnalysis, errors);

    // Data options first: manual data fixes the programs' arity
    const testData = dataOptions === undefined ? undefined : this.checkDataOptions(dataOptions, errors);

    const resolved =
      programs === undefined
        ? undefined
        : this.resolvePrograms(programs, dataOptions, nf ?? defaults.nf, testData, errors);

    if (testData && resolved) {
      this.checkTestDataFits(testData, resolved, errors);
    }

    if (analysisOptions) {
      this.checkAnalysisOptions(analysisOptions, errors);
    }

    if (
      errors.length > 0 ||
      resolved === undefined ||
      dataOptions === undefined ||
      analysisOptions === undefined ||
      compilerFlags === undefined ||
      baseline === undefined ||
      nf === undefined ||
      toolConfig === undefined
    ) {
      this.logger.debug(`Test suite '${name}' is invalid (${errors.length} error(s))`);
      return { success: false, errors };
    }

    this.logger.debug(`Test suite '${name}' is valid: ${resolved.map(p => p.name).join(', ')}`);
    return {
      success: true,
      testSuite: {
        programs: resolved.map(p => p.name),
        dataOptions,
        analysisOptions,
        compilerFlags,
        baseline,
        nf,
        toolConfig,
      },
    };
  }

  // --------------------------------------------------------------------------
  // Analysis options
  // --------------------------------------------------------------------------

  private readAnalysisOptions(record: Record<string, unknown>, errors: InputError[]): AnalysisOptions | undefined {
    const report = (message: string) => errors.push(InputErrors.analysisOptions(message));
    const defaults = defaultAnalysisOptions();

    for (const field of unknownFields(record, ANALYSIS_OPTION_FIELDS)) {
      report(`unknown setting '${field}'`);
    }

    const models: LinearModelSpec[] | undefined = readField(
      record,
      'models',
      z.array(LinearModelSchema),
      defaults.models,
      report
    );
    const cvIters = readField(record, 'cvIters', z.number(), defaults.cvIters, report);
    const cvTrain = readField(record, 'cvTrain', z.number(), defaults.cvTrain, report);
    const topModels = readField(record, 'topModels', z.number(), defaults.topModels, report);
    const statsFilter = readField(record, 'statsFilter', StatsFilterSchema, defaults.statsFilter, report);
    const statsSort = readField(record, 'statsSort', StatsSortSchema, defaults.statsSort, report);
    const runtimeCompare = readField(record, 'runtimeCompare', RuntimeCompareSchema, defaults.runtimeCompare, report);
    const graphPath = readField(record, 'graphPath', OptionalPathSchema, defaults.graphPath, report);
    const reportPath = readField(record, 'reportPath', OptionalPathSchema, defaults.reportPath, report);
    const coordsPath = readField(record, 'coordsPath', OptionalPathSchema, defaults.coordsPath, report);

    if (
      models === undefined ||
      cvIters === undefined ||
      cvTrain === undefined ||
      topModels === undefined ||
      statsFilter === undefined ||
      statsSort === undefined ||
      runtimeCompare === undefined ||
      graphPath === undefined ||
      reportPath === undefined ||
      coordsPath === undefined
    ) {
      return undefined;
    }

    return {
      models,
      cvIters,
      cvTrain,
      topModels,
      statsFilter,
      statsSort,
      runtimeCompare,
      graphPath,
      reportPath,
      coordsPath,
    };
  }

  private checkAnalysisOptions(options: AnalysisOptions, errors: InputError[]): void {
    const report = (message: string) => errors.push(InputErrors.analysisOptions(message));

    if (!Number.isInteger(options.cvIters) || options.cvIters < MIN_CV_ITERS || options.cvIters > MAX_CV_ITERS) {
      report(`cvIters must be an integer in [${MIN_CV_ITERS}, ${MAX_CV_ITERS}], got ${options.cvIters}`);
    }
    if (!(options.cvTrain >= MIN_CV_TRAIN && options.cvTrain <= MAX_CV_TRAIN)) {
      report(`cvTrain must be in [${MIN_CV_TRAIN}, ${MAX_CV_TRAIN}], got ${options.cvTrain}`);
    }
    if (!Number.isInteger(options.topModels) || options.topModels < 1) {
      report(`topModels must be a positive integer, got ${options.topModels}`);
    }
    if (options.models.length === 0) {
      report('at least one model is required');
    }
    for (const model of options.models) {
      for (const problem of modelProblems(model)) {
        report(problem);
      }
    }
  }

  // --------------------------------------------------------------------------
  // Data options
  // --------------------------------------------------------------------------

  /**
   * Checks data options; returns the manual test data when it is usable.
   */
  private checkDataOptions(options: DataOptions, errors: InputError[]): TestDataEntry | undefined {
    const report = (message: string) => errors.push(InputErrors.dataOptions(message));

    if (options.kind === 'generated') {
      const { lower, step, upper } = options;
      const unsafe = (
        [
          ['lower bound', lower],
          ['step', step],
          ['upper bound', upper],
        ] as const
      ).filter(([, value]) => !Number.isSafeInteger(value));
      if (unsafe.length > 0) {
        for (const [field, value] of unsafe) {
          report(`${field} must be a safe integer, got ${value}`);
        }
        return undefined;
      }

      if (lower < 0) report(`lower bound must not be negative, got ${lower}`);
      if (step <= 0) report(`step must be positive, got ${step}`);
      if (lower > upper) report(`lower bound ${lower} is greater than upper bound ${upper}`);

      const count = generatedCount(lower, step, upper);
      if (count < MIN_INPUTS) {
        report(`${formatDataOptions(options)} gives ${count} distinct size(s); at least ${MIN_INPUTS} are required`);
      }
      return undefined;
    }

    const entry = this.snapshot.testData(options.name);
    if (entry) {
      const distinct = distinctSizes(entry.sizes).length;
      if (distinct < MIN_INPUTS) {
        report(`test data '${options.name}' has ${distinct} distinct size(s); at least ${MIN_INPUTS} are required`);
        return undefined;
      }
      return entry;
    }

    const invalid = this.snapshot.invalidTestData.find(d => d.name === options.name);
    if (invalid) {
      report(`test data '${options.name}' is invalid`);
      errors.push(...invalid.errors);
    } else if (this.snapshot.classification(options.name)) {
      report(`'${options.name}' is not unary or binary test data`);
    } else {
      report(`test data '${options.name}' not found`);
    }
    return undefined;
  }

  private checkTestDataFits(data: TestDataEntry, programs: ClassifiedDeclaration[], errors: InputError[]): void {
    for (const program of programs) {
      if (program.arity !== data.arity) {
        errors.push(InputErrors.type(`'${program.name}' is ${program.arity} but test data '${data.name}' is ${data.arity}`));
        continue;
      }
      program.shape.argumentTypes.forEach((argument, i) => {
        const input = data.inputTypes[i];
        if (input !== undefined && !typesCompatible(argument, input)) {
          errors.push(
            InputErrors.type(
              `argument ${i + 1} of '${program.name}' has type '${printType(argument)}' ` +
                `but test data '${data.name}' supplies '${printType(input)}'`
            )
          );
        }
      });
    }
  }

  // --------------------------------------------------------------------------
  // Programs
  // --------------------------------------------------------------------------

  private resolvePrograms(
    requested: string[],
    dataOptions: DataOptions | undefined,
    nf: boolean,
    testData: TestDataEntry | undefined,
    errors: InputError[]
  ): ClassifiedDeclaration[] | undefined {
    if (requested.length === 0) {
      return this.resolveAllPrograms(dataOptions, nf, testData, errors);
    }

    const resolved: ClassifiedDeclaration[] = [];
    for (const name of new Set(requested)) {
      const programErrors = this.programProblems(name, dataOptions, nf);
      errors.push(...programErrors);
      const entry = this.snapshot.classification(name);
      if (programErrors.length === 0 && entry) {
        resolved.push(entry);
      }
    }

    const arities = new Set(resolved.map(p => p.arity));
    if (arities.size > 1) {
      errors.push(
        InputErrors.type(
          `programs mix unary and binary functions: ${resolved.map(p => `${p.name} (${p.arity})`).join(', ')}`
        )
      );
    }
    if (resolved.length === 0 && errors.length === 0) {
      errors.push(InputErrors.testSuite('no valid programs to benchmark'));
    }
    return resolved;
  }

  private resolveAllPrograms(
    dataOptions: DataOptions | undefined,
    nf: boolean,
    testData: TestDataEntry | undefined,
    errors: InputError[]
  ): ClassifiedDeclaration[] {
    const candidates = [...this.snapshot.unaryFunctions, ...this.snapshot.binaryFunctions]
      .filter(name => this.programProblems(name, dataOptions, nf).length === 0)
      .map(name => this.snapshot.classification(name))
      .filter((entry): entry is ClassifiedDeclaration => entry !== undefined)
      .filter(entry => !testData || entry.arity === testData.arity);

    const ordered = this.snapshot.declarations
      .map(d => candidates.find(c => c.name === d.name))
      .filter((entry): entry is ClassifiedDeclaration => entry !== undefined);

    if (ordered.length === 0) {
      errors.push(InputErrors.testSuite('no programs in the input file satisfy this test suite'));
      return ordered;
    }

    const arities = new Set<ProgramArity>();
    for (const entry of ordered) {
      if (entry.arity === 'unary' || entry.arity === 'binary') arities.add(entry.arity);
    }
    if (arities.size > 1) {
      errors.push(
        InputErrors.testSuite(
          `the input file has both unary and binary programs (${ordered.map(p => p.name).join(', ')}); list the programs to test`
        )
      );
    }
    return ordered;
  }

  private programProblems(name: string, dataOptions: DataOptions | undefined, nf: boolean): InputError[] {
    const entry = this.snapshot.classification(name);
    if (!entry) {
      const invalid = this.snapshot.invalid.find(i => i.declaration.name === name);
      return [
        invalid
          ? InputErrors.type(`program '${name}' is invalid: ${invalid.reason.message}`)
          : InputErrors.type(`program '${name}' is not defined in the input file`),
      ];
    }
    if (entry.arity !== 'unary' && entry.arity !== 'binary') {
      return [InputErrors.type(`program '${name}' is not a unary or binary function`)];
    }

    const problems: InputError[] = [];
    const argumentText = entry.shape.argumentTypes.map(printType).join(', ');
    const capabilities = entry.capabilities;

    if (dataOptions?.kind === 'generated' && !capabilities?.generatable) {
      problems.push(InputErrors.instance(`cannot generate random inputs of type ${argumentText} for '${name}'`));
    }
    if (!capabilities?.evaluableArgument) {
      problems.push(InputErrors.instance(`inputs of type ${argumentText} for '${name}' cannot be fully evaluated`));
    }
    if (nf && !capabilities?.evaluableResult) {
      problems.push(
        InputErrors.instance(
          `result type ${printType(entry.shape.resultType)} of '${name}' cannot be fully evaluated; set nf to false`
        )
      );
    }
    return problems;
  }
}

// ============================================================================
// Public API
// ============================================================================

export function validateTestSuite(
  name: string,
  raw: unknown,
  snapshot: ClassificationSnapshot,
  options: ValidatorOptions = {}
): TestSuiteValidation {
  return new TestSuiteValidator(snapshot, options).validate(name, raw);
}

/**
 * Validate every raw test suite and record each in exactly one of the
 * snapshot's valid or invalid test suite buckets.
 */
export function validateTestSuites(
  raws: Readonly<Record<string, unknown>>,
  snapshot: ClassificationSnapshot,
  options: ValidatorOptions = {}
): ClassificationSnapshot {
  const validator = new TestSuiteValidator(snapshot, options);
  const valid = new Map<string, TestSuite>();
  const invalid: Array<{ name: string; errors: InputError[] }> = [];

  for (const [name, raw] of Object.entries(raws)) {
    const result = validator.validate(name, raw);
    if (result.success) {
      valid.set(name, result.testSuite);
    } else {
      invalid.push({ name, errors: result.errors });
    }
  }

  options.logger?.info(`Validated ${valid.size + invalid.length} test suite(s): ${valid.size} valid, ${invalid.length} invalid`);
  return snapshot.withTestSuites(valid, invalid);
}
