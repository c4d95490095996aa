/**
 * Declaration Classifier Tests
 */

import { describe, it, expect } from 'vitest';
import { binarySize, unarySize } from '../../data-size/index.js';
import type { DataSize } from '../../data-size/index.js';
import { CapabilityOracleError, formatInputError } from '../../errors/index.js';
import { createLogger } from '../../logging/index.js';
import { TableCapabilityOracle } from '../capability-oracle.js';
import type { CapabilityOracle } from '../capability-oracle.js';
import { DeclarationClassifier, classifyDeclarations } from '../declaration-classifier.js';
import type { Declaration } from '../types.js';

const tableOracle = new TableCapabilityOracle({
  generatable: ['Int', '[Int]'],
  evaluable: ['Int', '[Int]', 'Bool'],
});

function fn(name: string, type: string, sizes?: DataSize[]): Declaration {
  return { name, kind: 'function', type, sizes };
}

function range(from: number, to: number): number[] {
  return Array.from({ length: to - from + 1 }, (_, i) => from + i);
}

describe('DeclarationClassifier', () => {
  describe('arity buckets', () => {
    it('should place functions by argument count', async () => {
      const snapshot = await classifyDeclarations(
        [fn('sort', '[Int] -> [Int]'), fn('merge', '[Int] -> [Int] -> [Int]'), fn('seed', 'Int')],
        tableOracle
      );

      expect(snapshot.unaryFunctions).toEqual(['sort']);
      expect(snapshot.binaryFunctions).toEqual(['merge']);
      expect(snapshot.nullaryFunctions).toEqual(['seed']);
      expect(snapshot.invalid).toEqual([]);
    });

    it('should keep functions of three or more arguments valid but in no bucket', async () => {
      const snapshot = await classifyDeclarations([fn('fold3', 'Int -> Int -> Int -> Int')], tableOracle);

      expect([...snapshot.valid.keys()]).toEqual(['fold3']);
      expect(snapshot.nullaryFunctions).toEqual([]);
      expect(snapshot.unaryFunctions).toEqual([]);
      expect(snapshot.binaryFunctions).toEqual([]);
      expect(snapshot.classification('fold3')?.capabilities).toBeNull();
    });
  });

  describe('invalid declarations', () => {
    it('should reject declarations that are not functions', async () => {
      const snapshot = await classifyDeclarations([{ name: 'Sortable', kind: 'type-class' }], tableOracle);

      expect(snapshot.invalid.map(i => formatInputError(i.reason))).toEqual([
        "Type error: 'Sortable' is a type-class, not a function",
      ]);
    });

    it('should reject functions without a type signature', async () => {
      const snapshot = await classifyDeclarations([{ name: 'helper', kind: 'function' }], tableOracle);

      expect(snapshot.invalid[0]?.reason.message).toBe("'helper' has no type signature");
    });

    it('should reject unparsable signatures with the offset', async () => {
      const snapshot = await classifyDeclarations([fn('broken', '[Int -> Int')], tableOracle);

      expect(snapshot.invalid[0]?.reason).toEqual({
        kind: 'type',
        message: "cannot parse type of 'broken' at offset 11: expected ']' but found end of type",
      });
      expect(snapshot.valid.size).toBe(0);
    });

    it('should reject the later of two declarations with the same name', async () => {
      const snapshot = await classifyDeclarations(
        [fn('sort', '[Int] -> [Int]'), fn('sort', '[Int] -> [Int] -> [Int]')],
        tableOracle
      );

      expect(snapshot.unaryFunctions).toEqual(['sort']);
      expect(snapshot.binaryFunctions).toEqual([]);
      expect(snapshot.invalid[0]?.reason.message).toBe("'sort' is defined more than once");
    });

    it('should keep every declaration in either the valid or invalid set', async () => {
      const declarations: Declaration[] = [
        fn('sort', '[Int] -> [Int]'),
        { name: 'Sortable', kind: 'type-class' },
        fn('broken', '->'),
        fn('seed', 'Int'),
      ];
      const snapshot = await classifyDeclarations(declarations, tableOracle);

      const valid = [...snapshot.valid.keys()];
      const invalid = snapshot.invalid.map(i => i.declaration.name);
      expect([...valid, ...invalid].sort()).toEqual(['Sortable', 'broken', 'seed', 'sort']);
      expect(valid.filter(name => invalid.includes(name))).toEqual([]);
    });
  });

  describe('capabilities', () => {
    it('should ask the oracle about argument and result types', async () => {
      const snapshot = await classifyDeclarations(
        [fn('sort', '[Int] -> [Int]'), fn('render', '[Int] -> String'), fn('flip', 'Bool -> Bool')],
        tableOracle
      );

      expect(snapshot.withCapability('generatable')).toEqual(['sort', 'render']);
      expect(snapshot.withCapability('evaluableArgument')).toEqual(['sort', 'render', 'flip']);
      expect(snapshot.withCapability('evaluableResult')).toEqual(['sort', 'flip']);
    });

    it('should require every argument of a binary function', async () => {
      const snapshot = await classifyDeclarations([fn('lookup', 'Int -> Bool -> Int')], tableOracle);

      expect(snapshot.hasCapability('lookup', 'generatable')).toBe(false);
      expect(snapshot.hasCapability('lookup', 'evaluableArgument')).toBe(true);
    });

    it('should record a failing query as a diagnostic and carry on', async () => {
      const oracle: CapabilityOracle = {
        isGeneratable: async type => {
          if (type === 'Tree') throw new Error('probe did not compile');
          return true;
        },
        isEvaluable: async () => true,
      };

      const snapshot = await classifyDeclarations([fn('depth', 'Tree -> Int'), fn('sort', '[Int] -> [Int]')], oracle);

      expect(snapshot.withCapability('generatable')).toEqual(['sort']);
      expect(snapshot.withCapability('evaluableArgument')).toEqual(['depth', 'sort']);
      expect(snapshot.diagnostics).toEqual([
        { name: 'depth', capability: 'generatable', type: 'Tree', message: 'probe did not compile' },
      ]);
    });

    it('should treat a timed out query as a per-declaration failure', async () => {
      const oracle: CapabilityOracle = {
        isGeneratable: () => new Promise<boolean>(() => undefined),
        isEvaluable: async () => true,
      };

      const snapshot = await classifyDeclarations([fn('sort', '[Int] -> [Int]')], oracle, { queryTimeoutMs: 20 });

      expect(snapshot.hasCapability('sort', 'generatable')).toBe(false);
      expect(snapshot.hasCapability('sort', 'evaluableResult')).toBe(true);
      expect(snapshot.diagnostics[0]?.message).toBe("capability query for '[Int]' timed out after 20ms");
    });

    it('should abort the whole pass when the oracle is unusable', async () => {
      const oracle: CapabilityOracle = {
        isGeneratable: async () => {
          throw new CapabilityOracleError('interpreter is not installed');
        },
        isEvaluable: async () => true,
      };

      await expect(classifyDeclarations([fn('sort', '[Int] -> [Int]')], oracle)).rejects.toThrow(
        'interpreter is not installed'
      );
    });

    it('should log failing queries as warnings', async () => {
      const lines: string[] = [];
      const logger = createLogger({ minLevel: 'warn', sink: (_level, line) => lines.push(line), now: () => new Date(0) });
      const oracle: CapabilityOracle = {
        isGeneratable: async () => {
          throw new Error('boom');
        },
        isEvaluable: async () => true,
      };

      await new DeclarationClassifier(oracle, { logger }).classify([fn('sort', '[Int] -> [Int]')]);

      expect(lines).toEqual([
        "[1970-01-01T00:00:00.000Z] [WARN] Capability query 'generatable' failed for 'sort' ([Int]): boom",
      ]);
    });
  });

  describe('test data', () => {
    it('should accept unary test data with enough distinct sizes', async () => {
      const snapshot = await classifyDeclarations(
        [fn('lists', 'UnaryTestData [Int]', range(1, 20).map(unarySize))],
        tableOracle
      );

      expect(snapshot.unaryTestData).toEqual(['lists']);
      expect(snapshot.testData('lists')?.inputTypes).toEqual([{ kind: 'list', element: { kind: 'con', name: 'Int' } }]);
      expect(snapshot.invalidTestData).toEqual([]);
    });

    it('should count distinct pairs for binary test data', async () => {
      const sizes = range(1, 10).flatMap(n => [binarySize(n, 4), binarySize(n, 9)]);
      const snapshot = await classifyDeclarations([fn('pairs', 'BinaryTestData [Int] [Int]', sizes)], tableOracle);

      expect(snapshot.binaryTestData).toEqual(['pairs']);
    });

    it('should reject test data with too few distinct sizes', async () => {
      const sizes = [...range(1, 19), 19].map(unarySize);
      const snapshot = await classifyDeclarations([fn('lists', 'UnaryTestData [Int]', sizes)], tableOracle);

      expect(snapshot.unaryTestData).toEqual([]);
      expect(snapshot.invalidTestData[0]?.errors.map(formatInputError)).toEqual([
        "Test data error: 'lists' has 19 distinctly sized input(s); at least 20 are required",
      ]);
    });

    it('should reject test data without size annotations', async () => {
      const snapshot = await classifyDeclarations([fn('lists', 'UnaryTestData [Int]')], tableOracle);

      expect(snapshot.invalidTestData[0]?.errors).toEqual([
        { kind: 'data-options', message: "'lists' has no size annotations" },
      ]);
    });

    it('should reject sizes of the wrong arity and negative sizes', async () => {
      const sizes = [...range(1, 20).map(unarySize), binarySize(1, 2), unarySize(-3)];
      const snapshot = await classifyDeclarations([fn('lists', 'UnaryTestData [Int]', sizes)], tableOracle);

      expect(snapshot.invalidTestData[0]?.errors.map(e => e.message)).toEqual([
        "'lists' is unary test data but has 1 binary size annotation(s)",
        "'lists' has negative sizes: -3",
      ]);
    });

    it('should reject test data whose inputs cannot be evaluated', async () => {
      const snapshot = await classifyDeclarations(
        [fn('trees', 'UnaryTestData Tree', range(1, 20).map(unarySize))],
        tableOracle
      );

      expect(snapshot.invalidTestData[0]?.errors).toEqual([
        { kind: 'instance', message: "input type 'Tree' of 'trees' is not fully evaluable" },
      ]);
    });

    it('should leave test data declarations valid and nullary', async () => {
      const snapshot = await classifyDeclarations([fn('lists', 'UnaryTestData [Int]')], tableOracle);

      expect(snapshot.nullaryFunctions).toEqual(['lists']);
    });
  });

  it('should classify the same input the same way twice', async () => {
    const declarations: Declaration[] = [
      fn('sort', '[Int] -> [Int]'),
      fn('merge', '[Int] -> [Int] -> [Int]'),
      { name: 'Sortable', kind: 'type-class' },
      fn('lists', 'UnaryTestData [Int]', range(1, 25).map(unarySize)),
    ];
    const classifier = new DeclarationClassifier(tableOracle);

    const first = await classifier.classify(declarations);
    const second = await classifier.classify(declarations);

    expect(second.summary()).toEqual(first.summary());
  });
});
