/**
 * Capability Oracle
 *
 * Decides whether a type is randomly generatable or fully evaluable. Real
 * oracles may compile and run probe code; a query that merely fails is a
 * per-declaration problem, while a CapabilityOracleError means the oracle
 * itself cannot be used.
 */

import { CapabilityOracleError } from '../errors/index.js';
import { parseShape, printType } from '../shape/index.js';
import type { TypeExpr } from '../shape/index.js';

export interface CapabilityOracle {
  isGeneratable(type: string): Promise<boolean>;
  isEvaluable(type: string): Promise<boolean>;
}

export class CapabilityQueryTimeout extends Error {
  constructor(public readonly type: string, public readonly timeoutMs: number) {
    super(`capability query for '${type}' timed out after ${timeoutMs}ms`);
    this.name = 'CapabilityQueryTimeout';
  }
}

/**
 * Run a query, rejecting with CapabilityQueryTimeout when it takes too long
 */
export async function withQueryTimeout<T>(query: Promise<T>, type: string, timeoutMs: number): Promise<T> {
  if (timeoutMs <= 0) {
    return query;
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new CapabilityQueryTimeout(type, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([query, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

// ============================================================================
// Table oracle
// ============================================================================

export interface CapabilityTables {
  /** Types (or type patterns with variables) with random generators */
  generatable: readonly string[];
  /** Types (or type patterns with variables) that can be fully evaluated */
  evaluable: readonly string[];
}

/**
 * Answers from declared instance tables. A table entry such as `[a]`
 * matches any list type; a queried type that still contains type
 * variables matches only entries that are variables at those positions.
 */
export class TableCapabilityOracle implements CapabilityOracle {
  private readonly generatable: TypeExpr[];
  private readonly evaluable: TypeExpr[];

  constructor(tables: CapabilityTables) {
    this.generatable = tables.generatable.map(t => parseTableEntry(t));
    this.evaluable = tables.evaluable.map(t => parseTableEntry(t));
  }

  async isGeneratable(type: string): Promise<boolean> {
    return matchesAny(this.generatable, parseQuery(type));
  }

  async isEvaluable(type: string): Promise<boolean> {
    return matchesAny(this.evaluable, parseQuery(type));
  }
}

function parseTableEntry(text: string): TypeExpr {
  const result = parseShape(text);
  if (!result.success) {
    throw new CapabilityOracleError(`Invalid capability table entry '${text}': ${result.error.message}`, { entry: text });
  }
  return result.shape.type;
}

function parseQuery(text: string): TypeExpr | null {
  const result = parseShape(text);
  return result.success ? result.shape.type : null;
}

function matchesAny(patterns: readonly TypeExpr[], type: TypeExpr | null): boolean {
  if (type === null) return false;
  return patterns.some(pattern => instanceOf(pattern, type, new Map()));
}

/**
 * Does `type` instantiate `pattern`? Repeated pattern variables must bind
 * to the same type.
 */
function instanceOf(pattern: TypeExpr, type: TypeExpr, bindings: Map<string, string>): boolean {
  if (pattern.kind === 'var') {
    const printed = printType(type);
    const bound = bindings.get(pattern.name);
    if (bound === undefined) {
      bindings.set(pattern.name, printed);
      return true;
    }
    return bound === printed;
  }

  switch (pattern.kind) {
    case 'con':
      return type.kind === 'con' && type.name === pattern.name;
    case 'unit':
      return type.kind === 'unit';
    case 'list':
      return type.kind === 'list' && instanceOf(pattern.element, type.element, bindings);
    case 'tuple':
      return (
        type.kind === 'tuple' &&
        type.elements.length === pattern.elements.length &&
        pattern.elements.every((p, i) => {
          const t = type.elements[i];
          return t !== undefined && instanceOf(p, t, bindings);
        })
      );
    case 'app':
      return (
        type.kind === 'app' &&
        type.args.length === pattern.args.length &&
        instanceOf(pattern.head, type.head, bindings) &&
        pattern.args.every((p, i) => {
          const t = type.args[i];
          return t !== undefined && instanceOf(p, t, bindings);
        })
      );
    case 'fun':
      return type.kind === 'fun' && instanceOf(pattern.from, type.from, bindings) && instanceOf(pattern.to, type.to, bindings);
  }
}
