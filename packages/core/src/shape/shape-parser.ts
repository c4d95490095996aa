/**
 * Shape Parser
 *
 * Recursive-descent parser for type signatures. Works on syntax only:
 * whether a type has instances of any class is decided elsewhere.
 */

import type {
  ArityTag,
  Constraint,
  ShapeDescriptor,
  ShapeParseError,
  ShapeParseResult,
  TypeExpr,
} from './types.js';

// ============================================================================
// Tokenizer
// ============================================================================

type TokenKind = 'name' | 'arrow' | 'fat-arrow' | 'lparen' | 'rparen' | 'lbracket' | 'rbracket' | 'comma' | 'eof';

interface Token {
  kind: TokenKind;
  text: string;
  offset: number;
}

const NAME_PATTERN = /[A-Za-z_][A-Za-z0-9_']*(?:\.[A-Za-z_][A-Za-z0-9_']*)*/y;

const PUNCTUATION: Array<[string, TokenKind]> = [
  ['->', 'arrow'],
  ['=>', 'fat-arrow'],
  ['(', 'lparen'],
  [')', 'rparen'],
  ['[', 'lbracket'],
  [']', 'rbracket'],
  [',', 'comma'],
];

class ParseFailure extends Error {
  constructor(public readonly offset: number, message: string) {
    super(message);
    this.name = 'ParseFailure';
  }
}

function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  let offset = 0;

  outer: while (offset < text.length) {
    const ch = text.charAt(offset);
    if (/\s/.test(ch)) {
      offset++;
      continue;
    }

    for (const [symbol, kind] of PUNCTUATION) {
      if (text.startsWith(symbol, offset)) {
        tokens.push({ kind, text: symbol, offset });
        offset += symbol.length;
        continue outer;
      }
    }

    NAME_PATTERN.lastIndex = offset;
    const match = NAME_PATTERN.exec(text);
    if (match) {
      tokens.push({ kind: 'name', text: match[0], offset });
      offset += match[0].length;
      continue;
    }

    throw new ParseFailure(offset, `unexpected character '${ch}'`);
  }

  tokens.push({ kind: 'eof', text: '', offset: text.length });
  return tokens;
}

// ============================================================================
// Parser
// ============================================================================

class ShapeParser {
  private pos = 0;

  constructor(private readonly tokens: Token[]) {}

  parseSignature(): { context: Constraint[]; type: TypeExpr } {
    let context: Constraint[] = [];
    if (this.hasTopLevelFatArrow()) {
      const contextStart = this.peek().offset;
      const contextType = this.parseType();
      this.expect('fat-arrow');
      context = toConstraints(contextType, contextStart);
    }

    const type = this.parseType();
    const next = this.peek();
    if (next.kind !== 'eof') {
      throw new ParseFailure(next.offset, `unexpected '${next.text}'`);
    }
    return { context, type };
  }

  private parseType(): TypeExpr {
    const from = this.parseBType();
    if (this.peek().kind === 'arrow') {
      this.advance();
      const to = this.parseType();
      return { kind: 'fun', from, to };
    }
    return from;
  }

  private parseBType(): TypeExpr {
    const head = this.parseAType();
    const args: TypeExpr[] = [];
    while (startsAType(this.peek().kind)) {
      args.push(this.parseAType());
    }
    return args.length === 0 ? head : { kind: 'app', head, args };
  }

  private parseAType(): TypeExpr {
    const token = this.advance();
    switch (token.kind) {
      case 'name':
        return isTypeVariable(token.text)
          ? { kind: 'var', name: token.text }
          : { kind: 'con', name: token.text };

      case 'lparen': {
        if (this.peek().kind === 'rparen') {
          this.advance();
          return { kind: 'unit' };
        }
        const first = this.parseType();
        if (this.peek().kind === 'comma') {
          const elements = [first];
          while (this.peek().kind === 'comma') {
            this.advance();
            elements.push(this.parseType());
          }
          this.expect('rparen');
          return { kind: 'tuple', elements };
        }
        this.expect('rparen');
        return first;
      }

      case 'lbracket': {
        if (this.peek().kind === 'rbracket') {
          this.advance();
          return { kind: 'con', name: '[]' };
        }
        const element = this.parseType();
        this.expect('rbracket');
        return { kind: 'list', element };
      }

      case 'eof':
        throw new ParseFailure(token.offset, 'unexpected end of type');

      default:
        throw new ParseFailure(token.offset, `unexpected '${token.text}'`);
    }
  }

  private hasTopLevelFatArrow(): boolean {
    let depth = 0;
    for (const token of this.tokens) {
      if (token.kind === 'lparen' || token.kind === 'lbracket') depth++;
      else if (token.kind === 'rparen' || token.kind === 'rbracket') depth--;
      else if (token.kind === 'fat-arrow' && depth === 0) return true;
    }
    return false;
  }

  private peek(): Token {
    return this.tokens[Math.min(this.pos, this.tokens.length - 1)] ?? { kind: 'eof', text: '', offset: 0 };
  }

  private advance(): Token {
    const token = this.peek();
    if (token.kind !== 'eof') this.pos++;
    return token;
  }

  private expect(kind: TokenKind): Token {
    const token = this.advance();
    if (token.kind !== kind) {
      const found = token.kind === 'eof' ? 'end of type' : `'${token.text}'`;
      throw new ParseFailure(token.offset, `expected ${describeToken(kind)} but found ${found}`);
    }
    return token;
  }
}

function startsAType(kind: TokenKind): boolean {
  return kind === 'name' || kind === 'lparen' || kind === 'lbracket';
}

function describeToken(kind: TokenKind): string {
  const symbol = PUNCTUATION.find(([, k]) => k === kind);
  return symbol ? `'${symbol[0]}'` : kind;
}

function isTypeVariable(name: string): boolean {
  const lastSegment = name.slice(name.lastIndexOf('.') + 1);
  const first = lastSegment.charAt(0);
  return first === '_' || (first >= 'a' && first <= 'z');
}

function toConstraints(contextType: TypeExpr, offset: number): Constraint[] {
  const parts = contextType.kind === 'tuple' ? contextType.elements : contextType.kind === 'unit' ? [] : [contextType];
  return parts.map(part => {
    if (part.kind === 'con') {
      return { className: part.name, types: [] };
    }
    if (part.kind === 'app' && part.head.kind === 'con') {
      return { className: part.head.name, types: part.args };
    }
    throw new ParseFailure(offset, `malformed constraint '${printType(part)}'`);
  });
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Parse a type signature into a shape descriptor.
 */
export function parseShape(text: string): ShapeParseResult {
  if (text.trim().length === 0) {
    return { success: false, error: { message: 'empty type signature', offset: 0 } };
  }

  try {
    const { context, type } = new ShapeParser(tokenize(text)).parseSignature();
    const argumentTypes: TypeExpr[] = [];
    let resultType = type;
    while (resultType.kind === 'fun') {
      argumentTypes.push(resultType.from);
      resultType = resultType.to;
    }

    const shape: ShapeDescriptor = {
      text,
      context,
      type,
      arity: argumentTypes.length,
      argumentTypes,
      resultType,
    };
    return { success: true, shape };
  } catch (error) {
    if (error instanceof ParseFailure) {
      const parseError: ShapeParseError = { message: error.message, offset: error.offset };
      return { success: false, error: parseError };
    }
    throw error;
  }
}

export function arityTag(shape: ShapeDescriptor): ArityTag {
  switch (shape.arity) {
    case 0:
      return 'nullary';
    case 1:
      return 'unary';
    case 2:
      return 'binary';
    default:
      return 'unsupported';
  }
}

/**
 * Canonical text of a type; equal types print identically.
 */
export function printType(type: TypeExpr): string {
  switch (type.kind) {
    case 'var':
    case 'con':
      return type.name;
    case 'unit':
      return '()';
    case 'list':
      return `[${printType(type.element)}]`;
    case 'tuple':
      return `(${type.elements.map(printType).join(', ')})`;
    case 'app': {
      const head = type.head.kind === 'fun' ? `(${printType(type.head)})` : printType(type.head);
      const args = type.args.map(arg =>
        arg.kind === 'app' || arg.kind === 'fun' ? `(${printType(arg)})` : printType(arg)
      );
      return [head, ...args].join(' ');
    }
    case 'fun': {
      const from = type.from.kind === 'fun' ? `(${printType(type.from)})` : printType(type.from);
      return `${from} -> ${printType(type.to)}`;
    }
  }
}

export function printShape(shape: ShapeDescriptor): string {
  const constraints = shape.context.map(c =>
    [c.className, ...c.types.map(t => (t.kind === 'app' || t.kind === 'fun' ? `(${printType(t)})` : printType(t)))].join(' ')
  );
  const type = printType(shape.type);
  if (constraints.length === 0) return type;
  if (constraints.length === 1) return `${constraints[0]} => ${type}`;
  return `(${constraints.join(', ')}) => ${type}`;
}

/**
 * Structural comparison where a type variable on either side matches anything.
 */
export function typesCompatible(expected: TypeExpr, actual: TypeExpr): boolean {
  if (expected.kind === 'var' || actual.kind === 'var') {
    return true;
  }

  switch (expected.kind) {
    case 'con':
      return actual.kind === 'con' && actual.name === expected.name;
    case 'unit':
      return actual.kind === 'unit';
    case 'list':
      return actual.kind === 'list' && typesCompatible(expected.element, actual.element);
    case 'tuple':
      return (
        actual.kind === 'tuple' &&
        actual.elements.length === expected.elements.length &&
        expected.elements.every((e, i) => {
          const other = actual.elements[i];
          return other !== undefined && typesCompatible(e, other);
        })
      );
    case 'app':
      return (
        actual.kind === 'app' &&
        actual.args.length === expected.args.length &&
        typesCompatible(expected.head, actual.head) &&
        expected.args.every((e, i) => {
          const other = actual.args[i];
          return other !== undefined && typesCompatible(e, other);
        })
      );
    case 'fun':
      return actual.kind === 'fun' && typesCompatible(expected.from, actual.from) && typesCompatible(expected.to, actual.to);
  }
}
