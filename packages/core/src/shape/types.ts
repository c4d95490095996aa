/**
 * Shape Types
 *
 * Structured form of a textual type signature, e.g. `Ord a => [a] -> [a]`.
 */

// ============================================================================
// Type AST
// ============================================================================

export type TypeExpr =
  | { kind: 'var'; name: string }
  | { kind: 'con'; name: string }
  | { kind: 'app'; head: TypeExpr; args: TypeExpr[] }
  | { kind: 'fun'; from: TypeExpr; to: TypeExpr }
  | { kind: 'list'; element: TypeExpr }
  | { kind: 'tuple'; elements: TypeExpr[] }
  | { kind: 'unit' };

/**
 * A class constraint from the signature's context, e.g. `Ord a`
 */
export interface Constraint {
  className: string;
  types: TypeExpr[];
}

// ============================================================================
// Shape
// ============================================================================

export interface ShapeDescriptor {
  /** Original type text */
  text: string;
  /** Constraints before `=>` */
  context: Constraint[];
  /** The whole type after the context */
  type: TypeExpr;
  /** Number of top-level arrows */
  arity: number;
  /** Types left of each top-level arrow */
  argumentTypes: TypeExpr[];
  /** Type right of the last top-level arrow */
  resultType: TypeExpr;
}

export interface ShapeParseError {
  message: string;
  /** Character offset into the type text */
  offset: number;
}

export type ShapeParseResult =
  | { success: true; shape: ShapeDescriptor }
  | { success: false; error: ShapeParseError };

/**
 * Arities the rest of the system handles
 */
export type ArityTag = 'nullary' | 'unary' | 'binary' | 'unsupported';
