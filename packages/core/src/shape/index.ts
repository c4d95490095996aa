/**
 * Shape Module
 *
 * Parses textual type signatures into arity and argument/result shapes.
 */

export type {
  TypeExpr,
  Constraint,
  ShapeDescriptor,
  ShapeParseError,
  ShapeParseResult,
  ArityTag,
} from './types.js';

export {
  parseShape,
  arityTag,
  printType,
  printShape,
  typesCompatible,
} from './shape-parser.js';
