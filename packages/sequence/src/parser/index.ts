export type {
  BinaryItem,
  IntNode,
  MathExprNode,
  Node,
  OperandItem,
  PlaceholderItem,
  PostfixItem,
  RangeExprNode,
  UnaryItem,
  ValueNode,
} from './ast.js';
export { parse, Parser } from './parser.js';
export { ParserError, type ParserErrorKind } from './parser-error.js';
export { findUnmatchedParen, reduceToPostfix, type ExpressionMode, type ReduceOptions } from './shunting-yard.js';
