import type { Span } from '../lexer/token.js';
import type { Operator } from '../lexer/token-types.js';

/**
 * Base interface for all AST nodes
 */
interface BaseNode {
  /** Source span for evaluation order and error reporting */
  span: Span;
}

/**
 * Fully resolved signed integer
 */
export interface IntNode extends BaseNode {
  type: 'Int';
  value: bigint;
}

/**
 * Integer operand inside a postfix expression
 */
export interface OperandItem extends BaseNode {
  type: 'Operand';
  value: bigint;
}

/**
 * The `@` placeholder (or the implicit left operand) of a mutation
 */
export interface PlaceholderItem extends BaseNode {
  type: 'Placeholder';
}

/**
 * Prefix sign: +a, -a
 */
export interface UnaryItem extends BaseNode {
  type: 'Unary';
  operator: '+' | '-';
}

/**
 * Binary operator: a + b, a ^ b
 */
export interface BinaryItem extends BaseNode {
  type: 'Binary';
  operator: Operator;
}

export type PostfixItem = OperandItem | PlaceholderItem | UnaryItem | BinaryItem;

/**
 * Arithmetic expression reduced to postfix (reverse Polish) order
 */
export interface MathExprNode extends BaseNode {
  type: 'MathExpr';
  postfix: PostfixItem[];
}

/**
 * Nodes that evaluate to a single integer
 */
export type ValueNode = IntNode | MathExprNode;

/**
 * Range specification: {start..end, s:step, m:mutation}
 */
export interface RangeExprNode extends BaseNode {
  type: 'RangeExpr';
  start: ValueNode;
  end: ValueNode;
  /** true for `..=`, false for `..` */
  inclusive: boolean;
  step: ValueNode | null;
  mutation: MathExprNode | null;
}

/**
 * Union of all top-level AST node types
 */
export type Node = ValueNode | RangeExprNode;
