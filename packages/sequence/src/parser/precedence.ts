import type { Operator } from '../lexer/token-types.js';
import type { BinaryItem, UnaryItem } from './ast.js';

export type Associativity = 'left' | 'right';

/**
 * Binding strength of binary operators (higher binds tighter)
 */
export const BINARY_PRECEDENCE: Record<Operator, number> = {
  '+': 1,
  '-': 1,
  '*': 2,
  '/': 2,
  '%': 2,
  '^': 3,
};

/** Prefix signs bind tighter than every binary operator */
export const UNARY_PRECEDENCE = 4;

export function precedenceOf(item: UnaryItem | BinaryItem): number {
  return item.type === 'Unary' ? UNARY_PRECEDENCE : BINARY_PRECEDENCE[item.operator];
}

export function associativityOf(item: UnaryItem | BinaryItem): Associativity {
  return item.type === 'Unary' ? 'right' : 'left';
}
