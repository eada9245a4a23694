import type { PostfixItem } from '../src/parser/ast.js';

/**
 * Run `fn` and return the error it throws, failing unless it is a `type`
 */
export function catchError<E extends Error>(fn: () => unknown, type: new (...args: never[]) => E): E {
  try {
    fn();
  } catch (error) {
    if (error instanceof type) return error;
    throw error;
  }
  throw new Error(`Expected ${type.name} to be thrown`);
}

/**
 * Postfix list as a space-separated string; unary signs print as `neg`/`pos`
 */
export function render(postfix: readonly PostfixItem[]): string {
  return postfix
    .map((item) => {
      switch (item.type) {
        case 'Operand':
          return item.value.toString();
        case 'Placeholder':
          return '@';
        case 'Unary':
          return item.operator === '-' ? 'neg' : 'pos';
        case 'Binary':
          return item.operator;
      }
    })
    .join(' ');
}
