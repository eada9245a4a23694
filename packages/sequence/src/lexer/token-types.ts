/**
 * Token types for the sequence lexer
 *
 * Range-only tokens (RANGE_STEP, RANGE_MUTATION, RANGE_MUTATION_ARG) are only
 * produced between `{` and `}`.
 */

export const TokenType = {
  // Separators
  COMMA: 'COMMA', // ,

  // Literals
  INT: 'INT', // 42, 1_000

  // Arithmetic operators
  OPERATOR: 'OPERATOR', // + - * / ^ %

  // Delimiters
  LPAREN: 'LPAREN', // (
  RPAREN: 'RPAREN', // )
  LBRACE: 'LBRACE', // {
  RBRACE: 'RBRACE', // }

  // Range syntax
  RANGE_EXCLUSIVE: 'RANGE_EXCLUSIVE', // ..
  RANGE_INCLUSIVE: 'RANGE_INCLUSIVE', // ..=
  RANGE_STEP: 'RANGE_STEP', // s:
  RANGE_MUTATION: 'RANGE_MUTATION', // m:
  RANGE_MUTATION_ARG: 'RANGE_MUTATION_ARG', // @
} as const;

export type TokenType = (typeof TokenType)[keyof typeof TokenType];

/**
 * Arithmetic operators, keyed by the character that spells them
 */
export const Operator = {
  ADD: '+',
  SUB: '-',
  MUL: '*',
  DIV: '/',
  POW: '^',
  MOD: '%',
} as const;

export type Operator = (typeof Operator)[keyof typeof Operator];

const OPERATOR_CHARS: ReadonlySet<string> = new Set(Object.values(Operator));

export function isOperatorChar(char: string): char is Operator {
  return OPERATOR_CHARS.has(char);
}

/** Operators that may also be read as a sign in front of an operand */
export function isSignOperator(operator: Operator): operator is '+' | '-' {
  return operator === Operator.ADD || operator === Operator.SUB;
}
