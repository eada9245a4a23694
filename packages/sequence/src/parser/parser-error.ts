import { SequenceError } from '../errors.js';
import { spanText, type Span } from '../lexer/token.js';
import { MAX_PAREN_DEPTH } from '../limits.js';

export type ParserErrorKind =
  // Structure
  | 'UnexpectedComma'
  | 'UnexpectedMathOp'
  | 'IncompleteInt'
  | 'InvalidInt'
  | 'EmptyParen'
  | 'IncompleteMathExpr'
  | 'InvalidMathExpr'
  | 'InvalidMathOp'
  | 'UnmatchedParen'
  | 'TooManyParen'
  // Range structure
  | 'MissingRangeOp'
  | 'UnclosedRange'
  | 'InvalidRangeArg'
  | 'DuplicateRangeArg'
  // Evaluation
  | 'DivisionByZero'
  | 'NegativeExponent'
  | 'IntegerOverflow'
  | 'InvalidStep';

const MESSAGES: Record<ParserErrorKind, (text: string) => string> = {
  UnexpectedComma: () => 'Unexpected comma',
  UnexpectedMathOp: (text) => `Unexpected math operator '${text}'`,
  IncompleteInt: (text) => `Expected a number after the math operator '${text}'`,
  InvalidInt: (text) => `Expected a number, found '${text}'`,
  EmptyParen: () => 'Empty parentheses',
  IncompleteMathExpr: (text) => `Expected an operand after '${text}'`,
  InvalidMathExpr: (text) => `Unexpected '${text}' in math expression`,
  InvalidMathOp: (text) => `Expected a math operator, found '${text}'`,
  UnmatchedParen: (text) => `Unmatched parenthesis '${text}'`,
  TooManyParen: () => `Parentheses are nested deeper than ${MAX_PAREN_DEPTH} levels`,
  MissingRangeOp: (text) => `Expected '..' or '..=', found '${text}'`,
  UnclosedRange: () => "Range is missing its closing '}'",
  InvalidRangeArg: (text) => `Expected 's:' or 'm:', found '${text}'`,
  DuplicateRangeArg: (text) => `Range argument '${text}' is given more than once`,
  DivisionByZero: () => 'Division by zero',
  NegativeExponent: () => 'Negative exponent',
  IntegerOverflow: (text) => `Result of '${text}' does not fit in a 64-bit signed integer`,
  InvalidStep: () => 'Range step must not be zero',
};

/**
 * Error thrown during parsing, or while evaluating what was parsed
 */
export class ParserError extends SequenceError {
  readonly kind: ParserErrorKind;

  constructor(kind: ParserErrorKind, input: string, span: Span) {
    super(MESSAGES[kind](spanText(input, span)), input, span);
    this.kind = kind;
  }
}
