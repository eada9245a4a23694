/**
 * @seqgen/sequence
 *
 * Integer sequences from compact text expressions such as `1, {2..=10, s:2}, (3^2)`.
 */

import { SequenceLimitError } from './errors.js';
import { evaluateNodes } from './interpreter/interpreter.js';
import { lex } from './lexer/lexer.js';
import { createSpan, type Token } from './lexer/token.js';
import { DEFAULT_LIMITS, type SequenceLimits } from './limits.js';
import { parse } from './parser/parser.js';
import type { Node } from './parser/ast.js';

// Re-export error types
export { SequenceError, SequenceLimitError } from './errors.js';
export type { SequenceLimitErrorKind } from './errors.js';
export { LexerError } from './lexer/lexer-error.js';
export type { LexerErrorKind } from './lexer/lexer-error.js';
export { ParserError } from './parser/parser-error.js';
export type { ParserErrorKind } from './parser/parser-error.js';
export { isSequenceError, toDiagnostic } from './diagnostics.js';
export type { Diagnostic } from './diagnostics.js';

// Re-export types
export type { Span, Token } from './lexer/token.js';
export { formatSpan, mergeSpans, spanText } from './lexer/token.js';
export { Operator, TokenType } from './lexer/token-types.js';
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
} from './parser/ast.js';
export { DEFAULT_LIMITS, I64_MAX, I64_MIN, MAX_PAREN_DEPTH } from './limits.js';
export type { SequenceLimits } from './limits.js';

export { lex, parse };

/**
 * Options for sequence generation
 */
export interface GenerateOptions {
  /** Override default limits (set to Infinity to disable) */
  limits?: Partial<SequenceLimits>;
}

/**
 * Sequence that has been lexed and parsed once and can be materialized repeatedly
 */
export interface CompiledSequence {
  /** Expression text as given */
  readonly input: string;
  /** Parsed nodes, one per item */
  readonly nodes: readonly Node[];
  /** Evaluate the nodes into integers */
  materialize(): bigint[];
}

function resolveLimits(options: GenerateOptions): SequenceLimits {
  return { ...DEFAULT_LIMITS, ...options.limits };
}

function checkLength(input: string, limits: SequenceLimits): void {
  const length = Array.from(input).length;
  if (length > limits.maxExpressionLength) {
    throw new SequenceLimitError(
      'ExpressionTooLong',
      input,
      createSpan(1, length),
      limits.maxExpressionLength,
    );
  }
}

function lexAndParse(input: string, limits: SequenceLimits): Node[] {
  checkLength(input, limits);
  const tokens: Token[] = lex(input);
  return parse(input, tokens);
}

/**
 * Evaluate parsed nodes into a flat list of integers
 *
 * @throws {ParserError} On an arithmetic fault or a zero range step
 * @throws {SequenceLimitError} If more than `maxSequenceLength` integers would be produced
 */
export function evaluateAndMaterialize(
  input: string,
  nodes: readonly Node[],
  options: GenerateOptions = {},
): bigint[] {
  return evaluateNodes(input, nodes, resolveLimits(options));
}

/**
 * Lex, parse and evaluate an expression
 *
 * @example
 * ```ts
 * generate('-1, {1..=5, s:2}, (2^10)')
 * // => [-1n, 1n, 3n, 5n, 1024n]
 * ```
 */
export function generate(input: string, options: GenerateOptions = {}): bigint[] {
  const limits = resolveLimits(options);
  return evaluateNodes(input, lexAndParse(input, limits), limits);
}

/**
 * Compile an expression for repeated materialization
 *
 * @example
 * ```ts
 * const seq = compile('{10..0, s:5}');
 * seq.materialize() // => [10n, 5n]
 * ```
 */
export function compile(input: string, options: GenerateOptions = {}): CompiledSequence {
  const limits = resolveLimits(options);
  const nodes = lexAndParse(input, limits);

  return {
    input,
    nodes,
    materialize: () => evaluateNodes(input, nodes, limits),
  };
}
