/**
 * Error types for sequence expressions
 *
 * Every error carries a kind, the full input and the span of the offending text,
 * so a presentation layer can underline it without re-parsing.
 */

import { formatSpan, type Span } from './lexer/token.js';

/**
 * Base class for sequence errors
 */
export abstract class SequenceError extends Error {
  /** Discriminant naming what went wrong */
  abstract readonly kind: string;
  /** The expression that caused the error */
  readonly input: string;
  /** Span of the offending text */
  readonly span: Span;
  /** Message without the position suffix */
  readonly description: string;

  constructor(description: string, input: string, span: Span) {
    super(`${description} at position ${formatSpan(span)}`);
    this.name = this.constructor.name;
    this.input = input;
    this.span = span;
    this.description = description;
  }
}

export type SequenceLimitErrorKind = 'ExpressionTooLong' | 'SequenceTooLong';

/**
 * Thrown when limits are exceeded (expression length, generated elements)
 */
export class SequenceLimitError extends SequenceError {
  readonly kind: SequenceLimitErrorKind;
  /** The limit that was crossed */
  readonly limit: number;

  constructor(kind: SequenceLimitErrorKind, input: string, span: Span, limit: number) {
    const description =
      kind === 'ExpressionTooLong'
        ? `Expression exceeds maximum length of ${limit} characters`
        : `Sequence exceeds maximum length of ${limit} elements`;
    super(description, input, span);
    this.kind = kind;
    this.limit = limit;
  }
}
