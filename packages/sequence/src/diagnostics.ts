import { SequenceError } from './errors.js';
import type { Span } from './lexer/token.js';

/**
 * Presentation-neutral view of an error, split around the offending text
 */
export interface Diagnostic {
  kind: string;
  /** Message without the position suffix */
  message: string;
  span: Span;
  before: string;
  highlighted: string;
  after: string;
}

export function toDiagnostic(error: SequenceError): Diagnostic {
  const chars = Array.from(error.input);
  const { start, end } = error.span;

  return {
    kind: error.kind,
    message: error.description,
    span: error.span,
    before: chars.slice(0, start - 1).join(''),
    highlighted: chars.slice(start - 1, end).join(''),
    after: chars.slice(end).join(''),
  };
}

export function isSequenceError(error: unknown): error is SequenceError {
  return error instanceof SequenceError;
}
