import type { Operator, TokenType } from './token-types.js';

/**
 * Location of a token or node in the input
 *
 * Both ends are 1-based and inclusive, counted in code points.
 */
export interface Span {
  start: number;
  end: number;
}

interface BaseToken {
  /** Source span for error reporting */
  span: Span;
}

/**
 * Integer literal with underscores removed
 */
export interface IntToken extends BaseToken {
  type: typeof TokenType.INT;
  value: bigint;
}

/**
 * One of + - * / ^ %
 */
export interface OperatorToken extends BaseToken {
  type: typeof TokenType.OPERATOR;
  operator: Operator;
}

export type PunctuationTokenType = Exclude<TokenType, typeof TokenType.INT | typeof TokenType.OPERATOR>;

/**
 * Delimiters, separators and range syntax
 */
export interface PunctuationToken extends BaseToken {
  type: PunctuationTokenType;
}

/**
 * A token produced by the lexer
 */
export type Token = IntToken | OperatorToken | PunctuationToken;

export function createSpan(start: number, end: number = start): Span {
  return { start, end };
}

/**
 * Smallest span covering both arguments
 */
export function mergeSpans(first: Span, last: Span): Span {
  return {
    start: Math.min(first.start, last.start),
    end: Math.max(first.end, last.end),
  };
}

/**
 * The substring of `input` covered by `span`
 */
export function spanText(input: string, span: Span): string {
  return Array.from(input)
    .slice(span.start - 1, span.end)
    .join('');
}

/**
 * Human-readable position used in error messages: `3` or `3-5`
 */
export function formatSpan(span: Span): string {
  return span.start === span.end ? `${span.start}` : `${span.start}-${span.end}`;
}
