/** Largest value of a 64-bit signed integer */
export const I64_MAX = 9_223_372_036_854_775_807n;

/** Smallest value of a 64-bit signed integer */
export const I64_MIN = -9_223_372_036_854_775_808n;

/** Deepest allowed parenthesis nesting in an arithmetic expression */
export const MAX_PAREN_DEPTH = 69;

/**
 * Default limits for sequence generation
 */
export const DEFAULT_LIMITS = {
  /** Maximum expression length in characters */
  maxExpressionLength: 10_000,
  /** Maximum number of integers a single call may produce */
  maxSequenceLength: 1_000_000,
} as const;

export type SequenceLimits = { -readonly [K in keyof typeof DEFAULT_LIMITS]: number };

export function isI64(value: bigint): boolean {
  return value >= I64_MIN && value <= I64_MAX;
}
