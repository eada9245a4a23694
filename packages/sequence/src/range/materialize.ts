import type { MathExprNode, RangeExprNode, ValueNode } from '../parser/ast.js';
import type { ParserError, ParserErrorKind } from '../parser/parser-error.js';
import type { Span } from '../lexer/token.js';

/**
 * What the materializer needs from the interpreter
 */
export interface RangeEvaluator {
  value(node: ValueNode): bigint;
  expression(node: MathExprNode, placeholder?: bigint): bigint;
  fault(kind: ParserErrorKind, span: Span): ParserError;
}

/**
 * Expand a range node, passing each (mutated) position to `emit`
 *
 * Direction comes from the endpoints; the step only sets the distance between
 * positions. The next position is always computed from the unmutated one.
 */
export function materializeRange(
  range: RangeExprNode,
  evaluator: RangeEvaluator,
  emit: (value: bigint) => void,
): void {
  const start = evaluator.value(range.start);
  const end = evaluator.value(range.end);
  const ascending = end >= start;

  let magnitude = 1n;
  if (range.step) {
    const step = evaluator.value(range.step);
    if (step === 0n) {
      throw evaluator.fault('InvalidStep', range.step.span);
    }
    magnitude = step < 0n ? -step : step;
  }
  const step = ascending ? magnitude : -magnitude;

  const inBounds = (position: bigint): boolean => {
    if (ascending) {
      return range.inclusive ? position <= end : position < end;
    }
    return range.inclusive ? position >= end : position > end;
  };

  for (let position = start; inBounds(position); position += step) {
    emit(range.mutation ? evaluator.expression(range.mutation, position) : position);
  }
}
