import { describe, expect, it } from 'vitest';
import { Interpreter } from '../src/interpreter/interpreter.js';
import { lex } from '../src/lexer/index.js';
import { DEFAULT_LIMITS } from '../src/limits.js';
import { parse, ParserError } from '../src/parser/index.js';
import { materializeRange } from '../src/range/materialize.js';
import { catchError } from './helpers.js';

describe('materializeRange', () => {
  function expand(input: string): bigint[] {
    const [node] = parse(input, lex(input));
    if (node?.type !== 'RangeExpr') throw new Error(`Expected a range in '${input}'`);

    const values: bigint[] = [];
    materializeRange(node, new Interpreter(input, { ...DEFAULT_LIMITS }), (value) => values.push(value));
    return values;
  }

  describe('bounds', () => {
    it('excludes the end of an exclusive range', () => {
      expect(expand('{1..5}')).toEqual([1n, 2n, 3n, 4n]);
    });

    it('includes the end of an inclusive range', () => {
      expect(expand('{1..=5}')).toEqual([1n, 2n, 3n, 4n, 5n]);
    });

    it('counts down when the end is below the start', () => {
      expect(expand('{5..1}')).toEqual([5n, 4n, 3n, 2n]);
      expect(expand('{5..=1}')).toEqual([5n, 4n, 3n, 2n, 1n]);
    });

    it('handles ranges of one or no elements', () => {
      expect(expand('{3..3}')).toEqual([]);
      expect(expand('{3..=3}')).toEqual([3n]);
    });

    it('evaluates arithmetic bounds', () => {
      expect(expand('{(2*2)..=(3+3)}')).toEqual([4n, 5n, 6n]);
    });
  });

  describe('step', () => {
    it('skips by the step', () => {
      expect(expand('{1..=5, s:2}')).toEqual([1n, 3n, 5n]);
      expect(expand('{0..10, s:5}')).toEqual([0n, 5n]);
      expect(expand('{0..=10, s:5}')).toEqual([0n, 5n, 10n]);
    });

    it('stops before passing the end', () => {
      expect(expand('{1..=6, s:2}')).toEqual([1n, 3n, 5n]);
    });

    it('takes the direction from the bounds, not the step', () => {
      expect(expand('{5..=0, s:-2}')).toEqual([5n, 3n, 1n]);
      expect(expand('{5..=0, s:2}')).toEqual([5n, 3n, 1n]);
      expect(expand('{0..=4, s:-2}')).toEqual([0n, 2n, 4n]);
    });

    it('rejects a zero step at the step expression', () => {
      const error = catchError(() => expand('{1..5, s:0}'), ParserError);
      expect(error.kind).toBe('InvalidStep');
      expect(error.span).toEqual({ start: 10, end: 10 });
      expect(error.message).toBe('Range step must not be zero at position 10');
    });
  });

  describe('mutation', () => {
    it('applies an implicit-operand mutation to every position', () => {
      expect(expand('{1..=5, m:+2}')).toEqual([3n, 4n, 5n, 6n, 7n]);
      expect(expand('{1..=3, m:*-1}')).toEqual([-1n, -2n, -3n]);
    });

    it('advances from the unmutated position', () => {
      expect(expand('{1..=5, s:2, m:+2}')).toEqual([3n, 5n, 7n]);
      expect(expand('{1..=3, m:*10}')).toEqual([10n, 20n, 30n]);
    });

    it('substitutes every placeholder', () => {
      expect(expand('{1..=3, m:@*@}')).toEqual([1n, 4n, 9n]);
      expect(expand('{1..=3, m:(@ + 1) * @}')).toEqual([2n, 6n, 12n]);
    });

    it('combines arithmetic bounds, step and mutation', () => {
      expect(expand('{(1-(10^2))..-108, s:3, m:*-1}')).toEqual([99n, 102n, 105n]);
    });

    it('reports mutation faults at the operator', () => {
      const error = catchError(() => expand('{1..=3, m:@/0}'), ParserError);
      expect(error.kind).toBe('DivisionByZero');
      expect(error.span).toEqual({ start: 12, end: 12 });
    });
  });
});
