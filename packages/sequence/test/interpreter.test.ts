import { describe, expect, it } from 'vitest';
import { I64_MAX, I64_MIN } from '../src/limits.js';
import { power } from '../src/interpreter/interpreter.js';
import { generate, ParserError } from '../src/index.js';
import { catchError } from './helpers.js';

describe('Interpreter', () => {
  function evaluationError(input: string): ParserError {
    return catchError(() => generate(input), ParserError);
  }

  describe('arithmetic', () => {
    it('evaluates the basic operators', () => {
      expect(generate('(2 * 3 + 4)')).toEqual([10n]);
      expect(generate('(2 + 3 * 4)')).toEqual([14n]);
      expect(generate('((2 + 3) * 4)')).toEqual([20n]);
      expect(generate('(1 + 2 - 3)')).toEqual([0n]);
    });

    it('evaluates arithmetic without enclosing parentheses', () => {
      expect(generate('1 + 2 - 3')).toEqual([0n]);
      expect(generate('-2^3 - (3*100/20)')).toEqual([-23n]);
      expect(generate('1, 10,  2  ^ 10,3')).toEqual([1n, 10n, 1024n, 3n]);
    });

    it('truncates division toward zero', () => {
      expect(generate('(7 / 2)')).toEqual([3n]);
      expect(generate('(-7 / 2)')).toEqual([-3n]);
    });

    it('gives the remainder the sign of the dividend', () => {
      expect(generate('(-7 % 3)')).toEqual([-1n]);
      expect(generate('(7 % -3)')).toEqual([1n]);
    });

    it('evaluates exponentiation left to right', () => {
      expect(generate('(2 ^ 10)')).toEqual([1024n]);
      expect(generate('(2 ^ 3 ^ 2)')).toEqual([64n]);
      expect(generate('(0 ^ 0)')).toEqual([1n]);
    });

    it('applies signs before exponentiation', () => {
      expect(generate('(-2^3 - (3*100/20))')).toEqual([-23n]);
      expect(generate('(-2 ^ 63)')).toEqual([I64_MIN]);
    });

    it('evaluates nested groups', () => {
      expect(generate('(200^2+1)')).toEqual([40001n]);
      expect(generate('((((1))))')).toEqual([1n]);
    });
  });

  describe('faults', () => {
    it('rejects division by zero at the operator', () => {
      expect(evaluationError('(1 / 0)')).toMatchObject({ kind: 'DivisionByZero', span: { start: 4, end: 4 } });
      expect(evaluationError('(1 % (2 - 2))')).toMatchObject({ kind: 'DivisionByZero', span: { start: 4, end: 4 } });
    });

    it('rejects negative exponents', () => {
      expect(evaluationError('(2 ^ -1)')).toMatchObject({ kind: 'NegativeExponent', span: { start: 4, end: 4 } });
    });

    it('rejects results outside the 64-bit range', () => {
      expect(evaluationError('(2 ^ 63)')).toMatchObject({ kind: 'IntegerOverflow', span: { start: 4, end: 4 } });
      expect(evaluationError('(9223372036854775807 + 1)')).toMatchObject({
        kind: 'IntegerOverflow',
        span: { start: 22, end: 22 },
      });
    });

    it('rejects negating the smallest 64-bit value', () => {
      const error = evaluationError('(-(-9223372036854775807 - 1))');
      expect(error.kind).toBe('IntegerOverflow');
      expect(error.span).toEqual({ start: 2, end: 2 });
    });
  });

  describe('power', () => {
    it('handles bases that never overflow', () => {
      expect(power(0n, 100n)).toBe(0n);
      expect(power(1n, 1000n)).toBe(1n);
      expect(power(-1n, 1001n)).toBe(-1n);
      expect(power(-1n, 1000n)).toBe(1n);
    });

    it('returns null past the 64-bit range', () => {
      expect(power(2n, 62n)).toBe(4611686018427387904n);
      expect(power(2n, 63n)).toBeNull();
      expect(power(3n, 100n)).toBeNull();
    });

    it('keeps the largest representable result', () => {
      expect(power(-2n, 63n)).toBe(I64_MIN);
      expect(I64_MAX).toBe(2n ** 63n - 1n);
    });
  });
});
