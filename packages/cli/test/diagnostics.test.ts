import { generate, LexerError, ParserError } from '@seqgen/sequence';
import { describe, expect, it } from 'vitest';
import { createColors } from '../src/output/colors.js';
import { diagnosticJson, renderDiagnostic } from '../src/output/diagnostics.js';

function failure<E extends Error>(input: string, type: new (...args: never[]) => E): E {
  try {
    generate(input);
  } catch (error) {
    if (error instanceof type) return error;
    throw error;
  }
  throw new Error(`Expected '${input}' to fail`);
}

describe('renderDiagnostic', () => {
  const c = createColors(false);

  it('underlines the offending text', () => {
    expect(renderDiagnostic(failure('1, {1...5}', LexerError), c)).toEqual([
      'error[InvalidRange]: Invalid range syntax at position 6-8',
      '  1, {1...5}',
      '       ^^^',
    ]);
  });

  it('aligns the caret in code points', () => {
    expect(renderDiagnostic(failure('1,😀', LexerError), c)).toEqual([
      "error[InvalidToken]: Invalid token '😀' at position 3",
      '  1,😀',
      '    ^',
    ]);
  });

  it('flattens tabs so the caret stays aligned', () => {
    expect(renderDiagnostic(failure('1,\t(2 +)', ParserError), c)).toEqual([
      "error[IncompleteMathExpr]: Expected an operand after '+' at position 7",
      '  1, (2 +)',
      '        ^',
    ]);
  });

  it('leaves plain text untouched when color is disabled', () => {
    const [headline] = renderDiagnostic(failure('(1 / 0)', ParserError), c);
    expect(headline).toBe('error[DivisionByZero]: Division by zero at position 4');
  });
});

describe('diagnosticJson', () => {
  it('keeps kind, message and span', () => {
    expect(diagnosticJson(failure('1,,2', ParserError))).toEqual({
      kind: 'UnexpectedComma',
      message: 'Unexpected comma',
      span: { start: 3, end: 3 },
    });
  });
});
