import { createMockLogger } from '@seqgen/logger/mock';
import { describe, expect, it } from 'vitest';
import { resolveLimits, runEval, type EvalOptions } from '../src/commands/eval.js';
import { parseFormat, parsePositiveInt } from '../src/commands/options.js';
import { runTokens } from '../src/commands/tokens.js';
import { captureOutput, testConfig } from './helpers.js';

describe('eval', () => {
  const pretty: EvalOptions = { separator: ', ', format: 'pretty', color: false };

  it('prints the sequence joined by the separator', () => {
    const output = captureOutput();
    const code = runEval('1, {2..=4}', pretty, { config: testConfig(), logger: createMockLogger(), output });

    expect(code).toBe(0);
    expect(output.stdout).toEqual(['1, 2, 3, 4']);
    expect(output.stderr).toEqual([]);
  });

  it('uses a custom separator', () => {
    const output = captureOutput();
    runEval('{3..0}', { ...pretty, separator: '\n' }, { config: testConfig(), logger: createMockLogger(), output });

    expect(output.stdout).toEqual(['3\n2\n1']);
  });

  it('prints values as decimal strings in JSON', () => {
    const output = captureOutput();
    runEval('{1..=3, m:*-1}', { ...pretty, format: 'json' }, { config: testConfig(), logger: createMockLogger(), output });

    expect(output.stdout).toEqual(['{"input":"{1..=3, m:*-1}","values":["-1","-2","-3"]}']);
  });

  it('logs completion on a child logger', () => {
    const logger = createMockLogger();
    runEval('1, 2', pretty, { config: testConfig(), logger, output: captureOutput() });

    expect(logger.child).toHaveBeenCalledWith({ command: 'eval' });
    const child = logger.child.mock.results[0].value;
    expect(child.info).toHaveBeenCalledWith('eval_completed', { count: 2 });
  });

  it('renders errors to stderr and exits with 1', () => {
    const output = captureOutput();
    const code = runEval('(1 / 0)', pretty, { config: testConfig(), logger: createMockLogger(), output });

    expect(code).toBe(1);
    expect(output.stdout).toEqual([]);
    expect(output.stderr).toEqual([
      'error[DivisionByZero]: Division by zero at position 4',
      '  (1 / 0)',
      '     ^',
    ]);
  });

  it('prints errors as JSON on stdout', () => {
    const output = captureOutput();
    const code = runEval('1,,2', { ...pretty, format: 'json' }, { config: testConfig(), logger: createMockLogger(), output });

    expect(code).toBe(1);
    expect(output.stdout).toEqual([
      '{"input":"1,,2","error":{"kind":"UnexpectedComma","message":"Unexpected comma","span":{"start":3,"end":3}}}',
    ]);
  });

  it('applies --max-length over the configured limit', () => {
    const output = captureOutput();
    const code = runEval('{1..=10}', { ...pretty, maxLength: 3 }, {
      config: testConfig({ maxSequenceLength: 100 }),
      logger: createMockLogger(),
      output,
    });

    expect(code).toBe(1);
    expect(output.stderr[0]).toBe(
      'error[SequenceTooLong]: Sequence exceeds maximum length of 3 elements at position 1-8',
    );
  });
});

describe('resolveLimits', () => {
  it('returns no overrides without configuration', () => {
    expect(resolveLimits(testConfig())).toEqual({});
  });

  it('prefers the command-line length over the configured one', () => {
    expect(resolveLimits(testConfig({ maxSequenceLength: 10, maxExpressionLength: 100 }), 5)).toEqual({
      maxSequenceLength: 5,
      maxExpressionLength: 100,
    });
  });
});

describe('option parsers', () => {
  it('accepts positive integers only', () => {
    expect(parsePositiveInt('25')).toBe(25);
    expect(() => parsePositiveInt('0')).toThrow('Expected a positive integer.');
    expect(() => parsePositiveInt('2.5')).toThrow('Expected a positive integer.');
  });

  it('accepts the two output formats', () => {
    expect(parseFormat('json')).toBe('json');
    expect(() => parseFormat('xml')).toThrow("Expected 'pretty' or 'json'.");
  });
});

describe('tokens', () => {
  it('prints one line per token', () => {
    const output = captureOutput();
    const code = runTokens('-1, {2..3}', { format: 'pretty', color: false }, output);

    expect(code).toBe(0);
    expect(output.stdout).toHaveLength(8);
    expect(output.stdout[0]).toBe(`1${' '.repeat(7)}OPERATOR${' '.repeat(12)}-`);
    expect(output.stdout[5]).toBe(`7-8${' '.repeat(5)}RANGE_EXCLUSIVE${' '.repeat(5)}..`);
  });

  it('prints tokens as JSON', () => {
    const output = captureOutput();
    runTokens('12', { format: 'json' }, output);

    expect(output.stdout).toEqual(['[{"type":"INT","text":"12","span":{"start":1,"end":2},"value":"12"}]']);
  });

  it('renders lexer errors', () => {
    const output = captureOutput();
    const code = runTokens('s:1', { format: 'pretty', color: false }, output);

    expect(code).toBe(1);
    expect(output.stderr[0]).toBe(
      "error[MisplacedRngSyntax]: Character 's' can only be used when defining number ranges at position 1",
    );
  });
});
