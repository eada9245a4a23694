import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { findEnvFile, loadConfig, parseEnvFile } from '../src/config.js';

describe('parseEnvFile', () => {
  it('reads key-value pairs', () => {
    expect(parseEnvFile('A=1\nB = two\n')).toEqual({ A: '1', B: 'two' });
  });

  it('skips comments, blank lines and lines without =', () => {
    expect(parseEnvFile('# comment\n\nNOPE\nA=1')).toEqual({ A: '1' });
  });

  it('removes surrounding quotes', () => {
    expect(parseEnvFile(`A="x y"\nB='z'\nC="`)).toEqual({ A: 'x y', B: 'z', C: '"' });
  });
});

describe('loadConfig', () => {
  let root: string;
  let nested: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'seqgen-config-'));
    nested = join(root, 'a', 'b');
    await mkdir(nested, { recursive: true });
    await writeFile(
      join(root, '.env'),
      ['SEQGEN_MAX_SEQUENCE_LENGTH=500', 'SEQGEN_ENV=development', 'SEQGEN_LOG_FILE=logs/seqgen.log'].join('\n'),
    );
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('finds the nearest .env file walking up', () => {
    expect(findEnvFile(nested)).toBe(join(root, '.env'));
  });

  it('reads settings from the .env file', () => {
    expect(loadConfig(nested, {})).toEqual({
      maxSequenceLength: 500,
      environment: 'development',
      logFile: join(nested, 'logs', 'seqgen.log'),
      warnings: [],
    });
  });

  it('lets the process environment override the .env file', () => {
    const config = loadConfig(nested, { SEQGEN_MAX_SEQUENCE_LENGTH: '20', SEQGEN_MAX_EXPRESSION_LENGTH: '64' });
    expect(config.maxSequenceLength).toBe(20);
    expect(config.maxExpressionLength).toBe(64);
    expect(config.environment).toBe('development');
  });

  it('ignores invalid values with a warning', () => {
    const config = loadConfig(nested, { SEQGEN_MAX_SEQUENCE_LENGTH: '-3', SEQGEN_ENV: 'staging' });
    expect(config.maxSequenceLength).toBeUndefined();
    expect(config.environment).toBe('production');
    expect(config.warnings).toEqual([
      "Ignoring SEQGEN_MAX_SEQUENCE_LENGTH: expected a positive integer, got '-3'",
      "Ignoring SEQGEN_ENV: expected one of test, development, production, got 'staging'",
    ]);
  });
});
