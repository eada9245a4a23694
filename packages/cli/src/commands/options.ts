import { InvalidArgumentError } from 'commander';

/**
 * commander argument parser for options that take a positive integer
 */
export function parsePositiveInt(value: string): number {
  if (!/^[1-9][0-9]*$/.test(value) || !Number.isSafeInteger(Number(value))) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return Number(value);
}

/**
 * commander argument parser for `--format`
 */
export function parseFormat(value: string): 'pretty' | 'json' {
  if (value !== 'pretty' && value !== 'json') {
    throw new InvalidArgumentError("Expected 'pretty' or 'json'.");
  }
  return value;
}
