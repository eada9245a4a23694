/**
 * CLI configuration loading
 *
 * Loads configuration from .env files, searching from the current directory
 * up to the filesystem root.
 */

import type { Environment } from '@seqgen/logger';
import * as fs from 'node:fs';
import * as path from 'node:path';

export interface SeqgenConfig {
  maxSequenceLength?: number;
  maxExpressionLength?: number;
  environment: Environment;
  logFile?: string;
  /** Values that were present but could not be used */
  warnings: string[];
}

const ENVIRONMENTS: readonly Environment[] = ['test', 'development', 'production'];

/**
 * Parse a .env file into a key-value object
 */
export function parseEnvFile(content: string): Record<string, string> {
  const result: Record<string, string> = {};

  for (const line of content.split('\n')) {
    const trimmed = line.trim();

    // Skip empty lines and comments
    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }

    const eqIndex = trimmed.indexOf('=');
    if (eqIndex === -1) {
      continue;
    }

    const key = trimmed.slice(0, eqIndex).trim();
    let value = trimmed.slice(eqIndex + 1).trim();

    // Remove surrounding quotes if present
    if (
      value.length >= 2 &&
      ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'")))
    ) {
      value = value.slice(1, -1);
    }

    result[key] = value;
  }

  return result;
}

/**
 * Find the nearest .env file, searching from startDir up to root
 */
export function findEnvFile(startDir: string): string | null {
  let currentDir = path.resolve(startDir);

  while (true) {
    const envPath = path.join(currentDir, '.env');

    if (fs.existsSync(envPath) && fs.statSync(envPath).isFile()) {
      return envPath;
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      // Reached filesystem root
      return null;
    }
    currentDir = parentDir;
  }
}

function positiveInteger(name: string, value: string, warnings: string[]): number | undefined {
  if (/^[1-9][0-9]*$/.test(value) && Number.isSafeInteger(Number(value))) {
    return Number(value);
  }
  warnings.push(`Ignoring ${name}: expected a positive integer, got '${value}'`);
  return undefined;
}

function environment(value: string, warnings: string[]): Environment | undefined {
  const match = ENVIRONMENTS.find((env) => env === value);
  if (!match) {
    warnings.push(`Ignoring SEQGEN_ENV: expected one of ${ENVIRONMENTS.join(', ')}, got '${value}'`);
  }
  return match;
}

/**
 * Load seqgen configuration from environment and .env files
 *
 * Priority (highest to lowest):
 * 1. Process environment variables
 * 2. .env file (searched from cwd upward)
 */
export function loadConfig(
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env,
): SeqgenConfig {
  const warnings: string[] = [];
  let values: Record<string, string> = {};

  // Load from .env file first (lower priority)
  const envPath = findEnvFile(cwd);
  if (envPath) {
    try {
      values = parseEnvFile(fs.readFileSync(envPath, 'utf-8'));
    } catch (error) {
      warnings.push(`Could not read ${envPath}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  // Override with process environment (higher priority)
  for (const key of [
    'SEQGEN_MAX_SEQUENCE_LENGTH',
    'SEQGEN_MAX_EXPRESSION_LENGTH',
    'SEQGEN_ENV',
    'SEQGEN_LOG_FILE',
  ]) {
    const value = env[key];
    if (value) {
      values[key] = value;
    }
  }

  const config: SeqgenConfig = { environment: 'production', warnings };

  if (values.SEQGEN_MAX_SEQUENCE_LENGTH) {
    config.maxSequenceLength = positiveInteger(
      'SEQGEN_MAX_SEQUENCE_LENGTH',
      values.SEQGEN_MAX_SEQUENCE_LENGTH,
      warnings,
    );
  }
  if (values.SEQGEN_MAX_EXPRESSION_LENGTH) {
    config.maxExpressionLength = positiveInteger(
      'SEQGEN_MAX_EXPRESSION_LENGTH',
      values.SEQGEN_MAX_EXPRESSION_LENGTH,
      warnings,
    );
  }
  if (values.SEQGEN_ENV) {
    config.environment = environment(values.SEQGEN_ENV, warnings) ?? config.environment;
  }
  if (values.SEQGEN_LOG_FILE) {
    // Relative to the directory the command runs in
    config.logFile = path.resolve(cwd, values.SEQGEN_LOG_FILE);
  }

  return config;
}
