/**
 * Expression file checking
 *
 * A `.seq` file holds one expression per line; blank lines and lines starting
 * with `#` are skipped.
 */

import { generate, isSequenceError, type SequenceError, type SequenceLimits } from '@seqgen/sequence';
import { glob } from 'glob';
import * as fs from 'node:fs';
import * as path from 'node:path';

export const SEQ_FILE_PATTERN = '**/*.seq';

export interface LineFailure {
  /** 1-based line number in the file */
  line: number;
  expression: string;
  error: SequenceError;
}

export interface CheckResult {
  path: string;
  /** Number of expressions checked */
  expressions: number;
  failures: LineFailure[];
}

export interface CollectedFiles {
  files: string[];
  /** Arguments that did not name an existing file or directory */
  missing: string[];
}

/**
 * Resolve paths to `.seq` files; directories are searched recursively
 */
export async function collectFiles(paths: string[], cwd: string = process.cwd()): Promise<CollectedFiles> {
  const files: string[] = [];
  const missing: string[] = [];

  for (const p of paths) {
    const resolved = path.resolve(cwd, p);

    if (!fs.existsSync(resolved)) {
      missing.push(p);
      continue;
    }

    if (fs.statSync(resolved).isDirectory()) {
      const found = await glob(SEQ_FILE_PATTERN, {
        cwd: resolved,
        absolute: true,
        ignore: ['**/node_modules/**', '**/dist/**'],
      });
      files.push(...found.sort());
    } else {
      files.push(resolved);
    }
  }

  return { files: [...new Set(files)], missing };
}

/**
 * Check every expression in the text of a `.seq` file
 */
export function checkSource(
  filePath: string,
  content: string,
  limits: Partial<SequenceLimits> = {},
): CheckResult {
  const failures: LineFailure[] = [];
  let expressions = 0;

  content.split(/\r?\n/).forEach((raw, index) => {
    const expression = raw.trim();
    if (!expression || expression.startsWith('#')) return;

    expressions++;
    try {
      generate(expression, { limits });
    } catch (error) {
      if (!isSequenceError(error)) throw error;
      failures.push({ line: index + 1, expression, error });
    }
  });

  return { path: filePath, expressions, failures };
}

export function checkFile(filePath: string, limits: Partial<SequenceLimits> = {}): CheckResult {
  return checkSource(filePath, fs.readFileSync(filePath, 'utf-8'), limits);
}
