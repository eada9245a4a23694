/**
 * seqgen check command
 *
 * Checks `.seq` files, one expression per line, and reports every line that
 * fails to lex, parse or evaluate.
 */

import type { Logger } from '@seqgen/logger';
import { Command } from 'commander';
import { checkFile, collectFiles, getExitCode, reportResults, type CheckResult } from '../checker/index.js';
import { loadConfig, type SeqgenConfig } from '../config.js';
import { createCliLogger } from '../logger.js';
import { createColors } from '../output/colors.js';
import { consoleOutput, type Output } from '../output/io.js';
import { resolveLimits } from './eval.js';
import { parseFormat } from './options.js';

export interface CheckOptions {
  format: 'pretty' | 'json';
  quiet?: boolean;
  color?: boolean;
}

/**
 * Check files and directories; returns the exit code
 */
export async function runCheck(
  paths: string[],
  options: CheckOptions,
  context: { config: SeqgenConfig; logger: Logger; output?: Output; cwd?: string },
): Promise<number> {
  const { config, logger, output = consoleOutput, cwd } = context;
  const log = logger.child({ command: 'check' });

  const { files, missing } = await collectFiles(paths, cwd);
  for (const p of missing) {
    output.err(`Path not found: ${p}`);
  }

  if (files.length === 0) {
    if (!options.quiet) {
      output.out('No files found to check');
    }
    return 0;
  }

  const limits = resolveLimits(config);
  const results: CheckResult[] = [];

  for (const file of files) {
    const result = checkFile(file, limits);
    log.debug('file_checked', { file, expressions: result.expressions, failures: result.failures.length });
    results.push(result);
  }

  reportResults(results, options, createColors(options.color), output);

  const failures = results.reduce((sum, r) => sum + r.failures.length, 0);
  log.info('check_completed', { files: results.length, failures });

  return getExitCode(results);
}

export const checkCommand = new Command('check')
  .description('Check .seq files for invalid expressions')
  .argument('[paths...]', 'Files or directories to check', ['.'])
  .option('--format <type>', 'Output format: pretty, json', parseFormat, 'pretty')
  .option('--quiet', 'Only output on errors')
  .option('--no-color', 'Disable colored output')
  .action(async (paths: string[], options: CheckOptions) => {
    const config = loadConfig();
    const logger = createCliLogger(config);

    try {
      process.exitCode = await runCheck(paths, options, { config, logger });
    } catch (error) {
      logger.error('check_crashed', { error });
      console.error('Error:', error instanceof Error ? error.message : error);
      process.exitCode = 2;
    } finally {
      await logger.flush();
    }
  });
