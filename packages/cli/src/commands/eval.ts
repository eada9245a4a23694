/**
 * seqgen eval command
 */

import type { Logger } from '@seqgen/logger';
import { generate, isSequenceError, type SequenceLimits } from '@seqgen/sequence';
import { Command } from 'commander';
import { loadConfig, type SeqgenConfig } from '../config.js';
import { createCliLogger } from '../logger.js';
import { createColors } from '../output/colors.js';
import { diagnosticJson, renderDiagnostic } from '../output/diagnostics.js';
import { consoleOutput, type Output } from '../output/io.js';
import { parseFormat, parsePositiveInt } from './options.js';

export interface EvalOptions {
  separator: string;
  format: 'pretty' | 'json';
  maxLength?: number;
  color?: boolean;
}

/**
 * Limits from configuration, with `--max-length` taking precedence
 */
export function resolveLimits(config: SeqgenConfig, maxLength?: number): Partial<SequenceLimits> {
  const limits: Partial<SequenceLimits> = {};
  const sequenceLength = maxLength ?? config.maxSequenceLength;

  if (sequenceLength !== undefined) limits.maxSequenceLength = sequenceLength;
  if (config.maxExpressionLength !== undefined) limits.maxExpressionLength = config.maxExpressionLength;

  return limits;
}

/**
 * Evaluate one expression and print the sequence; returns the exit code
 */
export function runEval(
  expression: string,
  options: EvalOptions,
  context: { config: SeqgenConfig; logger: Logger; output?: Output },
): number {
  const { config, logger, output = consoleOutput } = context;
  const log = logger.child({ command: 'eval' });

  log.debug('eval_started', { length: expression.length });

  try {
    const values = generate(expression, { limits: resolveLimits(config, options.maxLength) });

    if (options.format === 'json') {
      // Decimal strings keep the full 64-bit precision
      output.out(JSON.stringify({ input: expression, values: values.map(String) }));
    } else {
      output.out(values.join(options.separator));
    }

    log.info('eval_completed', { count: values.length });
    return 0;
  } catch (error) {
    if (!isSequenceError(error)) throw error;

    log.info('eval_failed', { kind: error.kind, span: error.span });

    if (options.format === 'json') {
      output.out(JSON.stringify({ input: expression, error: diagnosticJson(error) }));
    } else {
      for (const line of renderDiagnostic(error, createColors(options.color))) {
        output.err(line);
      }
    }
    return 1;
  }
}

export const evalCommand = new Command('eval')
  .description('Print the sequence an expression describes')
  .argument('<expression>', 'Sequence expression, e.g. "1, {2..=10, s:2}"')
  .option('-s, --separator <text>', 'Separator between values', ', ')
  .option('--format <type>', 'Output format: pretty, json', parseFormat, 'pretty')
  .option('--max-length <n>', 'Maximum number of values to generate', parsePositiveInt)
  .option('--no-color', 'Disable colored output')
  .option('-v, --verbose', 'Verbose output')
  .action(
    async (
      expression: string,
      options: EvalOptions & { verbose?: boolean },
    ) => {
      const config = loadConfig();
      const logger = createCliLogger(config, options.verbose);

      try {
        process.exitCode = runEval(expression, options, { config, logger });
      } catch (error) {
        logger.error('eval_crashed', { error });
        console.error('Error:', error instanceof Error ? error.message : error);
        process.exitCode = 2;
      } finally {
        await logger.flush();
      }
    },
  );
