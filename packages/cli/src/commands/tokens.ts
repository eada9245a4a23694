/**
 * seqgen tokens command
 */

import { formatSpan, isSequenceError, lex, spanText, type Token } from '@seqgen/sequence';
import { Command } from 'commander';
import { createColors } from '../output/colors.js';
import { diagnosticJson, renderDiagnostic } from '../output/diagnostics.js';
import { consoleOutput, type Output } from '../output/io.js';
import { parseFormat } from './options.js';

export interface TokensOptions {
  format: 'pretty' | 'json';
  color?: boolean;
}

interface TokenView {
  type: Token['type'];
  text: string;
  span: Token['span'];
  value?: string;
  operator?: string;
}

function toView(token: Token, input: string): TokenView {
  const view: TokenView = { type: token.type, text: spanText(input, token.span), span: token.span };
  if (token.type === 'INT') view.value = token.value.toString();
  if (token.type === 'OPERATOR') view.operator = token.operator;
  return view;
}

/**
 * Print the tokens of an expression; returns the exit code
 */
export function runTokens(expression: string, options: TokensOptions, output: Output = consoleOutput): number {
  const c = createColors(options.color);

  try {
    const tokens = lex(expression).map((token) => toView(token, expression));

    if (options.format === 'json') {
      output.out(JSON.stringify(tokens));
      return 0;
    }

    for (const token of tokens) {
      output.out(`${c.gray(formatSpan(token.span).padEnd(8))}${c.cyan(token.type.padEnd(20))}${token.text}`);
    }
    return 0;
  } catch (error) {
    if (!isSequenceError(error)) throw error;

    if (options.format === 'json') {
      output.out(JSON.stringify({ error: diagnosticJson(error) }));
    } else {
      for (const line of renderDiagnostic(error, c)) {
        output.err(line);
      }
    }
    return 1;
  }
}

export const tokensCommand = new Command('tokens')
  .description('Print the tokens of an expression')
  .argument('<expression>', 'Sequence expression')
  .option('--format <type>', 'Output format: pretty, json', parseFormat, 'pretty')
  .option('--no-color', 'Disable colored output')
  .action((expression: string, options: TokensOptions) => {
    try {
      process.exitCode = runTokens(expression, options);
    } catch (error) {
      console.error('Error:', error instanceof Error ? error.message : error);
      process.exitCode = 2;
    }
  });
