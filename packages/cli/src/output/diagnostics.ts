import { toDiagnostic, type SequenceError } from '@seqgen/sequence';
import type { Colors } from './colors.js';

function width(text: string): number {
  return Array.from(text).length;
}

/**
 * Render an error as a headline, the input with the offending text
 * highlighted, and a caret underline
 *
 * ```
 * error[InvalidRange]: Invalid range syntax at position 6-8
 *   1, {1...5}
 *        ^^^
 * ```
 */
export function renderDiagnostic(error: SequenceError, c: Colors): string[] {
  const diagnostic = toDiagnostic(error);
  // Tabs and line breaks would shift the caret line
  const flatten = (text: string): string => text.replace(/[\t\r\n]/g, ' ');

  const before = flatten(diagnostic.before);
  const highlighted = flatten(diagnostic.highlighted);
  const after = flatten(diagnostic.after);

  return [
    `${c.red(c.bold(`error[${diagnostic.kind}]`))}: ${error.message}`,
    `  ${before}${c.red(highlighted)}${after}`,
    `  ${' '.repeat(width(before))}${c.red('^'.repeat(Math.max(1, width(highlighted))))}`,
  ];
}

/**
 * JSON shape of an error for `--format json`
 */
export function diagnosticJson(error: SequenceError): {
  kind: string;
  message: string;
  span: { start: number; end: number };
} {
  return { kind: error.kind, message: error.description, span: error.span };
}
