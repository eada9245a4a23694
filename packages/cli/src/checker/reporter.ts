/**
 * Check result reporter
 */

import type { Colors } from '../output/colors.js';
import { diagnosticJson, renderDiagnostic } from '../output/diagnostics.js';
import type { Output } from '../output/io.js';
import type { CheckResult } from './checker.js';

export interface ReporterOptions {
  format: 'pretty' | 'json';
  quiet?: boolean;
}

function plural(count: number, word: string): string {
  return `${count} ${word}${count !== 1 ? 's' : ''}`;
}

/**
 * Report check results in pretty format
 */
function reportPretty(results: CheckResult[], options: ReporterOptions, c: Colors, output: Output): void {
  let totalFailures = 0;

  for (const result of results) {
    const hasIssues = result.failures.length > 0;
    if (options.quiet && !hasIssues) continue;

    output.out('');
    output.out(`  ${c.cyan(result.path)}`);

    if (!hasIssues) {
      output.out(`    ${c.green('✓')} ${plural(result.expressions, 'expression')}, no issues`);
    }

    for (const failure of result.failures) {
      output.out(`    ${c.red('✗')} Line ${failure.line}: ${failure.error.message}`);
      for (const line of renderDiagnostic(failure.error, c).slice(1)) {
        output.out(`    ${line}`);
      }
      totalFailures++;
    }
  }

  if (options.quiet && totalFailures === 0) return;

  output.out('');
  if (totalFailures === 0) {
    output.out(c.green(`  ✓ All ${plural(results.length, 'file')} passed`));
  } else {
    output.out(c.gray(`  Found ${plural(totalFailures, 'error')} in ${plural(results.length, 'file')}`));
  }
  output.out('');
}

/**
 * Report check results in JSON format
 */
function reportJson(results: CheckResult[], output: Output): void {
  const failures = results.reduce((sum, r) => sum + r.failures.length, 0);

  output.out(
    JSON.stringify(
      {
        files: results.map((result) => ({
          path: result.path,
          expressions: result.expressions,
          failures: result.failures.map((failure) => ({
            line: failure.line,
            expression: failure.expression,
            error: diagnosticJson(failure.error),
          })),
        })),
        summary: { files: results.length, failures },
      },
      null,
      2,
    ),
  );
}

export function reportResults(results: CheckResult[], options: ReporterOptions, c: Colors, output: Output): void {
  if (options.format === 'json') {
    reportJson(results, output);
  } else {
    reportPretty(results, options, c, output);
  }
}

/**
 * 1 when any expression failed, 0 otherwise
 */
export function getExitCode(results: CheckResult[]): number {
  return results.some((r) => r.failures.length > 0) ? 1 : 0;
}
