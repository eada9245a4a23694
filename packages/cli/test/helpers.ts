import type { SeqgenConfig } from '../src/config.js';
import type { Output } from '../src/output/io.js';

export interface CapturedOutput extends Output {
  stdout: string[];
  stderr: string[];
}

export function captureOutput(): CapturedOutput {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    out: (line) => stdout.push(line),
    err: (line) => stderr.push(line),
  };
}

export function testConfig(overrides: Partial<SeqgenConfig> = {}): SeqgenConfig {
  return { environment: 'test', warnings: [], ...overrides };
}
