import { appendFile } from 'node:fs/promises';
import { bigintReplacer } from './logger.js';
import type { LogEntry, LogSink } from './types.js';

/**
 * Sink appending one JSON object per line to `path`
 */
export function createFileSink(path: string): LogSink {
  return {
    async write(entries: readonly LogEntry[]): Promise<void> {
      const lines = entries.map((entry) => JSON.stringify(entry, bigintReplacer)).join('\n');
      await appendFile(path, `${lines}\n`, 'utf8');
    },
  };
}

/**
 * Sink keeping entries in memory
 */
export function createMemorySink(): LogSink & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return {
    entries,
    async write(batch: readonly LogEntry[]): Promise<void> {
      entries.push(...batch);
    },
  };
}
