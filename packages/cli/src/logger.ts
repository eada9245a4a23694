import { createFileSink, createLogger, type Logger } from '@seqgen/logger';
import type { SeqgenConfig } from './config.js';

/**
 * Command logger: JSON lines on stderr, plus the log file when one is configured
 */
export function createCliLogger(config: SeqgenConfig, verbose: boolean = false): Logger {
  const logger = createLogger({
    environment: config.environment,
    minLevel: verbose ? 'debug' : undefined,
    sink: config.logFile ? createFileSink(config.logFile) : undefined,
    consoleOnly: !config.logFile,
  });

  for (const warning of config.warnings) {
    logger.warn('config_warning', { warning });
  }

  return logger;
}
