export { checkFile, checkSource, collectFiles, SEQ_FILE_PATTERN } from './checker.js';
export type { CheckResult, CollectedFiles, LineFailure } from './checker.js';
export { getExitCode, reportResults } from './reporter.js';
export type { ReporterOptions } from './reporter.js';
