export { BenchmarkRunner, runAll, printSummaryTable, bucketAlreadyPresent, runPrefixFor } from './runner.js';
export { withAttempts, attemptError, normalizeResult } from './attempt.js';
export type { AttemptPolicy, AttemptHooks, AttemptOutcome } from './attempt.js';
export { loadConfig, parseConfig, selectProviders, bucketName, configSchema, DEFAULT_CONFIG_FILE } from './config.js';
export type { RawConfig } from './config.js';
export { operationHandlers, handlerFor, isFatal } from './operations/index.js';
export { createProgram } from './program.js';
export type {
  BenchmarkConfig,
  DatasetConfig,
  ProviderConfig,
  TestConfig,
  RunState,
  RunEventLog,
  RunnerDeps,
  RunOptions,
  OperationContext,
  OperationCall,
  OperationHandler,
  RunReport,
  ProviderOutcome,
} from './types.js';
