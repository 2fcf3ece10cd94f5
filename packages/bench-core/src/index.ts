// Types
export type {
  OperationKind,
  StorageTarget,
  Credentials,
  StorageCallOptions,
  StorageResult,
  IStorageClient,
  IStorageProvider,
  ProviderInfo,
  EventRecord,
  LatencyStats,
} from './types.js';
export { OPERATION_KINDS, TIMEOUT_EXIT_CODE, isOperationKind } from './types.js';

// Errors
export {
  ConfigError,
  CredentialError,
  DatasetError,
  OperationError,
  AggregationError,
} from './errors.js';

// Classes
export { SeededRandom } from './random.js';
export { EventLog } from './event-log.js';
export type { EventSink } from './event-log.js';
export { CredentialResolver, parseProfileSection } from './credentials.js';
export type { CredentialRequest, CredentialResolverFn } from './credentials.js';

// Key mapping
export { objectKey, objectKeyFromRelative, runScope } from './keys.js';

// Utilities
export {
  generateRunId,
  percentile,
  mean,
  calculateStats,
  formatMs,
  formatBytes,
  tail,
  sleep,
} from './utils.js';
