export { McStorageProvider, aliasFor, hostUrl } from './provider.js';
export type { McProviderOptions } from './provider.js';
export { McStorageClient } from './client.js';
export { runCommand } from './process.js';
export type { CommandOptions, CommandRunner, McClientOptions } from './types.js';
