import type { OperationKind } from './types.js';

/**
 * Invalid or incomplete configuration
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}:\n  - ${issues.join('\n  - ')}` : message);
    this.name = 'ConfigError';
  }
}

/**
 * No access/secret pair could be resolved for a namespace
 */
export class CredentialError extends Error {
  constructor(
    message: string,
    public readonly namespace: string,
  ) {
    super(message);
    this.name = 'CredentialError';
  }
}

/**
 * Manifest unreadable or dataset parameters unusable
 */
export class DatasetError extends Error {
  constructor(
    message: string,
    public readonly path?: string,
  ) {
    super(message);
    this.name = 'DatasetError';
  }
}

/**
 * A fatal storage operation exhausted its retry budget
 */
export class OperationError extends Error {
  constructor(
    message: string,
    public readonly op: OperationKind | 'CREATE_BUCKET',
    public readonly iteration: number,
    public readonly attempts: number,
    public readonly exitCode: number,
  ) {
    super(message);
    this.name = 'OperationError';
  }
}

/**
 * Nothing valid to aggregate
 */
export class AggregationError extends Error {
  constructor(
    message: string,
    public readonly dataPath: string,
  ) {
    super(message);
    this.name = 'AggregationError';
  }
}
