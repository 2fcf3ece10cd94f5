import type { OperationKind } from '@objbench/core';
import type { OperationHandler } from '../types.js';
import { putOperation } from './put.js';
import { listOperation } from './list.js';
import { headOperation } from './head.js';
import { getOperation } from './get.js';
import { deleteOperation } from './delete.js';

export const operationHandlers = {
  PUT: putOperation,
  LIST: listOperation,
  HEAD: headOperation,
  GET: getOperation,
  DELETE: deleteOperation,
} as const satisfies Record<OperationKind, OperationHandler>;

export function handlerFor(kind: OperationKind): OperationHandler {
  return operationHandlers[kind];
}

/**
 * Whether exhausting the attempts of `kind` aborts the run. An explicit
 * non-fatal list replaces the handlers' defaults.
 */
export function isFatal(kind: OperationKind, nonFatalOperations?: readonly OperationKind[]): boolean {
  if (nonFatalOperations !== undefined) {
    return !nonFatalOperations.includes(kind);
  }
  return operationHandlers[kind].defaultFatal;
}

export * from './put.js';
export * from './list.js';
export * from './head.js';
export * from './get.js';
export * from './delete.js';
