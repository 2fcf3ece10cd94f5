import { runScope } from '@objbench/core';
import type { OperationContext, OperationHandler } from '../types.js';

/**
 * Recursive listing of the run prefix
 */
export const listOperation: OperationHandler = {
  kind: 'LIST',
  description: 'List every object under the run prefix',
  defaultFatal: true,
  plan(ctx: OperationContext) {
    const prefix = runScope(ctx.runPrefix);
    return [{ key: prefix, bytes: 0, invoke: options => ctx.client.listPrefix(prefix, options) }];
  },
};
