import { runScope } from '@objbench/core';
import type { OperationContext, OperationHandler } from '../types.js';

/**
 * Recursive removal of the run prefix
 */
export const deleteOperation: OperationHandler = {
  kind: 'DELETE',
  description: 'Remove every object under the run prefix',
  defaultFatal: true,
  plan(ctx: OperationContext) {
    const prefix = runScope(ctx.runPrefix);
    return [{ key: prefix, bytes: 0, invoke: options => ctx.client.deletePrefix(prefix, options) }];
  },
};
