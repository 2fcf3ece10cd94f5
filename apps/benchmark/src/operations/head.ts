import { objectKeyFromRelative } from '@objbench/core';
import type { OperationCall, OperationContext, OperationHandler } from '../types.js';

/**
 * Metadata probes on the first `headSampleSize` manifest files, one call each
 */
export const headOperation: OperationHandler = {
  kind: 'HEAD',
  description: 'Stat a bounded sample of uploaded objects',
  defaultFatal: false,
  plan(ctx: OperationContext) {
    return ctx.manifest.files.slice(0, ctx.test.headSampleSize).map((file): OperationCall => {
      const key = objectKeyFromRelative(ctx.runPrefix, file.path);
      return { key, bytes: 0, invoke: options => ctx.client.statObject(key, options) };
    });
  },
};
