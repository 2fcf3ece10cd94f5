import { runScope } from '@objbench/core';
import { MANIFEST_FILENAME, totalBytes } from '@objbench/dataset';
import type { OperationContext, OperationHandler } from '../types.js';

/** Local files under the dataset root that are never uploaded */
export const UPLOAD_EXCLUDES = [MANIFEST_FILENAME, '*.ndjson', '*.csv'];

/**
 * Uploads the whole dataset tree under the run prefix
 */
export const putOperation: OperationHandler = {
  kind: 'PUT',
  description: 'Upload the dataset tree under the run prefix',
  defaultFatal: true,
  plan(ctx: OperationContext) {
    const prefix = runScope(ctx.runPrefix);
    return [
      {
        key: prefix,
        bytes: totalBytes(ctx.manifest),
        invoke: options => ctx.client.uploadTree(ctx.dataPath, prefix, { ...options, exclude: UPLOAD_EXCLUDES }),
      },
    ];
  },
};
