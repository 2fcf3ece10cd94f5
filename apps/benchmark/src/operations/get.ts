import { rm } from 'node:fs/promises';
import { join } from 'node:path';
import { runScope } from '@objbench/core';
import { totalBytes, verifyDataset } from '@objbench/dataset';
import type { OperationContext, OperationHandler } from '../types.js';

/**
 * Downloads the run prefix into scratch space, optionally verifies it, then
 * removes the copy
 */
export const getOperation: OperationHandler = {
  kind: 'GET',
  description: 'Download the run prefix to scratch space',
  defaultFatal: true,
  plan(ctx: OperationContext) {
    const prefix = runScope(ctx.runPrefix);
    const target = join(ctx.scratchDir, 'download');

    return [
      {
        key: prefix,
        bytes: totalBytes(ctx.manifest),
        invoke: options => ctx.client.downloadTree(prefix, target, options),
        async after() {
          if (ctx.test.verifyChecksums && (await verifyDataset(ctx.manifest, target))) {
            console.log(`  GET verified ${ctx.manifest.files.length} files`);
          }
          await rm(target, { recursive: true, force: true });
        },
      },
    ];
  },
};
