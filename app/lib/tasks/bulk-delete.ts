import { z } from 'zod';
import type { BulkDeleteResult, KeyFailure } from '~/lib/task-queue/types';
import { forEachPage } from './listing';
import { checkpoint } from './step-context';
import type { StepContext } from './step-context';
import { BucketNameSchema, StorageAccountRefSchema } from './schemas';

export const MAX_BULK_KEYS = 10_000;

export const BulkDeleteParamsSchema = z.object({
  storage_account: StorageAccountRefSchema,
  bucket_name: BucketNameSchema,
  keys: z
    .array(
      z.string().min(1, 'keys must not contain empty strings').max(1024, 'keys must be at most 1024 characters'),
      { required_error: 'keys is required' }
    )
    .min(1, 'keys must contain at least one key')
    .max(MAX_BULK_KEYS, `keys must contain at most ${MAX_BULK_KEYS} entries`),
});

export type BulkDeleteParams = z.infer<typeof BulkDeleteParamsSchema>;

export function isFolderKey(key: string): boolean {
  return key.endsWith('/');
}

/**
 * Delete an explicit set of keys. Keys ending in "/" are folders and expand to
 * everything under them. Per-key failures end up in the result; only a failed
 * store call fails the task.
 *
 * Progress: folder expansion 5-15, deletion 15-100.
 */
export async function bulkDeleteStep(params: BulkDeleteParams, ctx: StepContext): Promise<BulkDeleteResult> {
  const bucket = params.bucket_name;
  const requested = Array.from(new Set(params.keys));
  const folders = requested.filter(isFolderKey);
  const files = requested.filter(key => !isFolderKey(key));

  ctx.progress.report(5, 'Preparing deletion...');

  const targets = new Set(files);
  for (const [index, folder] of folders.entries()) {
    await forEachPage(ctx, bucket, folder, objects => {
      for (const object of objects) {
        targets.add(object.key);
      }
    });
    const progress = 5 + Math.floor(((index + 1) / folders.length) * 10);
    ctx.progress.report(progress, `Expanded ${index + 1}/${folders.length} folders (${targets.size} objects)`);
  }

  const keys = Array.from(targets);
  const total = keys.length;
  const batchSize = ctx.limits.deleteBatchSize;
  const failures: KeyFailure[] = [];
  let deleted = 0;
  let processed = 0;

  ctx.progress.report(15, `Deleting ${total} objects...`);

  for (let offset = 0; offset < total; offset += batchSize) {
    checkpoint(ctx.progress);

    const batch = keys.slice(offset, offset + batchSize);
    const result = await ctx.store.deleteObjects(bucket, batch);
    deleted += result.deleted.length;
    failures.push(...result.errors);
    processed += batch.length;

    ctx.progress.report(15 + Math.floor((processed / total) * 85), `Deleted ${deleted}/${total} objects`);
  }

  if (failures.length > 0) {
    ctx.log.warn({ bucket, failed: failures.length, total }, 'bulk delete finished with per-key failures');
  }

  return {
    bucket,
    requested_count: params.keys.length,
    folders: folders.length,
    files: files.length,
    deleted_count: deleted,
    failed_keys: failures.map(failure => failure.key),
    failures,
  };
}
