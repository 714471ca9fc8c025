import { z } from 'zod';
import { AppError, StoreError, getErrorMessage } from '~/lib/errors';
import type { BucketDeleteResult, KeyFailure } from '~/lib/task-queue/types';
import { collectKeys, deleteInBatches } from './listing';
import { checkpoint } from './step-context';
import type { StepContext } from './step-context';
import { BucketNameSchema, StorageAccountRefSchema } from './schemas';

export const BucketDeleteParamsSchema = z.object({
  storage_account: StorageAccountRefSchema,
  bucket_name: BucketNameSchema,
});

export type BucketDeleteParams = z.infer<typeof BucketDeleteParamsSchema>;

/**
 * Empty the bucket, then remove it.
 *
 * Progress: listing 0-10, object deletion 10-85, bucket deletion 85, cleanup 95.
 * A bucket that is still non-empty when we try to remove it (concurrent writes,
 * per-key failures) gets another full pass, up to `limits.maxDeletePasses`.
 */
export async function deleteBucketStep(params: BucketDeleteParams, ctx: StepContext): Promise<BucketDeleteResult> {
  const bucket = params.bucket_name;
  const maxPasses = ctx.limits.maxDeletePasses;
  let deletedCount = 0;
  let lastFailures: KeyFailure[] = [];

  for (let pass = 1; pass <= maxPasses; pass++) {
    const label = pass > 1 ? `Listing objects (pass ${pass}/${maxPasses})` : 'Listing objects';
    const keys = await collectKeys(ctx, bucket, '', { from: 0, to: 10 }, label);

    ctx.progress.report(10, keys.length > 0 ? `Found ${keys.length} objects` : 'Bucket is empty');

    const outcome = await deleteInBatches(ctx, bucket, keys, { from: 10, to: 85 });
    deletedCount += outcome.deleted;
    lastFailures = outcome.failures;

    checkpoint(ctx.progress);
    ctx.progress.report(85, 'Deleting bucket...');

    try {
      await ctx.store.deleteBucket(bucket);
    } catch (error) {
      if (error instanceof StoreError && error.reason === 'conflict') {
        ctx.log.warn(
          { bucket, pass, maxPasses, failedKeys: outcome.failures.length },
          'bucket not empty after delete pass'
        );
        continue;
      }
      throw error;
    }

    ctx.progress.report(95, 'Cleaning up...');
    if (ctx.hooks.onBucketDeleted) {
      try {
        await ctx.hooks.onBucketDeleted({ storageAccount: ctx.storageAccount, bucket });
      } catch (error) {
        throw new AppError(
          `Bucket "${bucket}" was deleted but cleanup failed: ${getErrorMessage(error)}`,
          'INTERNAL',
          500,
          { bucket, deleted_count: deletedCount }
        );
      }
    }

    return { bucket, deleted_count: deletedCount };
  }

  throw new AppError(
    `Bucket "${bucket}" still contains objects after ${maxPasses} delete passes`,
    'BUCKET_NOT_EMPTY',
    409,
    {
      bucket,
      passes: maxPasses,
      deleted_count: deletedCount,
      failed_keys: lastFailures.slice(0, 20).map(failure => failure.key),
    }
  );
}
