import { z } from 'zod';
import { AppError } from '~/lib/errors';
import type { KeyFailure, PrefixDeleteResult } from '~/lib/task-queue/types';
import { collectKeys, deleteInBatches } from './listing';
import type { StepContext } from './step-context';
import { BucketNameSchema, StorageAccountRefSchema } from './schemas';

export const PrefixDeleteParamsSchema = z.object({
  storage_account: StorageAccountRefSchema,
  bucket_name: BucketNameSchema,
  prefix: z
    .string({ required_error: 'prefix is required' })
    .min(1, 'prefix must not be empty')
    .max(1024, 'prefix must be at most 1024 characters')
    .refine(prefix => !prefix.startsWith('/'), 'prefix must not start with "/"'),
});

export type PrefixDeleteParams = z.infer<typeof PrefixDeleteParamsSchema>;

/**
 * Delete every object under a prefix. Same passes as bucket delete, minus the bucket itself.
 * Progress: listing 0-10, deletion 10-95.
 */
export async function deletePrefixStep(params: PrefixDeleteParams, ctx: StepContext): Promise<PrefixDeleteResult> {
  const { bucket_name: bucket, prefix } = params;
  const maxPasses = ctx.limits.maxDeletePasses;
  let deletedCount = 0;
  let lastFailures: KeyFailure[] = [];

  for (let pass = 1; pass <= maxPasses; pass++) {
    const label = pass > 1 ? `Listing objects (pass ${pass}/${maxPasses})` : 'Listing objects';
    const keys = await collectKeys(ctx, bucket, prefix, { from: 0, to: 10 }, label);

    if (keys.length === 0) {
      return { bucket, prefix, deleted_count: deletedCount };
    }

    ctx.progress.report(10, `Found ${keys.length} objects under ${prefix}`);
    const outcome = await deleteInBatches(ctx, bucket, keys, { from: 10, to: 95 });
    deletedCount += outcome.deleted;
    lastFailures = outcome.failures;

    if (outcome.failures.length === 0) {
      return { bucket, prefix, deleted_count: deletedCount };
    }

    ctx.log.warn({ bucket, prefix, pass, maxPasses, failedKeys: outcome.failures.length }, 'prefix delete pass left objects behind');
  }

  throw new AppError(
    `${lastFailures.length} objects under "${prefix}" could not be deleted after ${maxPasses} passes`,
    'PREFIX_NOT_EMPTY',
    409,
    {
      bucket,
      prefix,
      passes: maxPasses,
      deleted_count: deletedCount,
      failures: lastFailures.slice(0, 20),
    }
  );
}
