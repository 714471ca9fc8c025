import { z } from 'zod';
import { formatSize } from '~/lib/utils/format-size';
import type { CalculateSizeResult } from '~/lib/task-queue/types';
import { forEachPage } from './listing';
import type { StepContext } from './step-context';
import { BucketNameSchema, StorageAccountRefSchema } from './schemas';

export const CalculateSizeParamsSchema = z.object({
  storage_account: StorageAccountRefSchema,
  bucket_name: BucketNameSchema,
  prefix: z.string().max(1024, 'prefix must be at most 1024 characters').default(''),
});

export type CalculateSizeParams = z.infer<typeof CalculateSizeParamsSchema>;

/**
 * Listing progress estimate. The page count is unknown up front, so the
 * estimate approaches 90 without reaching it.
 */
export function scanProgress(pages: number): number {
  return 10 + Math.floor((80 * pages) / (pages + 4));
}

export async function calculateSizeStep(params: CalculateSizeParams, ctx: StepContext): Promise<CalculateSizeResult> {
  const { bucket_name: bucket, prefix } = params;
  let sizeBytes = 0;
  let objectCount = 0;

  ctx.progress.report(5, 'Scanning objects...');

  await forEachPage(ctx, bucket, prefix, (objects, pageNumber) => {
    for (const object of objects) {
      sizeBytes += object.size;
      objectCount++;
    }
    ctx.progress.report(scanProgress(pageNumber), `Scanned ${objectCount} objects (${formatSize(sizeBytes)})`);
  });

  return {
    bucket,
    prefix,
    size_bytes: sizeBytes,
    size_formatted: formatSize(sizeBytes),
    object_count: objectCount,
  };
}
