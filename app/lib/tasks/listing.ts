/**
 * Listing and batched deletion shared by the delete step functions
 */

import type { KeyFailure } from '~/lib/task-queue/types';
import type { StoredObject } from '~/lib/storage/object-store';
import { checkpoint } from './step-context';
import type { StepContext } from './step-context';

export interface ProgressRange {
  from: number;
  to: number;
}

/**
 * Walk every page under `prefix`, checking for cancellation before each page
 */
export async function forEachPage(
  ctx: StepContext,
  bucket: string,
  prefix: string,
  onPage: (objects: StoredObject[], pageNumber: number) => void
): Promise<number> {
  let continuationToken: string | null = null;
  let pages = 0;

  do {
    checkpoint(ctx.progress);
    const page = await ctx.store.listObjects(bucket, {
      prefix,
      continuationToken,
      maxKeys: ctx.limits.listPageSize,
    });
    pages++;
    onPage(page.objects, pages);
    continuationToken = page.nextContinuationToken;
  } while (continuationToken !== null);

  return pages;
}

/**
 * List every key under `prefix`. Progress steps one point per page inside `range`,
 * since the total is unknown until the last page.
 */
export async function collectKeys(
  ctx: StepContext,
  bucket: string,
  prefix: string,
  range: ProgressRange,
  label = 'Listing objects'
): Promise<string[]> {
  const keys: string[] = [];
  const span = Math.max(0, range.to - range.from - 1);

  await forEachPage(ctx, bucket, prefix, (objects, pageNumber) => {
    for (const object of objects) {
      keys.push(object.key);
    }
    ctx.progress.report(range.from + Math.min(span, pageNumber), `${label}... (${keys.length} found)`);
  });

  return keys;
}

export interface BatchOutcome {
  deleted: number;
  failures: KeyFailure[];
}

/**
 * Delete `keys` in batches of `limits.deleteBatchSize`, checkpointing before every batch.
 * Per-key failures are collected; a failure of the batch call itself propagates.
 */
export async function deleteInBatches(
  ctx: StepContext,
  bucket: string,
  keys: string[],
  range: ProgressRange
): Promise<BatchOutcome> {
  const total = keys.length;
  const batchSize = ctx.limits.deleteBatchSize;
  const failures: KeyFailure[] = [];
  let deleted = 0;
  let processed = 0;

  for (let offset = 0; offset < total; offset += batchSize) {
    checkpoint(ctx.progress);

    const batch = keys.slice(offset, offset + batchSize);
    const result = await ctx.store.deleteObjects(bucket, batch);
    deleted += result.deleted.length;
    failures.push(...result.errors);
    processed += batch.length;

    const progress = range.from + Math.floor((processed / total) * (range.to - range.from));
    ctx.progress.report(progress, `Deleted ${deleted}/${total} objects`);
  }

  return { deleted, failures };
}
