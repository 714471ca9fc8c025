import type { TaskLimits } from '~/lib/config/settings';
import { TaskCancelledError } from '~/lib/errors';
import type { Logger } from '~/lib/log/logger';
import type { ObjectStore } from '~/lib/storage/object-store';
import type { ProgressReporter } from '~/lib/task-queue/types';

export interface BucketDeletedEvent {
  storageAccount: string;
  bucket: string;
}

export interface TaskHooks {
  /** Runs after a bucket-delete task removed the bucket, e.g. to drop share links pointing into it */
  onBucketDeleted?: (event: BucketDeletedEvent) => Promise<void>;
}

/**
 * Everything a step function may touch. Step functions suspend only on `store` calls.
 */
export interface StepContext {
  storageAccount: string;
  store: ObjectStore;
  progress: ProgressReporter;
  limits: TaskLimits;
  hooks: TaskHooks;
  log: Logger;
}

export type StepFunction<TParams, TResult> = (params: TParams, ctx: StepContext) => Promise<TResult>;

/**
 * Cancellation checkpoint: stop here if cancellation was requested
 */
export function checkpoint(progress: ProgressReporter): void {
  if (progress.isCancelled()) {
    throw new TaskCancelledError();
  }
}
