/**
 * Task definitions - one entry per task kind, checked exhaustively by the compiler
 */

import type { z } from 'zod';
import type { AccessLevel } from '~/lib/auth/permissions';
import { BucketDeleteParamsSchema, deleteBucketStep } from '~/lib/tasks/bucket-delete';
import type { BucketDeleteParams } from '~/lib/tasks/bucket-delete';
import { BulkDeleteParamsSchema, bulkDeleteStep } from '~/lib/tasks/bulk-delete';
import type { BulkDeleteParams } from '~/lib/tasks/bulk-delete';
import { CalculateSizeParamsSchema, calculateSizeStep } from '~/lib/tasks/calculate-size';
import type { CalculateSizeParams } from '~/lib/tasks/calculate-size';
import { PrefixDeleteParamsSchema, deletePrefixStep } from '~/lib/tasks/prefix-delete';
import type { PrefixDeleteParams } from '~/lib/tasks/prefix-delete';
import type { StepFunction } from '~/lib/tasks/step-context';
import type { TaskKind, TaskMetadata, TaskResultMap } from './types';

export interface TaskParamsMap {
  'bucket-delete': BucketDeleteParams;
  'prefix-delete': PrefixDeleteParams;
  'bulk-delete': BulkDeleteParams;
  'calculate-size': CalculateSizeParams;
}

export interface TaskDefinition<K extends TaskKind> {
  kind: K;
  /** Validates the raw start request body */
  schema: z.ZodType<TaskParamsMap[K], z.ZodTypeDef, unknown>;
  /** Bucket access the caller needs to start this kind */
  access: AccessLevel;
  initialStep: string;
  describe: (params: TaskParamsMap[K]) => Omit<TaskMetadata, 'storage_account'>;
  startMessage: (params: TaskParamsMap[K]) => string;
  run: StepFunction<TaskParamsMap[K], TaskResultMap[K]>;
}

export type TaskDefinitions = { [K in TaskKind]: TaskDefinition<K> };

export const taskDefinitions: TaskDefinitions = {
  'bucket-delete': {
    kind: 'bucket-delete',
    schema: BucketDeleteParamsSchema,
    access: 'read-write',
    initialStep: 'Starting bucket deletion...',
    describe: params => ({ bucket_name: params.bucket_name }),
    startMessage: params => `Deletion of bucket "${params.bucket_name}" started`,
    run: deleteBucketStep,
  },
  'prefix-delete': {
    kind: 'prefix-delete',
    schema: PrefixDeleteParamsSchema,
    access: 'read-write',
    initialStep: 'Starting folder deletion...',
    describe: params => ({ bucket_name: params.bucket_name, prefix: params.prefix }),
    startMessage: params => `Deletion of "${params.prefix}" in bucket "${params.bucket_name}" started`,
    run: deletePrefixStep,
  },
  'bulk-delete': {
    kind: 'bulk-delete',
    schema: BulkDeleteParamsSchema,
    access: 'read-write',
    initialStep: 'Starting bulk deletion...',
    describe: params => ({ bucket_name: params.bucket_name, object_count: params.keys.length }),
    startMessage: params => `Deletion of ${params.keys.length} items in bucket "${params.bucket_name}" started`,
    run: bulkDeleteStep,
  },
  'calculate-size': {
    kind: 'calculate-size',
    schema: CalculateSizeParamsSchema,
    access: 'read',
    initialStep: 'Starting size calculation...',
    describe: params => ({ bucket_name: params.bucket_name, prefix: params.prefix }),
    startMessage: params => `Size calculation for "${params.bucket_name}/${params.prefix}" started`,
    run: calculateSizeStep,
  },
};

export function getTaskDefinition<K extends TaskKind>(kind: K): TaskDefinition<K> {
  return taskDefinitions[kind];
}
