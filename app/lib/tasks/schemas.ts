import { z } from 'zod';

const BUCKET_NAME_PATTERN = /^[a-z0-9][a-z0-9.-]{1,61}[a-z0-9]$/;

export const BucketNameSchema = z
  .string({ required_error: 'bucket_name is required' })
  .min(3, 'bucket_name must be at least 3 characters')
  .max(63, 'bucket_name must be at most 63 characters')
  .regex(BUCKET_NAME_PATTERN, 'bucket_name may only contain lowercase letters, digits, dots and hyphens');

export const StorageAccountRefSchema = z.string().min(1, 'storage_account must not be empty').optional();
