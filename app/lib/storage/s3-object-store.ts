import {
  DeleteBucketCommand,
  DeleteObjectCommand,
  DeleteObjectsCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  S3Client,
  S3ServiceException,
} from '@aws-sdk/client-s3';
import { StoreError, getErrorMessage } from '~/lib/errors';
import type { ErrorDetails, StoreErrorReason } from '~/lib/errors';
import { getLogger } from '~/lib/log/logger';
import { MAX_DELETE_BATCH } from './object-store';
import type { BatchDeleteError, BatchDeleteResult, ListObjectsOptions, ObjectPage, ObjectStore } from './object-store';

const log = getLogger({ module: 'S3ObjectStore' });

const NOT_FOUND_CODES = new Set(['NoSuchBucket', 'NoSuchKey', 'NotFound']);
const ACCESS_DENIED_CODES = new Set(['AccessDenied', 'Forbidden', 'InvalidAccessKeyId', 'SignatureDoesNotMatch']);
const CONFLICT_CODES = new Set(['BucketNotEmpty', 'OperationAborted']);

function classify(error: unknown): StoreErrorReason {
  if (!(error instanceof S3ServiceException)) {
    return 'unavailable';
  }

  const status = error.$metadata?.httpStatusCode;
  if (NOT_FOUND_CODES.has(error.name) || status === 404) return 'not-found';
  if (ACCESS_DENIED_CODES.has(error.name) || status === 403) return 'access-denied';
  if (CONFLICT_CODES.has(error.name) || status === 409) return 'conflict';
  return 'unavailable';
}

/**
 * Map an S3 SDK failure onto the store error taxonomy.
 * The message always names the operation that failed.
 */
export function toStoreError(error: unknown, operation: string, details: ErrorDetails = {}): StoreError {
  if (error instanceof StoreError) {
    return error;
  }

  const reason = classify(error);
  const cause = getErrorMessage(error);
  const target = typeof details.key === 'string'
    ? `${String(details.bucket)}/${details.key}`
    : String(details.bucket ?? '');

  const summary: Record<StoreErrorReason, string> = {
    'not-found': `${operation} failed: ${target} not found`,
    'access-denied': `${operation} failed: access denied to ${target}`,
    conflict: `${operation} failed: ${target} is in a conflicting state`,
    unavailable: `${operation} failed: storage backend unavailable`,
  };

  return new StoreError(reason, operation, `${summary[reason]} (${cause})`, {
    ...details,
    ...(error instanceof S3ServiceException ? { providerCode: error.name } : {}),
  });
}

/**
 * ObjectStore backed by an S3-compatible endpoint
 */
export class S3ObjectStore implements ObjectStore {
  constructor(private readonly client: S3Client) {}

  async listObjects(bucket: string, options: ListObjectsOptions = {}): Promise<ObjectPage> {
    try {
      const response = await this.client.send(
        new ListObjectsV2Command({
          Bucket: bucket,
          Prefix: options.prefix || undefined,
          ContinuationToken: options.continuationToken ?? undefined,
          MaxKeys: options.maxKeys,
        })
      );

      const objects = (response.Contents ?? []).flatMap(item =>
        item.Key !== undefined ? [{ key: item.Key, size: item.Size ?? 0 }] : []
      );

      return {
        objects,
        nextContinuationToken: response.IsTruncated ? response.NextContinuationToken ?? null : null,
      };
    } catch (error) {
      throw toStoreError(error, 'ListObjects', { bucket, prefix: options.prefix ?? '' });
    }
  }

  async deleteObject(bucket: string, key: string): Promise<void> {
    try {
      await this.client.send(new DeleteObjectCommand({ Bucket: bucket, Key: key }));
    } catch (error) {
      throw toStoreError(error, 'DeleteObject', { bucket, key });
    }
  }

  async deleteObjects(bucket: string, keys: string[]): Promise<BatchDeleteResult> {
    if (keys.length === 0) {
      return { deleted: [], errors: [] };
    }
    if (keys.length > MAX_DELETE_BATCH) {
      throw new RangeError(`DeleteObjects accepts at most ${MAX_DELETE_BATCH} keys, got ${keys.length}`);
    }

    try {
      const response = await this.client.send(
        new DeleteObjectsCommand({
          Bucket: bucket,
          Delete: {
            Objects: keys.map(key => ({ Key: key })),
            Quiet: false,
          },
        })
      );

      const errors: BatchDeleteError[] = [];
      for (const entry of response.Errors ?? []) {
        // Without a key the failed object cannot be told apart from the deleted ones
        if (entry.Key === undefined) {
          throw new StoreError(
            'unavailable',
            'DeleteObjects',
            `DeleteObjects failed: provider reported an error without a key (${entry.Code ?? 'Unknown'})`,
            { bucket, count: keys.length, providerCode: entry.Code ?? 'Unknown' }
          );
        }
        errors.push({
          key: entry.Key,
          code: entry.Code ?? 'Unknown',
          message: entry.Message ?? 'Delete failed',
        });
      }

      // Some S3-compatible providers omit Deleted entries; anything not reported as an error was deleted.
      const failed = new Set(errors.map(entry => entry.key));
      const deleted = keys.filter(key => !failed.has(key));

      if (errors.length > 0) {
        log.warn({ bucket, failed: errors.length, total: keys.length }, 'batch delete reported per-key errors');
      }

      return { deleted, errors };
    } catch (error) {
      throw toStoreError(error, 'DeleteObjects', { bucket, count: keys.length });
    }
  }

  async headObject(bucket: string, key: string): Promise<{ size: number }> {
    try {
      const response = await this.client.send(new HeadObjectCommand({ Bucket: bucket, Key: key }));
      return { size: response.ContentLength ?? 0 };
    } catch (error) {
      throw toStoreError(error, 'HeadObject', { bucket, key });
    }
  }

  async deleteBucket(bucket: string): Promise<void> {
    try {
      await this.client.send(new DeleteBucketCommand({ Bucket: bucket }));
    } catch (error) {
      throw toStoreError(error, 'DeleteBucket', { bucket });
    }
  }
}
