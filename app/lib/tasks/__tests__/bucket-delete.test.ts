import { describe, expect, it, vi } from 'vitest';
import { StoreError } from '~/lib/errors';
import { MemoryObjectStore, numberedObjects } from '~/lib/storage/__tests__/memory-object-store';
import { deleteBucketStep } from '../bucket-delete';
import { createStepContext, isNonDecreasing } from './step-helpers';

describe('deleteBucketStep', () => {
  it('deletes every object across listing pages, then the bucket', async () => {
    const store = new MemoryObjectStore(100).createBucket('photos', numberedObjects(250));
    const { ctx, reporter } = createStepContext(store);

    const result = await deleteBucketStep({ bucket_name: 'photos' }, ctx);

    expect(result).toEqual({ bucket: 'photos', deleted_count: 250 });
    expect(store.hasBucket('photos')).toBe(false);
    expect(store.callsOf('listObjects')).toHaveLength(3);
    expect(store.callsOf('deleteObjects').map(call => call.keys?.length)).toEqual([100, 100, 50]);
    expect(reporter.progressValues).toEqual([1, 2, 3, 10, 40, 70, 85, 85, 95]);
    expect(reporter.lastStep).toBe('Cleaning up...');
  });

  it('reports progress that never goes backwards', async () => {
    const store = new MemoryObjectStore(7).createBucket('photos', numberedObjects(90));
    const { ctx, reporter } = createStepContext(store, { limits: { deleteBatchSize: 13 } });

    await deleteBucketStep({ bucket_name: 'photos' }, ctx);

    expect(isNonDecreasing(reporter.progressValues)).toBe(true);
  });

  it('removes an empty bucket without batch deletes', async () => {
    const store = new MemoryObjectStore().createBucket('empty-bucket');
    const { ctx, reporter } = createStepContext(store);

    await expect(deleteBucketStep({ bucket_name: 'empty-bucket' }, ctx)).resolves.toEqual({
      bucket: 'empty-bucket',
      deleted_count: 0,
    });
    expect(store.callsOf('deleteObjects')).toHaveLength(0);
    expect(reporter.updates.find(update => update.progress === 10)?.step).toBe('Bucket is empty');
  });

  it('runs another pass when an object appears before the bucket is removed', async () => {
    const store = new MemoryObjectStore(100).createBucket('photos', numberedObjects(250));
    let raced = false;
    store.beforeDeleteBucket = bucket => {
      if (!raced) {
        raced = true;
        store.putObject(bucket, 'late-upload.jpg', 2048);
      }
    };
    const { ctx } = createStepContext(store);

    const result = await deleteBucketStep({ bucket_name: 'photos' }, ctx);

    expect(result.deleted_count).toBe(251);
    expect(store.callsOf('deleteBucket')).toHaveLength(2);
    expect(store.hasBucket('photos')).toBe(false);
  });

  it('fails with BUCKET_NOT_EMPTY once the passes are used up', async () => {
    const store = new MemoryObjectStore().createBucket('busy-bucket', numberedObjects(3));
    let uploads = 0;
    store.beforeDeleteBucket = bucket => {
      uploads++;
      store.putObject(bucket, `incoming-${uploads}.log`);
    };
    const { ctx } = createStepContext(store);

    await expect(deleteBucketStep({ bucket_name: 'busy-bucket' }, ctx)).rejects.toMatchObject({
      code: 'BUCKET_NOT_EMPTY',
      status: 409,
      message: 'Bucket "busy-bucket" still contains objects after 3 delete passes',
      details: { bucket: 'busy-bucket', passes: 3, deleted_count: 5 },
    });
    expect(store.callsOf('deleteBucket')).toHaveLength(3);
    expect(store.keys('busy-bucket')).toEqual(['incoming-3.log']);
  });

  it('retries keys a batch failed to delete on the next pass', async () => {
    const store = new MemoryObjectStore().createBucket('photos', numberedObjects(4));
    store.failKey('file-002', 'InternalError', 'We encountered an internal error');
    const { ctx } = createStepContext(store, { limits: { maxDeletePasses: 2 } });

    await expect(deleteBucketStep({ bucket_name: 'photos' }, ctx)).rejects.toMatchObject({
      code: 'BUCKET_NOT_EMPTY',
      details: { failed_keys: ['file-002'] },
    });
    expect(store.callsOf('deleteObjects').map(call => call.keys)).toEqual([
      ['file-000', 'file-001', 'file-002', 'file-003'],
      ['file-002'],
    ]);
  });

  it('fails with NOT_FOUND when the bucket does not exist', async () => {
    const store = new MemoryObjectStore();
    const { ctx } = createStepContext(store);

    const failure = deleteBucketStep({ bucket_name: 'missing-bucket' }, ctx);
    await expect(failure).rejects.toBeInstanceOf(StoreError);
    await expect(failure).rejects.toMatchObject({ reason: 'not-found', code: 'NOT_FOUND' });
  });

  it('runs the bucket-deleted hook after the bucket is gone', async () => {
    const store = new MemoryObjectStore().createBucket('photos', numberedObjects(2));
    const onBucketDeleted = vi.fn(async () => {
      expect(store.hasBucket('photos')).toBe(false);
    });
    const { ctx } = createStepContext(store, { hooks: { onBucketDeleted } });

    await deleteBucketStep({ bucket_name: 'photos' }, ctx);

    expect(onBucketDeleted).toHaveBeenCalledWith({ storageAccount: 'default', bucket: 'photos' });
  });

  it('reports a cleanup failure after the bucket was removed', async () => {
    const store = new MemoryObjectStore().createBucket('photos');
    const onBucketDeleted = vi.fn(async () => {
      throw new Error('share links table locked');
    });
    const { ctx } = createStepContext(store, { hooks: { onBucketDeleted } });

    await expect(deleteBucketStep({ bucket_name: 'photos' }, ctx)).rejects.toMatchObject({
      code: 'INTERNAL',
      message: 'Bucket "photos" was deleted but cleanup failed: share links table locked',
    });
    expect(store.hasBucket('photos')).toBe(false);
  });

  it('stops before removing the bucket when cancelled after the last batch', async () => {
    const store = new MemoryObjectStore().createBucket('photos', numberedObjects(3));
    const { ctx, reporter } = createStepContext(store);
    store.afterDeleteBatch = () => {
      reporter.cancelled = true;
    };

    await expect(deleteBucketStep({ bucket_name: 'photos' }, ctx)).rejects.toThrow('Task cancelled');
    expect(store.hasBucket('photos')).toBe(true);
    expect(store.keys('photos')).toEqual([]);
    expect(store.callsOf('deleteBucket')).toHaveLength(0);
  });
});
