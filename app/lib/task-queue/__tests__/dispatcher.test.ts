import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { AuthorizationError, NotFoundError, ValidationError } from '~/lib/errors';
import { numberedObjects } from '~/lib/storage/__tests__/memory-object-store';
import { admin, alice, bob, createRuntimeFixture, mallory } from './runtime-fixture';
import type { RuntimeFixture } from './runtime-fixture';

describe('TaskDispatcher', () => {
  let fixture: RuntimeFixture;

  beforeEach(() => {
    fixture = createRuntimeFixture();
    fixture.runtime.start();
  });

  afterEach(async () => {
    await fixture.runtime.shutdown({ timeoutMs: 100, reason: 'test' });
  });

  describe('start', () => {
    it('returns a pending task without doing any work inline', async () => {
      const { runtime, objects } = fixture;
      objects.createBucket('photos', numberedObjects(3));

      const started = await runtime.dispatcher.start('bucket-delete', { bucket_name: 'photos' }, alice);

      expect(started).toEqual({
        taskId: expect.any(String),
        status: 'pending',
        message: 'Deletion of bucket "photos" started',
      });
      expect(runtime.store.get(started.taskId)).toMatchObject({
        kind: 'bucket-delete',
        status: 'pending',
        owner_id: 'alice',
        metadata: { storage_account: 'default', bucket_name: 'photos' },
      });
      expect(objects.calls).toHaveLength(0);
    });

    it('deletes a 250-object bucket end to end with non-decreasing progress', async () => {
      const { runtime, objects } = fixture;
      objects.createBucket('photos', numberedObjects(250));
      const observed: number[] = [];
      let taskId = '';
      objects.afterDeleteBatch = () => {
        observed.push(runtime.dispatcher.getProgress(taskId, alice).progress);
      };

      taskId = (await runtime.dispatcher.start('bucket-delete', { bucket_name: 'photos' }, alice)).taskId;
      await runtime.worker.drain();

      const task = runtime.dispatcher.getProgress(taskId, alice);
      observed.push(task.progress);

      expect(task).toMatchObject({
        status: 'completed',
        progress: 100,
        result: { bucket: 'photos', deleted_count: 250 },
        error: null,
      });
      expect(observed).toEqual([10, 40, 70, 100]);
      expect(objects.hasBucket('photos')).toBe(false);
    });

    it('records the bulk-delete object count in metadata', async () => {
      const { runtime, objects } = fixture;
      objects.createBucket('photos', { 'a.txt': 1, 'b.txt': 1 });

      const { taskId } = await runtime.dispatcher.start(
        'bulk-delete',
        { bucket_name: 'photos', keys: ['a.txt', 'b.txt'] },
        alice
      );

      expect(runtime.store.get(taskId)?.metadata).toEqual({
        storage_account: 'default',
        bucket_name: 'photos',
        object_count: 2,
      });
    });

    it('rejects invalid parameters without creating a task', async () => {
      const { runtime } = fixture;

      await expect(runtime.dispatcher.start('calculate-size', {}, alice)).rejects.toThrow(
        'bucket_name: bucket_name is required'
      );
      await expect(runtime.dispatcher.start('bulk-delete', { bucket_name: 'photos' }, alice)).rejects.toBeInstanceOf(
        ValidationError
      );
      await expect(
        runtime.dispatcher.start('prefix-delete', { bucket_name: 'photos', prefix: '/abs' }, alice)
      ).rejects.toThrow('prefix: prefix must not start with "/"');
      expect(runtime.store.size).toBe(0);
    });

    it('rejects unknown storage accounts', async () => {
      const { runtime } = fixture;

      await expect(
        runtime.dispatcher.start('calculate-size', { bucket_name: 'photos', storage_account: 'nope' }, alice)
      ).rejects.toMatchObject({ code: 'VALIDATION_ERROR', message: 'Unknown storage account "nope"' });
      expect(runtime.store.size).toBe(0);
    });

    it('runs against the requested storage account', async () => {
      const { runtime, archive } = fixture;
      archive.createBucket('cold-storage', { 'x.bin': 4096 });

      const { taskId } = await runtime.dispatcher.start(
        'calculate-size',
        { bucket_name: 'cold-storage', storage_account: 'archive' },
        alice
      );
      await runtime.worker.drain();

      expect(runtime.store.get(taskId)).toMatchObject({
        status: 'completed',
        metadata: { storage_account: 'archive' },
        result: { size_bytes: 4096, size_formatted: '4.0 KiB' },
      });
    });

    it('checks bucket access before creating a task', async () => {
      const { runtime } = fixture;

      await expect(
        runtime.dispatcher.start('bucket-delete', { bucket_name: 'photos' }, bob)
      ).rejects.toBeInstanceOf(AuthorizationError);
      await expect(
        runtime.dispatcher.start('calculate-size', { bucket_name: 'photos' }, mallory)
      ).rejects.toThrow('You do not have read access to bucket "photos"');
      await expect(
        runtime.dispatcher.start('bulk-delete', { bucket_name: 'cold-storage', storage_account: 'archive', keys: ['x'] }, alice)
      ).rejects.toBeInstanceOf(AuthorizationError);
      expect(runtime.store.size).toBe(0);

      await expect(runtime.dispatcher.start('calculate-size', { bucket_name: 'photos' }, bob)).resolves.toMatchObject({
        status: 'pending',
      });
    });
  });

  describe('task outcomes', () => {
    it('completes a bulk delete with partial failures', async () => {
      const { runtime, objects } = fixture;
      objects.createBucket('photos', { 'a.txt': 1, 'b.txt': 1, 'c.txt': 1 });
      objects.failKey('c.txt');

      const { taskId } = await runtime.dispatcher.start(
        'bulk-delete',
        { bucket_name: 'photos', keys: ['a.txt', 'b.txt', 'c.txt'] },
        alice
      );
      await runtime.worker.drain();

      const task = runtime.dispatcher.getProgress(taskId, alice);
      expect(task.status).toBe('completed');
      expect(task.error).toBeNull();
      expect(task.result).toMatchObject({ deleted_count: 2, failed_keys: ['c.txt'] });
    });

    it('fails a task whose bucket does not exist', async () => {
      const { runtime } = fixture;

      const { taskId } = await runtime.dispatcher.start('bucket-delete', { bucket_name: 'missing-bucket' }, alice);
      await runtime.worker.drain();

      expect(runtime.dispatcher.getProgress(taskId, alice)).toMatchObject({
        status: 'failed',
        result: null,
        error: {
          code: 'NOT_FOUND',
          message: 'ListObjects failed: missing-bucket not found',
          details: { operation: 'ListObjects', bucket: 'missing-bucket' },
        },
      });
    });

    it('reports an empty size calculation as 0 B', async () => {
      const { runtime, objects } = fixture;
      objects.createBucket('photos');

      const { taskId } = await runtime.dispatcher.start('calculate-size', { bucket_name: 'photos', prefix: 'none/' }, alice);
      await runtime.worker.drain();

      expect(runtime.dispatcher.getProgress(taskId, alice)).toMatchObject({
        status: 'completed',
        progress: 100,
        result: { size_bytes: 0, size_formatted: '0 B', object_count: 0 },
      });
    });

    it('passes the storage account and bucket to the bucket-deleted hook', async () => {
      const onBucketDeleted = vi.fn(async () => {});
      await fixture.runtime.shutdown({ timeoutMs: 10 });
      fixture = createRuntimeFixture({ hooks: { onBucketDeleted } });
      fixture.runtime.start();
      fixture.objects.createBucket('photos');

      await fixture.runtime.dispatcher.start('bucket-delete', { bucket_name: 'photos' }, alice);
      await fixture.runtime.worker.drain();

      expect(onBucketDeleted).toHaveBeenCalledWith({ storageAccount: 'default', bucket: 'photos' });
    });
  });

  describe('getProgress', () => {
    it('throws NotFoundError for unknown ids', () => {
      expect(() => fixture.runtime.dispatcher.getProgress('no-such-task', alice)).toThrow(NotFoundError);
    });

    it('hides other users\' tasks from non-admins', async () => {
      const { runtime, objects } = fixture;
      objects.createBucket('photos');
      const { taskId } = await runtime.dispatcher.start('calculate-size', { bucket_name: 'photos' }, alice);

      expect(() => runtime.dispatcher.getProgress(taskId, bob)).toThrow(AuthorizationError);
      expect(runtime.dispatcher.getProgress(taskId, admin).id).toBe(taskId);
    });
  });

  describe('cancel', () => {
    it('cancels a pending task before it touches storage', async () => {
      const { runtime, objects } = fixture;
      objects.createBucket('photos', numberedObjects(10));
      runtime.worker.pause();

      const { taskId } = await runtime.dispatcher.start('bucket-delete', { bucket_name: 'photos' }, alice);
      expect(runtime.dispatcher.cancel(taskId, alice)).toEqual({ cancelled: true, status: 'pending' });

      runtime.worker.resume();
      await runtime.worker.drain();

      expect(runtime.store.get(taskId)).toMatchObject({ status: 'cancelled', result: null, error: null });
      expect(objects.calls).toHaveLength(0);
    });

    it('stops a running prefix delete at the next batch, keeping earlier deletions', async () => {
      const { runtime, objects } = fixture;
      objects.createBucket('logs-bucket', numberedObjects(250, 'logs/'));
      let taskId = '';
      objects.afterDeleteBatch = () => {
        runtime.dispatcher.cancel(taskId, alice);
      };

      taskId = (await runtime.dispatcher.start('prefix-delete', { bucket_name: 'logs-bucket', prefix: 'logs/' }, alice))
        .taskId;
      await runtime.worker.drain();

      expect(runtime.store.get(taskId)).toMatchObject({
        status: 'cancelled',
        progress: 44,
        cancel_requested: true,
        result: null,
        error: null,
      });
      const remaining = objects.keys('logs-bucket');
      expect(remaining).toHaveLength(150);
      expect(remaining[0]).toBe('logs/file-100');
    });

    it('is a no-op on finished tasks', async () => {
      const { runtime, objects } = fixture;
      objects.createBucket('photos');
      const { taskId } = await runtime.dispatcher.start('calculate-size', { bucket_name: 'photos' }, alice);
      await runtime.worker.drain();

      expect(runtime.dispatcher.cancel(taskId, alice)).toEqual({ cancelled: false, status: 'completed' });
      expect(runtime.dispatcher.cancel(taskId, alice)).toEqual({ cancelled: false, status: 'completed' });
      expect(runtime.store.get(taskId)).toMatchObject({ status: 'completed', cancel_requested: false });
    });

    it('throws NotFoundError for unknown ids', () => {
      expect(() => fixture.runtime.dispatcher.cancel('no-such-task', alice)).toThrow(NotFoundError);
    });

    it('refuses to cancel another user\'s task', async () => {
      const { runtime, objects } = fixture;
      objects.createBucket('photos');
      runtime.worker.pause();
      const { taskId } = await runtime.dispatcher.start('calculate-size', { bucket_name: 'photos' }, alice);

      expect(() => runtime.dispatcher.cancel(taskId, bob)).toThrow(AuthorizationError);
      expect(runtime.dispatcher.cancel(taskId, admin)).toEqual({ cancelled: true, status: 'pending' });
    });
  });

  describe('listActive', () => {
    it('lists the caller\'s pending and running tasks', async () => {
      const { runtime, objects } = fixture;
      objects.createBucket('photos');
      runtime.worker.pause();

      await runtime.dispatcher.start('calculate-size', { bucket_name: 'photos' }, alice);
      await runtime.dispatcher.start('calculate-size', { bucket_name: 'photos', prefix: 'a/' }, alice);
      await runtime.dispatcher.start('calculate-size', { bucket_name: 'photos' }, bob);

      expect(runtime.dispatcher.listActive(alice)).toHaveLength(2);
      expect(runtime.dispatcher.listActive(bob)).toHaveLength(1);
      expect(runtime.dispatcher.listActive(admin)).toHaveLength(3);

      runtime.worker.resume();
      await runtime.worker.drain();
      expect(runtime.dispatcher.listActive(admin)).toHaveLength(0);
    });
  });
});
