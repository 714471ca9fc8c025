import type { Actor } from '~/lib/auth/actor';
import { PermissionTableAuthorizer } from '~/lib/auth/permissions';
import type { AppSettings } from '~/lib/config/settings';
import { MemoryObjectStore } from '~/lib/storage/__tests__/memory-object-store';
import { StorageAccountRegistry } from '~/lib/storage/storage-accounts';
import type { StorageAccountConfig } from '~/lib/storage/storage-accounts';
import type { TaskHooks } from '~/lib/tasks/step-context';
import { createTaskRuntime } from '../startup';
import type { TaskRuntime } from '../startup';

export const alice: Actor = { id: 'alice', isAdmin: false };
export const bob: Actor = { id: 'bob', isAdmin: false };
export const mallory: Actor = { id: 'mallory', isAdmin: false };
export const admin: Actor = { id: 'root', isAdmin: true };

export const TEST_TASK_SETTINGS: AppSettings['tasks'] = {
  maxConcurrent: 2,
  retentionMs: 60_000,
  maxAgeMs: 3_600_000,
  sweepIntervalMs: 60_000,
  deleteBatchSize: 100,
  listPageSize: 1000,
  maxDeletePasses: 3,
};

function account(id: string, isDefault = false): StorageAccountConfig {
  return {
    id,
    region: 'us-east-1',
    endpoint: 'http://localhost:9000',
    access_key_id: 'test-access-key',
    secret_access_key: 'test-secret',
    force_path_style: true,
    default: isDefault,
  };
}

export interface RuntimeFixture {
  runtime: TaskRuntime;
  /** Backs the default account */
  objects: MemoryObjectStore;
  /** Backs the "archive" account */
  archive: MemoryObjectStore;
}

/**
 * Runtime wired to in-memory stores. alice has read-write on the default
 * account, bob read only, mallory nothing.
 */
export function createRuntimeFixture(options: { pageSize?: number; hooks?: TaskHooks } = {}): RuntimeFixture {
  const objects = new MemoryObjectStore(options.pageSize ?? 100);
  const archive = new MemoryObjectStore(options.pageSize ?? 100);
  const accounts = new StorageAccountRegistry([account('default', true), account('archive')], config =>
    config.id === 'archive' ? archive : objects
  );
  const authorizer = new PermissionTableAuthorizer({
    users: {
      alice: { admin: false, storage: { default: 'read-write', archive: 'read' }, buckets: {} },
      bob: { admin: false, storage: { default: 'read' }, buckets: {} },
    },
  });

  const runtime = createTaskRuntime({ tasks: TEST_TASK_SETTINGS, accounts, authorizer, hooks: options.hooks });
  return { runtime, objects, archive };
}
