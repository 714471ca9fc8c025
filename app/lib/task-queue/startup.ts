/**
 * Task runtime - builds the store, executor, worker and dispatcher as one unit
 */

import type { Authorizer } from '~/lib/auth/permissions';
import { loadAuthorizer } from '~/lib/auth/permissions';
import type { AppSettings } from '~/lib/config/settings';
import { getLogger } from '~/lib/log/logger';
import { StorageAccountRegistry, loadStorageAccounts } from '~/lib/storage/storage-accounts';
import type { TaskHooks } from '~/lib/tasks/step-context';
import { TaskDispatcher } from './dispatcher';
import { TaskExecutor } from './executor';
import { TaskStore } from './task-store';
import type { TaskStats } from './types';
import { TaskWorker } from './worker';
import type { WorkerStatus } from './worker';

const log = getLogger({ module: 'TaskQueueStartup' });

export interface TaskRuntimeOptions {
  tasks: AppSettings['tasks'];
  accounts: StorageAccountRegistry;
  authorizer: Authorizer;
  hooks?: TaskHooks;
  /** Clock for the task store, injectable for tests */
  now?: () => number;
}

export interface TaskRuntime {
  store: TaskStore;
  worker: TaskWorker;
  dispatcher: TaskDispatcher;
  accounts: StorageAccountRegistry;
  stats(): TaskStats & { worker: WorkerStatus };
  start(): void;
  shutdown(options?: { timeoutMs?: number; reason?: string }): Promise<void>;
}

export function createTaskRuntime(options: TaskRuntimeOptions): TaskRuntime {
  const { tasks } = options;

  const store = new TaskStore({ retentionMs: tasks.retentionMs, maxAgeMs: tasks.maxAgeMs, now: options.now });
  const executor = new TaskExecutor(store);
  const worker = new TaskWorker(store, executor, {
    maxConcurrent: tasks.maxConcurrent,
    sweepIntervalMs: tasks.sweepIntervalMs,
  });
  const dispatcher = new TaskDispatcher({
    store,
    worker,
    accounts: options.accounts,
    authorizer: options.authorizer,
    limits: {
      deleteBatchSize: tasks.deleteBatchSize,
      listPageSize: tasks.listPageSize,
      maxDeletePasses: tasks.maxDeletePasses,
    },
    hooks: options.hooks,
  });

  return {
    store,
    worker,
    dispatcher,
    accounts: options.accounts,
    stats: () => ({ ...store.stats(), worker: worker.status() }),
    start: () => {
      worker.start();
    },
    shutdown: shutdownOptions => worker.shutdown(shutdownOptions),
  };
}

/**
 * Build the runtime from settings: storage accounts and permissions are read from their files here
 */
export function initializeTaskRuntime(settings: AppSettings, hooks?: TaskHooks): TaskRuntime {
  log.info({}, 'initializing');

  const accounts = new StorageAccountRegistry(loadStorageAccounts(settings.storage));
  const authorizer = loadAuthorizer(settings.auth.permissionsFile);
  const runtime = createTaskRuntime({ tasks: settings.tasks, accounts, authorizer, hooks });

  log.info(
    { accounts: accounts.list().map(account => account.id), maxConcurrent: settings.tasks.maxConcurrent },
    'initialization complete'
  );
  return runtime;
}
