/**
 * Dispatcher - validates start requests, creates tasks and hands them to the worker
 */

import type { ZodIssue } from 'zod';
import type { Actor } from '~/lib/auth/actor';
import type { Authorizer } from '~/lib/auth/permissions';
import type { TaskLimits } from '~/lib/config/settings';
import { AuthorizationError, NotFoundError, ValidationError } from '~/lib/errors';
import { getLogger } from '~/lib/log/logger';
import type { StorageAccountRegistry } from '~/lib/storage/storage-accounts';
import type { TaskHooks } from '~/lib/tasks/step-context';
import { getTaskDefinition } from './handler-registry';
import type { TaskStore } from './task-store';
import { isTerminalStatus } from './types';
import type { Task, TaskJob, TaskKind, TaskStatus } from './types';
import type { TaskWorker } from './worker';

const log = getLogger({ module: 'TaskDispatcher' });

export interface DispatcherDeps {
  store: TaskStore;
  worker: TaskWorker;
  accounts: StorageAccountRegistry;
  authorizer: Authorizer;
  limits: TaskLimits;
  hooks?: TaskHooks;
}

export interface StartedTask {
  taskId: string;
  status: TaskStatus;
  message: string;
}

export interface CancelOutcome {
  /** false when the task had already reached a terminal status */
  cancelled: boolean;
  status: TaskStatus;
}

function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export class TaskDispatcher {
  constructor(private readonly deps: DispatcherDeps) {}

  /**
   * Validate, authorize and queue a task. Nothing is created when any check fails.
   */
  async start<K extends TaskKind>(kind: K, input: unknown, actor: Actor): Promise<StartedTask> {
    const definition = getTaskDefinition(kind);

    const parsed = definition.schema.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError(formatIssues(parsed.error.issues), {
        issues: parsed.error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message })),
      });
    }
    const params = parsed.data;

    const accountId = this.deps.accounts.resolveId(params.storage_account);
    const store = accountId !== null ? this.deps.accounts.getStore(accountId) : null;
    if (accountId === null || store === null) {
      throw new ValidationError(
        params.storage_account
          ? `Unknown storage account "${params.storage_account}"`
          : 'No storage account is configured',
        { storage_account: params.storage_account ?? null }
      );
    }

    await this.deps.authorizer.authorize(actor, accountId, params.bucket_name, definition.access);

    const task = this.deps.store.create({
      kind,
      metadata: { storage_account: accountId, ...definition.describe(params) },
      owner_id: actor.id,
    });

    const taskLog = log.child({ taskId: task.id, kind });
    const { limits, hooks = {} } = this.deps;
    const job: TaskJob = {
      taskId: task.id,
      kind,
      initialStep: definition.initialStep,
      run: progress =>
        definition.run(params, { storageAccount: accountId, store, progress, limits, hooks, log: taskLog }),
    };

    this.deps.worker.enqueue(job);
    taskLog.info({ userId: actor.id, bucket: params.bucket_name, storageAccount: accountId }, 'task accepted');

    return { taskId: task.id, status: task.status, message: definition.startMessage(params) };
  }

  /**
   * Current snapshot of a task the actor may see
   */
  getProgress(taskId: string, actor: Actor): Task {
    const task = this.deps.store.get(taskId);
    if (!task) {
      throw new NotFoundError('Task not found', { task_id: taskId });
    }
    if (!actor.isAdmin && task.owner_id !== actor.id) {
      throw new AuthorizationError('You do not have access to this task', { task_id: taskId });
    }
    return task;
  }

  /**
   * Request cancellation. Cancelling a finished task is a no-op.
   */
  cancel(taskId: string, actor: Actor): CancelOutcome {
    const task = this.getProgress(taskId, actor);
    if (isTerminalStatus(task.status)) {
      return { cancelled: false, status: task.status };
    }

    if (!this.deps.store.requestCancel(taskId)) {
      // Finished (or expired) between the lookup and the request
      const current = this.deps.store.get(taskId);
      return { cancelled: false, status: current?.status ?? task.status };
    }

    log.info({ taskId, kind: task.kind, userId: actor.id, status: task.status }, 'task cancellation requested');
    return { cancelled: true, status: task.status };
  }

  /**
   * Pending and running tasks, only the actor's own unless admin
   */
  listActive(actor: Actor): Task[] {
    return this.deps.store.list({
      statuses: ['pending', 'running'],
      owner_id: actor.isAdmin ? undefined : actor.id,
    });
  }
}
