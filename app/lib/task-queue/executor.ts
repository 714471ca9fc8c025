/**
 * Executor - drives one task through pending -> running -> terminal
 */

import { AppError, TaskCancelledError, getErrorMessage } from '~/lib/errors';
import { getLogger } from '~/lib/log/logger';
import type { Logger } from '~/lib/log/logger';
import { checkpoint } from '~/lib/tasks/step-context';
import type { TaskStore } from './task-store';
import type { ProgressReporter, TaskError, TaskJob, TaskPatch, TaskStatus } from './types';

const log = getLogger({ module: 'TaskExecutor' });

export function toTaskError(error: unknown): TaskError {
  if (error instanceof AppError) {
    return error.details
      ? { message: error.message, code: error.code, details: error.details }
      : { message: error.message, code: error.code };
  }
  return { message: getErrorMessage(error), code: 'INTERNAL' };
}

export class TaskExecutor {
  constructor(private readonly store: TaskStore) {}

  /**
   * Run a job to a terminal status. Never throws: failures are recorded on the task.
   * @returns the terminal status, or null when the task was no longer tracked
   */
  async execute(job: TaskJob): Promise<TaskStatus | null> {
    const taskLog = log.child({ taskId: job.taskId, kind: job.kind });

    const claimed = this.store.update(job.taskId, {
      status: 'running',
      progress: 0,
      current_step: job.initialStep,
    });
    if (!claimed) {
      taskLog.warn({}, 'task no longer tracked, skipping');
      return null;
    }

    let lost = false;
    const reporter: ProgressReporter = {
      report: (progress, step) => {
        if (lost) return;
        if (!this.store.update(job.taskId, { progress, current_step: step })) {
          lost = true;
          taskLog.warn({ progress, step }, 'task evicted while running, stopping at next checkpoint');
        }
      },
      isCancelled: () => lost || this.store.isCancelRequested(job.taskId),
    };

    taskLog.info({}, 'task started');

    try {
      // Cancelled while still queued: stop before touching storage
      checkpoint(reporter);
      const result = await job.run(reporter);
      return this.finish(job, { status: 'completed', result, current_step: 'Completed' }, taskLog);
    } catch (error) {
      if (error instanceof TaskCancelledError) {
        return this.finish(job, { status: 'cancelled', current_step: 'Cancelled' }, taskLog);
      }

      const taskError = toTaskError(error);
      taskLog.error({ err: error, code: taskError.code }, 'task failed');
      return this.finish(job, { status: 'failed', error: taskError }, taskLog);
    }
  }

  private finish(job: TaskJob, patch: TaskPatch & { status: TaskStatus }, taskLog: Logger): TaskStatus | null {
    if (!this.store.update(job.taskId, patch)) {
      taskLog.warn({ status: patch.status }, 'task evicted before its outcome could be recorded');
      return null;
    }
    taskLog.info({ status: patch.status }, `task ${patch.status}`);
    return patch.status;
  }
}
