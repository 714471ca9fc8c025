import { ZodError } from 'zod';
import { AppError } from '~/lib/errors';
import type { ErrorDetails } from '~/lib/errors';
import type { Logger } from '~/lib/log/logger';
import type { StartedTask } from '~/lib/task-queue/dispatcher';
import type { Task } from '~/lib/task-queue/types';

export interface ErrorBody {
  error: string;
  code: string;
  details?: ErrorDetails;
}

export function errorJson(status: number, error: string, code: string, details?: ErrorDetails): Response {
  const body: ErrorBody = details ? { error, code, details } : { error, code };
  return Response.json(body, { status });
}

/**
 * Translate a thrown error into a JSON error response.
 * Only unexpected errors (and 5xx app errors) are logged, under `event`.
 */
export function toErrorResponse(error: unknown, log: Logger, event: string, fallbackMessage: string): Response {
  if (error instanceof AppError) {
    if (error.status >= 500) {
      log.error({ err: error, code: error.code }, event);
    }
    return errorJson(error.status, error.message, error.code, error.details);
  }

  if (error instanceof ZodError) {
    return errorJson(400, 'Invalid request', 'VALIDATION_ERROR', {
      issues: error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message })),
    });
  }

  log.error({ err: error }, event);
  return errorJson(500, fallbackMessage, 'INTERNAL');
}

export function acceptedJson(started: StartedTask): Response {
  return Response.json(
    { task_id: started.taskId, status: started.status, message: started.message },
    { status: 202 }
  );
}

/**
 * Wire shape of a task for pollers
 */
export function serializeTask(task: Task) {
  return {
    task_id: task.id,
    kind: task.kind,
    status: task.status,
    progress: task.progress,
    current_step: task.current_step,
    result: task.result,
    error: task.error,
    metadata: task.metadata,
    cancel_requested: task.cancel_requested,
    created_at: new Date(task.created_at).toISOString(),
    updated_at: new Date(task.updated_at).toISOString(),
  };
}

export type SerializedTask = ReturnType<typeof serializeTask>;
