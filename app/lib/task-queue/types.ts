/**
 * Task Queue Type Definitions
 */

/**
 * Task kinds, closed set. Each one maps to exactly one step function in the handler registry.
 */
export const TASK_KINDS = ['bucket-delete', 'prefix-delete', 'bulk-delete', 'calculate-size'] as const;

export type TaskKind = (typeof TASK_KINDS)[number];

/**
 * Task status values
 */
export type TaskStatus = 'pending' | 'running' | 'completed' | 'failed' | 'cancelled';

export type TerminalTaskStatus = Extract<TaskStatus, 'completed' | 'failed' | 'cancelled'>;

export function isTerminalStatus(status: TaskStatus): status is TerminalTaskStatus {
  return status === 'completed' || status === 'failed' || status === 'cancelled';
}

/**
 * Parameters captured at creation, read-only afterwards
 */
export interface TaskMetadata {
  storage_account: string;
  bucket_name: string;
  prefix?: string;
  object_count?: number;
}

export interface BucketDeleteResult {
  bucket: string;
  deleted_count: number;
}

export interface PrefixDeleteResult {
  bucket: string;
  prefix: string;
  deleted_count: number;
}

export interface KeyFailure {
  key: string;
  code: string;
  message: string;
}

export interface BulkDeleteResult {
  bucket: string;
  requested_count: number;
  folders: number;
  files: number;
  deleted_count: number;
  failed_keys: string[];
  failures: KeyFailure[];
}

export interface CalculateSizeResult {
  bucket: string;
  prefix: string;
  size_bytes: number;
  size_formatted: string;
  object_count: number;
}

export interface TaskResultMap {
  'bucket-delete': BucketDeleteResult;
  'prefix-delete': PrefixDeleteResult;
  'bulk-delete': BulkDeleteResult;
  'calculate-size': CalculateSizeResult;
}

export type TaskResult = TaskResultMap[TaskKind];

export interface TaskError {
  message: string;
  code: string;
  details?: Record<string, unknown>;
}

/**
 * Task record held by the task store
 */
export interface Task {
  id: string;
  kind: TaskKind;
  status: TaskStatus;
  progress: number;
  current_step: string | null;
  metadata: TaskMetadata;
  result: TaskResult | null;
  error: TaskError | null;
  owner_id: string;
  cancel_requested: boolean;
  created_at: number;
  updated_at: number;
  finished_at: number | null;
}

/**
 * Fields the executor may change. Status transitions are validated by the store.
 */
export interface TaskPatch {
  status?: TaskStatus;
  progress?: number;
  current_step?: string | null;
  result?: TaskResult;
  error?: TaskError;
}

/**
 * Progress capability handed to every step function.
 * It knows nothing about who consumes the updates (HTTP poller, test, log sink).
 */
export interface ProgressReporter {
  report(progress: number, step: string): void;
  isCancelled(): boolean;
}

/**
 * Unit of work queued on the worker pool, bound to its step function at dispatch time
 */
export interface TaskJob {
  taskId: string;
  kind: TaskKind;
  initialStep: string;
  run: (progress: ProgressReporter) => Promise<TaskResult>;
}

/**
 * Task statistics
 */
export interface TaskStats {
  total: number;
  by_status: Record<TaskStatus, number>;
  by_kind: Record<TaskKind, number>;
}
