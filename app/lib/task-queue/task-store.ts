/**
 * Task Store - in-memory task registry with bounded retention
 *
 * Every mutation goes through `update` / `requestCancel`; readers only ever
 * get copies, so a poller never observes a half-applied patch.
 */

import { generateUUIDv7 } from './uuid';
import { isTerminalStatus } from './types';
import type { Task, TaskKind, TaskMetadata, TaskPatch, TaskStats, TaskStatus } from './types';
import { getLogger } from '~/lib/log/logger';

const log = getLogger({ module: 'TaskStore' });

export interface TaskStoreOptions {
  /** How long a terminal task stays queryable (default: 60s) */
  retentionMs?: number;

  /** How long an unfinished task may go without an update before it counts as abandoned (default: 6h) */
  maxAgeMs?: number;

  /** Clock, injectable for tests */
  now?: () => number;
}

export interface CreateTaskInput {
  kind: TaskKind;
  metadata: TaskMetadata;
  owner_id: string;
}

export interface TaskFilter {
  statuses?: TaskStatus[];
  owner_id?: string;
}

const ALLOWED_TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  pending: ['running'],
  running: ['completed', 'failed', 'cancelled'],
  completed: [],
  failed: [],
  cancelled: [],
};

const MAX_ID_ATTEMPTS = 5;

export class TaskStore {
  private readonly tasks = new Map<string, Task>();
  /** Ids evicted recently, kept so they are never handed out again inside the retention window */
  private readonly retired = new Map<string, number>();
  private readonly retentionMs: number;
  private readonly maxAgeMs: number;
  private readonly now: () => number;

  constructor(options: TaskStoreOptions = {}) {
    this.retentionMs = options.retentionMs ?? 60_000;
    this.maxAgeMs = options.maxAgeMs ?? 6 * 60 * 60 * 1000;
    this.now = options.now ?? Date.now;
  }

  /**
   * Create a new task in `pending`
   */
  create(input: CreateTaskInput): Task {
    const now = this.now();
    const id = this.allocateId(now);

    const task: Task = {
      id,
      kind: input.kind,
      status: 'pending',
      progress: 0,
      current_step: null,
      metadata: { ...input.metadata },
      result: null,
      error: null,
      owner_id: input.owner_id,
      cancel_requested: false,
      created_at: now,
      updated_at: now,
      finished_at: null,
    };

    this.tasks.set(id, task);
    return structuredClone(task);
  }

  /**
   * Get task by ID. Expired entries are evicted here rather than served stale.
   */
  get(id: string): Task | null {
    const task = this.getLive(id);
    return task ? structuredClone(task) : null;
  }

  /**
   * Merge a patch into a task
   * @returns false if the task is unknown, expired or already terminal
   */
  update(id: string, patch: TaskPatch): boolean {
    const task = this.getLive(id);
    if (!task || isTerminalStatus(task.status)) {
      return false;
    }

    const nextStatus = patch.status ?? task.status;
    if (nextStatus !== task.status && !ALLOWED_TRANSITIONS[task.status].includes(nextStatus)) {
      throw new Error(`Invalid task transition ${task.status} -> ${nextStatus} for ${id}`);
    }
    if (patch.result !== undefined && nextStatus !== 'completed') {
      throw new Error(`Task ${id} can only carry a result when completed`);
    }
    if (patch.error !== undefined && nextStatus !== 'failed') {
      throw new Error(`Task ${id} can only carry an error when failed`);
    }

    const now = this.now();

    if (patch.progress !== undefined) {
      task.progress = Math.max(task.progress, clampProgress(patch.progress));
    }
    if (patch.current_step !== undefined) {
      task.current_step = patch.current_step;
    }

    task.status = nextStatus;
    if (nextStatus === 'completed') {
      task.progress = 100;
      task.result = patch.result ? structuredClone(patch.result) : null;
    }
    if (nextStatus === 'failed') {
      task.error = patch.error ? structuredClone(patch.error) : { message: 'Unknown error', code: 'INTERNAL' };
    }
    if (isTerminalStatus(nextStatus)) {
      task.finished_at = now;
    }

    task.updated_at = Math.max(task.updated_at, now);
    return true;
  }

  /**
   * Flag a task for cancellation
   * @returns true if the flag is set on a non-terminal task
   */
  requestCancel(id: string): boolean {
    const task = this.getLive(id);
    if (!task || isTerminalStatus(task.status)) {
      return false;
    }

    if (!task.cancel_requested) {
      task.cancel_requested = true;
      task.updated_at = Math.max(task.updated_at, this.now());
    }
    return true;
  }

  /**
   * Checkpoint read. A task that no longer exists counts as cancelled.
   */
  isCancelRequested(id: string): boolean {
    const task = this.getLive(id);
    return !task || task.cancel_requested;
  }

  /**
   * List live tasks, oldest first
   */
  list(filter: TaskFilter = {}): Task[] {
    this.sweep();
    const result: Task[] = [];
    for (const task of this.tasks.values()) {
      if (filter.statuses && !filter.statuses.includes(task.status)) continue;
      if (filter.owner_id !== undefined && task.owner_id !== filter.owner_id) continue;
      result.push(structuredClone(task));
    }
    return result.sort((a, b) => a.created_at - b.created_at || a.id.localeCompare(b.id));
  }

  /**
   * Get task statistics
   */
  stats(): TaskStats {
    this.sweep();
    const by_status: Record<TaskStatus, number> = {
      pending: 0,
      running: 0,
      completed: 0,
      failed: 0,
      cancelled: 0,
    };
    const by_kind: Record<TaskKind, number> = {
      'bucket-delete': 0,
      'prefix-delete': 0,
      'bulk-delete': 0,
      'calculate-size': 0,
    };

    for (const task of this.tasks.values()) {
      by_status[task.status]++;
      by_kind[task.kind]++;
    }

    return { total: this.tasks.size, by_status, by_kind };
  }

  /**
   * Evict expired tasks
   * @returns number of tasks evicted
   */
  sweep(): number {
    const now = this.now();
    let evicted = 0;

    for (const task of this.tasks.values()) {
      if (this.isExpired(task, now)) {
        this.evict(task, now);
        evicted++;
      }
    }

    for (const [id, retiredAt] of this.retired) {
      if (now - retiredAt >= this.retentionMs) {
        this.retired.delete(id);
      }
    }

    if (evicted > 0) {
      log.debug({ evicted, remaining: this.tasks.size }, 'swept expired tasks');
    }
    return evicted;
  }

  get size(): number {
    return this.tasks.size;
  }

  private getLive(id: string): Task | null {
    const task = this.tasks.get(id);
    if (!task) {
      return null;
    }

    const now = this.now();
    if (this.isExpired(task, now)) {
      this.evict(task, now);
      return null;
    }
    return task;
  }

  private isExpired(task: Task, now: number): boolean {
    if (task.finished_at !== null) {
      return now - task.finished_at >= this.retentionMs;
    }
    // Every report refreshes updated_at, so only a silent task ages out
    return now - task.updated_at >= this.maxAgeMs;
  }

  private evict(task: Task, now: number): void {
    this.tasks.delete(task.id);
    this.retired.set(task.id, now);
    if (!isTerminalStatus(task.status)) {
      log.warn({ taskId: task.id, kind: task.kind, status: task.status }, 'evicted abandoned task');
    }
  }

  private allocateId(now: number): string {
    for (let attempt = 0; attempt < MAX_ID_ATTEMPTS; attempt++) {
      const id = generateUUIDv7(now);
      if (!this.tasks.has(id) && !this.retired.has(id)) {
        return id;
      }
    }
    throw new Error('Failed to allocate a unique task id');
  }
}

function clampProgress(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(100, Math.max(0, Math.floor(value)));
}
