/**
 * Worker - bounded pool running queued task jobs
 */

import { getLogger } from '~/lib/log/logger';
import type { TaskExecutor } from './executor';
import type { TaskStore } from './task-store';
import type { TaskJob } from './types';

export interface WorkerConfig {
  /** Maximum tasks running at once (default: 4) */
  maxConcurrent?: number;

  /** Interval between task store sweeps (default: 15000ms) */
  sweepIntervalMs?: number;
}

export interface WorkerStatus {
  running: boolean;
  paused: boolean;
  active: number;
  queued: number;
  maxConcurrent: number;
}

export class TaskWorker {
  private config: Required<WorkerConfig>;
  private running = false;
  private paused = false;
  private stopping = false;
  private pumpScheduled = false;
  private sweepTimer: NodeJS.Timeout | null = null;
  private queue: TaskJob[] = [];
  private activeTasks = new Set<Promise<unknown>>();
  private logger = getLogger({ module: 'TaskQueueWorker' });

  constructor(
    private readonly store: TaskStore,
    private readonly executor: TaskExecutor,
    config: WorkerConfig = {}
  ) {
    this.config = {
      maxConcurrent: config.maxConcurrent ?? 4,
      sweepIntervalMs: config.sweepIntervalMs ?? 15_000,
    };
  }

  /**
   * Queue a job. Work never starts inside the caller's turn; it is picked up on the next macrotask.
   */
  enqueue(job: TaskJob): void {
    this.queue.push(job);
    this.logger.debug({ taskId: job.taskId, kind: job.kind, queued: this.queue.length }, 'task queued');
    this.schedulePump();
  }

  /**
   * Start the worker
   */
  start(): void {
    if (this.running) {
      this.logger.debug({}, 'worker already running');
      return;
    }

    this.running = true;
    this.paused = false;
    this.stopping = false;
    this.logger.info({ maxConcurrent: this.config.maxConcurrent }, 'worker started');

    this.scheduleSweep();
    this.schedulePump();
  }

  /**
   * Stop the worker. Running tasks finish; queued tasks stay pending.
   */
  stop(): void {
    if (!this.running) {
      this.logger.debug({}, 'worker not running');
      return;
    }

    this.running = false;
    this.paused = false;

    if (this.sweepTimer) {
      clearTimeout(this.sweepTimer);
      this.sweepTimer = null;
    }

    this.logger.info({}, 'worker stopped');
  }

  /**
   * Gracefully stop the worker, waiting for active tasks (with timeout)
   */
  async shutdown(options?: { timeoutMs?: number; reason?: string }): Promise<void> {
    if (this.stopping) {
      return;
    }

    this.stopping = true;
    this.logger.info({ reason: options?.reason, queued: this.queue.length }, 'worker shutting down');
    this.stop();

    const timeoutMs = options?.timeoutMs ?? 10_000;
    if (this.activeTasks.size === 0) {
      this.logger.info({}, 'worker shutdown complete (no active tasks)');
      this.stopping = false;
      return;
    }

    await this.waitForActiveTasks(timeoutMs);

    if (this.activeTasks.size === 0) {
      this.logger.info({}, 'worker shutdown complete');
    } else {
      this.logger.warn({ pending: this.activeTasks.size }, 'worker shutdown timed out while waiting for tasks');
    }
    this.stopping = false;
  }

  /**
   * Pause the worker (running tasks continue, queued tasks wait)
   */
  pause(): void {
    if (!this.running) {
      this.logger.debug({}, 'worker not running, cannot pause');
      return;
    }

    this.paused = true;
    this.logger.info({}, 'worker paused');
  }

  /**
   * Resume the worker
   */
  resume(): void {
    if (!this.running) {
      this.logger.debug({}, 'worker not running, cannot resume');
      return;
    }

    if (!this.paused) {
      this.logger.debug({}, 'worker not paused');
      return;
    }

    this.paused = false;
    this.logger.info({}, 'worker resumed');
    this.schedulePump();
  }

  isRunning(): boolean {
    return this.running;
  }

  isPaused(): boolean {
    return this.paused;
  }

  status(): WorkerStatus {
    return {
      running: this.running,
      paused: this.paused,
      active: this.activeTasks.size,
      queued: this.queue.length,
      maxConcurrent: this.config.maxConcurrent,
    };
  }

  /**
   * Resolve once nothing is queued or running. Queued jobs only count while the worker can pick them up.
   */
  async drain(): Promise<void> {
    while (this.activeTasks.size > 0 || this.pumpScheduled || (this.queue.length > 0 && this.canPump())) {
      if (this.activeTasks.size > 0) {
        await Promise.allSettled(Array.from(this.activeTasks));
      } else {
        await new Promise<void>(resolve => setImmediate(resolve));
      }
    }
  }

  private canPump(): boolean {
    return this.running && !this.paused && !this.stopping;
  }

  private schedulePump(): void {
    if (this.pumpScheduled) return;

    this.pumpScheduled = true;
    setImmediate(() => {
      this.pumpScheduled = false;
      this.pump();
    });
  }

  private pump(): void {
    while (this.canPump() && this.activeTasks.size < this.config.maxConcurrent) {
      const job = this.queue.shift();
      if (!job) return;
      void this.trackExecution(this.runJob(job));
    }
  }

  private async runJob(job: TaskJob): Promise<void> {
    try {
      await this.executor.execute(job);
    } catch (error) {
      this.logger.error({ err: error, taskId: job.taskId, kind: job.kind }, 'task threw error');
    }
  }

  private scheduleSweep(): void {
    if (!this.running || this.stopping) return;

    this.sweepTimer = setTimeout(() => {
      this.sweep();
    }, this.config.sweepIntervalMs);
    this.sweepTimer.unref();
  }

  private sweep(): void {
    try {
      const evicted = this.store.sweep();
      if (evicted > 0) {
        this.logger.info({ evicted }, 'expired tasks evicted');
      }
    } catch (error) {
      this.logger.error({ err: error }, 'task sweep error');
    } finally {
      this.scheduleSweep();
    }
  }

  private trackExecution<T>(promise: Promise<T>): Promise<T> {
    this.activeTasks.add(promise);
    return promise.finally(() => {
      this.activeTasks.delete(promise);
      this.schedulePump();
    });
  }

  private async waitForActiveTasks(timeoutMs: number): Promise<void> {
    if (this.activeTasks.size === 0) {
      return;
    }

    let timer: NodeJS.Timeout | undefined;
    const active = Array.from(this.activeTasks);
    await Promise.race([
      Promise.allSettled(active).then(() => undefined),
      new Promise<void>(resolve => {
        timer = setTimeout(resolve, timeoutMs);
        timer.unref();
      }),
    ]);
    clearTimeout(timer);
  }
}
