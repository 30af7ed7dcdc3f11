import { PoolClosedError } from "../types/errors.js";
import type {
  FetchTask,
  FetchTaskRecord,
  QueueProgress,
  TaskStatus,
} from "./types.js";

type Waiter = {
  workerId: string;
  resolve: (record: FetchTaskRecord | null) => void;
};

/**
 * Task Queue Manager
 *
 * Unbounded in-memory FIFO shared by every worker of a pool. Workers claim
 * tasks in submission order; a worker that finds the queue empty parks on
 * the queue's wait condition until a task arrives or the queue is closed.
 *
 * Every task is in exactly one bucket at a time: pending, in progress
 * (owned by one worker) or terminal (completed / failed).
 */
export class TaskQueue {
  private pending: FetchTask[];
  private head: number;
  private records: Map<string, FetchTaskRecord>;
  private waiters: Waiter[];
  private closed: boolean;

  constructor() {
    this.pending = [];
    this.head = 0;
    this.records = new Map();
    this.waiters = [];
    this.closed = false;
  }

  /**
   * Append a task. Hands it straight to a parked worker when there is one.
   */
  enqueue(task: FetchTask): void {
    if (this.closed) {
      throw new PoolClosedError(`Queue closed, dropping ${task.source}`);
    }
    if (this.records.has(task.id)) {
      throw new Error(`Task ${task.id} is already queued`);
    }

    const record: FetchTaskRecord = {
      task: Object.freeze({ ...task }),
      status: 0,
      workerId: null,
      enqueuedAt: Date.now(),
      startedAt: null,
      completedAt: null,
      error: null,
    };
    this.records.set(task.id, record);

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(this.claim(record, waiter.workerId));
      return;
    }

    this.pending.push(record.task);
  }

  /**
   * Claim the next pending task in FIFO order.
   * Resolves null once the queue is closed and empty.
   */
  claimNext(workerId: string): Promise<FetchTaskRecord | null> {
    const task = this.dequeue();
    if (task) {
      const record = this.getRecord(task.id);
      return Promise.resolve(this.claim(record, workerId));
    }

    if (this.closed) {
      return Promise.resolve(null);
    }

    return new Promise((resolve) => {
      this.waiters.push({ workerId, resolve });
    });
  }

  /**
   * Mark a claimed task as completed
   */
  markComplete(taskId: string): void {
    this.settle(taskId, 2, null);
  }

  /**
   * Mark a claimed task as failed
   */
  markFailed(taskId: string, error: string): void {
    this.settle(taskId, 3, error);
  }

  /**
   * Stop accepting tasks and wake every parked worker.
   * Tasks already pending are still handed out.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter.resolve(null);
    }
  }

  isClosed(): boolean {
    return this.closed;
  }

  /**
   * Closed, nothing pending and nothing in flight
   */
  isComplete(): boolean {
    const progress = this.getProgress();
    return (
      this.closed && progress.pending === 0 && progress.inProgress === 0
    );
  }

  getProgress(): QueueProgress {
    const progress: QueueProgress = {
      total: this.records.size,
      pending: 0,
      inProgress: 0,
      completed: 0,
      failed: 0,
    };

    for (const record of this.records.values()) {
      switch (record.status) {
        case 0:
          progress.pending++;
          break;
        case 1:
          progress.inProgress++;
          break;
        case 2:
          progress.completed++;
          break;
        case 3:
          progress.failed++;
          break;
      }
    }

    return progress;
  }

  /**
   * Failed tasks in submission order
   */
  getFailedTasks(): FetchTaskRecord[] {
    return [...this.records.values()]
      .filter((record) => record.status === 3)
      .sort((a, b) => a.task.sequenceIndex - b.task.sequenceIndex);
  }

  private dequeue(): FetchTask | undefined {
    if (this.head >= this.pending.length) {
      return undefined;
    }

    const task = this.pending[this.head];
    this.head++;

    // Compact once the consumed prefix dominates the backing array
    if (this.head > 1024 && this.head * 2 > this.pending.length) {
      this.pending = this.pending.slice(this.head);
      this.head = 0;
    }

    return task;
  }

  private claim(record: FetchTaskRecord, workerId: string): FetchTaskRecord {
    record.status = 1;
    record.workerId = workerId;
    record.startedAt = Date.now();
    return record;
  }

  private settle(taskId: string, status: TaskStatus, error: string | null) {
    const record = this.getRecord(taskId);
    if (record.status !== 1) {
      throw new Error(
        `Task ${taskId} cannot be settled from status ${record.status}`,
      );
    }
    record.status = status;
    record.completedAt = Date.now();
    record.error = error;
  }

  private getRecord(taskId: string): FetchTaskRecord {
    const record = this.records.get(taskId);
    if (!record) {
      throw new Error(`Unknown task ${taskId}`);
    }
    return record;
  }
}
