import { PoolClosedError } from "../types/errors.js";
import { TaskQueue } from "./task-queue.js";
import { runWorker } from "./worker.js";
import type {
  FetchTask,
  PoolState,
  QueueProgress,
  TaskExecutor,
  WorkerPoolOptions,
  WorkerPoolResult,
  WorkerResult,
} from "./types.js";

/**
 * Worker Pool Manager
 *
 * Runs a fixed number of workers over one shared FIFO queue.
 *
 * Lifecycle: created → running → draining → stopped. Submissions are
 * accepted until shutdown begins; shutdown lets the workers drain what is
 * queued, then joins them. A stopped pool is never restarted.
 */
export class WorkerPool {
  private queue: TaskQueue;
  private workerCount: number;
  private execute: TaskExecutor;
  private options: WorkerPoolOptions;
  private activeWorkers: Set<string>;
  private running: Promise<WorkerResult>[];
  private state: PoolState;

  constructor(
    workerCount: number,
    execute: TaskExecutor,
    options: WorkerPoolOptions,
  ) {
    if (!Number.isInteger(workerCount) || workerCount < 1) {
      throw new RangeError(
        `Worker count must be a positive integer, got ${workerCount}`,
      );
    }

    this.queue = new TaskQueue();
    this.workerCount = workerCount;
    this.execute = execute;
    this.options = options;
    this.activeWorkers = new Set();
    this.running = [];
    this.state = "created";
  }

  /**
   * Start all workers
   */
  start(): void {
    if (this.state !== "created") {
      throw new Error(`Cannot start a pool that is ${this.state}`);
    }
    this.state = "running";

    this.options.sink.debug(`Starting ${this.workerCount} workers...`);

    for (let i = 0; i < this.workerCount; i++) {
      this.spawnWorker(`worker-${i + 1}`);
    }
  }

  /**
   * Queue a task. Returns false, after logging, once shutdown has begun.
   */
  submit(task: FetchTask): boolean {
    if (this.state === "draining" || this.state === "stopped") {
      const error = new PoolClosedError(
        `Pool is ${this.state}, task dropped: ${task.source}`,
      );
      this.options.sink.error(`${error.name}: ${error.message}`);
      return false;
    }

    this.queue.enqueue(task);
    return true;
  }

  /**
   * Drain the queue, then wait for every worker to exit
   */
  async shutdown(): Promise<WorkerPoolResult> {
    if (this.state === "draining" || this.state === "stopped") {
      throw new PoolClosedError(`Pool is already ${this.state}`);
    }
    if (this.state === "created") {
      this.start();
    }

    this.state = "draining";
    this.options.sink.debug("Waiting for workers to drain the queue...");
    this.queue.close();

    const workers = await Promise.all(this.running);
    this.state = "stopped";

    const result: WorkerPoolResult = {
      totalWorkers: this.workerCount,
      workers,
      progress: this.queue.getProgress(),
    };

    this.options.sink.debug(
      `All ${this.workerCount} workers stopped: ${result.progress.completed} succeeded, ${result.progress.failed} failed`,
    );

    return result;
  }

  getState(): PoolState {
    return this.state;
  }

  getProgress(): QueueProgress {
    return this.queue.getProgress();
  }

  /**
   * Get number of workers still looping
   */
  getActiveWorkerCount(): number {
    return this.activeWorkers.size;
  }

  private spawnWorker(workerId: string): void {
    this.activeWorkers.add(workerId);

    const worker = runWorker(workerId, this.queue, this.execute, {
      sink: this.options.sink,
      interTaskDelayMs: this.options.interTaskDelayMs,
      onProgress: this.options.onProgress,
    });

    const onExit = () => {
      this.activeWorkers.delete(workerId);
    };
    void worker.then(onExit, onExit);

    this.running.push(worker);
  }
}
