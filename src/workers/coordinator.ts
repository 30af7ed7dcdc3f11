import os from "os";
import { FetchHttpClient } from "../http/http-client.js";
import { DiskArtifactStore } from "../storage/artifact-store.js";
import {
  DEFAULT_ARTIFACT_EXTENSION,
  FETCH_TIMEOUT_SECONDS,
  INTER_TASK_DELAY_MS,
  MAX_RETRIES,
  MIN_POOL_SIZE,
  MIN_THROUGHPUT_BYTES_PER_SEC,
  RETRY_BACKOFF_BASE_MS,
  STALL_WINDOW_SECONDS,
  TASKS_PER_WORKER,
} from "../types/constants.js";
import { InputError } from "../types/errors.js";
import { executeFetchTask } from "./fetch-task.js";
import { ProgressTracker } from "./progress-tracker.js";
import { WorkerPool } from "./worker-pool.js";
import type {
  CoordinatorOptions,
  CoordinatorResult,
  FetchTask,
  FetchTaskContext,
} from "./types.js";

/**
 * Pool size for a batch: one worker per TASKS_PER_WORKER tasks, at least
 * MIN_POOL_SIZE, never more than twice the available parallelism.
 * An explicit override is clamped to the same ceiling.
 */
export function computePoolSize(
  taskCount: number,
  parallelism: number,
  override?: number,
): number {
  const ceiling = 2 * Math.max(1, Math.floor(parallelism));
  const wanted =
    override ??
    Math.max(MIN_POOL_SIZE, Math.floor(taskCount / TASKS_PER_WORKER));
  return Math.min(Math.max(1, Math.floor(wanted)), ceiling);
}

/**
 * Artifact name for the task at a 1-based position among accepted URLs
 */
export function artifactName(sequenceIndex: number, extension: string): string {
  return `page${sequenceIndex}.${extension}`;
}

/**
 * Coordinator (Producer)
 *
 * Runs one batch:
 * 1. Sizes the pool from the batch size and available parallelism
 * 2. Starts the workers and submits one task per URL
 * 3. Drains the pool and waits for every worker to exit
 * 4. Reports the totals
 */
export class Coordinator {
  private urls: string[];
  private outputDir: string;
  private options: CoordinatorOptions;
  private hasRun: boolean;

  constructor(urls: string[], outputDir: string, options: CoordinatorOptions) {
    this.urls = [...urls];
    this.outputDir = outputDir;
    this.options = options;
    this.hasRun = false;
  }

  /**
   * Main run method. Resolves once every task has reached a terminal outcome.
   */
  async run(): Promise<CoordinatorResult> {
    if (this.hasRun) {
      throw new Error("A coordinator runs a single batch");
    }
    this.hasRun = true;

    const { sink } = this.options;
    const total = this.urls.length;

    if (total === 0) {
      throw new InputError("No valid URLs found.");
    }

    const startTime = Date.now();
    const tracker = new ProgressTracker(total);
    const context = this.createTaskContext(tracker);

    const parallelism =
      this.options.availableParallelism ?? os.availableParallelism();
    const workersUsed = computePoolSize(
      total,
      parallelism,
      this.options.workers,
    );

    const pool = new WorkerPool(
      workersUsed,
      (task) => executeFetchTask(task, context),
      {
        sink,
        interTaskDelayMs: this.options.interTaskDelayMs ?? INTER_TASK_DELAY_MS,
        onProgress: this.options.onProgress,
      },
    );

    sink.info(`Fetching ${total} URLs with ${workersUsed} workers`);
    pool.start();

    for (const [index, url] of this.urls.entries()) {
      pool.submit(this.createTask(url, index + 1));
    }

    const poolResult = await pool.shutdown();

    sink.info(
      `Download complete! ${tracker.completed}/${total} pages downloaded.`,
    );

    return {
      totalTasks: total,
      completedTasks: tracker.completed,
      failedTasks: poolResult.progress.failed,
      duration: Date.now() - startTime,
      workersUsed,
    };
  }

  private createTask(url: string, sequenceIndex: number): FetchTask {
    const extension = this.options.extension ?? DEFAULT_ARTIFACT_EXTENSION;
    return {
      id: `task-${sequenceIndex}`,
      source: url,
      destination: artifactName(sequenceIndex, extension),
      sequenceIndex,
    };
  }

  private createTaskContext(tracker: ProgressTracker): FetchTaskContext {
    const { retry, limits } = this.options;
    return {
      client: this.options.client ?? new FetchHttpClient(),
      store: this.options.store ?? new DiskArtifactStore(this.outputDir),
      sink: this.options.sink,
      tracker,
      retry: {
        maxRetries: retry?.maxRetries ?? MAX_RETRIES,
        backoffBaseMs: retry?.backoffBaseMs ?? RETRY_BACKOFF_BASE_MS,
      },
      limits: {
        timeoutMs: limits?.timeoutMs ?? FETCH_TIMEOUT_SECONDS * 1000,
        minThroughputBytesPerSec:
          limits?.minThroughputBytesPerSec ?? MIN_THROUGHPUT_BYTES_PER_SEC,
        stallWindowMs: limits?.stallWindowMs ?? STALL_WINDOW_SECONDS * 1000,
      },
    };
  }
}
