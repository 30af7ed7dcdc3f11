/**
 * Type definitions for the bounded fetch pool
 */

import type { HttpClient } from "../http/http-client.js";
import type { ArtifactStore } from "../storage/artifact-store.js";
import type { LogSink } from "../utils/logger.js";
import type { ProgressTracker } from "./progress-tracker.js";

/**
 * A single fetch task in the queue. Frozen once enqueued.
 */
export interface FetchTask {
  readonly id: string;
  readonly source: string;
  readonly destination: string;
  /** 1-based position among accepted URLs */
  readonly sequenceIndex: number;
}

export type TaskOutcome =
  | { status: "success"; bytesWritten: number; attempts: number }
  | { status: "failure"; reason: string; attempts: number };

export type TaskExecutor = (task: FetchTask) => Promise<TaskOutcome>;

/**
 * Task status codes
 * 0 = Pending (queued)
 * 1 = In Progress (worker claimed it)
 * 2 = Completed (fetch succeeded)
 * 3 = Failed (retries exhausted or resource error)
 */
export type TaskStatus = 0 | 1 | 2 | 3;

/**
 * Task as tracked by the queue
 */
export interface FetchTaskRecord {
  task: FetchTask;
  status: TaskStatus;
  workerId: string | null;
  enqueuedAt: number;
  startedAt: number | null;
  completedAt: number | null;
  error: string | null;
}

/**
 * Progress statistics for the queue. The four buckets always sum to total.
 */
export interface QueueProgress {
  total: number;
  pending: number;
  inProgress: number;
  completed: number;
  failed: number;
}

export type PoolState = "created" | "running" | "draining" | "stopped";

export interface RetryPolicy {
  maxRetries: number;
  backoffBaseMs: number;
}

export interface FetchLimits {
  timeoutMs: number;
  minThroughputBytesPerSec: number;
  stallWindowMs: number;
}

/**
 * Collaborators a fetch task runs against
 */
export interface FetchTaskContext {
  client: HttpClient;
  store: ArtifactStore;
  sink: LogSink;
  tracker: ProgressTracker;
  retry: RetryPolicy;
  limits: FetchLimits;
}

/**
 * Options for the Coordinator
 */
export interface CoordinatorOptions {
  sink: LogSink;
  /** Overrides the computed pool size, still clamped to the ceiling */
  workers?: number;
  client?: HttpClient;
  store?: ArtifactStore;
  extension?: string;
  retry?: Partial<RetryPolicy>;
  limits?: Partial<FetchLimits>;
  interTaskDelayMs?: number;
  availableParallelism?: number;
  onProgress?: (progress: QueueProgress) => void;
}

/**
 * Result from the Coordinator run
 */
export interface CoordinatorResult {
  totalTasks: number;
  completedTasks: number;
  failedTasks: number;
  duration: number;
  workersUsed: number;
}

/**
 * Options for the WorkerPool
 */
export interface WorkerPoolOptions {
  sink: LogSink;
  interTaskDelayMs?: number;
  onProgress?: (progress: QueueProgress) => void;
}

/**
 * Result from the WorkerPool
 */
export interface WorkerPoolResult {
  totalWorkers: number;
  workers: WorkerResult[];
  progress: QueueProgress;
}

/**
 * Options for individual workers
 */
export interface WorkerOptions {
  sink: LogSink;
  interTaskDelayMs?: number;
  onProgress?: (progress: QueueProgress) => void;
}

/**
 * Result from a worker run
 */
export interface WorkerResult {
  workerId: string;
  tasksProcessed: number;
  tasksSucceeded: number;
  tasksFailed: number;
  errors: string[];
}
