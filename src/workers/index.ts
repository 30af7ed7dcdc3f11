/**
 * Bounded Fetch Pool
 *
 * Fixed-size worker pool for fetching a batch of URLs to files.
 *
 * Usage:
 *   import { Coordinator } from "./src/workers/index.js";
 *   import { createLogSink } from "./src/utils/logger.js";
 *
 *   const sink = createLogSink({ logFile: "errors.log" });
 *   const coordinator = new Coordinator(urls, "./downloads", { sink });
 *
 *   await coordinator.run();
 *   await sink.close();
 */

// Main classes
export { Coordinator, computePoolSize, artifactName } from "./coordinator.js";
export { WorkerPool } from "./worker-pool.js";
export { TaskQueue } from "./task-queue.js";
export { ProgressTracker } from "./progress-tracker.js";

// Worker and task functions
export { runWorker } from "./worker.js";
export { executeFetchTask } from "./fetch-task.js";

// Types
export type {
  FetchTask,
  FetchTaskRecord,
  FetchTaskContext,
  TaskOutcome,
  TaskExecutor,
  TaskStatus,
  QueueProgress,
  PoolState,
  RetryPolicy,
  FetchLimits,
  CoordinatorOptions,
  CoordinatorResult,
  WorkerPoolOptions,
  WorkerPoolResult,
  WorkerOptions,
  WorkerResult,
} from "./types.js";
