/**
 * Worker loop
 *
 * A long-lived worker that:
 * 1. Claims the next task from the queue, parking while it is empty
 * 2. Runs the task through the executor
 * 3. Records the outcome on the queue
 * 4. Exits once the queue is closed and drained
 */

import { MAX_TIMER_DELAY_MS } from "../types/constants.js";
import { errorMessage } from "../types/errors.js";
import type { TaskQueue } from "./task-queue.js";
import type {
  TaskExecutor,
  TaskOutcome,
  WorkerOptions,
  WorkerResult,
} from "./types.js";

export async function runWorker(
  workerId: string,
  queue: TaskQueue,
  execute: TaskExecutor,
  options: WorkerOptions,
): Promise<WorkerResult> {
  const { sink } = options;
  const delayMs = options.interTaskDelayMs ?? 0;

  const result: WorkerResult = {
    workerId,
    tasksProcessed: 0,
    tasksSucceeded: 0,
    tasksFailed: 0,
    errors: [],
  };

  sink.debug(`[${workerId}] Started`);

  while (true) {
    const record = await queue.claimNext(workerId);
    if (!record) {
      break;
    }

    const { task } = record;
    result.tasksProcessed++;
    sink.info(`[${workerId}] Processing ${task.destination}: ${task.source}`);

    let outcome: TaskOutcome;
    try {
      outcome = await execute(task);
    } catch (error) {
      const reason = errorMessage(error);
      sink.error(`[${workerId}] Unexpected error for ${task.source}: ${reason}`);
      outcome = { status: "failure", reason, attempts: 0 };
    }

    if (outcome.status === "success") {
      queue.markComplete(task.id);
      result.tasksSucceeded++;
    } else {
      queue.markFailed(task.id, outcome.reason);
      result.tasksFailed++;
      result.errors.push(`${task.source}: ${outcome.reason}`);
    }

    if (options.onProgress) {
      try {
        options.onProgress(queue.getProgress());
      } catch (error) {
        sink.error(
          `[${workerId}] Progress callback failed: ${errorMessage(error)}`,
        );
      }
    }

    if (delayMs > 0) {
      await sleep(delayMs);
    }
  }

  sink.debug(
    `[${workerId}] Finished: ${result.tasksSucceeded} succeeded, ${result.tasksFailed} failed`,
  );

  return result;
}

/**
 * Sleep utility
 */
function sleep(ms: number): Promise<void> {
  return new Promise((resolve) =>
    setTimeout(resolve, Math.min(ms, MAX_TIMER_DELAY_MS)),
  );
}
