import { withArtifact } from "../storage/artifact-store.js";
import { MAX_TIMER_DELAY_MS } from "../types/constants.js";
import { TransportError, errorMessage } from "../types/errors.js";
import type { FetchTask, FetchTaskContext, TaskOutcome } from "./types.js";

/**
 * Run one fetch task to a terminal outcome.
 *
 * Each attempt reopens (and so truncates) the destination artifact and
 * closes it again whatever happens. Transport failures are retried with a
 * linear backoff until `maxRetries` attempts have been made; resource
 * failures end the task at once. Only a success touches the tracker.
 *
 * Never throws: every failure is folded into the returned outcome.
 */
export async function executeFetchTask(
  task: FetchTask,
  context: FetchTaskContext,
): Promise<TaskOutcome> {
  const { client, store, sink, tracker, retry, limits } = context;
  const maxRetries = Math.max(1, retry.maxRetries);
  let lastError = "";

  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      const bytesWritten = await withArtifact(
        store,
        task.destination,
        (writer) =>
          client.fetch(
            {
              url: task.source,
              timeoutMs: limits.timeoutMs,
              minThroughputBytesPerSec: limits.minThroughputBytesPerSec,
              stallWindowMs: limits.stallWindowMs,
            },
            writer,
          ),
      );

      const completed = tracker.recordSuccess();
      sink.info(
        `Downloaded ${completed}/${tracker.total} (${tracker.percentage().toFixed(2)}%): ${task.source}`,
      );
      return { status: "success", bytesWritten, attempts: attempt };
    } catch (error) {
      lastError = errorMessage(error);

      if (!(error instanceof TransportError)) {
        sink.error(`Download failed for ${task.source}: ${lastError}`);
        return { status: "failure", reason: lastError, attempts: attempt };
      }

      if (attempt < maxRetries) {
        sink.info(
          `Retrying ${task.source} (${attempt}/${maxRetries}): ${lastError}`,
        );
        await sleep(retry.backoffBaseMs * attempt);
      }
    }
  }

  sink.error(`Download failed for ${task.source}: ${lastError}`);
  return { status: "failure", reason: lastError, attempts: maxRetries };
}

/**
 * Sleep utility
 */
function sleep(ms: number): Promise<void> {
  if (ms <= 0) {
    return Promise.resolve();
  }
  return new Promise((resolve) =>
    setTimeout(resolve, Math.min(ms, MAX_TIMER_DELAY_MS)),
  );
}
