import { afterEach, describe, expect, it, vi } from "vitest";
import { ResourceError, TransportError } from "../src/types/errors.js";
import { executeFetchTask } from "../src/workers/fetch-task.js";
import { ProgressTracker } from "../src/workers/progress-tracker.js";
import type {
  FetchTask,
  FetchTaskContext,
  RetryPolicy,
} from "../src/workers/types.js";
import {
  MemoryArtifactStore,
  MemorySink,
  ScriptedHttpClient,
  type ScriptStep,
} from "./fixtures.js";

const URL_A = "https://a.test/x";

const task: FetchTask = {
  id: "task-1",
  source: URL_A,
  destination: "page1.html",
  sequenceIndex: 1,
};

function timeout(): TransportError {
  return new TransportError("timeout", "Timeout was reached after 30000 ms");
}

function setup(
  steps: ScriptStep[],
  options: { total?: number; retry?: Partial<RetryPolicy> } = {},
) {
  const sink = new MemorySink();
  const store = new MemoryArtifactStore();
  const client = new ScriptedHttpClient({ [URL_A]: steps });
  const tracker = new ProgressTracker(options.total ?? 1);
  const context: FetchTaskContext = {
    client,
    store,
    sink,
    tracker,
    retry: { maxRetries: 3, backoffBaseMs: 0, ...options.retry },
    limits: {
      timeoutMs: 30000,
      minThroughputBytesPerSec: 100,
      stallWindowMs: 10000,
    },
  };
  return { sink, store, client, tracker, context };
}

describe("executeFetchTask", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("writes the body and counts one success", async () => {
    const { sink, store, tracker, context } = setup([{ body: "<html>a</html>" }], {
      total: 2,
    });

    const outcome = await executeFetchTask(task, context);

    expect(outcome).toEqual({ status: "success", bytesWritten: 14, attempts: 1 });
    expect(store.text("page1.html")).toBe("<html>a</html>");
    expect(store.openHandles).toBe(0);
    expect(tracker.completed).toBe(1);
    expect(sink.entries).toEqual([
      { level: "info", message: `Downloaded 1/2 (50.00%): ${URL_A}` },
    ]);
  });

  it("passes the fetch limits to the client", async () => {
    const { client, context } = setup([{ body: "ok" }]);

    await executeFetchTask(task, context);

    expect(client.calls).toEqual([
      {
        url: URL_A,
        timeoutMs: 30000,
        minThroughputBytesPerSec: 100,
        stallWindowMs: 10000,
      },
    ]);
  });

  it("logs one retry notice per failed attempt before a success", async () => {
    const { sink, client, tracker, context } = setup([
      { error: timeout() },
      { error: timeout() },
      { body: "ok" },
    ]);

    const outcome = await executeFetchTask(task, context);

    expect(outcome).toEqual({ status: "success", bytesWritten: 2, attempts: 3 });
    expect(client.callsFor(URL_A)).toBe(3);
    expect(tracker.completed).toBe(1);
    expect(sink.entries).toEqual([
      {
        level: "info",
        message: `Retrying ${URL_A} (1/3): Timeout was reached after 30000 ms`,
      },
      {
        level: "info",
        message: `Retrying ${URL_A} (2/3): Timeout was reached after 30000 ms`,
      },
      { level: "info", message: `Downloaded 1/1 (100.00%): ${URL_A}` },
    ]);
  });

  it("gives up after the last attempt without touching the tracker", async () => {
    const { sink, client, tracker, context } = setup([
      {
        error: new TransportError("http", "HTTP 500 Internal Server Error", 500),
      },
    ]);

    const outcome = await executeFetchTask(task, context);

    expect(outcome).toEqual({
      status: "failure",
      reason: "HTTP 500 Internal Server Error",
      attempts: 3,
    });
    expect(client.callsFor(URL_A)).toBe(3);
    expect(tracker.completed).toBe(0);
    expect(sink.matching("Retrying")).toHaveLength(2);
    expect(sink.messages("error")).toEqual([
      `Download failed for ${URL_A}: HTTP 500 Internal Server Error`,
    ]);
  });

  it("starts every attempt from an empty artifact", async () => {
    const { store, context } = setup([
      {
        body: "<html>partial",
        error: new TransportError("stall", "Transfer stalled"),
      },
      { body: "<html>full</html>" },
    ]);

    await executeFetchTask(task, context);

    expect(store.opened).toEqual(["page1.html", "page1.html"]);
    expect(store.text("page1.html")).toBe("<html>full</html>");
    expect(store.openHandles).toBe(0);
  });

  it("fails at once when the artifact cannot be opened", async () => {
    const { sink, store, client, tracker, context } = setup([{ body: "ok" }]);
    store.failOpen.add("page1.html");

    const outcome = await executeFetchTask(task, context);

    expect(outcome).toEqual({
      status: "failure",
      reason: "Error opening file: page1.html",
      attempts: 1,
    });
    expect(client.calls).toHaveLength(0);
    expect(tracker.completed).toBe(0);
    expect(sink.entries).toEqual([
      {
        level: "error",
        message: `Download failed for ${URL_A}: Error opening file: page1.html`,
      },
    ]);
  });

  it("does not retry a failed write", async () => {
    const { sink, client, store, context } = setup([
      { error: new ResourceError("Error writing file page1.html: ENOSPC") },
    ]);

    const outcome = await executeFetchTask(task, context);

    expect(outcome.status).toBe("failure");
    expect(outcome.attempts).toBe(1);
    expect(client.calls).toHaveLength(1);
    expect(store.openHandles).toBe(0);
    expect(sink.matching("Retrying")).toEqual([]);
  });

  it("makes at least one attempt", async () => {
    const { sink, client, context } = setup([{ error: timeout() }], {
      retry: { maxRetries: 0 },
    });

    const outcome = await executeFetchTask(task, context);

    expect(outcome).toEqual({
      status: "failure",
      reason: "Timeout was reached after 30000 ms",
      attempts: 1,
    });
    expect(client.calls).toHaveLength(1);
    expect(sink.matching("Retrying")).toEqual([]);
  });

  it("backs off linearly between attempts", async () => {
    vi.useFakeTimers();
    const { client, context } = setup(
      [{ error: timeout() }, { error: timeout() }, { body: "ok" }],
      { retry: { backoffBaseMs: 1000 } },
    );

    const pending = executeFetchTask(task, context);

    await vi.advanceTimersByTimeAsync(999);
    expect(client.calls).toHaveLength(1);

    await vi.advanceTimersByTimeAsync(1);
    expect(client.calls).toHaveLength(2);

    await vi.advanceTimersByTimeAsync(1999);
    expect(client.calls).toHaveLength(2);

    await vi.advanceTimersByTimeAsync(1);
    expect(client.calls).toHaveLength(3);

    await expect(pending).resolves.toEqual({
      status: "success",
      bytesWritten: 2,
      attempts: 3,
    });
  });
});
