import type {
  ReadableStreamDefaultReader,
  ReadableStreamReadResult,
} from "node:stream/web";
import type { ArtifactWriter } from "../storage/artifact-store.js";
import { MAX_TIMER_DELAY_MS } from "../types/constants.js";
import {
  ResourceError,
  TransportError,
  errorMessage,
} from "../types/errors.js";

export interface FetchRequest {
  url: string;
  /** Overall limit for one transfer, connect included */
  timeoutMs: number;
  /** Transfer floor; zero disables stall detection */
  minThroughputBytesPerSec: number;
  /** How long the rate may stay below the floor before the transfer aborts */
  stallWindowMs: number;
}

/**
 * Fetch capability consumed by the task executor.
 * Resolves with the number of bytes written.
 */
export interface HttpClient {
  fetch(request: FetchRequest, writer: ArtifactWriter): Promise<number>;
}

export type FetchImpl = (input: string, init: RequestInit) => Promise<Response>;

export interface FetchHttpClientOptions {
  fetchImpl?: FetchImpl;
  userAgent?: string;
}

type AbortReason = "timeout" | "stall";

/**
 * Timers and abort state for one transfer. `release()` must run on every
 * exit path.
 */
class TransferGuard {
  readonly controller = new AbortController();
  private reason: AbortReason | null = null;
  private reader: ReadableStreamDefaultReader<Uint8Array> | null = null;
  private timeoutTimer: ReturnType<typeof setTimeout> | null = null;
  private stallTimer: ReturnType<typeof setInterval> | null = null;
  private windowBytes = 0;
  private lastSampleAt = Date.now();
  private slowSince: number | null = null;

  get abortReason(): AbortReason | null {
    return this.reason;
  }

  armTimeout(timeoutMs: number): void {
    this.timeoutTimer = setTimeout(
      () => this.abort("timeout"),
      Math.min(timeoutMs, MAX_TIMER_DELAY_MS),
    );
  }

  attach(reader: ReadableStreamDefaultReader<Uint8Array>): void {
    this.reader = reader;
  }

  /**
   * Sample the transfer rate and abort once it has stayed below the floor
   * for the whole window.
   */
  armStallDetection(minBytesPerSec: number, windowMs: number): void {
    if (minBytesPerSec <= 0 || windowMs <= 0) {
      return;
    }

    this.lastSampleAt = Date.now();
    const sampleMs = Math.min(1000, windowMs);

    this.stallTimer = setInterval(() => {
      const now = Date.now();
      const elapsedSeconds = (now - this.lastSampleAt) / 1000;
      const rate = elapsedSeconds > 0 ? this.windowBytes / elapsedSeconds : 0;

      if (rate < minBytesPerSec) {
        this.slowSince ??= this.lastSampleAt;
        if (now - this.slowSince >= windowMs) {
          this.abort("stall");
        }
      } else {
        this.slowSince = null;
      }

      this.windowBytes = 0;
      this.lastSampleAt = now;
    }, sampleMs);
  }

  record(bytes: number): void {
    this.windowBytes += bytes;
  }

  abort(reason: AbortReason): void {
    if (this.reason) {
      return;
    }
    this.reason = reason;
    this.controller.abort();
    this.cancelReader();
  }

  release(): void {
    if (this.timeoutTimer) {
      clearTimeout(this.timeoutTimer);
      this.timeoutTimer = null;
    }
    if (this.stallTimer) {
      clearInterval(this.stallTimer);
      this.stallTimer = null;
    }
  }

  cancelReader(): void {
    // A pending read settles as done once the reader is cancelled
    this.reader?.cancel().catch(() => undefined);
  }
}

/**
 * HTTP client on the global fetch. Follows redirects, fails on non-2xx
 * statuses and streams the body into the artifact writer.
 */
export class FetchHttpClient implements HttpClient {
  private fetchImpl: FetchImpl;
  private userAgent: string;

  constructor(options: FetchHttpClientOptions = {}) {
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.userAgent = options.userAgent ?? "pagepull/1.0";
  }

  async fetch(request: FetchRequest, writer: ArtifactWriter): Promise<number> {
    const guard = new TransferGuard();
    let finished = false;

    try {
      guard.armTimeout(request.timeoutMs);

      let response: Response;
      try {
        response = await this.fetchImpl(request.url, {
          signal: guard.controller.signal,
          redirect: "follow",
          headers: { "user-agent": this.userAgent },
        });
      } catch (error) {
        throw this.toTransportError(error, guard.abortReason, request);
      }

      if (!response.ok) {
        await response.body?.cancel().catch(() => undefined);
        const statusText = response.statusText ? ` ${response.statusText}` : "";
        throw new TransportError(
          "http",
          `HTTP ${response.status}${statusText}`,
          response.status,
        );
      }

      if (!response.body) {
        finished = true;
        return 0;
      }

      const reader = response.body.getReader();
      guard.attach(reader);
      guard.armStallDetection(
        request.minThroughputBytesPerSec,
        request.stallWindowMs,
      );

      let total = 0;
      while (true) {
        let result: ReadableStreamReadResult<Uint8Array>;
        try {
          result = await reader.read();
        } catch (error) {
          throw this.toTransportError(error, guard.abortReason, request);
        }

        const reason = guard.abortReason;
        if (reason) {
          throw this.toTransportError(null, reason, request);
        }
        if (result.done) {
          break;
        }

        guard.record(result.value.byteLength);
        await writer.write(result.value);
        total += result.value.byteLength;
      }

      finished = true;
      return total;
    } finally {
      guard.release();
      if (!finished) {
        guard.cancelReader();
      }
    }
  }

  private toTransportError(
    error: unknown,
    reason: AbortReason | null,
    request: FetchRequest,
  ): Error {
    if (reason === "timeout") {
      return new TransportError(
        "timeout",
        `Timeout was reached after ${request.timeoutMs} ms`,
      );
    }
    if (reason === "stall") {
      return new TransportError(
        "stall",
        `Transfer stalled below ${request.minThroughputBytesPerSec} bytes/sec for ${request.stallWindowMs} ms`,
      );
    }
    if (error instanceof TransportError || error instanceof ResourceError) {
      return error;
    }

    const cause =
      error instanceof Error && error.cause !== undefined
        ? ` (${errorMessage(error.cause)})`
        : "";
    return new TransportError("connect", `${errorMessage(error)}${cause}`);
  }
}
