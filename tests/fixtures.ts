/**
 * Shared test doubles: recording sink, in-memory artifacts, scripted client.
 */
import { mkdtempSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import type { FetchRequest, HttpClient } from "../src/http/http-client.js";
import type {
  ArtifactStore,
  ArtifactWriter,
} from "../src/storage/artifact-store.js";
import { ResourceError } from "../src/types/errors.js";
import type { LogSink } from "../src/utils/logger.js";

export function makeTmpDir(): string {
  return mkdtempSync(join(tmpdir(), "pagepull-test-"));
}

// ---------------------------------------------------------------------------
// Log sink
// ---------------------------------------------------------------------------

export type LogEntry = { level: "debug" | "info" | "error"; message: string };

export class MemorySink implements LogSink {
  entries: LogEntry[] = [];
  closed = false;

  debug(message: string): void {
    this.entries.push({ level: "debug", message });
  }

  info(message: string): void {
    this.entries.push({ level: "info", message });
  }

  error(message: string): void {
    this.entries.push({ level: "error", message });
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  messages(level: LogEntry["level"]): string[] {
    return this.entries
      .filter((entry) => entry.level === level)
      .map((entry) => entry.message);
  }

  matching(prefix: string): string[] {
    return this.entries
      .map((entry) => entry.message)
      .filter((message) => message.startsWith(prefix));
  }
}

// ---------------------------------------------------------------------------
// Artifact store
// ---------------------------------------------------------------------------

const decoder = new TextDecoder();

export class MemoryArtifactStore implements ArtifactStore {
  files = new Map<string, Uint8Array[]>();
  opened: string[] = [];
  openHandles = 0;
  failOpen = new Set<string>();

  async open(destination: string): Promise<ArtifactWriter> {
    if (this.failOpen.has(destination)) {
      throw new ResourceError(`Error opening file: ${destination}`);
    }

    const chunks: Uint8Array[] = [];
    this.files.set(destination, chunks);
    this.opened.push(destination);
    this.openHandles++;

    let closed = false;
    let bytesWritten = 0;
    const store = this;

    return {
      async write(chunk: Uint8Array): Promise<void> {
        chunks.push(chunk);
        bytesWritten += chunk.byteLength;
      },
      get bytesWritten() {
        return bytesWritten;
      },
      async close(): Promise<void> {
        if (!closed) {
          closed = true;
          store.openHandles--;
        }
      },
    };
  }

  text(destination: string): string | undefined {
    const chunks = this.files.get(destination);
    if (!chunks) {
      return undefined;
    }
    return chunks.map((chunk) => decoder.decode(chunk)).join("");
  }
}

// ---------------------------------------------------------------------------
// HTTP client
// ---------------------------------------------------------------------------

/** One scripted attempt: an optional body written, then an optional error */
export type ScriptStep = { body?: string; error?: Error };

const encoder = new TextEncoder();

/**
 * Plays back a per-URL script. The last step repeats once a script runs out;
 * URLs without a script get "<url>" as body.
 */
export class ScriptedHttpClient implements HttpClient {
  calls: FetchRequest[] = [];
  private scripts: Map<string, ScriptStep[]>;
  private positions = new Map<string, number>();

  constructor(scripts: Record<string, ScriptStep[]> = {}) {
    this.scripts = new Map(Object.entries(scripts));
  }

  async fetch(request: FetchRequest, writer: ArtifactWriter): Promise<number> {
    this.calls.push(request);

    const script = this.scripts.get(request.url) ?? [{ body: request.url }];
    const position = this.positions.get(request.url) ?? 0;
    this.positions.set(request.url, position + 1);
    const step = script[Math.min(position, script.length - 1)] ?? {};

    let written = 0;
    if (step.body !== undefined) {
      const bytes = encoder.encode(step.body);
      await writer.write(bytes);
      written = bytes.byteLength;
    }
    if (step.error) {
      throw step.error;
    }
    return written;
  }

  callsFor(url: string): number {
    return this.calls.filter((call) => call.url === url).length;
  }
}
