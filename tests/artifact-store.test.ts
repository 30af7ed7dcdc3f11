import { readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import {
  DiskArtifactStore,
  withArtifact,
} from "../src/storage/artifact-store.js";
import type {
  ArtifactStore,
  ArtifactWriter,
} from "../src/storage/artifact-store.js";
import { ResourceError, TransportError } from "../src/types/errors.js";
import { MemoryArtifactStore, makeTmpDir } from "./fixtures.js";

const encoder = new TextEncoder();

/** Store whose writers always fail to close */
class FailingCloseStore implements ArtifactStore {
  closeAttempts = 0;

  async open(): Promise<ArtifactWriter> {
    return {
      bytesWritten: 0,
      write: async () => undefined,
      close: async () => {
        this.closeAttempts++;
        throw new ResourceError("Error closing file page1.html");
      },
    };
  }
}

describe("DiskArtifactStore", () => {
  it("writes chunks under the output directory", async () => {
    const dir = makeTmpDir();
    const store = new DiskArtifactStore(join(dir, "out"));

    const writer = await store.open("page1.html");
    await writer.write(encoder.encode("<html>"));
    await writer.write(encoder.encode("</html>"));
    await writer.close();

    expect(writer.bytesWritten).toBe(13);
    expect(readFileSync(join(dir, "out", "page1.html"), "utf-8")).toBe(
      "<html></html>",
    );
  });

  it("truncates an existing artifact on open", async () => {
    const dir = makeTmpDir();
    writeFileSync(join(dir, "page1.html"), "stale content from before");
    const store = new DiskArtifactStore(dir);

    const writer = await store.open("page1.html");
    await writer.write(encoder.encode("new"));
    await writer.close();

    expect(readFileSync(join(dir, "page1.html"), "utf-8")).toBe("new");
  });

  it("wraps open failures in a resource error", async () => {
    const dir = makeTmpDir();
    writeFileSync(join(dir, "blocker"), "");
    const store = new DiskArtifactStore(join(dir, "blocker"));

    await expect(store.open("page1.html")).rejects.toThrow(ResourceError);
  });

  it("refuses writes after close", async () => {
    const store = new DiskArtifactStore(makeTmpDir());
    const writer = await store.open("page1.html");
    await writer.close();
    await writer.close();

    await expect(writer.write(encoder.encode("late"))).rejects.toThrow(
      ResourceError,
    );
  });
});

describe("withArtifact", () => {
  it("returns what the callback returns and closes the artifact", async () => {
    const store = new MemoryArtifactStore();

    const result = await withArtifact(store, "page1.html", async (writer) => {
      await writer.write(encoder.encode("body"));
      return writer.bytesWritten;
    });

    expect(result).toBe(4);
    expect(store.openHandles).toBe(0);
  });

  it("closes the artifact when the callback throws", async () => {
    const store = new MemoryArtifactStore();

    await expect(
      withArtifact(store, "page1.html", async () => {
        throw new Error("transfer failed");
      }),
    ).rejects.toThrow("transfer failed");
    expect(store.openHandles).toBe(0);
  });

  it("keeps the callback's error when closing also fails", async () => {
    const store = new FailingCloseStore();
    const failure = new TransportError("timeout", "Timeout was reached after 20 ms");

    await expect(
      withArtifact(store, "page1.html", async () => {
        throw failure;
      }),
    ).rejects.toBe(failure);
    expect(store.closeAttempts).toBe(1);
  });

  it("reports a close failure after a successful callback", async () => {
    const store = new FailingCloseStore();

    await expect(
      withArtifact(store, "page1.html", async () => "done"),
    ).rejects.toThrow("Error closing file page1.html");
  });
});
