import { mkdir, open, type FileHandle } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";
import { ResourceError, errorMessage } from "../types/errors.js";

/**
 * Sequential writer for one destination artifact.
 */
export interface ArtifactWriter {
  /** Append a chunk. */
  write(chunk: Uint8Array): Promise<void>;

  /** Bytes written since the artifact was opened. */
  readonly bytesWritten: number;

  /** Release the underlying handle. Safe to call more than once. */
  close(): Promise<void>;
}

/**
 * Opens destination artifacts. Every open truncates, so each fetch attempt
 * starts from an empty artifact.
 */
export interface ArtifactStore {
  open(destination: string): Promise<ArtifactWriter>;
}

class FileArtifactWriter implements ArtifactWriter {
  private handle: FileHandle | null;
  private filePath: string;
  bytesWritten = 0;

  constructor(handle: FileHandle, filePath: string) {
    this.handle = handle;
    this.filePath = filePath;
  }

  async write(chunk: Uint8Array): Promise<void> {
    if (!this.handle) {
      throw new ResourceError(`Artifact already closed: ${this.filePath}`);
    }
    try {
      await this.handle.write(chunk);
    } catch (error) {
      throw new ResourceError(
        `Error writing file ${this.filePath}: ${errorMessage(error)}`,
      );
    }
    this.bytesWritten += chunk.byteLength;
  }

  async close(): Promise<void> {
    const handle = this.handle;
    if (!handle) {
      return;
    }
    this.handle = null;
    await handle.close();
  }
}

/**
 * Local filesystem artifact store rooted at the output directory.
 */
export class DiskArtifactStore implements ArtifactStore {
  private basePath: string;

  constructor(basePath: string) {
    this.basePath = resolve(basePath);
  }

  resolve(destination: string): string {
    return join(this.basePath, destination);
  }

  async open(destination: string): Promise<ArtifactWriter> {
    const fullPath = this.resolve(destination);
    try {
      await mkdir(dirname(fullPath), { recursive: true });
      const handle = await open(fullPath, "w");
      return new FileArtifactWriter(handle, fullPath);
    } catch (error) {
      throw new ResourceError(
        `Error opening file: ${fullPath} (${errorMessage(error)})`,
      );
    }
  }
}

/**
 * Run `use` with an open artifact and close it on every exit path.
 * When `use` fails, its error is the one that surfaces, even if closing
 * fails as well.
 */
export async function withArtifact<T>(
  store: ArtifactStore,
  destination: string,
  use: (writer: ArtifactWriter) => Promise<T>,
): Promise<T> {
  const writer = await store.open(destination);

  let result: T;
  try {
    result = await use(writer);
  } catch (error) {
    await writer.close().catch(() => undefined);
    throw error;
  }

  await writer.close();
  return result;
}
