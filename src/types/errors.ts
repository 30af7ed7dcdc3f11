/**
 * Error taxonomy for a batch run.
 *
 * Only InputError aborts a batch. Everything else is scoped to one task
 * (TransportError, ResourceError) or one submission (PoolClosedError).
 */

export class InputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InputError";
  }
}

export type TransportErrorKind = "connect" | "timeout" | "stall" | "http";

export class TransportError extends Error {
  kind: TransportErrorKind;
  status?: number;

  constructor(kind: TransportErrorKind, message: string, status?: number) {
    super(message);
    this.name = "TransportError";
    this.kind = kind;
    this.status = status;
  }
}

export class ResourceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ResourceError";
  }
}

export class PoolClosedError extends Error {
  constructor(message?: string) {
    super(message ?? "Worker pool is closed to new tasks");
    this.name = "PoolClosedError";
  }
}

/**
 * A rejected input line. Recorded, never thrown.
 */
export interface ValidationSkip {
  lineNumber: number;
  line: string;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  return String(error);
}
