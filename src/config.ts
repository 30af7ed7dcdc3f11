/**
 * Run configuration: command-line options over environment defaults,
 * validated with zod.
 */
import { z } from "zod";
import {
  DEFAULT_ARTIFACT_EXTENSION,
  DEFAULT_LOG_FILE,
  DEFAULT_OUTPUT_DIR,
  DEFAULT_URL_FILE,
  FETCH_TIMEOUT_SECONDS,
  INTER_TASK_DELAY_MS,
  MAX_RETRIES,
  MAX_TIMER_DELAY_MS,
  MIN_THROUGHPUT_BYTES_PER_SEC,
  RETRY_BACKOFF_BASE_MS,
  STALL_WINDOW_SECONDS,
} from "./types/constants.js";
import type { FetchLimits, RetryPolicy } from "./workers/types.js";

// ---------------------------------------------------------------------------
// Config schema
// ---------------------------------------------------------------------------

const MAX_TIMEOUT_SECONDS = Math.floor(MAX_TIMER_DELAY_MS / 1000);
// The last backoff waits backoff * (MAX_RETRIES - 1)
const MAX_BACKOFF_MS = Math.floor(
  MAX_TIMER_DELAY_MS / Math.max(1, MAX_RETRIES - 1),
);

export const RunConfigSchema = z.object({
  file: z.string().trim().min(1, "URL list path is required"),
  directory: z.string().trim().min(1, "Output directory is required"),
  logFile: z.string().trim().min(1, "Log file path is required"),
  workers: z.coerce.number().int().min(1).optional(),
  ext: z
    .string()
    .regex(/^[A-Za-z0-9]+$/, "Extension must be alphanumeric"),
  timeout: z.coerce
    .number()
    .positive()
    .max(
      MAX_TIMEOUT_SECONDS,
      `Timeout must be at most ${MAX_TIMEOUT_SECONDS} seconds`,
    ),
  minSpeed: z.coerce.number().int().min(0),
  stallTime: z.coerce.number().min(0),
  backoff: z.coerce
    .number()
    .int()
    .min(0)
    .max(MAX_BACKOFF_MS, `Backoff must be at most ${MAX_BACKOFF_MS} ms`),
  delay: z.coerce
    .number()
    .int()
    .min(0)
    .max(MAX_TIMER_DELAY_MS, `Delay must be at most ${MAX_TIMER_DELAY_MS} ms`),
  progress: z.boolean(),
  verbose: z.boolean(),
});

export type RunConfig = z.infer<typeof RunConfigSchema>;

/**
 * Options as they arrive from commander or the interactive prompts
 */
export type RawRunOptions = {
  file?: string;
  directory?: string;
  logFile?: string;
  workers?: string | number;
  ext?: string;
  timeout?: string | number;
  minSpeed?: string | number;
  stallTime?: string | number;
  backoff?: string | number;
  delay?: string | number;
  progress?: boolean;
  verbose?: boolean;
};

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

export function loadRunConfig(
  options: RawRunOptions,
  env: NodeJS.ProcessEnv = process.env,
): RunConfig {
  return RunConfigSchema.parse({
    file: options.file ?? env.PAGEPULL_URL_FILE ?? DEFAULT_URL_FILE,
    directory:
      options.directory ?? env.PAGEPULL_OUTPUT_DIR ?? DEFAULT_OUTPUT_DIR,
    logFile: options.logFile ?? env.PAGEPULL_LOG_FILE ?? DEFAULT_LOG_FILE,
    workers: options.workers,
    ext: options.ext ?? DEFAULT_ARTIFACT_EXTENSION,
    timeout: options.timeout ?? FETCH_TIMEOUT_SECONDS,
    minSpeed: options.minSpeed ?? MIN_THROUGHPUT_BYTES_PER_SEC,
    stallTime: options.stallTime ?? STALL_WINDOW_SECONDS,
    backoff: options.backoff ?? RETRY_BACKOFF_BASE_MS,
    delay: options.delay ?? INTER_TASK_DELAY_MS,
    progress: options.progress ?? true,
    verbose: options.verbose ?? false,
  });
}

export function formatConfigError(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const field = issue.path.join(".");
      return field ? `${field}: ${issue.message}` : issue.message;
    })
    .join("; ");
}

export function toRetryPolicy(config: RunConfig): RetryPolicy {
  return { maxRetries: MAX_RETRIES, backoffBaseMs: config.backoff };
}

export function toFetchLimits(config: RunConfig): FetchLimits {
  return {
    timeoutMs: config.timeout * 1000,
    minThroughputBytesPerSec: config.minSpeed,
    stallWindowMs: config.stallTime * 1000,
  };
}
