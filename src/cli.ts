/**
 * pagepull command line
 *
 * Parses the options, runs one batch and maps the result to an exit code:
 * 0 once the batch has run (whatever the per-URL outcomes), 1 when there is
 * no usable list or configuration.
 */

// ============================================================================
// SECTION 1: IMPORTS
// ============================================================================

import { Command } from "commander";
import chalk from "chalk";
import { z } from "zod";
import {
  formatConfigError,
  loadRunConfig,
  toFetchLimits,
  toRetryPolicy,
  type RawRunOptions,
  type RunConfig,
} from "./config.js";
import type { HttpClient } from "./http/http-client.js";
import { loadUrlList } from "./input/url-list.js";
import {
  DEFAULT_OUTPUT_DIR,
  DEFAULT_URL_FILE,
  PROGRESS_TASK_NAME,
} from "./types/constants.js";
import { PromptType } from "./types/enums.js";
import { InputError, ResourceError, errorMessage } from "./types/errors.js";
import {
  cleanupAfterPromptExit,
  showConfiguration,
  showDownloadSummary,
  showHeader,
} from "./utils/helpers.js";
import { createLogSink, type LogSink } from "./utils/logger.js";
import {
  addDownloadProgressTask,
  closeProgressBars,
  markTaskDone,
  updateDownloadProgress,
} from "./utils/progress.js";
import { isExitPromptError, prompt } from "./utils/prompt.js";
import { Coordinator } from "./workers/index.js";

// ============================================================================
// SECTION 2: TYPES & STATE
// ============================================================================

type CliOptions = RawRunOptions & { interactive?: boolean };

export interface CliRunOptions {
  /** Arguments after the executable and script name */
  argv: string[];
  version: string;
  env?: NodeJS.ProcessEnv;
  /** Fetch capability override, the global fetch otherwise */
  client?: HttpClient;
  availableParallelism?: number;
}

/** Sink of the run in flight, closed by the signal handlers */
let activeSink: LogSink | null = null;

// ============================================================================
// SECTION 3: PROGRAM DEFINITION
// ============================================================================

function createProgram(version: string): Command {
  return new Command()
    .name("pagepull")
    .description("Fetch a list of URLs concurrently into page<N> files")
    .version(version)
    .option("-f, --file <path>", "URL list, one per line (default: urls.txt)")
    .option(
      "-d, --directory <path>",
      "Directory for the fetched files (default: .)",
    )
    .option(
      "-l, --log-file <path>",
      "Persistent log file (default: errors.log)",
    )
    .option(
      "-w, --workers <number>",
      "Override the pool size (capped at twice the available parallelism)",
    )
    .option("-e, --ext <ext>", "Extension for the fetched files (default: html)")
    .option("--timeout <seconds>", "Overall timeout per attempt (default: 30)")
    .option(
      "--min-speed <bytes>",
      "Minimum transfer rate in bytes/sec (default: 100)",
    )
    .option(
      "--stall-time <seconds>",
      "Seconds below the minimum rate before an attempt aborts (default: 10)",
    )
    .option("--backoff <ms>", "Backoff base between retries (default: 2000)")
    .option("--delay <ms>", "Pause between tasks per worker (default: 100)")
    .option("--no-progress", "Disable the progress bars")
    .option("-v, --verbose", "Show verbose debug output", false)
    .option(
      "-i, --interactive",
      "Interactive mode: prompt for the main options (flags provided will be pre-filled)",
      false,
    )
    .configureHelp({
      sortSubcommands: true,
      helpWidth: 80,
    })
    .addHelpText(
      "after",
      `
    Examples:
    - Default run: pagepull (reads ./urls.txt, writes ./page<N>.html)
    - Interactive mode: pagepull -i
    - Custom list and directory: pagepull -f links.txt -d ./pages
    - Fixed pool size: pagepull -f links.txt -w 8
    - Quick retries: pagepull -f links.txt --backoff 500
    - Environment defaults: PAGEPULL_URL_FILE, PAGEPULL_OUTPUT_DIR, PAGEPULL_LOG_FILE
      `,
    );
}

// ============================================================================
// SECTION 4: INTERACTIVE MODE
// ============================================================================

/**
 * Prompt for the main options, pre-filled from any flags already given.
 */
async function runInteractiveMode(
  initialOptions: CliOptions,
  env: NodeJS.ProcessEnv,
): Promise<RawRunOptions> {
  console.log(chalk.cyan("\nInteractive Mode\n"));
  console.log(
    chalk.gray("Press Enter to accept default values shown in brackets.\n"),
  );

  const file = await prompt({
    type: PromptType.Input,
    message: "URL list file:",
    default: initialOptions.file || env.PAGEPULL_URL_FILE || DEFAULT_URL_FILE,
    validate: (value) =>
      value.trim() !== "" || "URL list file is required",
    cleanup: cleanupAfterPromptExit,
  });

  const directory = await prompt({
    type: PromptType.Input,
    message: "Output directory:",
    default:
      initialOptions.directory || env.PAGEPULL_OUTPUT_DIR || DEFAULT_OUTPUT_DIR,
    validate: (value) =>
      value.trim() !== "" || "Output directory is required",
    cleanup: cleanupAfterPromptExit,
  });

  const workersInput = await prompt({
    type: PromptType.Input,
    message: "Number of workers (leave empty to size automatically):",
    default:
      initialOptions.workers !== undefined ? String(initialOptions.workers) : "",
    validate: (value) => {
      if (value.trim() === "") {
        return true;
      }
      const num = parseInt(value, 10);
      if (isNaN(num) || num < 1) {
        return "Please enter a positive number";
      }
      return true;
    },
    cleanup: cleanupAfterPromptExit,
  });

  const verbose = await prompt({
    type: PromptType.Confirm,
    message: "Enable verbose output?",
    default: initialOptions.verbose || false,
    cleanup: cleanupAfterPromptExit,
  });

  return {
    ...initialOptions,
    file,
    directory,
    workers: workersInput.trim() === "" ? undefined : workersInput.trim(),
    verbose,
  };
}

// ============================================================================
// SECTION 5: BATCH RUN
// ============================================================================

async function runBatch(
  config: RunConfig,
  sink: LogSink,
  options: CliRunOptions,
): Promise<number> {
  const { accepted, skipped } = await loadUrlList(config.file, sink);

  if (accepted.length === 0) {
    throw new InputError("No valid URLs found.");
  }

  showConfiguration(config, accepted.length, skipped.length);
  console.log(chalk.green("\nStarting download process...\n"));

  if (config.progress) {
    addDownloadProgressTask(PROGRESS_TASK_NAME, accepted.length);
  }

  const coordinator = new Coordinator(accepted, config.directory, {
    sink,
    client: options.client,
    availableParallelism: options.availableParallelism,
    workers: config.workers,
    extension: config.ext,
    retry: toRetryPolicy(config),
    limits: toFetchLimits(config),
    interTaskDelayMs: config.delay,
    onProgress: config.progress
      ? (progress) =>
          updateDownloadProgress(
            PROGRESS_TASK_NAME,
            progress.completed + progress.failed,
            progress.completed,
            progress.total,
          )
      : undefined,
  });

  const result = await coordinator.run();

  if (config.progress) {
    markTaskDone(
      PROGRESS_TASK_NAME,
      `${result.completedTasks} downloaded ✓`,
      chalk.green,
    );
  }
  closeProgressBars();
  showDownloadSummary(result);

  return 0;
}

/**
 * Run the command line once. Resolves with the process exit code.
 */
export async function runCli(options: CliRunOptions): Promise<number> {
  const env = options.env ?? process.env;
  const program = createProgram(options.version);
  program.parse(options.argv, { from: "user" });

  const cliOptions = program.opts<CliOptions>();

  showHeader(options.version);

  const rawOptions = cliOptions.interactive
    ? await runInteractiveMode(cliOptions, env)
    : cliOptions;

  let config: RunConfig;
  try {
    config = loadRunConfig(rawOptions, env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error(chalk.red(`Error: ${formatConfigError(error)}`));
      return 1;
    }
    throw error;
  }

  let sink: LogSink;
  try {
    sink = createLogSink({
      logFile: config.logFile,
      verbose: config.verbose,
    });
  } catch (error) {
    if (error instanceof ResourceError) {
      console.error(chalk.red(`Error: ${error.message}`));
      return 1;
    }
    throw error;
  }
  activeSink = sink;

  try {
    return await runBatch(config, sink, options);
  } catch (error) {
    if (error instanceof InputError) {
      sink.error(error.message);
      return 1;
    }
    throw error;
  } finally {
    closeProgressBars();
    activeSink = null;
    await sink.close();
  }
}

// ============================================================================
// SECTION 6: SIGNALS & ERROR HANDLING
// ============================================================================

let isShuttingDown = false;

async function shutdownOnSignal(message: string, code: number): Promise<void> {
  if (isShuttingDown) return;
  isShuttingDown = true;

  console.log(chalk.yellow(`\n\n⚠ ${message}`));
  console.log(chalk.gray("Cleaning up resources..."));
  closeProgressBars();

  const sink = activeSink;
  activeSink = null;
  if (sink) {
    sink.error(`${message}, in-flight downloads abandoned`);
    await sink.close();
  }

  console.log(chalk.gray("Exiting..."));
  process.exit(code);
}

/**
 * Exit with 130 on SIGINT and 143 on SIGTERM, closing the log first.
 */
export function installSignalHandlers(): void {
  process.on("SIGINT", () => {
    void shutdownOnSignal("Interrupted by user (Ctrl+C)", 130);
  });

  process.on("SIGTERM", () => {
    void shutdownOnSignal("Received SIGTERM", 143);
  });

  process.on("unhandledRejection", (reason) => {
    if (isExitPromptError(reason)) {
      void shutdownOnSignal("Prompt cancelled by user (Ctrl+C)", 130);
      return;
    }
    console.error(chalk.red(errorMessage(reason)));
    process.exit(1);
  });
}
