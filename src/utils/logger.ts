import fs from "fs";
import path from "path";
import chalk from "chalk";
import { LogLevel } from "../types/enums.js";
import { ResourceError, errorMessage } from "../types/errors.js";

/**
 * Append-only status log shared by the coordinator, the pool and every worker.
 *
 * Each call emits exactly one line per destination with a single write, so
 * lines from concurrent workers never interleave.
 */
export interface LogSink {
  debug(message: string): void;
  info(message: string): void;
  error(message: string): void;
  close(): Promise<void>;
}

export interface LogSinkOptions {
  /** Persistent log destination. Console only when omitted. */
  logFile?: string;
  verbose?: boolean;
}

export function formatLogLine(level: LogLevel, message: string): string {
  return level === LogLevel.Error ? `ERROR: ${message}` : message;
}

class ConsoleFileSink implements LogSink {
  private stream: fs.WriteStream | null;
  private verbose: boolean;

  constructor(stream: fs.WriteStream | null, verbose: boolean) {
    this.stream = stream;
    this.verbose = verbose;

    // A failed log write is reported once; the console keeps going
    let reported = false;
    stream?.on("error", (error) => {
      if (this.stream === stream) {
        this.stream = null;
      }
      if (reported) {
        return;
      }
      reported = true;
      console.error(
        chalk.red(
          formatLogLine(
            LogLevel.Error,
            `Log file write failed, continuing on the console only: ${errorMessage(error)}`,
          ),
        ),
      );
    });
  }

  debug(message: string): void {
    if (!this.verbose) {
      return;
    }
    this.write(LogLevel.Debug, message);
  }

  info(message: string): void {
    this.write(LogLevel.Info, message);
  }

  error(message: string): void {
    this.write(LogLevel.Error, message);
  }

  async close(): Promise<void> {
    const stream = this.stream;
    if (!stream) {
      return;
    }
    this.stream = null;

    if (stream.destroyed) {
      return;
    }
    await new Promise<void>((resolve) => {
      // Write failures are reported by the constructor's handler
      stream.once("error", () => resolve());
      stream.end(() => resolve());
    });
  }

  private write(level: LogLevel, message: string): void {
    const line = formatLogLine(level, message);

    switch (level) {
      case LogLevel.Error:
        console.error(chalk.red(line));
        break;
      case LogLevel.Debug:
        console.log(chalk.gray(line));
        break;
      default:
        console.log(line);
    }

    this.stream?.write(`${line}\n`);
  }
}

/**
 * Open the log sink for one batch run. The log file is opened eagerly so
 * an unwritable destination fails before anything is dispatched.
 */
export function createLogSink(options: LogSinkOptions = {}): LogSink {
  let stream: fs.WriteStream | null = null;

  if (options.logFile) {
    try {
      fs.mkdirSync(path.dirname(path.resolve(options.logFile)), {
        recursive: true,
      });
      const fd = fs.openSync(options.logFile, "a");
      stream = fs.createWriteStream(options.logFile, { fd });
    } catch (error) {
      throw new ResourceError(
        `Error opening log file ${options.logFile}: ${errorMessage(error)}`,
      );
    }
  }

  return new ConsoleFileSink(stream, options.verbose ?? false);
}
