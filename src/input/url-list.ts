import fs from "fs/promises";
import { InputError, errorMessage } from "../types/errors.js";
import type { ValidationSkip } from "../types/errors.js";
import type { LogSink } from "../utils/logger.js";

/** http(s)://host.tld with an optional path */
export const URL_PATTERN = /^https?:\/\/[A-Za-z0-9.-]+\.[A-Za-z]{2,}(\/\S*)?$/;

export interface UrlList {
  accepted: string[];
  skipped: ValidationSkip[];
}

export function isValidUrl(candidate: string): boolean {
  return URL_PATTERN.test(candidate);
}

/**
 * Split a line-oriented list into accepted URLs and skipped lines.
 * Lines are trimmed; blank lines are ignored, anything else that is not a
 * URL is logged and left out of the batch.
 */
export function parseUrlList(content: string, sink: LogSink): UrlList {
  const accepted: string[] = [];
  const skipped: ValidationSkip[] = [];

  content.split(/\r?\n/).forEach((raw, index) => {
    const line = raw.trim();
    if (line === "") {
      return;
    }

    if (isValidUrl(line)) {
      accepted.push(line);
      return;
    }

    skipped.push({ lineNumber: index + 1, line });
    sink.error(`Invalid URL skipped: ${line}`);
  });

  return { accepted, skipped };
}

export async function loadUrlList(
  filePath: string,
  sink: LogSink,
): Promise<UrlList> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    throw new InputError(
      `Error opening file: ${filePath} (${errorMessage(error)})`,
    );
  }

  return parseUrlList(content, sink);
}
