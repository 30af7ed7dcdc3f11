#!/usr/bin/env node
/**
 * pagepull CLI
 *
 * Reads a line-oriented list of URLs, fetches each one with a bounded pool
 * of workers and writes the responses to page<N>.<ext> files. Retries,
 * failures and progress go to the console and to a persistent log.
 *
 * @module index
 * @version 1.0.0
 * @license MIT
 */

import chalk from "chalk";
import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { installSignalHandlers, runCli } from "./src/cli.js";
import { errorMessage } from "./src/types/errors.js";
import { closeProgressBars } from "./src/utils/progress.js";

/** Application version from package.json (beside this file, or one up once built) */
function readVersion(): string {
  const here = path.dirname(fileURLToPath(import.meta.url));
  for (const dir of [here, path.dirname(here)]) {
    const packageJsonPath = path.join(dir, "package.json");
    if (fs.existsSync(packageJsonPath)) {
      const packageJson: unknown = JSON.parse(
        fs.readFileSync(packageJsonPath, "utf-8"),
      );
      if (
        typeof packageJson === "object" &&
        packageJson !== null &&
        "version" in packageJson &&
        typeof packageJson.version === "string"
      ) {
        return packageJson.version;
      }
    }
  }
  return "0.0.0";
}

installSignalHandlers();

runCli({ argv: process.argv.slice(2), version: readVersion() })
  .then((code) => {
    process.exit(code);
  })
  .catch((err: unknown) => {
    closeProgressBars();
    console.error(chalk.red(errorMessage(err)));
    process.exit(1);
  });
