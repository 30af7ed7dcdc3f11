import chalk from "chalk";
import path from "path";
import type { RunConfig } from "../config.js";
import type { CoordinatorResult } from "../workers/types.js";
import { getAsciiArt } from "./ascii.js";
import { closeProgressBars } from "./progress.js";

export function showHeader(version: string): void {
  console.log(chalk.cyan(getAsciiArt("pagepull")));
  console.log(chalk.cyan.bold(`\nBatch page fetcher (Version ${version})`));
}

export async function cleanupAfterPromptExit(): Promise<void> {
  closeProgressBars();
}

export function showConfiguration(
  config: RunConfig,
  acceptedCount: number,
  skippedCount: number,
): void {
  console.log(chalk.cyan("\nCollected inputs:"));
  console.log(chalk.white(`  URL list: ${config.file}`));
  console.log(
    chalk.white(
      `  URLs: ${acceptedCount} accepted` +
        (skippedCount > 0 ? `, ${skippedCount} skipped` : ""),
    ),
  );
  console.log(chalk.white(`  Directory: ${path.resolve(config.directory)}`));
  console.log(chalk.white(`  Files: page<N>.${config.ext}`));
  console.log(chalk.white(`  Log file: ${config.logFile}`));
  console.log(
    chalk.white(
      `  Workers: ${config.workers !== undefined ? config.workers : "auto"}`,
    ),
  );
  console.log(
    chalk.white(
      `  Limits: ${config.timeout}s timeout, stall below ${config.minSpeed} B/s for ${config.stallTime}s`,
    ),
  );
  console.log(chalk.white(`  Verbose: ${config.verbose ? "Yes" : "No"}`));
}

export function showDownloadSummary(result: CoordinatorResult): void {
  console.log(chalk.cyan(`\n========================================`));
  console.log(chalk.cyan(`Download Summary:`));
  console.log(chalk.white(`  Total URLs: ${result.totalTasks}`));
  console.log(chalk.green(`  Downloaded: ${result.completedTasks}`));
  if (result.failedTasks > 0) {
    console.log(chalk.red(`  Failed: ${result.failedTasks}`));
  }
  console.log(chalk.white(`  Workers Used: ${result.workersUsed}`));
  console.log(chalk.white(`  Duration: ${formatDuration(result.duration)}`));
  console.log(chalk.cyan(`========================================`));
}

/**
 * Format duration for display
 */
export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);

  if (hours > 0) {
    return `${hours}h ${minutes % 60}m ${seconds % 60}s`;
  } else if (minutes > 0) {
    return `${minutes}m ${seconds % 60}s`;
  } else {
    return `${seconds}s`;
  }
}
