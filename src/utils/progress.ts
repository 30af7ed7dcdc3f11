import { MultiProgressBars } from "multi-progress-bars";
import chalk from "chalk";

// Progress bar manager singleton
let mpb: MultiProgressBars | null = null;

/**
 * Initialize the progress bar manager
 */
export function initProgressBars(): MultiProgressBars {
  if (!mpb) {
    mpb = new MultiProgressBars({
      anchor: "bottom",
      persist: true,
      border: true,
      initMessage: " Fetch Progress ",
    });
  }
  return mpb;
}

/**
 * Close and cleanup progress bars
 */
export function closeProgressBars(): void {
  if (mpb) {
    mpb.close();
    mpb = null;
  }
}

/**
 * Add the download progress task (Green)
 */
export function addDownloadProgressTask(
  taskName: string,
  totalUrls: number,
): void {
  const bars = initProgressBars();
  bars.addTask(taskName, {
    type: "percentage",
    barTransformFn: chalk.green,
    nameTransformFn: chalk.green.bold,
    message: `0/${totalUrls} pages`,
  });
}

/**
 * Update download progress. `settled` counts successes and failures.
 */
export function updateDownloadProgress(
  taskName: string,
  settled: number,
  succeeded: number,
  total: number,
): void {
  if (!mpb) return;
  mpb.updateTask(taskName, {
    percentage: settled / total,
    message: `${succeeded}/${total} pages`,
  });
}

/**
 * Mark a task as done
 */
export function markTaskDone(
  taskName: string,
  message?: string,
  colorFn?: (text: string) => string,
): void {
  if (!mpb) return;
  mpb.done(taskName, {
    message: message || "Complete",
    barTransformFn: colorFn || chalk.gray,
  });
}
