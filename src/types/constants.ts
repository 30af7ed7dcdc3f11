/** Attempts per task, the first one included */
export const MAX_RETRIES = 3;

/** Backoff before retry N is RETRY_BACKOFF_BASE_MS * N */
export const RETRY_BACKOFF_BASE_MS = 2000;

/** Pause a worker takes between two tasks */
export const INTER_TASK_DELAY_MS = 100;

export const FETCH_TIMEOUT_SECONDS = 30;
export const MIN_THROUGHPUT_BYTES_PER_SEC = 100;
export const STALL_WINDOW_SECONDS = 10;

export const DEFAULT_URL_FILE = "urls.txt";
export const DEFAULT_OUTPUT_DIR = ".";
export const DEFAULT_LOG_FILE = "errors.log";
export const DEFAULT_ARTIFACT_EXTENSION = "html";

export const MIN_POOL_SIZE = 4;
export const TASKS_PER_WORKER = 5;

export const PROGRESS_TASK_NAME = "Downloads";

/** Largest delay a Node.js timer accepts */
export const MAX_TIMER_DELAY_MS = 2147483647;
