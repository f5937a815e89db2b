// src/config/app-config.ts

/**
 * Input file read by `check` when `--input` is not given.
 */
export const DEFAULT_INPUT_FILE = 'urls.txt';

/**
 * Directory for app.log and error.log.
 */
export const DEFAULT_LOG_DIR = 'logs';

/**
 * Number of concurrent workers draining the URL queue.
 * Not exposed as a flag.
 */
export const DEFAULT_WORKER_COUNT = 4;

/**
 * Deadline for a single GET, covering connect, headers and body.
 * Value is in milliseconds.
 */
export const REQUEST_TIMEOUT_MS = 5000; // ms

/**
 * Responses with a status at or above this value are HTTP errors.
 */
export const HTTP_ERROR_STATUS_THRESHOLD = 400;

/**
 * User-Agent sent with every status request.
 */
export const DEFAULT_USER_AGENT = 'url-pulse/1.0 (+website status checker)';

/**
 * Console log level when neither `--verbose` nor LOG_LEVEL_CONSOLE is set.
 * The console transport writes to stderr alongside the error report lines.
 */
export const DEFAULT_CONSOLE_LOG_LEVEL = 'warn';

/**
 * Log level for app.log when LOG_LEVEL_APP is not set.
 */
export const DEFAULT_APP_LOG_LEVEL = 'info';
