/**
 * url-pulse library entry point.
 *
 * Usage:
 *   import { checkWebsiteStatus, StatusReporter, initializeLogger } from 'url-pulse';
 *
 *   const logger = initializeLogger('logs');
 *   await checkWebsiteStatus(['https://example.com'], {
 *     logger,
 *     reporter: StatusReporter.forProcess(),
 *   });
 *
 * The CLI lives in `commands/` and is started through `bin/run.js`.
 */

export { checkWebsiteStatus, runStatusCheck } from './services/status-service.js';
export { WorkQueue } from './utils/work-queue.js';
export { WorkerPool } from './utils/worker-pool.js';
export { checkUrl } from './utils/status-checker.js';
export { StatusReporter, formatOutcomeLine } from './utils/status-reporter.js';
export { loadUrlsFromFile, splitLines } from './utils/url-loader.js';
export {
  categorizeRequestError,
  formatRequestError,
  RequestErrorCategory,
} from './utils/error-types.js';
export {
  formatSeekLine,
  noFilesFoundMessage,
  sanitizeExtension,
  searchForFiles,
} from './utils/file-seeker.js';
export { initializeLogger } from './utils/logger.js';
export { AppError } from './common/AppError.js';

export type { StatusCheckOptions } from './services/status-service.js';
export type { WorkerPoolOptions } from './utils/worker-pool.js';
export type { CheckUrlOptions } from './utils/status-checker.js';
export type { RequestErrorDetails } from './utils/error-types.js';
export type { AppErrorCode, AppErrorDetails } from './common/AppError.js';
export type {
  CheckOutcome,
  LineSink,
  OutcomeKind,
  OutputStreams,
  WorkHandler,
  WorkerPoolResult,
} from './common/types.js';
