import { SpanStatusCode, trace, type Span } from '@opentelemetry/api';
import type { Logger as WinstonLogger } from 'winston';
import type { WorkerPoolResult } from '../common/types.js';
import { DEFAULT_WORKER_COUNT } from '../config/app-config.js';
import { formatRequestError } from '../utils/error-types.js';
import { checkUrl } from '../utils/status-checker.js';
import type { StatusReporter } from '../utils/status-reporter.js';
import { loadUrlsFromFile } from '../utils/url-loader.js';
import { WorkQueue } from '../utils/work-queue.js';
import { WorkerPool } from '../utils/worker-pool.js';

const tracer = trace.getTracer('url-pulse');

export interface StatusCheckOptions {
  logger: WinstonLogger;
  reporter: StatusReporter;
  /** Per-request deadline; defaults to REQUEST_TIMEOUT_MS. */
  timeoutMs?: number;
}

/**
 * Checks every URL with a pool of DEFAULT_WORKER_COUNT workers and reports
 * one line per URL. Resolves after the queue has drained and every worker
 * has finished; per-URL failures never reject.
 */
export async function checkWebsiteStatus(
  urls: readonly string[],
  options: StatusCheckOptions
): Promise<WorkerPoolResult> {
  const { logger, reporter, timeoutMs } = options;

  return tracer.startActiveSpan(
    'website-status-check',
    async (parentSpan: Span) => {
      parentSpan.setAttribute('urls.count', urls.length);

      const queue = WorkQueue.from(urls);
      const pool = new WorkerPool<string>(
        async (url, workerId) => {
          await tracer.startActiveSpan('check-url', async (span: Span) => {
            span.setAttributes({ 'url.full': url, 'worker.id': workerId });
            try {
              const outcome = await checkUrl(url, { timeoutMs });
              span.setAttribute('check.outcome', outcome.kind);

              if (outcome.kind === 'error') {
                logger.debug(
                  `[${workerId}] ${url}: ${formatRequestError(outcome.error)}`
                );
              } else {
                logger.debug(
                  `[${workerId}] ${url}: HTTP ${outcome.status} (${outcome.kind})`
                );
              }

              reporter.report(outcome);
            } finally {
              span.end();
            }
          });
        },
        { logger, workerCount: DEFAULT_WORKER_COUNT }
      );

      try {
        const result = await pool.run(queue);
        logger.info(
          `Checked ${result.itemsProcessed} URLs with ${result.totalWorkers} workers`
        );
        return result;
      } catch (error) {
        parentSpan.setStatus({ code: SpanStatusCode.ERROR });
        throw error;
      } finally {
        parentSpan.end();
      }
    }
  );
}

/**
 * Loads the URL list from `inputFile` and checks it.
 * Only a failure to read the file propagates (as AppError INPUT_LOAD_FAILED),
 * and it does so before any worker starts.
 */
export async function runStatusCheck(
  inputFile: string,
  options: StatusCheckOptions
): Promise<WorkerPoolResult> {
  const urls = loadUrlsFromFile(inputFile, options.logger);
  return checkWebsiteStatus(urls, options);
}
