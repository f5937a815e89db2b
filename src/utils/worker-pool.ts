import type { Logger as WinstonLogger } from 'winston';
import { toError } from '../common/AppError.js';
import type { WorkHandler, WorkerPoolResult } from '../common/types.js';
import { DEFAULT_WORKER_COUNT } from '../config/app-config.js';
import type { WorkQueue } from './work-queue.js';

export interface WorkerPoolOptions {
  logger: WinstonLogger;
  /** Defaults to DEFAULT_WORKER_COUNT; values below 1 are raised to 1. */
  workerCount?: number;
}

/**
 * Worker Pool
 *
 * Runs a fixed number of async workers against one shared {@link WorkQueue}.
 * Each worker takes items until it finds the queue empty; the batch is static,
 * so a worker never waits for new work. Every dequeued item is acknowledged,
 * whether its handler resolved or threw.
 */
export class WorkerPool<T> {
  private readonly handler: WorkHandler<T>;
  private readonly logger: WinstonLogger;
  private readonly workerCount: number;
  private active = 0;
  private peak = 0;

  constructor(handler: WorkHandler<T>, options: WorkerPoolOptions) {
    this.handler = handler;
    this.logger = options.logger;
    this.workerCount = Math.max(
      1,
      Math.floor(options.workerCount ?? DEFAULT_WORKER_COUNT)
    );
  }

  /**
   * Starts every worker, waits for the queue to drain, then joins the workers.
   */
  async run(queue: WorkQueue<T>): Promise<WorkerPoolResult> {
    const result: WorkerPoolResult = {
      totalWorkers: this.workerCount,
      itemsProcessed: 0,
      handlerFailures: 0,
    };
    this.active = 0;
    this.peak = 0;

    this.logger.debug(
      `Starting ${this.workerCount} workers for ${queue.size} queued items`
    );

    const workers: Promise<void>[] = [];
    for (let i = 0; i < this.workerCount; i++) {
      workers.push(this.runWorker(`worker-${i + 1}`, queue, result));
    }

    await queue.waitUntilDrained();
    await Promise.all(workers);

    this.logger.debug(
      `All ${this.workerCount} workers finished: ${result.itemsProcessed} processed, ${result.handlerFailures} handler failures`
    );
    return result;
  }

  /** Highest number of handlers in flight at once during the latest `run`. */
  get peakConcurrency(): number {
    return this.peak;
  }

  private async runWorker(
    workerId: string,
    queue: WorkQueue<T>,
    result: WorkerPoolResult
  ): Promise<void> {
    this.logger.debug(`[${workerId}] Started`);

    while (!queue.isEmpty()) {
      const item = queue.dequeue();
      if (item === undefined) {
        break;
      }

      this.active++;
      this.peak = Math.max(this.peak, this.active);
      try {
        await this.handler(item, workerId);
      } catch (e: unknown) {
        const error = toError(e);
        result.handlerFailures++;
        this.logger.error(
          `[${workerId}] Handler failed for ${String(item)}: ${error.message}`,
          { stack: error.stack }
        );
      } finally {
        this.active--;
        result.itemsProcessed++;
        queue.acknowledge(item);
      }
    }

    this.logger.debug(`[${workerId}] No more work, exiting`);
  }
}
