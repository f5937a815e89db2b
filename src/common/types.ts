/**
 * @fileoverview Shared type definitions used across the checker, the pool
 * and the commands. Centralizing them avoids circular imports between
 * `utils/` and `services/`.
 */

import type { RequestErrorDetails } from '../utils/error-types.js';

/**
 * Result of probing one URL.
 * - `success`: a response arrived with a non-error status.
 * - `http-error`: a response arrived with an HTTP error status (>= 400).
 * - `error`: no usable response (timeout, DNS, refused connection, bad URL, ...).
 */
export type CheckOutcome =
  | { kind: 'success'; url: string; status: number }
  | { kind: 'http-error'; url: string; status: number }
  | { kind: 'error'; url: string; error: RequestErrorDetails };

export type OutcomeKind = CheckOutcome['kind'];

/**
 * The part of a writable stream the reporters need.
 * `process.stdout`/`process.stderr` satisfy it, as do test doubles.
 */
export interface LineSink {
  write(chunk: string): boolean;
}

/**
 * Destination streams for report lines.
 */
export interface OutputStreams {
  /** Receives success lines. */
  out: LineSink;
  /** Receives HTTP error and other error lines. */
  err: LineSink;
}

/**
 * Handles one dequeued item. `workerId` is `worker-<n>`, 1-based.
 */
export type WorkHandler<T> = (item: T, workerId: string) => Promise<void>;

/**
 * Pool-level counters returned once every worker has finished.
 */
export interface WorkerPoolResult {
  totalWorkers: number;
  itemsProcessed: number;
  /** Items whose handler threw; they were still acknowledged. */
  handlerFailures: number;
}
