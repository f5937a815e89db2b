/**
 * @file Defines the application error class shared by the commands and services.
 */

/**
 * Error codes raised by url-pulse itself.
 * Per-URL request failures are not errors at this level; they become outcomes.
 */
export type AppErrorCode =
  | 'INPUT_LOAD_FAILED'
  | 'QUEUE_ACK_WITHOUT_DEQUEUE'
  | 'INVALID_EXTENSION';

/**
 * Additional details carried by an {@link AppError}.
 * @property errorCode - Identifies the failure (e.g. `INPUT_LOAD_FAILED`).
 * @property isOperational - True for expected failures (bad input, missing file),
 *                           false for programmer errors.
 * @property originalError - The underlying error when this one wraps another.
 */
export interface AppErrorDetails {
  errorCode?: AppErrorCode;
  isOperational?: boolean;
  originalError?: Error;
  [key: string]: unknown;
}

/**
 * Custom error class for the application.
 * Extends the built-in Error class with an error code and operational status.
 */
export class AppError extends Error {
  public readonly details?: AppErrorDetails;

  /**
   * @param message - The human-readable error message.
   * @param details - Optional object containing additional error details.
   */
  constructor(message: string, details?: AppErrorDetails) {
    super(message);
    this.name = this.constructor.name;
    this.details = details;

    // Keep the AppError constructor frame out of the stack trace.
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  get errorCode(): AppErrorCode | undefined {
    return this.details?.errorCode;
  }
}

/**
 * Narrows an unknown thrown value to an Error, wrapping non-Error values.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
