/**
 * @fileoverview Probes a single URL and classifies the result into a
 * {@link CheckOutcome}. `checkUrl` never rejects: every failure becomes an
 * `error` outcome.
 */

import fetch from 'node-fetch';
import type { CheckOutcome } from '../common/types.js';
import {
  DEFAULT_USER_AGENT,
  HTTP_ERROR_STATUS_THRESHOLD,
  REQUEST_TIMEOUT_MS,
} from '../config/app-config.js';
import { categorizeRequestError } from './error-types.js';

export interface CheckUrlOptions {
  /** Deadline for the whole request in milliseconds. Defaults to REQUEST_TIMEOUT_MS. */
  timeoutMs?: number;
}

/**
 * Sends a GET to `url` and reports how it went.
 *
 * The deadline covers connecting, the response headers and reading the body;
 * the body is read only to release the connection and is discarded.
 * Redirects are followed, so the status is that of the final response.
 *
 * @example
 * const outcome = await checkUrl('https://example.com');
 * if (outcome.kind === 'success') console.log(outcome.status);
 */
export async function checkUrl(
  url: string,
  options: CheckUrlOptions = {}
): Promise<CheckOutcome> {
  const controller = new AbortController();
  const timer = setTimeout(
    () => controller.abort(),
    options.timeoutMs ?? REQUEST_TIMEOUT_MS
  );

  try {
    const response = await fetch(url, {
      method: 'GET',
      headers: { 'User-Agent': DEFAULT_USER_AGENT },
      redirect: 'follow',
      signal: controller.signal,
    });
    await response.arrayBuffer();

    if (response.status >= HTTP_ERROR_STATUS_THRESHOLD) {
      return { kind: 'http-error', url, status: response.status };
    }
    return { kind: 'success', url, status: response.status };
  } catch (error: unknown) {
    return { kind: 'error', url, error: categorizeRequestError(error, url) };
  } finally {
    clearTimeout(timer);
  }
}
