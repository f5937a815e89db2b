/**
 * @fileoverview Loads the list of URLs to check from a line-delimited text file.
 */

import * as fs from 'fs';
import type { Logger as WinstonLogger } from 'winston';
import { AppError, toError } from '../common/AppError.js';

/**
 * Splits text into lines on `\n`, `\r\n` or `\r`.
 * A terminator at the very end does not start another line, so
 * `"a\nb\n"` gives `["a", "b"]` and `""` gives `[]`.
 */
export function splitLines(content: string): string[] {
  if (content === '') {
    return [];
  }
  const lines = content.split(/\r\n|\r|\n/);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Reads `filePath` and returns one trimmed entry per line, in file order.
 *
 * Blank lines are kept as empty strings: they are checked like any other
 * entry and end up on the error path.
 *
 * @throws {AppError} INPUT_LOAD_FAILED when the file cannot be read.
 * @example
 * // urls.txt: "https://example.com\n  http://example.org \n"
 * loadUrlsFromFile('urls.txt', logger); // ["https://example.com", "http://example.org"]
 */
export function loadUrlsFromFile(
  filePath: string,
  logger: WinstonLogger
): string[] {
  logger.info(`Attempting to read local file: ${filePath}`);

  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf8');
  } catch (e: unknown) {
    const error = toError(e);
    logger.error(`Failed to read file ${filePath}: ${error.message}`, {
      stack: error.stack,
    });
    throw new AppError(`Could not read URL list from ${filePath}: ${error.message}`, {
      errorCode: 'INPUT_LOAD_FAILED',
      isOperational: true,
      originalError: error,
      filePath,
    });
  }

  const urls = splitLines(content).map((line) => line.trim());
  const blankCount = urls.filter((url) => url === '').length;

  logger.info(`Initial URLs read from ${filePath}`, { count: urls.length });
  if (blankCount > 0) {
    logger.info(
      `${blankCount} blank line(s) in ${filePath} will be checked as empty URLs`
    );
  }
  return urls;
}
