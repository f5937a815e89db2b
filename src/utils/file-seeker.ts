/**
 * @fileoverview Recursive file search by extension, used by the `seek` command.
 */

import glob from 'fast-glob';
import path from 'path';
import { AppError } from '../common/AppError.js';

/**
 * Drops every leading dot, so ".ts", "..ts" and "ts" all mean "ts".
 */
export function sanitizeExtension(extension: string): string {
  return extension.replace(/^\.+/, '');
}

/**
 * Finds every file below `root` whose name ends in `.<extension>`.
 * Hidden files and directories are searched too. Paths are absolute and sorted.
 *
 * @throws {AppError} INVALID_EXTENSION when nothing is left after sanitizing.
 */
export async function searchForFiles(
  root: string,
  extension: string
): Promise<string[]> {
  const sanitized = sanitizeExtension(extension);
  if (!sanitized) {
    throw new AppError(`Invalid extension: "${extension}"`, {
      errorCode: 'INVALID_EXTENSION',
      isOperational: true,
    });
  }

  const files = await glob(`**/*.${glob.escapePath(sanitized)}`, {
    cwd: path.resolve(root),
    absolute: true,
    onlyFiles: true,
    dot: true,
    followSymbolicLinks: false,
  });

  return files.sort();
}

/**
 * One output line of `seek`; `index` is 1-based. The path is followed
 * directly by the newline, with no padding.
 */
export function formatSeekLine(
  index: number,
  filePath: string,
  withIndex: boolean
): string {
  return withIndex ? `${index}: ${filePath}\n` : `${filePath}\n`;
}

/**
 * Message for an empty search. The extension is shown with exactly one leading
 * dot however it was typed, and the message ends with a newline.
 */
export function noFilesFoundMessage(extension: string): string {
  return `Error: No Files Found with extension .${sanitizeExtension(extension)}\n`;
}
