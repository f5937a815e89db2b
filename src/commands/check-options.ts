import { Flags } from '@oclif/core';
import { DEFAULT_INPUT_FILE, DEFAULT_LOG_DIR } from '../config/app-config.js';

export const checkFlags = {
  input: Flags.string({
    char: 'i',
    description: 'File containing URLs to check, one per line.',
    default: DEFAULT_INPUT_FILE,
  }),
  logDir: Flags.string({
    description: 'Directory to save log files (app.log, error.log).',
    default: DEFAULT_LOG_DIR,
  }),
  verbose: Flags.boolean({
    description:
      'Print debug diagnostics (per-URL status codes and error categories) and stack traces to stderr.',
    default: false,
  }),
};
