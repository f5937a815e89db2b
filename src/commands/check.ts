import { Command } from '@oclif/core';
import { AppError } from '../common/AppError.js';
import { runStatusCheck } from '../services/status-service.js';
import { initTracer, shutdownTracer } from '../tracer.js';
import { initializeLogger } from '../utils/logger.js';
import { StatusReporter } from '../utils/status-reporter.js';
import { checkFlags } from './check-options.js';

/**
 * @class Check
 * @description Checks whether every URL listed in the input file is reachable.
 * Four workers share the list; each URL produces exactly one line, on stdout
 * for a successful connection and on stderr for an HTTP error status or any
 * other failure. Per-URL failures do not change the exit code; only an
 * unreadable input file does.
 */
export default class Check extends Command {
  static override description =
    'Checks the HTTP status of every URL in a file, four at a time.';

  static override examples = [
    '<%= config.bin %> <%= command.id %>',
    '<%= config.bin %> <%= command.id %> --input sites.txt',
    '<%= config.bin %> <%= command.id %> -i sites.txt --verbose --logDir ./check_logs',
  ];

  static override flags = checkFlags;

  public async run(): Promise<void> {
    const { flags } = await this.parse(Check);
    const logger = initializeLogger(flags.logDir, flags.verbose);
    initTracer(logger);

    try {
      await runStatusCheck(flags.input, {
        logger,
        reporter: StatusReporter.forProcess(),
      });
    } catch (error: unknown) {
      let userMessage = 'An unexpected error occurred while checking URLs.';
      const suggestions = ['Check logs for more details.'];

      if (error instanceof AppError) {
        logger.error(`AppError in check command: ${error.message}`, {
          details: error.details
            ? JSON.stringify({
                ...error.details,
                originalError: error.details.originalError?.message,
              })
            : undefined,
          stack: error.stack,
        });
        userMessage = error.message;
        if (error.errorCode === 'INPUT_LOAD_FAILED') {
          suggestions.unshift(
            `Make sure ${flags.input} exists and is readable, or pass another file with --input.`
          );
        }
      } else if (error instanceof Error) {
        logger.error(`Error in check command: ${error.message}`, {
          stack: error.stack,
        });
        userMessage = error.message;
      } else {
        logger.error('An unknown error occurred in check command.', {
          errorDetail: JSON.stringify(error),
        });
      }

      this.error(userMessage, { exit: 1, suggestions });
    } finally {
      await shutdownTracer(logger);
    }
  }
}
