import { Args, Command, Flags } from '@oclif/core';
import { AppError } from '../common/AppError.js';
import {
  formatSeekLine,
  noFilesFoundMessage,
  searchForFiles,
} from '../utils/file-seeker.js';
import { initializeLogger } from '../utils/logger.js';

/**
 * @class Seek
 * @description Lists every file below the current directory with the given
 * extension, one absolute path per line. Exits with status 1 when nothing matches.
 * Logs go to the console only, so the searched tree is left untouched.
 */
export default class Seek extends Command {
  static override description =
    'Recursively finds files by extension below the current directory.';

  static override examples = [
    '<%= config.bin %> <%= command.id %> ts',
    '<%= config.bin %> <%= command.id %> .json --index',
    '<%= config.bin %> <%= command.id %> md --dir ./docs',
  ];

  static override args = {
    extension: Args.string({
      description: 'Extension to search for, with or without the leading dot.',
      required: true,
    }),
  };

  static override flags = {
    index: Flags.boolean({
      char: 'i',
      description: 'Prefix each path with its 1-based position.',
      default: false,
    }),
    dir: Flags.string({
      char: 'd',
      description: 'Directory to search instead of the current one.',
    }),
  };

  public async run(): Promise<void> {
    const { args, flags } = await this.parse(Seek);
    const logger = initializeLogger(null);
    const root = flags.dir ?? process.cwd();

    let files: string[];
    try {
      files = await searchForFiles(root, args.extension);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`Seek failed for extension "${args.extension}": ${message}`);
      this.error(message, {
        exit: 1,
        suggestions:
          error instanceof AppError && error.errorCode === 'INVALID_EXTENSION'
            ? ['Pass an extension such as "ts" or ".json".']
            : ['Check logs for more details.'],
      });
    }

    logger.info(`Found ${files.length} file(s) with extension ${args.extension} in ${root}`);

    if (files.length === 0) {
      process.stderr.write(noFilesFoundMessage(args.extension));
      this.exit(1);
    }

    files.forEach((filePath, i) => {
      process.stdout.write(formatSeekLine(i + 1, filePath, flags.index));
    });
  }
}
