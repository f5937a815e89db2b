import type { CheckOutcome, OutputStreams } from '../common/types.js';

/**
 * Renders the report line for an outcome, newline included.
 */
export function formatOutcomeLine(outcome: CheckOutcome): string {
  switch (outcome.kind) {
    case 'success':
      return `Successfully connected to ${outcome.url}\n`;
    case 'http-error':
      return `HTTP error occurred for ${outcome.url}\n`;
    case 'error':
      return `Error occurred for ${outcome.url}\n`;
  }
}

/**
 * Writes one line per outcome: successes to `out`, everything else to `err`.
 * Each line goes out in a single write, so concurrent workers never split a line.
 */
export class StatusReporter {
  private readonly streams: OutputStreams;

  constructor(streams: OutputStreams) {
    this.streams = streams;
  }

  static forProcess(): StatusReporter {
    return new StatusReporter({ out: process.stdout, err: process.stderr });
  }

  report(outcome: CheckOutcome): void {
    const stream =
      outcome.kind === 'success' ? this.streams.out : this.streams.err;
    stream.write(formatOutcomeLine(outcome));
  }
}
