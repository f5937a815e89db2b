import { describe, it, expect } from 'vitest';
import { formatOutcomeLine, StatusReporter } from '../status-reporter.js';
import { RequestErrorCategory } from '../error-types.js';
import type { CheckOutcome } from '../../common/types.js';
import { createStreams } from '../../../tests/test-utils.js';

const success: CheckOutcome = { kind: 'success', url: 'https://up.test', status: 200 };
const httpError: CheckOutcome = { kind: 'http-error', url: 'https://gone.test', status: 410 };
const failure: CheckOutcome = {
  kind: 'error',
  url: 'not-a-url',
  error: {
    category: RequestErrorCategory.INVALID_URL,
    code: 'INVALID_URL',
    message: 'Invalid URL',
    url: 'not-a-url',
    timestamp: '2024-01-01T00:00:00.000Z',
  },
};

describe('formatOutcomeLine', () => {
  it('should render the success line', () => {
    expect(formatOutcomeLine(success)).toBe('Successfully connected to https://up.test\n');
  });

  it('should render the HTTP error line', () => {
    expect(formatOutcomeLine(httpError)).toBe('HTTP error occurred for https://gone.test\n');
  });

  it('should render the generic error line', () => {
    expect(formatOutcomeLine(failure)).toBe('Error occurred for not-a-url\n');
  });

  it('should render an empty URL verbatim', () => {
    expect(formatOutcomeLine({ ...failure, url: '' })).toBe('Error occurred for \n');
  });
});

describe('StatusReporter', () => {
  it('should send successes to out and failures to err, one write per line', () => {
    const streams = createStreams();
    const reporter = new StatusReporter(streams);

    reporter.report(success);
    reporter.report(httpError);
    reporter.report(failure);

    expect(streams.out.chunks).toEqual(['Successfully connected to https://up.test\n']);
    expect(streams.err.chunks).toEqual([
      'HTTP error occurred for https://gone.test\n',
      'Error occurred for not-a-url\n',
    ]);
  });

  it('should bind to the process streams', () => {
    expect(StatusReporter.forProcess()).toBeInstanceOf(StatusReporter);
  });
});
