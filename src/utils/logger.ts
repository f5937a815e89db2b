/**
 * @module logger
 * @description This module provides a singleton Winston logger instance.
 * It must be initialized by calling `initializeLogger` before use.
 * The logger writes diagnostics to the console (stderr) and to files (app.log, error.log).
 * File entries are enriched with the active OpenTelemetry span, if any.
 */
import winston, { Logger, Logform, transports } from 'winston';
import TransportStream from 'winston-transport';
import fs from 'fs';
import path from 'path';
import { trace } from '@opentelemetry/api';
import {
  DEFAULT_APP_LOG_LEVEL,
  DEFAULT_CONSOLE_LOG_LEVEL,
} from '../config/app-config.js';

let logger: Logger | undefined;
export let isVerbose = false; // Exported for testing

/**
 * Adds `trace_id` and `span_id` from the active OpenTelemetry span to the log entry.
 */
const openTelemetryFormat = winston.format((info) => {
  const spanContext = trace.getActiveSpan()?.spanContext();
  if (spanContext) {
    info.trace_id = spanContext.traceId;
    info.span_id = spanContext.spanId;
  }
  return info;
});

/**
 * Formats Winston splat (`...rest`) metadata for console logging.
 * Objects are stringified; an empty result is dropped.
 */
function formatSplatMetadata(splat: unknown): string {
  if (Array.isArray(splat)) {
    return splat
      .map((s: unknown) => (typeof s === 'object' ? JSON.stringify(s) : String(s)))
      .filter((s) => s !== '{}')
      .join(' ');
  }
  if (typeof splat === 'object' && splat !== null) {
    const metadataString = JSON.stringify(splat);
    return metadataString !== '{}' ? metadataString : '';
  }
  return splat === undefined ? '' : String(splat);
}

function messageText(info: Logform.TransformableInfo): string {
  return typeof info.message === 'string' ? info.message : String(info.message);
}

/**
 * Formats a log entry for console output.
 * Outside verbose mode, error messages are cut before the first stack frame
 * (" at ...") and the stack itself is omitted.
 */
export function formatConsoleLogMessage(info: Logform.TransformableInfo): string {
  const isError = info.level.includes('error');
  let message = messageText(info);

  if (isError && !isVerbose) {
    const atIndex = message.indexOf(' at ');
    if (atIndex !== -1) {
      message = message.substring(0, atIndex);
    }
  }

  let line = `${String(info.timestamp)} ${info.level}: ${message}`;

  const metadataString = formatSplatMetadata(info[Symbol.for('splat')]);
  if (metadataString) {
    line += ` ${metadataString}`;
  }

  if (isVerbose && typeof info.stack === 'string') {
    line += `\n${info.stack}`;
  }

  return line;
}

/**
 * Transport that keeps every entry in memory; used by tests in place of the
 * console and file transports.
 */
export class MockTransport extends TransportStream {
  public messages: Logform.TransformableInfo[] = [];

  constructor(opts?: TransportStream.TransportStreamOptions) {
    super(opts);
  }

  override log(info: Logform.TransformableInfo, callback: () => void): void {
    setImmediate(() => {
      this.emit('logged', info);
    });
    this.messages.push(info);
    callback();
  }
}

function createConsoleTransport(verboseFlag: boolean): TransportStream {
  return new transports.Console({
    level: verboseFlag
      ? 'debug'
      : process.env.LOG_LEVEL_CONSOLE || DEFAULT_CONSOLE_LOG_LEVEL,
    // stdout is reserved for the success report lines.
    stderrLevels: Object.keys(winston.config.npm.levels),
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.printf(formatConsoleLogMessage)
    ),
  });
}

function createFileTransports(logDir: string): TransportStream[] {
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }
  return [
    new transports.File({
      filename: path.join(logDir, 'app.log'),
      level: process.env.LOG_LEVEL_APP || DEFAULT_APP_LOG_LEVEL,
      format: winston.format.combine(openTelemetryFormat(), winston.format.json()),
    }),
    new transports.File({
      filename: path.join(logDir, 'error.log'),
      level: 'error',
      format: winston.format.combine(openTelemetryFormat(), winston.format.json()),
    }),
  ];
}

/**
 * Initializes the Winston logger instance.
 *
 * @param logDir - The directory where app.log and error.log are stored.
 *                 Created if missing. `null` logs to the console only and
 *                 touches no files.
 * @param verboseFlag - Lowers the console level to `debug` and prints stacks.
 * @param testTransports - Replaces the console and file transports.
 */
export function initializeLogger(
  logDir: string | null,
  verboseFlag = false,
  testTransports: TransportStream[] | null = null
): Logger {
  isVerbose = verboseFlag;

  const effectiveTransports: TransportStream[] = testTransports ?? [
    createConsoleTransport(verboseFlag),
    ...(logDir === null ? [] : createFileTransports(logDir)),
  ];

  logger = winston.createLogger({
    levels: winston.config.npm.levels,
    level: 'debug',
    format: winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
      winston.format.errors({ stack: true }),
      winston.format.splat()
    ),
    transports: effectiveTransports,
    exitOnError: false,
  });

  if (!testTransports) {
    logger.debug(
      `Logger initialized successfully. Log directory: ${logDir ?? '(console only)'}, Verbose: ${isVerbose}`
    );
  }
  return logger;
}

// Setter for isVerbose for testing purposes
export function setTestIsVerbose(value: boolean): void {
  isVerbose = value;
}

export default {
  /**
   * Gets the singleton logger instance.
   * @throws {Error} If `initializeLogger` has not been called.
   */
  get instance(): Logger {
    if (!logger) {
      throw new Error(
        'Logger has not been initialized. Call initializeLogger(logDir) first.'
      );
    }
    return logger;
  },
};
