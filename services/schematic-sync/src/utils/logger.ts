/**
 * Schematic Sync - Logger
 *
 * Winston logger scoped by run and sheet. Text lines carry the sheet in
 * brackets so interleaved per-sheet output stays readable; `LOG_FORMAT=json`
 * emits one JSON object per line for log collectors.
 */

import winston from 'winston';
import { config } from '../config.js';

const { combine, timestamp, printf, colorize, errors, json } = winston.format;

export interface LogMetadata {
  runId?: string;
  sheet?: string;
  strategy?: string;
  matchMode?: string;
  operation?: string;
  duration?: number;
  [key: string]: unknown;
}

const textFormat = printf(({ level, message, timestamp, stack, sheet, ...metadata }) => {
  const scope = typeof sheet === 'string' ? ` [${sheet}]` : '';
  const meta = Object.keys(metadata).length > 0 ? ` ${JSON.stringify(metadata)}` : '';
  const stackTrace = stack ? `\n${String(stack)}` : '';
  return `${String(timestamp)} ${level}${scope} ${String(message)}${meta}${stackTrace}`;
});

const transportFormat = config.logFormat === 'json'
  ? json()
  : combine(colorize({ all: config.nodeEnv === 'development' }), textFormat);

const logger = winston.createLogger({
  level: config.logLevel,
  silent: config.logSilent,
  format: combine(
    errors({ stack: true }),
    timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' })
  ),
  defaultMeta: {
    engine: config.serviceId,
    engineVersion: config.version,
    ...(config.buildId ? { buildId: config.buildId } : {}),
  },
  transports: [new winston.transports.Console({ format: transportFormat })],
});

export interface Logger {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string, error?: Error, metadata?: LogMetadata): void;
  child(defaultMetadata: LogMetadata): Logger;
}

/** Error fields worth keeping in a log line; engine errors add their code. */
export function describeError(error: Error | undefined): LogMetadata {
  if (!error) return {};
  const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
  return { error: error.message, ...(code ? { code } : {}), stack: error.stack };
}

export function createLogger(scope: LogMetadata = {}): Logger {
  const write = (level: 'debug' | 'info' | 'warn' | 'error', message: string, metadata?: LogMetadata): void => {
    logger.log(level, message, { ...scope, ...metadata });
  };

  return {
    debug: (message, metadata) => write('debug', message, metadata),
    info: (message, metadata) => write('info', message, metadata),
    warn: (message, metadata) => write('warn', message, metadata),
    error: (message, error, metadata) => write('error', message, { ...metadata, ...describeError(error) }),
    child: (childScope) => createLogger({ ...scope, ...childScope }),
  };
}

export const log = createLogger();

export default log;
