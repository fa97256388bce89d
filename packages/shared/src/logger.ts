/**
 * @module: Logger
 * @risk: low
 * @scope: utility
 *
 * @description: Winston-based logging utility with console and file transports. Provides structured logging for every dispatch stage.
 *
 * @impact
 * Risk: Logging failures can make debugging difficult but won't break command dispatch.
 * Privacy: Logs may contain message content or identifiers, so raw snowflakes are redacted before any transport sees them.
 */

import fs from 'fs';
import { createLogger, format, transports } from 'winston';
import { format as dateFnsFormat } from 'date-fns';

const { combine, timestamp, printf, colorize } = format;
const splatSymbol = Symbol.for('splat');

// --- Redaction rules ---
// Discord snowflakes are 17-19 digit numeric strings.
const DISCORD_ID_REGEX = /\b\d{17,19}\b/g;

/**
 * Recursively sanitize log data to strip raw Discord identifiers. Mentions in
 * message content (`<@1234...>`) are covered too since the digits are matched
 * on their own.
 */
export function sanitizeLogData<T>(value: T): T {
  if (typeof value === 'string') {
    return value.replace(DISCORD_ID_REGEX, '[REDACTED_ID]') as T;
  }

  if (Array.isArray(value)) {
    return value.map((entry) => sanitizeLogData(entry)) as T;
  }

  if (value instanceof Error) {
    // Errors keep their prototype so winston can still print stacks.
    return value;
  }

  if (value && typeof value === 'object') {
    const sanitized: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(value)) {
      sanitized[key] = sanitizeLogData(val);
    }
    return sanitized as T;
  }

  return value;
}

// --- Winston formatters ---
const sanitizeFormat = format((info) => {
  info.message = sanitizeLogData(info.message);

  const splat: unknown = info[splatSymbol];
  if (Array.isArray(splat)) {
    info[splatSymbol] = splat.map((item: unknown) => sanitizeLogData(item));
  }

  return info;
});

/**
 * Custom log format function
 * @private
 */
const logFormat = printf(({ level, message, timestamp, module }) => {
  const scope = typeof module === 'string' ? ` (${module})` : '';
  return `${timestamp} [${level}]${scope}: ${message}`;
});

// --- Logger output configuration ---
const logDirectory = process.env.LOG_DIR || 'logs';
fs.mkdirSync(logDirectory, { recursive: true });

/**
 * Winston logger instance with console and file transports
 */
export const logger = createLogger({
  level: (process.env.LOG_LEVEL || (process.env.NODE_ENV === 'production' ? 'info' : 'debug')).toLowerCase(),
  format: combine(
    sanitizeFormat(),
    timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    colorize({ all: true }),
    logFormat
  ),
  transports: [
    new transports.Console(),
    new transports.File({
      filename: `${logDirectory}/${dateFnsFormat(new Date(), 'yyyy-MM-dd')}.log`,
      format: format.combine(
        format.uncolorize(),
        format.timestamp(),
        format.json()
      )
    })
  ],
  exitOnError: false
});

/**
 * Renders an unknown thrown value for a log line.
 */
export const describeError = (error: unknown): string => {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
};
