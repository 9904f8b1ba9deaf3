import winston from 'winston';
import * as Sentry from '@sentry/node';

/**
 * Winston logger configuration for structured logging
 * Warnings and errors go to stderr so stdout stays readable
 */
const transports: winston.transport[] = [
  new winston.transports.Console({
    stderrLevels: ['error', 'warn'],
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.printf(({ timestamp, level, message, ...meta }) => {
        let msg = `${timestamp} [${level}]: ${message}`;
        const { service: _service, ...rest } = meta;
        if (Object.keys(rest).length > 0) {
          msg += ` ${JSON.stringify(rest)}`;
        }
        return msg;
      }),
    ),
  }),
];

// Only add file transport when asked for (never during tests)
if (process.env.LOG_FILE && process.env.NODE_ENV !== 'test') {
  transports.push(new winston.transports.File({ filename: process.env.LOG_FILE }));
}

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  ),
  defaultMeta: { service: 'playlist-fetch' },
  transports,
});

/**
 * Log an operation
 */
export function logOperation(
  operation: string,
  details?: Record<string, unknown>,
): void {
  logger.info(operation, details);
}

/**
 * Log an error with stack trace and report it to Sentry
 */
export function logError(
  error: Error,
  context?: Record<string, unknown>,
): void {
  logger.error({
    message: error.message,
    stack: error.stack,
    ...context,
  });
  Sentry.captureException(error, { extra: context });
}
