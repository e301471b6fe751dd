import pino from 'pino';
import type { Logger } from 'pino';

const LOG_LEVEL = process.env.LOG_LEVEL ?? 'info';

/**
 * Structured logger using pino
 *
 * Configuration:
 * - LOG_LEVEL environment variable controls verbosity (trace, debug, info, warn, error, fatal, silent)
 * - ISO timestamps for consistent time formatting
 * - JSON format for structured logging
 * - Bot tokens never reach the output
 */
export const logger: Logger = pino({
  level: LOG_LEVEL,
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  // Redact sensitive fields if they accidentally get logged
  redact: {
    paths: [
      'botToken',
      '*.botToken',
      '*.bot_token',
      '*.token',
      '*.secret',
      '*.apiKey',
      '*.privateKey',
    ],
    censor: '[REDACTED]',
  },
});

export type { Logger };
