/**
 * Structured JSON logging with Pino.js
 *
 * Production: JSON format for log indexing
 * Development: Pretty-printed for readability
 */

import { pino, type Logger as PinoLogger, type LoggerOptions } from 'pino';

const isDevelopment = process.env['NODE_ENV'] !== 'production';
const isTest = process.env['NODE_ENV'] === 'test';

const serviceName = process.env['SERVICE_NAME'];
const instanceId = process.env['INSTANCE_ID'];

const loggerOptions: LoggerOptions = {
  level: isTest ? 'silent' : (process.env['LOG_LEVEL'] ?? 'info'),
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  base: {
    env: process.env['NODE_ENV'] ?? 'development',
    ...(serviceName && { service: serviceName }),
    ...(instanceId && { instanceId }),
  },
  redact: {
    paths: ['apiKey', 'token', 'signature', 'headers.authorization', 'headers["x-api-key"]'],
    censor: '[redacted]',
  },
};

// Only add transport in development (not in production for JSON format)
if (isDevelopment && !isTest) {
  loggerOptions.transport = {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
    },
  };
}

const baseLogger = pino(loggerOptions);

export type Logger = PinoLogger;

export function createLogger(module: string): Logger {
  return baseLogger.child({ module });
}

export { baseLogger as logger };
