// src/logging.ts
// What: Application logger.
// How: Creates a pino logger. In development, attempts to use pino-pretty transport for readable logs.
//      Under vitest (NODE_ENV=test) the logger is silent unless LOG_LEVEL asks otherwise.

import { pino, type Logger, type LoggerOptions } from 'pino';

const env = process.env.NODE_ENV ?? 'development';
const isDev = env === 'development';
const defaultLevel = env === 'test' ? 'silent' : isDev ? 'debug' : 'info';

const baseOptions: LoggerOptions = {
  name: 'book-intake',
  level: process.env.LOG_LEVEL || defaultLevel,
};

function createLogger(): Logger {
  // Try pretty transport in development; fall back to standard if unavailable.
  if (isDev) {
    try {
      return pino({
        ...baseOptions,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            singleLine: false,
          },
        },
      });
    } catch {
      return pino(baseOptions);
    }
  }
  return pino(baseOptions);
}

const logger: Logger = createLogger();

export type { Logger };
export default logger;
