import pino, { stdTimeFunctions, type Logger, type LoggerOptions } from 'pino';

export const createLoggerOptions = (level: string): LoggerOptions => ({
  level,
  base: undefined,
  timestamp: stdTimeFunctions.isoTime
});

export const createLogger = (level: string): Logger => pino(createLoggerOptions(level));
