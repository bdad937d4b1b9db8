import pino, { stdTimeFunctions } from 'pino';
import type { Logger } from 'pino';

export type { Logger };

export type CreateLoggerOptions = {
  level?: string;
  name?: string;
};

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  return pino({
    level: options.level ?? process.env.LOG_LEVEL ?? 'info',
    name: options.name,
    base: undefined,
    timestamp: stdTimeFunctions.isoTime
  });
}

export const silentLogger: Logger = pino({ level: 'silent' });
