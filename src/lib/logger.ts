import pino, { type Logger } from 'pino';
import { DEFAULT_LOG_LEVEL, resolveLogLevel, type LogLevel } from './config';

export type { Logger };

/**
 * Synchronous logger writing to stderr
 */
export function createLogger(level: LogLevel = DEFAULT_LOG_LEVEL): Logger {
  return pino({ name: 'ytgrab', level }, pino.destination({ dest: 2, sync: true }));
}

export const logger = createLogger(resolveLogLevel(process.env.LOG_LEVEL));
