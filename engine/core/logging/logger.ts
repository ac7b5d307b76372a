import { pino, type DestinationStream, type Logger, type LoggerOptions } from 'pino';
import type { LogLevel } from '../config/index.js';

export type { Logger };

/**
 * JSON logger for the bridge. Pass a destination to capture output.
 */
export function createLogger(level: LogLevel, destination?: DestinationStream): Logger {
  const options: LoggerOptions = {
    level,
    base: {
      service: 'cellbridge',
    },
  };

  return destination ? pino(options, destination) : pino(options);
}
