import type { Logger, LoggerMeta } from './types';

/**
 * Logs to console.debug, console.info, console.warn and console.error.
 */
export class ConsoleLogger implements Logger {
  debug(message: string, meta?: LoggerMeta): void {
    console.debug(message, meta ?? {});
  }
  info(message: string, meta?: LoggerMeta): void {
    console.info(message, meta ?? {});
  }
  warn(message: string, meta?: LoggerMeta): void {
    console.warn(message, meta ?? {});
  }
  error(message: string, meta?: LoggerMeta): void {
    console.error(message, meta ?? {});
  }
}
