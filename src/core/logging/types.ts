import type { Logger as PinoLogger } from 'pino';

/**
 * Logger type - pino's own Logger, no wrapper.
 *
 * Data-first call style:
 *   logger.info({ rootPath, durationMs }, 'Cache tree scanned');
 *   logger.warn({ err: error }, 'Reference query failed');
 */
export type Logger = PinoLogger;

/**
 * Logger factory interface for DI.
 */
export interface ILoggerFactory {
  /** Create a child logger for a component */
  create(component: string): Logger;

  /** Root logger instance */
  readonly root: Logger;
}

export type LogLevel = 'silent' | 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

/**
 * Parse a level from the environment. Unknown or missing values fall back to `silent`:
 * the CLI writes its own output to stdout and keeps stderr quiet unless asked.
 */
export function parseLogLevel(raw: string | undefined): LogLevel {
  const level = raw?.toLowerCase();
  return LOG_LEVELS.find((l) => l === level) ?? 'silent';
}
