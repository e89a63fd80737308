import type { Logger as PinoLogger } from 'pino';

/**
 * Logger type: pino's Logger, unwrapped.
 *
 * Data-first calls, the pino way:
 *   logger.debug({ path, size }, 'saved');
 *   logger.warn({ err }, 'temp cleanup after failed write');
 */
export type Logger = PinoLogger;

export interface ILoggerFactory {
  /** Child logger bound to `{ component }`. */
  create(component: string): Logger;

  readonly root: Logger;
}

export type LogLevel = 'silent' | 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

export function parseLogLevel(raw: string | undefined): LogLevel {
  const level = raw?.toLowerCase();
  return LOG_LEVELS.find((l) => l === level) ?? 'silent';
}
