import pino from 'pino';
import type { Logger } from './types.js';
import { parseLogLevel } from './types.js';
import { REDACTION_CONFIG } from './redaction.js';

/**
 * Logger for code that runs before the DI container exists
 * (container bootstrap, CLI argument handling).
 * After DI is ready, resolve ILoggerFactory instead.
 */
let bootstrapLogger: Logger | null = null;

export function getBootstrapLogger(): Logger {
  if (!bootstrapLogger) {
    bootstrapLogger = pino(
      {
        level: parseLogLevel(process.env['STOWAGE_LOG_LEVEL']),
        redact: REDACTION_CONFIG,
        timestamp: pino.stdTimeFunctions.isoTime,
      },
      pino.destination({ dest: 2, sync: true })
    );
  }

  return bootstrapLogger;
}

export function createBootstrapLogger(component: string): Logger {
  return getBootstrapLogger().child({ component });
}
