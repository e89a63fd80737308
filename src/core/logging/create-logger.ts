import pino from 'pino';
import type { Logger, ILoggerFactory, LogLevel } from './types.js';
import { parseLogLevel } from './types.js';
import { REDACTION_CONFIG } from './redaction.js';

/**
 * Root pino logger. JSON lines go to stderr synchronously so CLI output on
 * stdout stays clean.
 */
function createRootLogger(level: LogLevel): Logger {
  return pino(
    {
      level,
      redact: REDACTION_CONFIG,
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    pino.destination({ dest: 2, sync: true })
  );
}

/**
 * Component logger factory, one per container.
 *
 * Level: the validated config value when wired by the container, otherwise
 * STOWAGE_LOG_LEVEL (trace | debug | info | warn | error | fatal | silent),
 * default silent.
 */
export class PinoLoggerFactory implements ILoggerFactory {
  private readonly _root: Logger;

  constructor(level: LogLevel = parseLogLevel(process.env['STOWAGE_LOG_LEVEL'])) {
    this._root = createRootLogger(level);
  }

  get root(): Logger {
    return this._root;
  }

  create(component: string): Logger {
    return this._root.child({ component });
  }
}
