/**
 * The slice of pino's Logger the engine calls. A pino Logger satisfies it.
 */
export interface DiskLogger {
  debug(obj: object, msg: string): void;
  warn(obj: object, msg: string): void;
}
