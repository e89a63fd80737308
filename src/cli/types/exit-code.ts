import type { ExitCode as ProcessExitCode } from '../../runtime/ports/process-terminator.js';

/**
 * Typed exit codes for CLI commands, following Unix conventions.
 */
export type ExitCode =
  | { kind: 'success' }        // 0
  | { kind: 'general_error' }  // 1 - the operation failed
  | { kind: 'misuse' };        // 2 - bad arguments or definition

export function toProcessExitCode(exitCode: ExitCode): ProcessExitCode {
  switch (exitCode.kind) {
    case 'success':
      return { kind: 'success' };
    case 'general_error':
      return { kind: 'failure' };
    case 'misuse':
      return { kind: 'misuse' };
  }
}

/**
 * Numeric code for raw process.exit(), when no terminator is available
 * (the container failed to start).
 */
export function toNumericExitCode(exitCode: ExitCode): number {
  switch (exitCode.kind) {
    case 'success':
      return 0;
    case 'general_error':
      return 1;
    case 'misuse':
      return 2;
  }
}
