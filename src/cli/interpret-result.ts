/**
 * The only place a CliResult turns into a process exit.
 */

import type { CliResult } from './types/cli-result.js';
import { toProcessExitCode, toNumericExitCode } from './types/exit-code.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { printResult } from './output-formatter.js';

/** With DI available. Success lets the process end on its own. */
export function interpretCliResult(result: CliResult, terminator: ProcessTerminator): void {
  printResult(result);

  switch (result.kind) {
    case 'success':
      return;
    case 'failure':
      terminator.terminate(toProcessExitCode(result.exitCode));
  }
}

/** Before or without the container (startup failures). */
export function interpretCliResultWithoutDI(result: CliResult): void {
  printResult(result);

  switch (result.kind) {
    case 'success':
      return;
    case 'failure':
      process.exit(toNumericExitCode(result.exitCode));
  }
}
