/**
 * CLI Result Types
 *
 * Commands return these; the composition root interprets them.
 */

import type { ExitCode } from './exit-code.js';

export interface CliOutput {
  readonly message: string;
  /** `label: value` rows shown under the message. */
  readonly fields?: readonly (readonly [label: string, value: string])[];
  readonly details?: readonly string[];
  readonly suggestions?: readonly string[];
}

export type CliResult =
  | { kind: 'success'; output?: CliOutput }
  | { kind: 'failure'; exitCode: ExitCode; output: CliOutput };

export function success(output?: CliOutput): CliResult {
  return { kind: 'success', output };
}

export function failure(
  message: string,
  options?: {
    exitCode?: ExitCode;
    details?: readonly string[];
    suggestions?: readonly string[];
  }
): CliResult {
  return {
    kind: 'failure',
    exitCode: options?.exitCode ?? { kind: 'general_error' },
    output: {
      message,
      details: options?.details,
      suggestions: options?.suggestions,
    },
  };
}

/** Bad arguments: exit 2. */
export function misuse(message: string, details?: readonly string[], suggestions?: readonly string[]): CliResult {
  return {
    kind: 'failure',
    exitCode: { kind: 'misuse' },
    output: { message, details, suggestions },
  };
}
