import type { AppError } from './app-error.js';
import { assertNever } from '../runtime/assert-never.js';

export function formatAppError(error: AppError): string {
  switch (error._tag) {
    case 'ConfigInvalid':
      return ['Invalid stowage configuration:', ...error.issues.map((i) => `  ${i.variable}: ${i.message}`)].join('\n');

    case 'ContainerFailed':
      return `Could not register stowage ${error.stage}: ${describeCause(error.cause)}`;

    case 'CommandCrashed':
      return `stowage ${error.command} crashed: ${describeCause(error.cause)}`;

    default:
      return assertNever(error, 'app error');
  }
}

function describeCause(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (typeof value === 'string') return value;
  try {
    return JSON.stringify(value) ?? String(value);
  } catch (e) {
    return `${String(value)} (${e instanceof Error ? e.message : 'unserializable'})`;
  }
}
