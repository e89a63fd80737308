import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { CodecError } from '../errors.js';
import type { ValueSchema } from './codec.js';
import { schemaFailed } from './codec.js';

export function validateDecoded<T>(format: string, schema: ValueSchema<T>, value: unknown): Result<T, CodecError> {
  const parsed = schema.safeParse(value);
  return parsed.success ? ok(parsed.data) : err(schemaFailed(format, parsed.error));
}
