import type { Result } from 'neverthrow';
import type { z } from 'zod';
import type { CodecError, DecodeError } from '../errors.js';

/**
 * One serialization format: value to bytes and back.
 * `extension` is the default file extension (may be empty).
 */
export interface Codec<T> {
  readonly format: string;
  readonly extension: string;
  encode(value: T): Result<Uint8Array, CodecError>;
  decode(bytes: Uint8Array): Result<T, DecodeError>;
}

/**
 * Decoders validate with a zod schema; output type is whatever the schema
 * produces, input is left open so coercing and transforming schemas fit.
 */
export type ValueSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/**
 * Encoder settings, built once from configuration and passed to codec and
 * compression constructors.
 */
export interface CodecSettings {
  readonly jsonIndent: number;
  readonly gzipLevel: number;
}

export const DEFAULT_CODEC_SETTINGS: CodecSettings = Object.freeze({
  jsonIndent: 2,
  gzipLevel: 1,
});

export function encodeFailed(format: string, e: unknown): CodecError {
  return { code: 'CODEC_ENCODE_FAILED', format, message: e instanceof Error ? e.message : String(e) };
}

export function decodeFailed(format: string, e: unknown): CodecError {
  return { code: 'CODEC_DECODE_FAILED', format, message: e instanceof Error ? e.message : String(e) };
}

export function schemaFailed(format: string, error: z.ZodError): CodecError {
  const detail = error.errors
    .map((issue) => `${issue.path.length ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
  return { code: 'CODEC_DECODE_FAILED', format, message: `Decoded value failed validation: ${detail}` };
}
