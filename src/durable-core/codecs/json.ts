import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { CodecError } from '../errors.js';
import type { Codec, CodecSettings, ValueSchema } from './codec.js';
import { DEFAULT_CODEC_SETTINGS, decodeFailed, encodeFailed } from './codec.js';
import { validateDecoded } from './validate.js';
import { decodeUtf8Strict, encodeUtf8 } from '../lib/utf8.js';

export function encodeJson(format: string, value: unknown, indent: number): Result<Uint8Array, CodecError> {
  let text: string | undefined;
  try {
    text = JSON.stringify(value, null, indent > 0 ? indent : undefined);
  } catch (e) {
    return err(encodeFailed(format, e));
  }
  // JSON.stringify yields undefined for undefined, functions and symbols.
  if (text === undefined) return err(encodeFailed(format, 'Value has no JSON representation'));
  return ok(encodeUtf8(text));
}

export function decodeJson(format: string, bytes: Uint8Array): Result<unknown, CodecError> {
  return decodeUtf8Strict(bytes)
    .mapErr((e) => decodeFailed(format, e.message))
    .andThen((text) => {
      try {
        const parsed: unknown = JSON.parse(text);
        return ok(parsed);
      } catch (e) {
        return err(decodeFailed(format, e));
      }
    });
}

/** Pretty-printed JSON, `.json`. */
export function jsonCodec<T>(schema: ValueSchema<T>, settings: CodecSettings = DEFAULT_CODEC_SETTINGS): Codec<T> {
  return {
    format: 'json',
    extension: 'json',
    encode: (value) => encodeJson('json', value, settings.jsonIndent),
    decode: (bytes) => decodeJson('json', bytes).andThen((v) => validateDecoded('json', schema, v)),
  };
}

/**
 * Compact JSON. The payload codec inside framed `.bin` files.
 */
export function compactJsonCodec<T>(schema: ValueSchema<T>): Codec<T> {
  return {
    format: 'compact-json',
    extension: 'json',
    encode: (value) => encodeJson('compact-json', value, 0),
    decode: (bytes) => decodeJson('compact-json', bytes).andThen((v) => validateDecoded('compact-json', schema, v)),
  };
}
