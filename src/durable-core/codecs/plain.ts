import { ok } from 'neverthrow';
import type { Codec, ValueSchema } from './codec.js';
import { decodeFailed } from './codec.js';
import { validateDecoded } from './validate.js';
import { decodeUtf8Strict, encodeUtf8 } from '../lib/utf8.js';

export type PlainValue = string | number | boolean | bigint;

/**
 * Bare text, `.txt`. Values are written with `String(value)`; the schema
 * turns the text back into a value, so numeric files want `z.coerce.number()`.
 */
export function plainCodec<T extends PlainValue>(schema: ValueSchema<T>): Codec<T> {
  return {
    format: 'plain',
    extension: 'txt',
    encode: (value) => ok(encodeUtf8(String(value))),
    decode: (bytes) =>
      decodeUtf8Strict(bytes)
        .mapErr((e) => decodeFailed('plain', e.message))
        .andThen((text) => validateDecoded('plain', schema, text)),
  };
}
