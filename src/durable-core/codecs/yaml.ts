import { ok, err } from 'neverthrow';
import { parse, stringify } from 'yaml';
import type { Codec, ValueSchema } from './codec.js';
import { decodeFailed, encodeFailed } from './codec.js';
import { validateDecoded } from './validate.js';
import { decodeUtf8Strict, encodeUtf8 } from '../lib/utf8.js';

/** YAML via the `yaml` package, `.yml`. */
export function yamlCodec<T>(schema: ValueSchema<T>): Codec<T> {
  return {
    format: 'yaml',
    extension: 'yml',
    encode: (value) => {
      try {
        return ok(encodeUtf8(stringify(value)));
      } catch (e) {
        return err(encodeFailed('yaml', e));
      }
    },
    decode: (bytes) =>
      decodeUtf8Strict(bytes)
        .mapErr((e) => decodeFailed('yaml', e.message))
        .andThen((text) => {
          try {
            const parsed: unknown = parse(text);
            return ok(parsed);
          } catch (e) {
            return err(decodeFailed('yaml', e));
          }
        })
        .andThen((v) => validateDecoded('yaml', schema, v)),
  };
}
