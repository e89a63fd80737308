import { ok } from 'neverthrow';
import type { Codec } from './codec.js';

/**
 * Zero-byte marker files with no extension. Content is ignored on read.
 */
export function emptyCodec(): Codec<null> {
  return {
    format: 'empty',
    extension: '',
    encode: () => ok(new Uint8Array(0)),
    decode: () => ok(null),
  };
}
