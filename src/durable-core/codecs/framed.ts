import type { Codec } from './codec.js';
import type { Frame } from '../frame.js';
import { frameBytes, stripFrame } from '../frame.js';

export const FRAMED_EXTENSION = 'bin';

/**
 * Wrap a payload codec with the 25-byte header+version frame.
 * Decoding rejects a foreign or mismatched frame before the payload codec runs.
 */
export function framedCodec<T>(frame: Frame, inner: Codec<T>, extension: string = FRAMED_EXTENSION): Codec<T> {
  return {
    format: `framed(${inner.format})`,
    extension,
    encode: (value) => inner.encode(value).map((payload) => frameBytes(frame, payload)),
    decode: (bytes) => stripFrame(frame, bytes).andThen((payload) => inner.decode(payload)),
  };
}
