import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';

const encoder = new TextEncoder();
const strictDecoder = new TextDecoder('utf-8', { fatal: true });

export function utf8ByteLength(s: string): number {
  return encoder.encode(s).length;
}

export function encodeUtf8(s: string): Uint8Array {
  return encoder.encode(s);
}

/** Rejects malformed sequences instead of substituting U+FFFD. */
export function decodeUtf8Strict(bytes: Uint8Array): Result<string, { readonly message: string }> {
  try {
    return ok(strictDecoder.decode(bytes));
  } catch (e) {
    return err({ message: e instanceof Error ? e.message : String(e) });
  }
}
