import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { FrameError } from './errors.js';

/**
 * Binary frame prepended to every framed payload.
 *
 * Layout (25 bytes, then the codec payload):
 *   [0-23]  header  (schema identity, fixed per file definition)
 *   [24]    version (uint8, payload schema revision)
 *   [25-]   payload
 *
 * LOCKED: changing these offsets makes every existing framed file unreadable.
 * When a file is gzipped the whole framed buffer is compressed, so callers
 * decompress before validating.
 */
export const FRAME_LAYOUT = {
  HEADER_OFFSET: 0,
  HEADER_SIZE: 24,
  VERSION_OFFSET: 24,
  TOTAL_SIZE: 25,
} as const;

export const MAX_FRAME_VERSION = 255;

export interface Frame {
  readonly header: Uint8Array;
  readonly version: number;
}

/** Header followed by the version byte. */
export function fullHeader(frame: Frame): Uint8Array {
  const out = new Uint8Array(FRAME_LAYOUT.TOTAL_SIZE);
  out.set(frame.header.subarray(0, FRAME_LAYOUT.HEADER_SIZE), FRAME_LAYOUT.HEADER_OFFSET);
  out[FRAME_LAYOUT.VERSION_OFFSET] = frame.version;
  return out;
}

function headerMatches(frame: Frame, bytes: Uint8Array): boolean {
  for (let i = 0; i < FRAME_LAYOUT.HEADER_SIZE; i++) {
    if (bytes[FRAME_LAYOUT.HEADER_OFFSET + i] !== frame.header[i]) return false;
  }
  return true;
}

function tooShort(actual: number): FrameError {
  return {
    code: 'FRAME_TOO_SHORT',
    expected: FRAME_LAYOUT.TOTAL_SIZE,
    actual,
    message: `Frame needs ${FRAME_LAYOUT.TOTAL_SIZE} bytes, got ${actual}`,
  };
}

const HEADER_MISMATCH: FrameError = {
  code: 'FRAME_HEADER_MISMATCH',
  message: 'Header does not match the file definition',
};

/**
 * Read the version byte of a framed buffer, checking length and header but
 * not the version itself.
 */
export function readFrameVersion(frame: Frame, bytes: Uint8Array): Result<number, FrameError> {
  if (bytes.length < FRAME_LAYOUT.TOTAL_SIZE) return err(tooShort(bytes.length));
  if (!headerMatches(frame, bytes)) return err(HEADER_MISMATCH);
  return ok(bytes[FRAME_LAYOUT.VERSION_OFFSET] ?? 0);
}

/**
 * Length first, then header, then version; the length check keeps the other
 * two in bounds.
 */
export function validateHeader(frame: Frame, bytes: Uint8Array): Result<void, FrameError> {
  return readFrameVersion(frame, bytes).andThen((actual) =>
    actual === frame.version
      ? ok(undefined)
      : err({
          code: 'FRAME_VERSION_MISMATCH',
          expected: frame.version,
          actual,
          message: `Expected version ${frame.version}, found ${actual}`,
        } as const)
  );
}

export function frameBytes(frame: Frame, payload: Uint8Array): Uint8Array {
  const out = new Uint8Array(FRAME_LAYOUT.TOTAL_SIZE + payload.length);
  out.set(fullHeader(frame), 0);
  out.set(payload, FRAME_LAYOUT.TOTAL_SIZE);
  return out;
}

/** Validate the frame and return the payload that follows it. */
export function stripFrame(frame: Frame, bytes: Uint8Array): Result<Uint8Array, FrameError> {
  return validateHeader(frame, bytes).map(() => bytes.subarray(FRAME_LAYOUT.TOTAL_SIZE));
}
