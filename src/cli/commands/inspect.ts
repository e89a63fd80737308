/**
 * Inspect Command
 *
 * Reads the 25-byte frame at the start of a file and reports header,
 * version and size. Works on any file; it does not know the expected header.
 */

import type { ResultAsync } from 'neverthrow';
import type { FileStat, FsError } from '../../ports/fs.port.js';
import { FRAME_LAYOUT } from '../../durable-core/frame.js';
import { formatSize } from '../../durable-core/metadata.js';
import type { CliResult } from '../types/cli-result.js';
import { success, failure } from '../types/cli-result.js';
import { diskFailure } from './location.js';

export interface InspectCommandDeps {
  readonly readRange: (filePath: string, position: number, length: number) => ResultAsync<Uint8Array, FsError>;
  readonly stat: (filePath: string) => ResultAsync<FileStat, FsError>;
}

export function toHex(bytes: Uint8Array): string {
  return Array.from(bytes, (b) => b.toString(16).padStart(2, '0')).join(' ');
}

/** Printable ASCII only; anything else is not shown as text. */
export function asPrintable(bytes: Uint8Array): string | null {
  for (const b of bytes) {
    if (b < 0x20 || b > 0x7e) return null;
  }
  return Buffer.from(bytes).toString('latin1');
}

export async function executeInspectCommand(deps: InspectCommandDeps, filePath: string): Promise<CliResult> {
  const stat = await deps.stat(filePath);
  if (stat.isErr()) return diskFailure('Cannot inspect', stat.error);
  if (stat.value.kind !== 'file') return failure(`Not a regular file: ${filePath}`);

  const prefix = await deps.readRange(filePath, 0, FRAME_LAYOUT.TOTAL_SIZE);
  if (prefix.isErr()) return diskFailure('Cannot inspect', prefix.error);

  const bytes = prefix.value;
  if (bytes.length < FRAME_LAYOUT.TOTAL_SIZE) {
    return failure(`Not a framed file: ${bytes.length} bytes, a frame needs ${FRAME_LAYOUT.TOTAL_SIZE}`, {
      details: [filePath],
    });
  }

  const header = bytes.subarray(FRAME_LAYOUT.HEADER_OFFSET, FRAME_LAYOUT.HEADER_SIZE);
  const text = asPrintable(header);

  return success({
    message: filePath,
    fields: [
      ['header', toHex(header)],
      ['header text', text ?? '(not printable)'],
      ['version', String(bytes[FRAME_LAYOUT.VERSION_OFFSET])],
      ['size', `${formatSize(stat.value.sizeBytes)} (payload ${stat.value.sizeBytes - FRAME_LAYOUT.TOTAL_SIZE} bytes)`],
    ],
  });
}
