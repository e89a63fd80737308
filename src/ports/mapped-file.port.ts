import type { ResultAsync } from 'neverthrow';
import type { FsError } from './fs.port.js';

/**
 * Port: fixed-length file regions.
 *
 * The whole file is treated as one region of exactly its length: writes size
 * the file to the buffer first and then fill it from offset 0, reads take the
 * region as it stands. Callers must keep other processes from truncating the
 * file while an operation runs; nothing here checks that.
 */
export interface MappedFilePort {
  readRegion(filePath: string): ResultAsync<Uint8Array, FsError>;
  writeRegion(filePath: string, bytes: Uint8Array): ResultAsync<void, FsError>;
}
