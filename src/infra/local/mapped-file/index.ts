import * as fs from 'fs/promises';
import type { ResultAsync } from 'neverthrow';
import { ResultAsync as RA } from 'neverthrow';
import type { MappedFilePort } from '../../../ports/mapped-file.port.js';
import type { FsError } from '../../../ports/fs.port.js';
import { mapFsError } from '../fs/index.js';

/**
 * Fixed-region adapter. Node has no mmap, so a region is read and written
 * through one file handle with positional I/O against offset 0, and the file
 * is sized to the buffer before it is filled.
 */
export class NodeMappedFile implements MappedFilePort {
  readRegion(filePath: string): ResultAsync<Uint8Array, FsError> {
    return RA.fromPromise(
      (async () => {
        const handle = await fs.open(filePath, 'r');
        try {
          const { size } = await handle.stat();
          const region = Buffer.alloc(size);
          let filled = 0;
          while (filled < size) {
            const { bytesRead } = await handle.read(region, filled, size - filled, filled);
            if (bytesRead === 0) break;
            filled += bytesRead;
          }
          return new Uint8Array(region.buffer, region.byteOffset, filled);
        } finally {
          await handle.close();
        }
      })(),
      (e) => mapFsError(e, filePath)
    );
  }

  writeRegion(filePath: string, bytes: Uint8Array): ResultAsync<void, FsError> {
    return RA.fromPromise(
      (async () => {
        const handle = await fs.open(filePath, 'w+', 0o600);
        try {
          await handle.truncate(bytes.length);
          let written = 0;
          while (written < bytes.length) {
            const { bytesWritten } = await handle.write(bytes, written, bytes.length - written, written);
            written += bytesWritten;
          }
          await handle.sync();
        } finally {
          await handle.close();
        }
      })(),
      (e) => mapFsError(e, filePath)
    );
  }
}
