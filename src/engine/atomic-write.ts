import type { ResultAsync } from 'neverthrow';
import { okAsync, errAsync } from 'neverthrow';
import type { FileSystemPort, FsError } from '../ports/fs.port.js';
import type { DiskLogger } from './logger.js';

export interface AtomicDeps {
  readonly fs: FileSystemPort;
  readonly logger: DiskLogger;
}

/**
 * Remove a temp file left by a failed step. Already gone counts as removed;
 * any other unlink failure is returned and replaces the step's own error.
 */
export function discardTemp(deps: AtomicDeps, tmpPath: string, cause: { readonly code: string }): ResultAsync<void, FsError> {
  deps.logger.warn({ path: tmpPath, cause: cause.code }, 'removing temp file after failed write');
  return deps.fs
    .unlink(tmpPath)
    .orElse((e) => (e.code === 'FS_NOT_FOUND' ? okAsync(undefined) : errAsync(e)));
}

/**
 * Write to `tmpPath`, then rename it over `finalPath`.
 *
 * `finalPath` only ever holds the previous complete file or the new complete
 * file. A failed write or rename deletes the temp file and returns the
 * original error. No fsync happens before the rename, so a crash may lose the
 * update but never tears the old file.
 */
export function writeViaTemp<E extends { readonly code: string }>(
  deps: AtomicDeps,
  write: (tmpPath: string) => ResultAsync<void, E>,
  tmpPath: string,
  finalPath: string
): ResultAsync<void, E | FsError> {
  return write(tmpPath)
    .orElse((e) => discardTemp(deps, tmpPath, e).andThen(() => errAsync(e)))
    .andThen(() =>
      deps.fs.rename(tmpPath, finalPath).orElse((e) => discardTemp(deps, tmpPath, e).andThen(() => errAsync(e)))
    );
}

/**
 * Rename `targetPath` onto `tmpPath`, then delete `tmpPath`. A crash between
 * the two leaves a recognisable temp artifact that `rmTmp` clears.
 */
export function removeViaTemp(deps: AtomicDeps, targetPath: string, tmpPath: string): ResultAsync<void, FsError> {
  return deps.fs.rename(targetPath, tmpPath).andThen(() => deps.fs.unlink(tmpPath));
}

/** Size in bytes, or 0 when it cannot be read. */
export function filesize(fs: FileSystemPort, filePath: string): ResultAsync<number, never> {
  return fs
    .stat(filePath)
    .map((s) => s.sizeBytes)
    .orElse(() => okAsync(0));
}
