import type { Result, ResultAsync } from 'neverthrow';
import { ok, err, okAsync, errAsync } from 'neverthrow';
import type { FileSystemPort } from '../ports/fs.port.js';
import type { MappedFilePort } from '../ports/mapped-file.port.js';
import type { CompressionPort } from '../ports/compression.port.js';
import type { DirectoryResolverPort } from '../ports/directory-resolver.port.js';
import type { FileDefinition } from '../durable-core/definition.js';
import type { ByteRangeError, DiskError, PathError } from '../durable-core/errors.js';
import type { Metadata } from '../durable-core/metadata.js';
import { metadata } from '../durable-core/metadata.js';
import { decodeUtf8Strict } from '../durable-core/lib/utf8.js';
import { decodeFailed } from '../durable-core/codecs/codec.js';
import type { FilePaths } from './file-paths.js';
import { resolveFilePaths } from './file-paths.js';
import { filesize, removeViaTemp, writeViaTemp } from './atomic-write.js';
import type { DiskLogger } from './logger.js';

export interface DiskDeps {
  readonly fs: FileSystemPort;
  readonly mapped: MappedFilePort;
  readonly compression: CompressionPort;
  readonly resolver: DirectoryResolverPort;
  readonly logger: DiskLogger;
}

interface Prepared {
  readonly paths: FilePaths;
  readonly bytes: Uint8Array;
}

/**
 * Range check shared by buffered and region reads: `start > end` is invalid.
 * `start === end` reads one byte on the buffered path; see `fileBytes`.
 */
export function checkRange(start: number, end: number): Result<void, ByteRangeError> {
  if (!Number.isSafeInteger(start) || !Number.isSafeInteger(end) || start < 0 || start > end) {
    return err({ code: 'RANGE_INVALID', start, end, message: `Invalid byte range [${start}, ${end})` } as const);
  }
  return ok(undefined);
}

function outOfBounds(end: number, available: number): ByteRangeError {
  return { code: 'RANGE_OUT_OF_BOUNDS', end, available, message: `Range ends at ${end} but only ${available} bytes are available` };
}

/**
 * Disk operations for one validated file definition.
 *
 * Every method resolves its paths afresh, runs its steps strictly in order and
 * settles once the last one finished. Nothing is cached between calls and no
 * lock is taken: concurrent writers to the same definition race on the same
 * temp name and the last rename wins.
 */
export class DiskFile<T> {
  constructor(
    protected readonly deps: DiskDeps,
    readonly definition: FileDefinition<T>
  ) {}

  // ---------------------------------------------------------------------------
  // Paths
  // ---------------------------------------------------------------------------

  paths(): Result<FilePaths, PathError> {
    return resolveFilePaths(this.deps.resolver, this.definition);
  }

  projectDirPath(): Result<string, PathError> {
    return this.paths().map((p) => p.projectDir);
  }

  basePath(): Result<string, PathError> {
    return this.paths().map((p) => p.baseDir);
  }

  subDirParentPath(): Result<string, PathError> {
    return this.paths().map((p) => p.subParentDir);
  }

  absolutePath(): Result<string, PathError> {
    return this.paths().map((p) => p.canonical);
  }

  absolutePathGzip(): Result<string, PathError> {
    return this.paths().map((p) => p.gzip);
  }

  // ---------------------------------------------------------------------------
  // Encoding
  // ---------------------------------------------------------------------------

  toBytes(value: T): Result<Uint8Array, DiskError> {
    return this.definition.codec.encode(value);
  }

  fromBytes(bytes: Uint8Array): Result<T, DiskError> {
    return this.definition.codec.decode(bytes);
  }

  // ---------------------------------------------------------------------------
  // Save
  // ---------------------------------------------------------------------------

  /** Direct write to the final path. Not interruption safe. */
  save(value: T): ResultAsync<Metadata, DiskError> {
    return this.prepare(value).andThen(({ paths, bytes }) =>
      this.deps.fs
        .writeFileBytes(paths.canonical, bytes)
        .map(() => this.written('save', bytes.length, paths.canonical))
    );
  }

  saveGzip(value: T): ResultAsync<Metadata, DiskError> {
    return this.prepareGzip(value).andThen(({ paths, bytes }) =>
      this.deps.fs.writeFileBytes(paths.gzip, bytes).map(() => this.written('saveGzip', bytes.length, paths.gzip))
    );
  }

  saveAtomic(value: T): ResultAsync<Metadata, DiskError> {
    return this.prepare(value).andThen(({ paths, bytes }) =>
      writeViaTemp(this.deps, (tmp) => this.deps.fs.writeFileBytes(tmp, bytes), paths.tmp, paths.canonical).map(() =>
        this.written('saveAtomic', bytes.length, paths.canonical)
      )
    );
  }

  saveAtomicGzip(value: T): ResultAsync<Metadata, DiskError> {
    return this.prepareGzip(value).andThen(({ paths, bytes }) =>
      writeViaTemp(this.deps, (tmp) => this.deps.fs.writeFileBytes(tmp, bytes), paths.gzipTmp, paths.gzip).map(() =>
        this.written('saveAtomicGzip', bytes.length, paths.gzip)
      )
    );
  }

  saveMemmap(value: T): ResultAsync<Metadata, DiskError> {
    return this.prepare(value).andThen(({ paths, bytes }) =>
      this.deps.mapped
        .writeRegion(paths.canonical, bytes)
        .map(() => this.written('saveMemmap', bytes.length, paths.canonical))
    );
  }

  saveGzipMemmap(value: T): ResultAsync<Metadata, DiskError> {
    return this.prepareGzip(value).andThen(({ paths, bytes }) =>
      this.deps.mapped.writeRegion(paths.gzip, bytes).map(() => this.written('saveGzipMemmap', bytes.length, paths.gzip))
    );
  }

  saveAtomicMemmap(value: T): ResultAsync<Metadata, DiskError> {
    return this.prepare(value).andThen(({ paths, bytes }) =>
      writeViaTemp(this.deps, (tmp) => this.deps.mapped.writeRegion(tmp, bytes), paths.tmp, paths.canonical).map(() =>
        this.written('saveAtomicMemmap', bytes.length, paths.canonical)
      )
    );
  }

  saveAtomicGzipMemmap(value: T): ResultAsync<Metadata, DiskError> {
    return this.prepareGzip(value).andThen(({ paths, bytes }) =>
      writeViaTemp(this.deps, (tmp) => this.deps.mapped.writeRegion(tmp, bytes), paths.gzipTmp, paths.gzip).map(() =>
        this.written('saveAtomicGzipMemmap', bytes.length, paths.gzip)
      )
    );
  }

  /** Create the directories and an empty file at the canonical path. */
  touch(): ResultAsync<Metadata, DiskError> {
    return this.paths().asyncAndThen((paths) =>
      this.deps.fs
        .mkdirp(paths.baseDir)
        .andThen(() => this.deps.fs.writeFileBytes(paths.canonical, new Uint8Array(0)))
        .map(() => this.written('touch', 0, paths.canonical))
    );
  }

  // ---------------------------------------------------------------------------
  // Load
  // ---------------------------------------------------------------------------

  readToBytes(): ResultAsync<Uint8Array, DiskError> {
    return this.paths().asyncAndThen((paths) => this.deps.fs.readFileBytes(paths.canonical));
  }

  /** Read the `.gz` file and return the decompressed bytes. */
  readToBytesGzip(): ResultAsync<Uint8Array, DiskError> {
    return this.paths().asyncAndThen((paths) =>
      this.deps.fs.readFileBytes(paths.gzip).andThen((bytes) => this.deps.compression.gunzip(bytes))
    );
  }

  readToString(): ResultAsync<string, DiskError> {
    return this.readToBytes().andThen((bytes) =>
      decodeUtf8Strict(bytes).mapErr((e) => decodeFailed('utf8', e.message))
    );
  }

  fromFile(): ResultAsync<T, DiskError> {
    return this.readToBytes().andThen((bytes) => this.fromBytes(bytes));
  }

  fromFileGzip(): ResultAsync<T, DiskError> {
    return this.readToBytesGzip().andThen((bytes) => this.fromBytes(bytes));
  }

  fromFileMemmap(): ResultAsync<T, DiskError> {
    return this.paths()
      .asyncAndThen((paths) => this.deps.mapped.readRegion(paths.canonical))
      .andThen((bytes) => this.fromBytes(bytes));
  }

  fromFileGzipMemmap(): ResultAsync<T, DiskError> {
    return this.paths()
      .asyncAndThen((paths) => this.deps.mapped.readRegion(paths.gzip))
      .andThen((bytes) => this.deps.compression.gunzip(bytes))
      .andThen((bytes) => this.fromBytes(bytes));
  }

  /**
   * Bytes `[start, end)` of the canonical file.
   *
   * Quirk kept for compatibility: `start === end` returns the single byte at
   * `start` rather than an empty buffer. A file too short for the range is
   * RANGE_OUT_OF_BOUNDS.
   */
  fileBytes(start: number, end: number): ResultAsync<Uint8Array, DiskError> {
    const length = start === end ? 1 : end - start;
    return checkRange(start, end)
      .andThen(() => this.paths())
      .asyncAndThen((paths) => this.deps.fs.readRange(paths.canonical, start, length))
      .andThen((bytes) => (bytes.length === length ? okAsync(bytes) : errAsync(outOfBounds(start + length, start + bytes.length))));
  }

  /** Region-read variant of `fileBytes`; here `start === end` is an empty slice. */
  fileBytesMemmap(start: number, end: number): ResultAsync<Uint8Array, DiskError> {
    return checkRange(start, end)
      .andThen(() => this.paths())
      .asyncAndThen((paths) => this.deps.mapped.readRegion(paths.canonical))
      .andThen((region) => (region.length < end ? errAsync(outOfBounds(end, region.length)) : okAsync(region.subarray(start, end))));
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  exists(): ResultAsync<boolean, DiskError> {
    return this.paths().asyncAndThen((paths) => this.deps.fs.exists(paths.canonical));
  }

  existsGzip(): ResultAsync<boolean, DiskError> {
    return this.paths().asyncAndThen((paths) => this.deps.fs.exists(paths.gzip));
  }

  /** Size of the canonical file; FS_NOT_FOUND when absent. */
  fileSize(): ResultAsync<Metadata, DiskError> {
    return this.paths().asyncAndThen((paths) => this.sizeOf(paths.canonical));
  }

  fileSizeGzip(): ResultAsync<Metadata, DiskError> {
    return this.paths().asyncAndThen((paths) => this.sizeOf(paths.gzip));
  }

  /** Total bytes of regular files under the project directory. */
  projectDirSize(): ResultAsync<Metadata, DiskError> {
    return this.paths().asyncAndThen((paths) =>
      this.deps.fs.treeSize(paths.projectDir).map((size) => metadata(size, paths.projectDir))
    );
  }

  /** Total bytes of regular files under the first sub-directory. */
  subDirSize(): ResultAsync<Metadata, DiskError> {
    return this.paths().asyncAndThen((paths) =>
      this.deps.fs.treeSize(paths.subParentDir).map((size) => metadata(size, paths.subParentDir))
    );
  }

  // ---------------------------------------------------------------------------
  // Remove
  // ---------------------------------------------------------------------------

  /** Direct unlink. An absent file is success with size 0. */
  rm(): ResultAsync<Metadata, DiskError> {
    return this.paths().asyncAndThen((paths) =>
      this.removeIfPresent(paths.canonical, 'rm', () => this.deps.fs.unlink(paths.canonical))
    );
  }

  rmAtomic(): ResultAsync<Metadata, DiskError> {
    return this.paths().asyncAndThen((paths) =>
      this.removeIfPresent(paths.canonical, 'rmAtomic', () => removeViaTemp(this.deps, paths.canonical, paths.tmp))
    );
  }

  rmAtomicGzip(): ResultAsync<Metadata, DiskError> {
    return this.paths().asyncAndThen((paths) =>
      this.removeIfPresent(paths.gzip, 'rmAtomicGzip', () => removeViaTemp(this.deps, paths.gzip, paths.gzipTmp))
    );
  }

  /**
   * Delete leftover `.tmp` and `.gz.tmp` files. Nothing to delete is success;
   * a temp file that exists but cannot be deleted is an error.
   */
  rmTmp(): ResultAsync<void, DiskError> {
    return this.paths().asyncAndThen((paths) =>
      this.unlinkIfPresent(paths.tmp).andThen(() => this.unlinkIfPresent(paths.gzipTmp))
    );
  }

  // ---------------------------------------------------------------------------
  // Directories
  // ---------------------------------------------------------------------------

  /** Create every directory up to the file's parent. Returns that directory. */
  mkdir(): ResultAsync<string, DiskError> {
    return this.paths().asyncAndThen((paths) => this.deps.fs.mkdirp(paths.baseDir).map(() => paths.baseDir));
  }

  /**
   * Recursively delete the first sub-directory (the project directory when
   * the definition has none). Symlinks are removed, not followed.
   */
  rmSub(): ResultAsync<Metadata, DiskError> {
    return this.paths().asyncAndThen((paths) => this.removeTree('rmSub', paths.subParentDir));
  }

  /** Recursively delete the project directory. Symlinks are removed, not followed. */
  rmProject(): ResultAsync<Metadata, DiskError> {
    return this.paths().asyncAndThen((paths) => this.removeTree('rmProject', paths.projectDir));
  }

  // ---------------------------------------------------------------------------
  // Internal
  // ---------------------------------------------------------------------------

  /** Encode first so a failing codec leaves no directories behind, then create them. */
  private prepare(value: T): ResultAsync<Prepared, DiskError> {
    return this.paths()
      .andThen((paths) => this.toBytes(value).map((bytes) => ({ paths, bytes })))
      .asyncAndThen((prepared) => this.deps.fs.mkdirp(prepared.paths.baseDir).map(() => prepared));
  }

  private prepareGzip(value: T): ResultAsync<Prepared, DiskError> {
    return this.prepare(value).andThen(({ paths, bytes }) =>
      this.deps.compression.gzip(bytes).map((compressed) => ({ paths, bytes: compressed }))
    );
  }

  private written(operation: string, size: number, path: string): Metadata {
    this.deps.logger.debug({ operation, path, size }, 'file written');
    return metadata(size, path);
  }

  private sizeOf(path: string): ResultAsync<Metadata, DiskError> {
    return this.deps.fs.stat(path).map((s) => metadata(s.sizeBytes, path));
  }

  private removeIfPresent(
    path: string,
    operation: string,
    remove: () => ResultAsync<void, DiskError>
  ): ResultAsync<Metadata, DiskError> {
    return this.deps.fs.exists(path).andThen((present) => {
      if (!present) return okAsync(metadata(0, path));
      return filesize(this.deps.fs, path).andThen((size) =>
        remove().map(() => {
          this.deps.logger.debug({ operation, path, size }, 'file removed');
          return metadata(size, path);
        })
      );
    });
  }

  private unlinkIfPresent(path: string): ResultAsync<void, DiskError> {
    return this.deps.fs.exists(path).andThen((present) => (present ? this.deps.fs.unlink(path) : okAsync(undefined)));
  }

  private removeTree(operation: string, dir: string): ResultAsync<Metadata, DiskError> {
    return this.deps.fs
      .treeSize(dir)
      .orElse(() => okAsync(0))
      .andThen((size) =>
        this.deps.fs.removeTree(dir).map(() => {
          this.deps.logger.debug({ operation, path: dir, size }, 'directory removed');
          return metadata(size, dir);
        })
      );
  }
}
