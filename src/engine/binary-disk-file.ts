import type { ResultAsync } from 'neverthrow';
import type { BinaryFileDefinition } from '../durable-core/definition.js';
import type { DiskError } from '../durable-core/errors.js';
import { FRAME_LAYOUT, fullHeader, readFrameVersion } from '../durable-core/frame.js';
import type { VersionedLoader } from '../durable-core/versions.js';
import { selectVersion } from '../durable-core/versions.js';
import { decodeUtf8Strict } from '../durable-core/lib/utf8.js';
import { decodeFailed } from '../durable-core/codecs/codec.js';
import type { DiskDeps } from './disk-file.js';
import { DiskFile } from './disk-file.js';

export type VersionLoader<T, E> = VersionedLoader<() => ResultAsync<T, E>>;

export interface VersionedValue<T> {
  readonly version: number;
  readonly value: T;
}

/**
 * A framed file: every payload on disk starts with the definition's 24-byte
 * header and its version byte.
 */
export class BinaryDiskFile<T> extends DiskFile<T> {
  declare readonly definition: BinaryFileDefinition<T>;

  constructor(deps: DiskDeps, definition: BinaryFileDefinition<T>) {
    super(deps, definition);
  }

  /** Header and version as written at the start of the file. */
  fullHeader(): Uint8Array {
    return fullHeader(this.definition.frame);
  }

  /**
   * Version byte of the canonical file, after checking its header. Reads only
   * the first 25 bytes, so it does not work on `.gz` files.
   */
  fileVersion(): ResultAsync<number, DiskError> {
    return this.paths()
      .asyncAndThen((paths) => this.deps.fs.readRange(paths.canonical, 0, FRAME_LAYOUT.TOTAL_SIZE))
      .andThen((prefix) => readFrameVersion(this.definition.frame, prefix));
  }

  /** First 24 bytes of the file as strict UTF-8. */
  fileHeaderToString(): ResultAsync<string, DiskError> {
    return this.fileBytes(0, FRAME_LAYOUT.HEADER_SIZE).andThen((bytes) =>
      decodeUtf8Strict(bytes).mapErr((e) => decodeFailed('utf8', e.message))
    );
  }

  /**
   * Load through the loader registered for the on-disk version. Each loader
   * decodes its historical layout and upgrades it. The first loader tagged
   * with the version wins; duplicates later in the list are ignored.
   */
  fromVersions<E>(loaders: readonly VersionLoader<T, E>[]): ResultAsync<VersionedValue<T>, DiskError | E> {
    return this.fileVersion().andThen((version) =>
      selectVersion(version, loaders).asyncAndThen((load) => load().map((value) => ({ version, value })))
    );
  }
}
