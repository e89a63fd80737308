import type { ResultAsync } from 'neverthrow';

export type FsError =
  | { readonly code: 'FS_IO_ERROR'; readonly message: string }
  | { readonly code: 'FS_NOT_FOUND'; readonly message: string }
  | { readonly code: 'FS_ALREADY_EXISTS'; readonly message: string }
  | { readonly code: 'FS_PERMISSION_DENIED'; readonly message: string }
  | { readonly code: 'FS_UNSUPPORTED'; readonly message: string };

export type EntryKind = 'file' | 'directory' | 'other';

export interface FileStat {
  readonly sizeBytes: number;
  readonly kind: EntryKind;
}

/**
 * Port: Directory tree operations.
 * Used by: disk-file (mkdir, rmProject, rmSub, directory sizes).
 */
export interface DirectoryOpsPort {
  /** Recursive create; an existing directory is success. */
  mkdirp(dirPath: string): ResultAsync<void, FsError>;

  /**
   * Recursive delete. Symlinks inside the tree are removed, never followed.
   * A missing directory is FS_NOT_FOUND.
   */
  removeTree(dirPath: string): ResultAsync<void, FsError>;

  /** Sum of regular file sizes below `dirPath`, not following symlinks. */
  treeSize(dirPath: string): ResultAsync<number, FsError>;
}

/**
 * Port: File reading and metadata.
 */
export interface FileReadPort {
  readFileBytes(filePath: string): ResultAsync<Uint8Array, FsError>;

  /**
   * Read up to `length` bytes starting at `position`.
   * The result is shorter than `length` only when the file ends first.
   */
  readRange(filePath: string, position: number, length: number): ResultAsync<Uint8Array, FsError>;

  stat(filePath: string): ResultAsync<FileStat, FsError>;

  /**
   * `false` only when the path is absent; any other failure to find out
   * (permissions, I/O) is an error.
   */
  exists(filePath: string): ResultAsync<boolean, FsError>;
}

/**
 * Port: File manipulation (write, rename, delete).
 */
export interface FileManipulationPort {
  /** Create or truncate, then write everything. No implicit fsync. */
  writeFileBytes(filePath: string, bytes: Uint8Array): ResultAsync<void, FsError>;
  rename(fromPath: string, toPath: string): ResultAsync<void, FsError>;
  unlink(filePath: string): ResultAsync<void, FsError>;
}

/**
 * Composite port consumed by the disk engine.
 */
export interface FileSystemPort extends DirectoryOpsPort, FileReadPort, FileManipulationPort {}
