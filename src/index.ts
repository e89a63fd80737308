import 'reflect-metadata';

// Definitions and naming
export {
  defineFile,
  defineBinaryFile,
  isIssuedDefinition,
  NAME_LIMITS,
  type FileDefinition,
  type FileDefinitionFields,
  type FileDefinitionInput,
  type BinaryFileDefinition,
  type BinaryFileDefinitionInput,
  type DefineOptions,
} from './durable-core/definition.js';
export { deriveFileIdentity, GZIP_SUFFIX, TMP_SUFFIX, type FileIdentity } from './durable-core/file-naming.js';
export { DIRECTORY_KINDS, DEFAULT_DIRECTORY_KIND, parseDirectoryKind, type DirectoryKind } from './durable-core/directory-kind.js';

// Frame
export {
  FRAME_LAYOUT,
  MAX_FRAME_VERSION,
  fullHeader,
  validateHeader,
  readFrameVersion,
  frameBytes,
  stripFrame,
  type Frame,
} from './durable-core/frame.js';
export { selectVersion, type VersionedLoader } from './durable-core/versions.js';

// Results and errors
export { metadata, formatMetadata, formatSize, type Metadata } from './durable-core/metadata.js';
export {
  formatDiskError,
  type DiskError,
  type PathError,
  type FrameError,
  type CodecError,
  type ByteRangeError,
  type VersionError,
  type DefinitionError,
  type DefinitionIssue,
  type DecodeError,
} from './durable-core/errors.js';
export type { FsError, FileSystemPort, FileStat } from './ports/fs.port.js';
export type { CompressionError, CompressionPort } from './ports/compression.port.js';
export type { MappedFilePort } from './ports/mapped-file.port.js';
export type { DirectoryResolverPort } from './ports/directory-resolver.port.js';

// Codecs
export * from './durable-core/codecs/index.js';

// Engine
export { DiskFile, checkRange, type DiskDeps } from './engine/disk-file.js';
export { BinaryDiskFile, type VersionLoader, type VersionedValue } from './engine/binary-disk-file.js';
export { resolveFilePaths, assertAbsolute, type FilePaths } from './engine/file-paths.js';
export { filesize, writeViaTemp, removeViaTemp } from './engine/atomic-write.js';
export type { DiskLogger } from './engine/logger.js';
export { Stowage, type StowageCodecs } from './engine/stowage.js';

// Adapters
export { NodeFileSystem } from './infra/local/fs/index.js';
export { NodeMappedFile } from './infra/local/mapped-file/index.js';
export { NodeGzip } from './infra/local/gzip/index.js';
export { LocalDirectoryResolver, ROOT_DIR_ENV, type ResolverHost } from './infra/local/directory-resolver/index.js';

// Composition
export { initializeContainer, resetContainer, container } from './di/container.js';
export { DI } from './di/tokens.js';
export { loadConfig, createValidatedConfig, type AppConfig, type ValidatedConfig } from './config/app-config.js';
export * from './errors/index.js';
