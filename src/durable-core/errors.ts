import type { FsError } from '../ports/fs.port.js';
import type { CompressionError } from '../ports/compression.port.js';
import type { DirectoryKind } from './directory-kind.js';
import { assertNever } from '../runtime/assert-never.js';

export type PathError =
  | { readonly code: 'PATH_DIRECTORY_UNAVAILABLE'; readonly kind: DirectoryKind; readonly message: string }
  | { readonly code: 'PATH_NOT_ABSOLUTE'; readonly path: string; readonly message: string }
  | { readonly code: 'PATH_DEFINITION_UNCHECKED'; readonly message: string };

export type FrameError =
  | { readonly code: 'FRAME_TOO_SHORT'; readonly expected: number; readonly actual: number; readonly message: string }
  | { readonly code: 'FRAME_HEADER_MISMATCH'; readonly message: string }
  | { readonly code: 'FRAME_VERSION_MISMATCH'; readonly expected: number; readonly actual: number; readonly message: string };

export type CodecError =
  | { readonly code: 'CODEC_ENCODE_FAILED'; readonly format: string; readonly message: string }
  | { readonly code: 'CODEC_DECODE_FAILED'; readonly format: string; readonly message: string };

export type ByteRangeError =
  | { readonly code: 'RANGE_INVALID'; readonly start: number; readonly end: number; readonly message: string }
  | { readonly code: 'RANGE_OUT_OF_BOUNDS'; readonly end: number; readonly available: number; readonly message: string };

export type VersionError = {
  readonly code: 'VERSION_NOT_MATCHED';
  readonly found: number;
  readonly candidates: readonly number[];
  readonly message: string;
};

export type DefinitionIssue = Readonly<{
  readonly path: string;
  readonly message: string;
}>;

export type DefinitionError = {
  readonly code: 'DEFINITION_INVALID';
  readonly issues: readonly DefinitionIssue[];
  readonly message: string;
};

export type DecodeError = CodecError | FrameError;

export type DiskError =
  | FsError
  | PathError
  | FrameError
  | CodecError
  | ByteRangeError
  | CompressionError
  | VersionError
  | DefinitionError;

export function formatDiskError(error: DiskError): string {
  switch (error.code) {
    case 'DEFINITION_INVALID':
      return `${error.message}\n${error.issues.map((i) => `  - ${i.path}: ${i.message}`).join('\n')}`;
    case 'CODEC_ENCODE_FAILED':
    case 'CODEC_DECODE_FAILED':
      return `[${error.code}] ${error.format}: ${error.message}`;
    case 'FS_IO_ERROR':
    case 'FS_NOT_FOUND':
    case 'FS_ALREADY_EXISTS':
    case 'FS_PERMISSION_DENIED':
    case 'FS_UNSUPPORTED':
    case 'PATH_DIRECTORY_UNAVAILABLE':
    case 'PATH_NOT_ABSOLUTE':
    case 'PATH_DEFINITION_UNCHECKED':
    case 'FRAME_TOO_SHORT':
    case 'FRAME_HEADER_MISMATCH':
    case 'FRAME_VERSION_MISMATCH':
    case 'RANGE_INVALID':
    case 'RANGE_OUT_OF_BOUNDS':
    case 'GZIP_COMPRESS_FAILED':
    case 'GZIP_DECOMPRESS_FAILED':
    case 'VERSION_NOT_MATCHED':
      return `[${error.code}] ${error.message}`;
    default:
      return assertNever(error, 'disk error');
  }
}
