import type { ResultAsync } from 'neverthrow';

export type CompressionError =
  | { readonly code: 'GZIP_COMPRESS_FAILED'; readonly message: string }
  | { readonly code: 'GZIP_DECOMPRESS_FAILED'; readonly message: string };

/**
 * Port: gzip compression of whole buffers.
 * For framed files the frame is inside the compressed stream.
 */
export interface CompressionPort {
  gzip(bytes: Uint8Array): ResultAsync<Uint8Array, CompressionError>;
  gunzip(bytes: Uint8Array): ResultAsync<Uint8Array, CompressionError>;
}
