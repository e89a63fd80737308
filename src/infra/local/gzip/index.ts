import { promisify } from 'node:util';
import zlib from 'node:zlib';
import type { ResultAsync } from 'neverthrow';
import { ResultAsync as RA } from 'neverthrow';
import type { CompressionError, CompressionPort } from '../../../ports/compression.port.js';

const gzipAsync = promisify(zlib.gzip);
const gunzipAsync = promisify(zlib.gunzip);

function describe(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/**
 * zlib-backed gzip. Level comes from codec settings; 1 favours speed.
 */
export class NodeGzip implements CompressionPort {
  constructor(private readonly level: number) {}

  gzip(bytes: Uint8Array): ResultAsync<Uint8Array, CompressionError> {
    return RA.fromPromise(gzipAsync(bytes, { level: this.level }), (e) => ({
      code: 'GZIP_COMPRESS_FAILED',
      message: `gzip failed: ${describe(e)}`,
    }) as const).map((b) => new Uint8Array(b));
  }

  gunzip(bytes: Uint8Array): ResultAsync<Uint8Array, CompressionError> {
    return RA.fromPromise(gunzipAsync(bytes), (e) => ({
      code: 'GZIP_DECOMPRESS_FAILED',
      message: `gunzip failed: ${describe(e)}`,
    }) as const).map((b) => new Uint8Array(b));
  }
}
