import * as fs from 'fs/promises';
import * as path from 'path';
import type { ResultAsync } from 'neverthrow';
import { ResultAsync as RA, okAsync, errAsync } from 'neverthrow';
import type { EntryKind, FileStat, FileSystemPort, FsError } from '../../../ports/fs.port.js';

export function nodeErrorCode(e: unknown): string | undefined {
  if (typeof e !== 'object' || e === null || !('code' in e)) return undefined;
  return typeof e.code === 'string' ? e.code : undefined;
}

export function mapFsError(e: unknown, target: string): FsError {
  const code = nodeErrorCode(e);

  if (code === 'ENOENT') return { code: 'FS_NOT_FOUND', message: `Not found: ${target}` };
  if (code === 'EEXIST') return { code: 'FS_ALREADY_EXISTS', message: `Already exists: ${target}` };
  if (code === 'EACCES' || code === 'EPERM') return { code: 'FS_PERMISSION_DENIED', message: `Permission denied: ${target}` };
  if (code === 'ENOTSUP' || code === 'EOPNOTSUPP') return { code: 'FS_UNSUPPORTED', message: `Unsupported operation at ${target}` };
  return { code: 'FS_IO_ERROR', message: `FS error at ${target}: ${e instanceof Error ? e.message : String(e)}` };
}

function entryKind(s: { isFile(): boolean; isDirectory(): boolean }): EntryKind {
  if (s.isFile()) return 'file';
  if (s.isDirectory()) return 'directory';
  return 'other';
}

async function sumTree(dirPath: string): Promise<number> {
  let total = 0;
  for (const entry of await fs.readdir(dirPath, { withFileTypes: true })) {
    const entryPath = path.join(dirPath, entry.name);
    // Dirent types come from lstat semantics: symlinks are neither file nor directory here.
    if (entry.isDirectory()) {
      total += await sumTree(entryPath);
    } else if (entry.isFile()) {
      total += (await fs.lstat(entryPath)).size;
    }
  }
  return total;
}

async function readAt(filePath: string, position: number, length: number): Promise<Uint8Array> {
  const handle = await fs.open(filePath, 'r');
  try {
    // Sized by what the file holds past `position`; a short result is the caller's bounds error.
    const { size } = await handle.stat();
    const wanted = Math.max(0, Math.min(length, size - position));
    const buffer = Buffer.alloc(wanted);
    let filled = 0;
    while (filled < wanted) {
      const { bytesRead } = await handle.read(buffer, filled, wanted - filled, position + filled);
      if (bytesRead === 0) break;
      filled += bytesRead;
    }
    return new Uint8Array(buffer.buffer, buffer.byteOffset, filled);
  } finally {
    await handle.close();
  }
}

export class NodeFileSystem implements FileSystemPort {
  mkdirp(dirPath: string): ResultAsync<void, FsError> {
    return RA.fromPromise(fs.mkdir(dirPath, { recursive: true }).then(() => undefined), (e) => mapFsError(e, dirPath));
  }

  removeTree(dirPath: string): ResultAsync<void, FsError> {
    // fs.rm unlinks symlinks rather than descending into their targets.
    return RA.fromPromise(fs.rm(dirPath, { recursive: true, force: false }), (e) => mapFsError(e, dirPath));
  }

  treeSize(dirPath: string): ResultAsync<number, FsError> {
    return RA.fromPromise(sumTree(dirPath), (e) => mapFsError(e, dirPath));
  }

  readFileBytes(filePath: string): ResultAsync<Uint8Array, FsError> {
    return RA.fromPromise(fs.readFile(filePath), (e) => mapFsError(e, filePath)).map((b) => new Uint8Array(b));
  }

  readRange(filePath: string, position: number, length: number): ResultAsync<Uint8Array, FsError> {
    return RA.fromPromise(readAt(filePath, position, length), (e) => mapFsError(e, filePath));
  }

  stat(filePath: string): ResultAsync<FileStat, FsError> {
    return RA.fromPromise(fs.stat(filePath), (e) => mapFsError(e, filePath)).map((s) => ({
      sizeBytes: s.size,
      kind: entryKind(s),
    }));
  }

  exists(filePath: string): ResultAsync<boolean, FsError> {
    return RA.fromPromise(fs.stat(filePath), (e) => mapFsError(e, filePath))
      .map(() => true)
      .orElse((e) => (e.code === 'FS_NOT_FOUND' ? okAsync(false) : errAsync(e)));
  }

  writeFileBytes(filePath: string, bytes: Uint8Array): ResultAsync<void, FsError> {
    return RA.fromPromise(fs.writeFile(filePath, bytes, { mode: 0o600 }), (e) => mapFsError(e, filePath));
  }

  rename(fromPath: string, toPath: string): ResultAsync<void, FsError> {
    return RA.fromPromise(fs.rename(fromPath, toPath), (e) => mapFsError(e, `${fromPath} -> ${toPath}`));
  }

  unlink(filePath: string): ResultAsync<void, FsError> {
    return RA.fromPromise(fs.unlink(filePath), (e) => mapFsError(e, filePath));
  }
}
