import * as fs from 'fs/promises';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { NodeFileSystem } from '../../../src/infra/local/fs/index.js';
import { mkTempRoot, rmTempRoot } from '../../helpers/temp-dir.js';

const bytes = (s: string): Uint8Array => new TextEncoder().encode(s);

describe('NodeFileSystem', () => {
  const nodeFs = new NodeFileSystem();
  let root: string;

  beforeEach(async () => {
    root = await mkTempRoot();
  });

  afterEach(async () => {
    await rmTempRoot(root);
  });

  it('creates nested directories and tolerates existing ones', async () => {
    const dir = path.join(root, 'a', 'b', 'c');
    expect((await nodeFs.mkdirp(dir)).isOk()).toBe(true);
    expect((await nodeFs.mkdirp(dir)).isOk()).toBe(true);
    expect((await nodeFs.stat(dir))._unsafeUnwrap()).toEqual({ sizeBytes: expect.any(Number), kind: 'directory' });
  });

  it('writes and reads bytes', async () => {
    const file = path.join(root, 'f.bin');
    await nodeFs.writeFileBytes(file, bytes('hello'));
    expect(new TextDecoder().decode((await nodeFs.readFileBytes(file))._unsafeUnwrap())).toBe('hello');
    expect((await nodeFs.stat(file))._unsafeUnwrap()).toEqual({ sizeBytes: 5, kind: 'file' });
  });

  it('returns a short range when the file ends first', async () => {
    const file = path.join(root, 'f.bin');
    await nodeFs.writeFileBytes(file, bytes('0123456789'));
    expect(new TextDecoder().decode((await nodeFs.readRange(file, 2, 3))._unsafeUnwrap())).toBe('234');
    expect(new TextDecoder().decode((await nodeFs.readRange(file, 5, 10))._unsafeUnwrap())).toBe('56789');
  });

  it('sizes the read by the file, not by the requested length', async () => {
    const file = path.join(root, 'small.bin');
    await nodeFs.writeFileBytes(file, bytes('abcdef'));

    const whole = (await nodeFs.readRange(file, 0, 2 ** 31))._unsafeUnwrap();
    expect(whole.byteLength).toBe(6);
    expect(whole.buffer.byteLength).toBeLessThan(2 ** 20);
    expect((await nodeFs.readRange(file, 9, 4))._unsafeUnwrap().byteLength).toBe(0);
  });

  it('reports absent paths as not existing and as FS_NOT_FOUND elsewhere', async () => {
    const missing = path.join(root, 'missing');
    expect((await nodeFs.exists(missing))._unsafeUnwrap()).toBe(false);
    expect((await nodeFs.readFileBytes(missing))._unsafeUnwrapErr().code).toBe('FS_NOT_FOUND');
    expect((await nodeFs.unlink(missing))._unsafeUnwrapErr().code).toBe('FS_NOT_FOUND');
  });

  it('renames over an existing file', async () => {
    const a = path.join(root, 'a');
    const b = path.join(root, 'b');
    await nodeFs.writeFileBytes(a, bytes('new'));
    await nodeFs.writeFileBytes(b, bytes('old'));
    expect((await nodeFs.rename(a, b)).isOk()).toBe(true);
    expect(await fs.readFile(b, 'utf8')).toBe('new');
    expect((await nodeFs.exists(a))._unsafeUnwrap()).toBe(false);
  });

  it('sums regular files recursively without following symlinks', async () => {
    const outside = path.join(root, 'outside.txt');
    const tree = path.join(root, 'tree');
    await fs.writeFile(outside, 'x'.repeat(100));
    await fs.mkdir(path.join(tree, 'sub'), { recursive: true });
    await fs.writeFile(path.join(tree, 'a'), 'abc');
    await fs.writeFile(path.join(tree, 'sub', 'b'), 'defgh');
    await fs.symlink(outside, path.join(tree, 'link'));

    expect((await nodeFs.treeSize(tree))._unsafeUnwrap()).toBe(8);
  });

  it('removes a tree and leaves symlink targets alone', async () => {
    const outsideDir = path.join(root, 'keep');
    const tree = path.join(root, 'tree');
    await fs.mkdir(outsideDir);
    await fs.writeFile(path.join(outsideDir, 'precious'), 'data');
    await fs.mkdir(tree);
    await fs.symlink(outsideDir, path.join(tree, 'link'));

    expect((await nodeFs.removeTree(tree)).isOk()).toBe(true);
    expect((await nodeFs.exists(tree))._unsafeUnwrap()).toBe(false);
    expect(await fs.readFile(path.join(outsideDir, 'precious'), 'utf8')).toBe('data');
  });

  it('fails to remove a missing tree', async () => {
    expect((await nodeFs.removeTree(path.join(root, 'nope')))._unsafeUnwrapErr().code).toBe('FS_NOT_FOUND');
  });
});
