import { beforeEach, describe, expect, it } from 'vitest';
import { z } from 'zod';
import { ok } from 'neverthrow';
import { DiskFile } from '../../../src/engine/disk-file.js';
import { defineFile } from '../../../src/durable-core/definition.js';
import { jsonCodec } from '../../../src/durable-core/codecs/json.js';
import { plainCodec } from '../../../src/durable-core/codecs/plain.js';
import { createMemoryDisk, type MemoryDisk } from '../../helpers/memory-disk.js';
import { expectOk } from '../../helpers/result-helpers.js';

const Counter = z.object({ n: z.number() });
const linux = { platform: 'linux' } as const;
const APP = '/stowage-test/data/app';

const text = (bytes: Uint8Array | undefined): string => new TextDecoder().decode(bytes);
const bytes = (s: string): Uint8Array => new TextEncoder().encode(s);

describe('DiskFile', () => {
  let disk: MemoryDisk;

  const counterFile = (sub?: string, file = 'state'): DiskFile<{ n: number }> =>
    new DiskFile(disk.deps, expectOk(defineFile({ project: 'app', file, sub, codec: jsonCodec(Counter) }, linux), 'define'));

  const textFile = (): DiskFile<string> =>
    new DiskFile(disk.deps, expectOk(defineFile({ project: 'app', file: 'note', codec: plainCodec(z.string()) }, linux), 'define'));

  beforeEach(() => {
    disk = createMemoryDisk();
  });

  describe('paths', () => {
    it('refuses a definition that was not issued by defineFile', () => {
      const forged = new DiskFile(disk.deps, { ...counterFile().definition, project: '' });
      expect(forged.paths()._unsafeUnwrapErr()).toEqual({
        code: 'PATH_DEFINITION_UNCHECKED',
        message: 'File definition was not created by defineFile or defineBinaryFile',
      });
    });

    it('derives every path from the definition', () => {
      expect(counterFile('a/b').paths()._unsafeUnwrap()).toEqual({
        projectDir: APP,
        baseDir: `${APP}/a/b`,
        subParentDir: `${APP}/a`,
        canonical: `${APP}/a/b/state.json`,
        gzip: `${APP}/a/b/state.json.gz`,
        tmp: `${APP}/a/b/state.json.tmp`,
        gzipTmp: `${APP}/a/b/state.json.gz.tmp`,
      });
    });

    it('uses the project directory as sub-directory parent when there is no sub', () => {
      expect(counterFile().subDirParentPath()._unsafeUnwrap()).toBe(APP);
    });

    it('refuses a resolver that returns a relative path', () => {
      const file = new DiskFile(
        { ...disk.deps, resolver: { projectDir: (_kind, project) => ok(`relative/${project}`) } },
        counterFile().definition
      );
      expect(file.absolutePath()._unsafeUnwrapErr()).toEqual({
        code: 'PATH_NOT_ABSOLUTE',
        path: 'relative/app',
        message: 'Refusing to use relative path: relative/app',
      });
    });
  });

  describe('save', () => {
    it('creates directories and writes the encoded value', async () => {
      const m = (await counterFile('a/b').save({ n: 1 }))._unsafeUnwrap();
      expect(m).toEqual({ size: 12, path: `${APP}/a/b/state.json` });
      expect(text(disk.fs.fileBytes(`${APP}/a/b/state.json`))).toBe('{\n  "n": 1\n}');
      expect(disk.logger.getEntries('debug')).toEqual([
        { level: 'debug', obj: { operation: 'save', path: `${APP}/a/b/state.json`, size: 12 }, msg: 'file written' },
      ]);
    });

    it('creates nothing when encoding fails', async () => {
      const file = new DiskFile(
        disk.deps,
        expectOk(defineFile({ project: 'app', file: 'state', codec: jsonCodec(z.unknown()) }, linux), 'define')
      );
      expect((await file.save(undefined))._unsafeUnwrapErr().code).toBe('CODEC_ENCODE_FAILED');
      expect(disk.fs.has(APP)).toBe(false);
    });

    it('touch creates an empty file', async () => {
      expect((await counterFile().touch())._unsafeUnwrap()).toEqual({ size: 0, path: `${APP}/state.json` });
      expect(disk.fs.fileBytes(`${APP}/state.json`)?.length).toBe(0);
    });
  });

  describe('saveAtomic', () => {
    it('writes the temp file and renames it into place', async () => {
      const file = counterFile();
      expect((await file.saveAtomic({ n: 1 })).isOk()).toBe(true);
      expect(disk.fs.calls).toEqual([
        `mkdirp ${APP}`,
        `write ${APP}/state.json.tmp`,
        `rename ${APP}/state.json.tmp -> ${APP}/state.json`,
      ]);
      expect(disk.fs.has(`${APP}/state.json.tmp`)).toBe(false);
      expect((await file.fromFile())._unsafeUnwrap()).toEqual({ n: 1 });
    });

    it('keeps the previous file when the write fails', async () => {
      const file = counterFile();
      await file.saveAtomic({ n: 1 });
      disk.fs.failNext('writeFileBytes');

      const res = await file.saveAtomic({ n: 2 });

      expect(res._unsafeUnwrapErr()).toEqual({ code: 'FS_IO_ERROR', message: 'injected writeFileBytes failure' });
      expect(disk.fs.has(`${APP}/state.json.tmp`)).toBe(false);
      expect((await file.fromFile())._unsafeUnwrap()).toEqual({ n: 1 });
      expect(disk.logger.hasEntry('warn', 'removing temp file after failed write')).toBe(true);
    });

    it('keeps the previous file when the rename fails', async () => {
      const file = counterFile();
      await file.saveAtomic({ n: 1 });
      disk.fs.failNext('rename');

      expect((await file.saveAtomic({ n: 2 }))._unsafeUnwrapErr().message).toBe('injected rename failure');
      expect(disk.fs.has(`${APP}/state.json.tmp`)).toBe(false);
      expect((await file.fromFile())._unsafeUnwrap()).toEqual({ n: 1 });
    });

    it('returns the cleanup error when the temp file cannot be removed', async () => {
      const file = counterFile();
      disk.fs.failNext('writeFileBytes');
      disk.fs.failNext('unlink', { code: 'FS_PERMISSION_DENIED', message: 'denied' });

      expect((await file.saveAtomic({ n: 2 }))._unsafeUnwrapErr()).toEqual({ code: 'FS_PERMISSION_DENIED', message: 'denied' });
      expect(disk.fs.has(`${APP}/state.json.tmp`)).toBe(true);
      expect(disk.fs.has(`${APP}/state.json`)).toBe(false);
    });
  });

  describe('gzip', () => {
    it('writes only the .gz file and reads it back', async () => {
      const file = counterFile();
      const m = (await file.saveAtomicGzip({ n: 3 }))._unsafeUnwrap();

      expect(m.path).toBe(`${APP}/state.json.gz`);
      expect(m.size).toBe(disk.fs.fileBytes(`${APP}/state.json.gz`)?.length);
      expect((await file.existsGzip())._unsafeUnwrap()).toBe(true);
      expect((await file.exists())._unsafeUnwrap()).toBe(false);
      expect((await file.fromFileGzip())._unsafeUnwrap()).toEqual({ n: 3 });
      expect(text((await file.readToBytesGzip())._unsafeUnwrap())).toBe('{\n  "n": 3\n}');
    });

    it('saveGzip writes directly', async () => {
      const file = counterFile();
      await file.saveGzip({ n: 4 });
      expect(disk.fs.calls).not.toContain(`write ${APP}/state.json.gz.tmp`);
      expect((await file.fromFileGzip())._unsafeUnwrap()).toEqual({ n: 4 });
    });

    it('reports a corrupt .gz file', async () => {
      disk.fs.seedFile(`${APP}/state.json.gz`, bytes('not gzip'));
      expect((await counterFile().fromFileGzip())._unsafeUnwrapErr().code).toBe('GZIP_DECOMPRESS_FAILED');
    });
  });

  describe('memmap variants', () => {
    it('round-trip through the region port', async () => {
      const file = counterFile();
      await file.saveMemmap({ n: 5 });
      expect((await file.fromFileMemmap())._unsafeUnwrap()).toEqual({ n: 5 });

      await file.saveAtomicMemmap({ n: 6 });
      expect((await file.fromFileMemmap())._unsafeUnwrap()).toEqual({ n: 6 });
      expect(disk.fs.has(`${APP}/state.json.tmp`)).toBe(false);

      await file.saveGzipMemmap({ n: 7 });
      expect((await file.fromFileGzipMemmap())._unsafeUnwrap()).toEqual({ n: 7 });

      await file.saveAtomicGzipMemmap({ n: 8 });
      expect((await file.fromFileGzipMemmap())._unsafeUnwrap()).toEqual({ n: 8 });
    });
  });

  describe('atomic memmap failures', () => {
    it('saveAtomicMemmap keeps the previous file byte for byte when the region write fails', async () => {
      const file = counterFile();
      await file.saveAtomicMemmap({ n: 1 });
      const before = disk.fs.fileBytes(`${APP}/state.json`);
      disk.fs.failNext('writeFileBytes');

      const res = await file.saveAtomicMemmap({ n: 2 });

      expect(res._unsafeUnwrapErr()).toEqual({ code: 'FS_IO_ERROR', message: 'injected writeFileBytes failure' });
      expect(disk.fs.has(`${APP}/state.json.tmp`)).toBe(false);
      expect(disk.fs.fileBytes(`${APP}/state.json`)).toEqual(before);
    });

    it('saveAtomicGzipMemmap keeps the previous .gz file when the region write fails', async () => {
      const file = counterFile();
      await file.saveAtomicGzipMemmap({ n: 1 });
      const before = disk.fs.fileBytes(`${APP}/state.json.gz`);
      disk.fs.failNext('writeFileBytes');

      expect((await file.saveAtomicGzipMemmap({ n: 2 })).isErr()).toBe(true);
      expect(disk.fs.has(`${APP}/state.json.gz.tmp`)).toBe(false);
      expect(disk.fs.fileBytes(`${APP}/state.json.gz`)).toEqual(before);
      expect((await file.fromFileGzipMemmap())._unsafeUnwrap()).toEqual({ n: 1 });
    });
  });

  describe('reads', () => {
    it('fails with FS_NOT_FOUND for a missing file', async () => {
      expect((await counterFile().fromFile())._unsafeUnwrapErr().code).toBe('FS_NOT_FOUND');
    });

    it('readToString decodes UTF-8 strictly', async () => {
      const file = textFile();
      await file.save('abcdef');
      expect((await file.readToString())._unsafeUnwrap()).toBe('abcdef');

      disk.fs.seedFile(`${APP}/note.txt`, new Uint8Array([0x61, 0xff]));
      expect((await file.readToString())._unsafeUnwrapErr()).toMatchObject({ code: 'CODEC_DECODE_FAILED', format: 'utf8' });
    });
  });

  describe('fileBytes', () => {
    let file: DiskFile<string>;

    beforeEach(async () => {
      file = textFile();
      await file.save('abcdef');
    });

    it('returns [start, end)', async () => {
      expect(text((await file.fileBytes(1, 3))._unsafeUnwrap())).toBe('bc');
    });

    it('returns one byte when start equals end', async () => {
      expect(text((await file.fileBytes(2, 2))._unsafeUnwrap())).toBe('c');
    });

    it('rejects start after end', async () => {
      expect((await file.fileBytes(3, 1))._unsafeUnwrapErr()).toEqual({
        code: 'RANGE_INVALID',
        start: 3,
        end: 1,
        message: 'Invalid byte range [3, 1)',
      });
    });

    it('rejects a range past the end of the file', async () => {
      expect((await file.fileBytes(4, 10))._unsafeUnwrapErr()).toEqual({
        code: 'RANGE_OUT_OF_BOUNDS',
        end: 10,
        available: 6,
        message: 'Range ends at 10 but only 6 bytes are available',
      });
    });

    it('region variant returns an empty slice when start equals end', async () => {
      expect((await file.fileBytesMemmap(2, 2))._unsafeUnwrap().length).toBe(0);
      expect(text((await file.fileBytesMemmap(0, 6))._unsafeUnwrap())).toBe('abcdef');
      expect((await file.fileBytesMemmap(4, 10))._unsafeUnwrapErr().code).toBe('RANGE_OUT_OF_BOUNDS');
    });
  });

  describe('sizes', () => {
    it('reports file sizes and fails for absent files', async () => {
      const file = textFile();
      expect((await file.fileSize())._unsafeUnwrapErr().code).toBe('FS_NOT_FOUND');
      await file.save('abcdef');
      expect((await file.fileSize())._unsafeUnwrap()).toEqual({ size: 6, path: `${APP}/note.txt` });
    });

    it('sums the project and first sub-directory', async () => {
      const nested = counterFile('a/b');
      const flat = counterFile(undefined, 'other');
      await nested.save({ n: 1 });
      await flat.save({ n: 22 });

      expect((await nested.projectDirSize())._unsafeUnwrap()).toEqual({ size: 25, path: APP });
      expect((await nested.subDirSize())._unsafeUnwrap()).toEqual({ size: 12, path: `${APP}/a` });
      expect((await flat.subDirSize())._unsafeUnwrap()).toEqual({ size: 25, path: APP });
    });
  });

  describe('remove', () => {
    it('rm of an absent file is success with size 0', async () => {
      expect((await counterFile().rm())._unsafeUnwrap()).toEqual({ size: 0, path: `${APP}/state.json` });
    });

    it('rm reports the removed size', async () => {
      const file = counterFile();
      await file.save({ n: 1 });
      expect((await file.rm())._unsafeUnwrap()).toEqual({ size: 12, path: `${APP}/state.json` });
      expect((await file.exists())._unsafeUnwrap()).toBe(false);
    });

    it('rmAtomic renames onto the temp name before deleting', async () => {
      const file = counterFile();
      await file.save({ n: 1 });
      disk.fs.calls.length = 0;

      expect((await file.rmAtomic())._unsafeUnwrap().size).toBe(12);
      expect(disk.fs.calls).toEqual([`rename ${APP}/state.json -> ${APP}/state.json.tmp`, `unlink ${APP}/state.json.tmp`]);
    });

    it('rmAtomic interrupted before the unlink leaves only the temp file, which rmTmp clears', async () => {
      const file = counterFile();
      await file.save({ n: 1 });
      disk.fs.failNext('unlink');

      expect((await file.rmAtomic())._unsafeUnwrapErr()).toEqual({ code: 'FS_IO_ERROR', message: 'injected unlink failure' });
      expect(disk.fs.has(`${APP}/state.json`)).toBe(false);
      expect(text(disk.fs.fileBytes(`${APP}/state.json.tmp`))).toBe('{\n  "n": 1\n}');

      expect((await file.rmTmp()).isOk()).toBe(true);
      expect(disk.fs.has(`${APP}/state.json.tmp`)).toBe(false);
    });

    it('rmAtomicGzip interrupted before the unlink leaves the .gz.tmp file, which rmTmp clears', async () => {
      const file = counterFile();
      await file.saveGzip({ n: 1 });
      disk.fs.failNext('unlink');

      expect((await file.rmAtomicGzip()).isErr()).toBe(true);
      expect(disk.fs.has(`${APP}/state.json.gz`)).toBe(false);
      expect(disk.fs.has(`${APP}/state.json.gz.tmp`)).toBe(true);

      expect((await file.rmTmp()).isOk()).toBe(true);
      expect(disk.fs.has(`${APP}/state.json.gz.tmp`)).toBe(false);
    });

    it('rmAtomicGzip removes only the .gz file', async () => {
      const file = counterFile();
      await file.save({ n: 1 });
      await file.saveGzip({ n: 1 });

      expect((await file.rmAtomicGzip()).isOk()).toBe(true);
      expect((await file.existsGzip())._unsafeUnwrap()).toBe(false);
      expect((await file.exists())._unsafeUnwrap()).toBe(true);
    });

    it('rmTmp clears both temp names', async () => {
      const file = counterFile();
      disk.fs.seedFile(`${APP}/state.json.tmp`, bytes('partial'));
      disk.fs.seedFile(`${APP}/state.json.gz.tmp`, bytes('partial'));

      expect((await file.rmTmp()).isOk()).toBe(true);
      expect(disk.fs.has(`${APP}/state.json.tmp`)).toBe(false);
      expect(disk.fs.has(`${APP}/state.json.gz.tmp`)).toBe(false);
      expect((await file.rmTmp()).isOk()).toBe(true);
    });

    it('rmTmp fails when a temp file cannot be deleted', async () => {
      disk.fs.seedFile(`${APP}/state.json.tmp`, bytes('partial'));
      disk.fs.failNext('unlink');
      expect((await counterFile().rmTmp())._unsafeUnwrapErr().code).toBe('FS_IO_ERROR');
    });
  });

  describe('directories', () => {
    it('mkdir creates and returns the base directory', async () => {
      expect((await counterFile('a/b').mkdir())._unsafeUnwrap()).toBe(`${APP}/a/b`);
      expect(disk.fs.has(`${APP}/a/b`)).toBe(true);
    });

    it('rmSub removes the first sub-directory only', async () => {
      const nested = counterFile('a/b');
      const flat = counterFile(undefined, 'other');
      await nested.save({ n: 1 });
      await flat.save({ n: 22 });

      expect((await nested.rmSub())._unsafeUnwrap()).toEqual({ size: 12, path: `${APP}/a` });
      expect(disk.fs.has(`${APP}/a`)).toBe(false);
      expect((await flat.exists())._unsafeUnwrap()).toBe(true);
      expect(disk.logger.hasEntry('debug', 'directory removed')).toBe(true);
    });

    it('rmSub without a sub removes the project directory', async () => {
      const flat = counterFile(undefined, 'other');
      await flat.save({ n: 22 });
      expect((await flat.rmSub())._unsafeUnwrap()).toEqual({ size: 13, path: APP });
      expect(disk.fs.has(APP)).toBe(false);
    });

    it('rmProject removes everything and fails once it is gone', async () => {
      const file = counterFile('a/b');
      await file.save({ n: 1 });
      expect((await file.rmProject())._unsafeUnwrap()).toEqual({ size: 12, path: APP });
      expect((await file.rmProject())._unsafeUnwrapErr().code).toBe('FS_NOT_FOUND');
    });
  });
});
