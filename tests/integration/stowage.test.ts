import * as fs from 'fs/promises';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { z } from 'zod';
import { container, initializeContainer, isInitialized, resetContainer } from '../../src/di/container.js';
import { DI } from '../../src/di/tokens.js';
import { formatAppError } from '../../src/errors/formatter.js';
import type { Stowage } from '../../src/engine/stowage.js';
import { ThrowingProcessTerminator } from '../../src/runtime/adapters/throwing-process-terminator.js';
import { InMemoryFileSystem } from '../fakes/file-system.fake.js';
import { mkTempRoot, rmTempRoot } from '../helpers/temp-dir.js';
import { expectOk } from '../helpers/result-helpers.js';

const Settings = z.object({ theme: z.string(), fontSize: z.number() });

describe('Stowage through the container', () => {
  let root: string;

  beforeEach(async () => {
    resetContainer();
    root = await mkTempRoot();
  });

  afterEach(async () => {
    resetContainer();
    await rmTempRoot(root);
  });

  const start = (env: Record<string, string | undefined>): Stowage => {
    const started = initializeContainer({ env: { STOWAGE_ROOT_DIR: root, ...env } });
    if (started.kind === 'err') throw new Error(formatAppError(started.error));
    return container.resolve<Stowage>(DI.Services.Stowage);
  };

  it('saves and loads under the root directory', async () => {
    const stowage = start({});
    const file = expectOk(
      stowage.define({ project: 'my-app', file: 'state', sub: 'settings', codec: stowage.codecs.json(Settings) }),
      'define'
    );

    const m = (await file.saveAtomic({ theme: 'dark', fontSize: 12 }))._unsafeUnwrap();
    const expected = path.join(root, 'data', 'my-app', 'settings', 'state.json');

    expect(m.path).toBe(expected);
    expect(await fs.readFile(expected, 'utf8')).toBe('{\n  "theme": "dark",\n  "fontSize": 12\n}');
    expect((await file.fromFile())._unsafeUnwrap()).toEqual({ theme: 'dark', fontSize: 12 });
  });

  it('applies the configured JSON indent', async () => {
    const stowage = start({ STOWAGE_JSON_INDENT: '0' });
    const file = expectOk(stowage.define({ project: 'my-app', file: 'state', codec: stowage.codecs.json(Settings) }), 'define');

    await file.save({ theme: 'light', fontSize: 10 });
    expect(await fs.readFile(path.join(root, 'data', 'my-app', 'state.json'), 'utf8')).toBe('{"theme":"light","fontSize":10}');
  });

  it('round-trips a framed gzip file on disk', async () => {
    const stowage = start({});
    const blob = expectOk(
      stowage.defineBinary({ project: 'my-app', file: 'blob', dir: 'cache', header: new Array<number>(24).fill(1), version: 5, schema: Settings }),
      'defineBinary'
    );

    await blob.saveAtomicGzip({ theme: 'dark', fontSize: 14 });
    expect((await blob.fromFileGzip())._unsafeUnwrap()).toEqual({ theme: 'dark', fontSize: 14 });

    const rm = (await blob.rmProject())._unsafeUnwrap();
    expect(rm.path).toBe(path.join(root, 'cache', 'my-app'));
    expect(rm.size).toBeGreaterThan(0);
    await expect(fs.stat(rm.path)).rejects.toThrow();
  });

  it('never removes a tree for a definition that skipped validation', async () => {
    const stowage = start({});
    const keep = path.join(root, 'data', 'other-app', 'keep.json');
    await fs.mkdir(path.dirname(keep), { recursive: true });
    await fs.writeFile(keep, '{}');

    const issued = expectOk(stowage.define({ project: 'my-app', file: 'x', codec: stowage.codecs.json(z.unknown()) }), 'define');
    const forged = stowage.file({ ...issued.definition, project: '' });

    expect((await forged.rmProject())._unsafeUnwrapErr().code).toBe('PATH_DEFINITION_UNCHECKED');
    expect(await fs.readFile(keep, 'utf8')).toBe('{}');
  });

  it('reports a huge byte range on a small file as out of bounds', async () => {
    const stowage = start({});
    const note = expectOk(stowage.define({ project: 'my-app', file: 'note', codec: stowage.codecs.plain(z.string()) }), 'define');
    await note.save('abcdef');

    expect((await note.fileBytes(0, 2 ** 31))._unsafeUnwrapErr()).toMatchObject({
      code: 'RANGE_OUT_OF_BOUNDS',
      end: 2 ** 31,
      available: 6,
    });
  });

  it('keeps ports a test registered first', async () => {
    const memory = new InMemoryFileSystem();
    container.register(DI.Ports.FileSystem, { useValue: memory });
    const stowage = start({ STOWAGE_ROOT_DIR: '/mem' });

    const file = expectOk(stowage.define({ project: 'p', file: 'f', codec: stowage.codecs.plain(z.string()) }), 'define');
    await file.save('hello');

    expect(new TextDecoder().decode(memory.fileBytes('/mem/data/p/f.txt'))).toBe('hello');
  });

  it('registers a throwing terminator under test', () => {
    start({ VITEST: 'true' });
    expect(container.resolve(DI.Runtime.ProcessTerminator)).toBeInstanceOf(ThrowingProcessTerminator);
  });

  it('rejects invalid configuration without initializing', () => {
    const res = initializeContainer({ env: { STOWAGE_GZIP_LEVEL: '12' } });
    expect(res).toEqual({
      kind: 'err',
      error: {
        _tag: 'ConfigInvalid',
        issues: [{ variable: 'STOWAGE_GZIP_LEVEL', message: 'STOWAGE_GZIP_LEVEL must be <= 9' }],
      },
    });
    expect(isInitialized()).toBe(false);
  });
});
