import { describe, expect, it } from 'vitest';
import { LocalDirectoryResolver, type ResolverHost } from '../../../src/infra/local/directory-resolver/index.js';

const linux: ResolverHost = { platform: 'linux', homedir: () => '/home/u' };
const darwin: ResolverHost = { platform: 'darwin', homedir: () => '/Users/u' };
const win32: ResolverHost = { platform: 'win32', homedir: () => 'C:\\Users\\u' };

describe('LocalDirectoryResolver', () => {
  describe('root override', () => {
    it('places every kind under <root>/<kind>', () => {
      const resolver = new LocalDirectoryResolver({ STOWAGE_ROOT_DIR: '/srv/stowage' }, linux);
      expect(resolver.projectDir('cache', 'proj')._unsafeUnwrap()).toBe('/srv/stowage/cache/proj');
      expect(resolver.projectDir('data_local', 'proj')._unsafeUnwrap()).toBe('/srv/stowage/data_local/proj');
    });

    it('rejects a relative root', () => {
      const resolver = new LocalDirectoryResolver({ STOWAGE_ROOT_DIR: 'rel' }, linux);
      expect(resolver.projectDir('data', 'proj')._unsafeUnwrapErr()).toEqual({
        code: 'PATH_NOT_ABSOLUTE',
        path: 'rel',
        message: 'STOWAGE_ROOT_DIR must be absolute: rel',
      });
    });
  });

  describe('linux', () => {
    it('falls back to the home directory', () => {
      const resolver = new LocalDirectoryResolver({}, linux);
      expect(resolver.projectDir('cache', 'proj')._unsafeUnwrap()).toBe('/home/u/.cache/proj');
      expect(resolver.projectDir('config', 'proj')._unsafeUnwrap()).toBe('/home/u/.config/proj');
      expect(resolver.projectDir('preference', 'proj')._unsafeUnwrap()).toBe('/home/u/.config/proj');
      expect(resolver.projectDir('data', 'proj')._unsafeUnwrap()).toBe('/home/u/.local/share/proj');
    });

    it('honours absolute XDG variables and ignores relative ones', () => {
      const resolver = new LocalDirectoryResolver({ XDG_CACHE_HOME: '/xdg/cache', XDG_DATA_HOME: 'relative' }, linux);
      expect(resolver.projectDir('cache', 'proj')._unsafeUnwrap()).toBe('/xdg/cache/proj');
      expect(resolver.projectDir('data', 'proj')._unsafeUnwrap()).toBe('/home/u/.local/share/proj');
    });

    it('reports the kind as unavailable without a home directory', () => {
      const resolver = new LocalDirectoryResolver({}, { platform: 'linux', homedir: () => '' });
      expect(resolver.projectDir('config', 'proj')._unsafeUnwrapErr()).toEqual({
        code: 'PATH_DIRECTORY_UNAVAILABLE',
        kind: 'config',
        message: 'No config directory available on linux',
      });
    });
  });

  describe('darwin', () => {
    it('uses the Library folders', () => {
      const resolver = new LocalDirectoryResolver({}, darwin);
      expect(resolver.projectDir('cache', 'proj')._unsafeUnwrap()).toBe('/Users/u/Library/Caches/proj');
      expect(resolver.projectDir('data', 'proj')._unsafeUnwrap()).toBe('/Users/u/Library/Application Support/proj');
      expect(resolver.projectDir('preference', 'proj')._unsafeUnwrap()).toBe('/Users/u/Library/Preferences/proj');
    });
  });

  describe('win32', () => {
    it('uses APPDATA and LOCALAPPDATA', () => {
      const resolver = new LocalDirectoryResolver(
        { APPDATA: 'C:\\Users\\u\\AppData\\Roaming', LOCALAPPDATA: 'C:\\Users\\u\\AppData\\Local' },
        win32
      );
      expect(resolver.projectDir('data', 'proj')._unsafeUnwrap()).toBe('C:\\Users\\u\\AppData\\Roaming\\proj');
      expect(resolver.projectDir('cache', 'proj')._unsafeUnwrap()).toBe('C:\\Users\\u\\AppData\\Local\\proj');
    });

    it('reports a missing variable as unavailable', () => {
      const resolver = new LocalDirectoryResolver({ APPDATA: 'C:\\Users\\u\\AppData\\Roaming' }, win32);
      expect(resolver.projectDir('data_local', 'proj')._unsafeUnwrapErr().code).toBe('PATH_DIRECTORY_UNAVAILABLE');
    });
  });
});
