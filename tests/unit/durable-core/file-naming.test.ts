import { describe, expect, it } from 'vitest';
import { deriveFileIdentity } from '../../../src/durable-core/file-naming.js';

describe('deriveFileIdentity', () => {
  it('appends gz and tmp suffixes after the extension', () => {
    expect(deriveFileIdentity('state', 'json')).toEqual({
      canonical: 'state.json',
      gzip: 'state.json.gz',
      tmp: 'state.json.tmp',
      gzipTmp: 'state.json.gz.tmp',
    });
  });

  it('drops the extension part when the extension is empty', () => {
    expect(deriveFileIdentity('marker', '')).toEqual({
      canonical: 'marker',
      gzip: 'marker.gz',
      tmp: 'marker.tmp',
      gzipTmp: 'marker.gz.tmp',
    });
  });

  it('keeps dots already in the file name', () => {
    expect(deriveFileIdentity('v1.backup', 'bin').canonical).toBe('v1.backup.bin');
  });

  it('returns a frozen identity', () => {
    expect(Object.isFrozen(deriveFileIdentity('a', 'b'))).toBe(true);
  });
});
