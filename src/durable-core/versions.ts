import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { VersionError } from './errors.js';

/**
 * A loader for one historical payload version. The loader decodes that
 * revision and upgrades it to the current type.
 */
export type VersionedLoader<L> = readonly [version: number, load: L];

/**
 * Pick the loader for `found`. List order decides: the first entry with a
 * matching tag wins, later duplicates are never consulted.
 */
export function selectVersion<L>(found: number, loaders: readonly VersionedLoader<L>[]): Result<L, VersionError> {
  const hit = loaders.find(([version]) => version === found);
  if (hit) return ok(hit[1]);
  const candidates = loaders.map(([version]) => version);
  return err({
    code: 'VERSION_NOT_MATCHED',
    found,
    candidates,
    message: `No loader for version ${found} (have: ${candidates.length ? candidates.join(', ') : 'none'})`,
  } as const);
}
