import type { Result } from 'neverthrow';
import { ok } from 'neverthrow';
import type { DirectoryResolverPort } from '../../src/ports/directory-resolver.port.js';
import type { DirectoryKind } from '../../src/durable-core/directory-kind.js';
import type { PathError } from '../../src/durable-core/errors.js';

/**
 * Resolves every kind to `<root>/<kind>/<project>` with `/` separators,
 * matching the in-memory filesystem's path style.
 */
export class FixedDirectoryResolver implements DirectoryResolverPort {
  constructor(private readonly root: string) {}

  projectDir(kind: DirectoryKind, project: string): Result<string, PathError> {
    return ok(`${this.root}/${kind}/${project}`);
  }
}
