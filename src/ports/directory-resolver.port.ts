import type { Result } from 'neverthrow';
import type { DirectoryKind } from '../durable-core/directory-kind.js';
import type { PathError } from '../durable-core/errors.js';

/**
 * Port: logical directory to absolute project directory.
 *
 * Implementations must return an absolute path or PATH_DIRECTORY_UNAVAILABLE.
 * The engine re-checks absoluteness before every write regardless.
 */
export interface DirectoryResolverPort {
  projectDir(kind: DirectoryKind, project: string): Result<string, PathError>;
}
