import * as path from 'path';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { DirectoryResolverPort } from '../ports/directory-resolver.port.js';
import type { FileDefinition } from '../durable-core/definition.js';
import { isIssuedDefinition } from '../durable-core/definition.js';
import type { PathError } from '../durable-core/errors.js';

/**
 * Every absolute path one file definition touches. Recomputed per operation.
 */
export interface FilePaths {
  /** `<kind root>/<project>` */
  readonly projectDir: string;
  /** Project directory plus all sub-directories; the file's parent. */
  readonly baseDir: string;
  /** Project directory plus the first sub-directory, or the project directory when there are none. */
  readonly subParentDir: string;
  readonly canonical: string;
  readonly gzip: string;
  readonly tmp: string;
  readonly gzipTmp: string;
}

export function assertAbsolute(p: string): Result<string, PathError> {
  return path.isAbsolute(p)
    ? ok(p)
    : err({ code: 'PATH_NOT_ABSOLUTE', path: p, message: `Refusing to use relative path: ${p}` } as const);
}

export function resolveFilePaths(
  resolver: DirectoryResolverPort,
  definition: FileDefinition<unknown>
): Result<FilePaths, PathError> {
  // A hand-built object skips the name checks; an empty project would resolve to the kind root.
  if (!isIssuedDefinition(definition)) {
    return err({
      code: 'PATH_DEFINITION_UNCHECKED',
      message: 'File definition was not created by defineFile or defineBinaryFile',
    } as const);
  }

  return resolver
    .projectDir(definition.dir, definition.project)
    .andThen(assertAbsolute)
    .map((projectDir) => {
      const baseDir = path.join(projectDir, ...definition.sub);
      const first = definition.sub[0];
      const { identity } = definition;
      return Object.freeze({
        projectDir,
        baseDir,
        subParentDir: first === undefined ? projectDir : path.join(projectDir, first),
        canonical: path.join(baseDir, identity.canonical),
        gzip: path.join(baseDir, identity.gzip),
        tmp: path.join(baseDir, identity.tmp),
        gzipTmp: path.join(baseDir, identity.gzipTmp),
      });
    });
}
