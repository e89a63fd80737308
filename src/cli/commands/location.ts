import type { Result } from '../../runtime/result.js';
import { ok, err } from '../../runtime/result.js';
import type { DirectoryKind } from '../../durable-core/directory-kind.js';
import { DIRECTORY_KINDS, DEFAULT_DIRECTORY_KIND, parseDirectoryKind } from '../../durable-core/directory-kind.js';
import type { DiskError } from '../../durable-core/errors.js';
import { formatDiskError } from '../../durable-core/errors.js';
import type { CliResult } from '../types/cli-result.js';
import { failure, misuse } from '../types/cli-result.js';

/** Raw commander options naming one file. */
export interface LocationOptions {
  readonly project: string;
  readonly file: string;
  readonly sub?: string;
  readonly dir?: string;
  readonly ext?: string;
}

export interface FileLocation {
  readonly project: string;
  readonly file: string;
  readonly sub?: string;
  readonly dir: DirectoryKind;
  readonly extension?: string;
}

export function parseLocation(options: LocationOptions): Result<FileLocation, CliResult> {
  const dir = options.dir === undefined ? DEFAULT_DIRECTORY_KIND : parseDirectoryKind(options.dir);
  if (dir === null) {
    return err(misuse(`Unknown directory kind: ${options.dir}`, undefined, [`Use one of: ${DIRECTORY_KINDS.join(', ')}`]));
  }
  return ok({ project: options.project, file: options.file, sub: options.sub, dir, extension: options.ext });
}

/** Definition problems are the caller's arguments (exit 2); the rest are operational (exit 1). */
export function diskFailure(prefix: string, error: DiskError): CliResult {
  if (error.code === 'DEFINITION_INVALID') {
    return misuse(`${prefix}: ${error.message}`, error.issues.map((i) => `${i.path}: ${i.message}`));
  }
  return failure(`${prefix}: ${formatDiskError(error)}`);
}
