/**
 * Paths Command
 *
 * Prints every path a file definition resolves to. Touches nothing on disk.
 */

import type { Result } from 'neverthrow';
import type { DiskError } from '../../durable-core/errors.js';
import type { FilePaths } from '../../engine/file-paths.js';
import type { CliResult } from '../types/cli-result.js';
import { success } from '../types/cli-result.js';
import type { FileLocation, LocationOptions } from './location.js';
import { diskFailure, parseLocation } from './location.js';

export interface PathsCommandDeps {
  readonly resolvePaths: (location: FileLocation) => Result<FilePaths, DiskError>;
}

export function executePathsCommand(deps: PathsCommandDeps, options: LocationOptions): CliResult {
  const location = parseLocation(options);
  if (location.kind === 'err') return location.error;

  return deps.resolvePaths(location.value).match(
    (paths) =>
      success({
        message: `${location.value.project}/${location.value.file} (${location.value.dir})`,
        fields: [
          ['project', paths.projectDir],
          ['base', paths.baseDir],
          ['file', paths.canonical],
          ['gzip', paths.gzip],
          ['tmp', paths.tmp],
          ['gzip tmp', paths.gzipTmp],
        ],
      }),
    (e) => diskFailure('Cannot resolve paths', e)
  );
}
