/**
 * Clean-tmp Command
 *
 * Deletes `.tmp` leftovers of interrupted atomic saves and removes.
 */

import type { ResultAsync } from 'neverthrow';
import type { DiskError } from '../../durable-core/errors.js';
import type { CliResult } from '../types/cli-result.js';
import { success } from '../types/cli-result.js';
import type { FileLocation, LocationOptions } from './location.js';
import { diskFailure, parseLocation } from './location.js';

export interface CleanTmpCommandDeps {
  readonly rmTmp: (location: FileLocation) => ResultAsync<void, DiskError>;
}

export async function executeCleanTmpCommand(deps: CleanTmpCommandDeps, options: LocationOptions): Promise<CliResult> {
  const location = parseLocation(options);
  if (location.kind === 'err') return location.error;

  return deps.rmTmp(location.value).match(
    () => success({ message: `No temp files left for ${location.value.project}/${location.value.file}` }),
    (e) => diskFailure('Cleanup failed', e)
  );
}
