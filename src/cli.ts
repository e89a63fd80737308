#!/usr/bin/env node
/**
 * stowage CLI: composition root.
 *
 * Wires dependencies for each command and interprets its CliResult.
 * Command logic lives in src/cli/commands/*.ts.
 */

import 'reflect-metadata';
import { Command } from 'commander';

import { initializeContainer, container } from './di/container.js';
import { DI } from './di/tokens.js';
import type { ProcessTerminator } from './runtime/ports/process-terminator.js';
import type { FileSystemPort } from './ports/fs.port.js';
import type { Stowage } from './engine/stowage.js';
import { formatAppError } from './errors/formatter.js';
import { Err } from './errors/factories.js';
import { failure } from './cli/types/cli-result.js';
import { interpretCliResult, interpretCliResultWithoutDI } from './cli/interpret-result.js';
import {
  executePathsCommand,
  executeInspectCommand,
  executeCleanTmpCommand,
  type FileLocation,
  type LocationOptions,
} from './cli/commands/index.js';

interface Wired {
  readonly stowage: Stowage;
  readonly fs: FileSystemPort;
  readonly terminator: ProcessTerminator;
}

/** Start the container or exit with the configuration problem. */
function wire(): Wired {
  const started = initializeContainer({ runtimeMode: { kind: 'cli' } });
  if (started.kind === 'err') {
    interpretCliResultWithoutDI(failure(formatAppError(started.error)));
  }
  return {
    stowage: container.resolve<Stowage>(DI.Services.Stowage),
    fs: container.resolve<FileSystemPort>(DI.Ports.FileSystem),
    terminator: container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator),
  };
}

/** Marker-file definition: the CLI only needs names, never values. */
function defineLocation(stowage: Stowage, location: FileLocation) {
  return stowage.define({ ...location, codec: stowage.codecs.empty() });
}

function withLocationOptions(command: Command): Command {
  return command
    .option('-d, --dir <kind>', 'directory kind: cache, config, data, data_local, preference', 'data')
    .option('-s, --sub <dirs>', 'sub-directories below the project, "/"-separated')
    .option('-e, --ext <ext>', 'file extension (none by default)');
}

// ═══════════════════════════════════════════════════════════════════════════
// PROGRAM DEFINITION
// ═══════════════════════════════════════════════════════════════════════════

const program = new Command();

program
  .name('stowage')
  .description('Inspect and maintain files written by stowage')
  .version('0.1.0');

withLocationOptions(
  program.command('paths <project> <file>').description('Show the canonical, gzip and temp paths of a file')
).action((project: string, file: string, options: Omit<LocationOptions, 'project' | 'file'>) => {
  const { stowage, terminator } = wire();

  const result = executePathsCommand(
    { resolvePaths: (location) => defineLocation(stowage, location).andThen((f) => f.paths()) },
    { ...options, project, file }
  );

  interpretCliResult(result, terminator);
});

program
  .command('inspect <path>')
  .description('Show the header, version and size of a framed binary file')
  .action(async (filePath: string) => {
    const { fs, terminator } = wire();

    const result = await executeInspectCommand(
      {
        readRange: (p, position, length) => fs.readRange(p, position, length),
        stat: (p) => fs.stat(p),
      },
      filePath
    );

    interpretCliResult(result, terminator);
  });

withLocationOptions(
  program.command('clean-tmp <project> <file>').description('Delete leftover temp files of interrupted atomic writes')
).action(async (project: string, file: string, options: Omit<LocationOptions, 'project' | 'file'>) => {
  const { stowage, terminator } = wire();

  const result = await executeCleanTmpCommand(
    {
      rmTmp: (location) =>
        defineLocation(stowage, location).asyncAndThen((f) => f.rmTmp()),
    },
    { ...options, project, file }
  );

  interpretCliResult(result, terminator);
});

program.parseAsync(process.argv).catch((e: unknown) => {
  interpretCliResultWithoutDI(failure(formatAppError(Err.commandCrashed(process.argv[2] ?? '(none)', e))));
});
