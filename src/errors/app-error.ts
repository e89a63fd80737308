import type { Brand } from '../runtime/brand.js';

/** One rejected environment variable. */
export type ConfigIssue = Readonly<{
  readonly variable: string;
  readonly message: string;
}>;

export type ConfigInvalidError = Readonly<{
  readonly _tag: 'ConfigInvalid';
  readonly issues: readonly ConfigIssue[];
}>;

export type ContainerStage = 'runtime' | 'ports' | 'services';

export type ContainerFailedError = Readonly<{
  readonly _tag: 'ContainerFailed';
  readonly stage: ContainerStage;
  readonly cause: unknown;
}>;

/** A CLI action rejected instead of returning a CliResult. */
export type CommandCrashedError = Readonly<{
  readonly _tag: 'CommandCrashed';
  readonly command: string;
  readonly cause: unknown;
}>;

/**
 * Process-level failures of the container and the CLI. Disk operations report
 * `DiskError` (durable-core/errors) instead.
 */
export type AppError = ConfigInvalidError | ContainerFailedError | CommandCrashedError;

export type ValidatedAppConfig<T> = Brand<T, 'ValidatedAppConfig'>;
