import type {
  AppError,
  CommandCrashedError,
  ConfigInvalidError,
  ConfigIssue,
  ContainerFailedError,
  ContainerStage,
} from './app-error.js';

export const Err = {
  configInvalid: (issues: readonly ConfigIssue[]): ConfigInvalidError => ({ _tag: 'ConfigInvalid', issues }),

  containerFailed: (stage: ContainerStage, cause: unknown): ContainerFailedError => ({ _tag: 'ContainerFailed', stage, cause }),

  commandCrashed: (command: string, cause: unknown): CommandCrashedError => ({ _tag: 'CommandCrashed', command, cause }),
} as const satisfies Record<string, (...args: never[]) => AppError>;
