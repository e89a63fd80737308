export type {
  AppError,
  ConfigIssue,
  ConfigInvalidError,
  ContainerStage,
  ContainerFailedError,
  CommandCrashedError,
  ValidatedAppConfig,
} from './app-error.js';
export { Err } from './factories.js';
export { formatAppError } from './formatter.js';
