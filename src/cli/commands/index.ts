export { executePathsCommand, type PathsCommandDeps } from './paths.js';
export { executeInspectCommand, type InspectCommandDeps, toHex, asPrintable } from './inspect.js';
export { executeCleanTmpCommand, type CleanTmpCommandDeps } from './clean-tmp.js';
export { parseLocation, diskFailure, type FileLocation, type LocationOptions } from './location.js';
