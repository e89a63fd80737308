import * as os from 'os';
import * as path from 'path';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { DirectoryResolverPort } from '../../../ports/directory-resolver.port.js';
import type { DirectoryKind } from '../../../durable-core/directory-kind.js';
import type { PathError } from '../../../durable-core/errors.js';
import { assertNever } from '../../../runtime/assert-never.js';

export const ROOT_DIR_ENV = 'STOWAGE_ROOT_DIR';

/** Host facts the resolver depends on; injectable for tests. */
export interface ResolverHost {
  readonly platform: NodeJS.Platform;
  readonly homedir: () => string;
}

export const NODE_RESOLVER_HOST: ResolverHost = {
  platform: process.platform,
  homedir: os.homedir,
};

type PathFlavor = typeof path.posix;

/**
 * User-directory conventions:
 *
 *   linux/bsd  XDG_*_HOME, falling back to ~/.cache, ~/.config, ~/.local/share
 *   darwin     ~/Library/{Caches, Application Support, Preferences}
 *   win32      %LOCALAPPDATA% (cache, data_local), %APPDATA% (the rest)
 *
 * STOWAGE_ROOT_DIR replaces all of them with `<root>/<kind>`.
 */
export class LocalDirectoryResolver implements DirectoryResolverPort {
  private readonly p: PathFlavor;

  constructor(
    private readonly env: Record<string, string | undefined>,
    private readonly host: ResolverHost = NODE_RESOLVER_HOST
  ) {
    this.p = host.platform === 'win32' ? path.win32 : path.posix;
  }

  projectDir(kind: DirectoryKind, project: string): Result<string, PathError> {
    return this.kindRoot(kind).map((root) => this.p.join(root, project));
  }

  private kindRoot(kind: DirectoryKind): Result<string, PathError> {
    const override = this.env[ROOT_DIR_ENV];
    if (override) {
      return this.p.isAbsolute(override)
        ? ok(this.p.join(override, kind))
        : err({ code: 'PATH_NOT_ABSOLUTE', path: override, message: `${ROOT_DIR_ENV} must be absolute: ${override}` } as const);
    }

    const resolved = this.platformRoot(kind);
    return resolved !== null && this.p.isAbsolute(resolved)
      ? ok(resolved)
      : err({
          code: 'PATH_DIRECTORY_UNAVAILABLE',
          kind,
          message: `No ${kind} directory available on ${this.host.platform}`,
        } as const);
  }

  private platformRoot(kind: DirectoryKind): string | null {
    switch (this.host.platform) {
      case 'win32':
        return this.windowsRoot(kind);
      case 'darwin':
        return this.macRoot(kind);
      default:
        return this.xdgRoot(kind);
    }
  }

  private home(): string | null {
    const home = this.host.homedir();
    return home && this.p.isAbsolute(home) ? home : null;
  }

  private underHome(...segments: string[]): string | null {
    const home = this.home();
    return home === null ? null : this.p.join(home, ...segments);
  }

  private xdg(variable: string, ...fallback: string[]): string | null {
    // XDG treats relative values as invalid; they are ignored.
    const value = this.env[variable];
    if (value && this.p.isAbsolute(value)) return value;
    return this.underHome(...fallback);
  }

  private xdgRoot(kind: DirectoryKind): string | null {
    switch (kind) {
      case 'cache':
        return this.xdg('XDG_CACHE_HOME', '.cache');
      case 'config':
      case 'preference':
        return this.xdg('XDG_CONFIG_HOME', '.config');
      case 'data':
      case 'data_local':
        return this.xdg('XDG_DATA_HOME', '.local', 'share');
      default:
        return assertNever(kind, 'directory kind');
    }
  }

  private macRoot(kind: DirectoryKind): string | null {
    switch (kind) {
      case 'cache':
        return this.underHome('Library', 'Caches');
      case 'config':
      case 'data':
      case 'data_local':
        return this.underHome('Library', 'Application Support');
      case 'preference':
        return this.underHome('Library', 'Preferences');
      default:
        return assertNever(kind, 'directory kind');
    }
  }

  private windowsRoot(kind: DirectoryKind): string | null {
    switch (kind) {
      case 'cache':
      case 'data_local':
        return this.env['LOCALAPPDATA'] || null;
      case 'config':
      case 'data':
      case 'preference':
        return this.env['APPDATA'] || null;
      default:
        return assertNever(kind, 'directory kind');
    }
  }
}
