/**
 * Logical user directories a file can live under.
 * The resolver maps each one to the platform's convention.
 */
export const DIRECTORY_KINDS = ['cache', 'config', 'data', 'data_local', 'preference'] as const;

export type DirectoryKind = (typeof DIRECTORY_KINDS)[number];

export const DEFAULT_DIRECTORY_KIND: DirectoryKind = 'data';

export function parseDirectoryKind(raw: string): DirectoryKind | null {
  const normalized = raw.trim().toLowerCase().replace(/-/g, '_');
  return DIRECTORY_KINDS.find((k) => k === normalized) ?? null;
}
