/**
 * Result envelope of every disk operation: a byte count and the path it
 * describes. Frozen on creation.
 */
export type Metadata = Readonly<{
  readonly size: number;
  readonly path: string;
}>;

export function metadata(size: number, path: string): Metadata {
  return Object.freeze({ size, path });
}

export function formatMetadata(m: Metadata): string {
  return `${m.path} (${formatSize(m.size)})`;
}

const UNITS = ['B', 'KiB', 'MiB', 'GiB', 'TiB'] as const;

export function formatSize(bytes: number): string {
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${bytes} B` : `${value.toFixed(1)} ${UNITS[unit]}`;
}
