/**
 * On-disk names of one logical file.
 *
 *   canonical  {file}.{ext}
 *   gzip       {file}.{ext}.gz
 *   tmp        {file}.{ext}.tmp
 *   gzipTmp    {file}.{ext}.gz.tmp
 *
 * With an empty extension the `.{ext}` part is dropped. Derived once per
 * definition so save and load can never disagree.
 */
export const GZIP_SUFFIX = 'gz';
export const TMP_SUFFIX = 'tmp';

export interface FileIdentity {
  readonly canonical: string;
  readonly gzip: string;
  readonly tmp: string;
  readonly gzipTmp: string;
}

export function deriveFileIdentity(file: string, extension: string): FileIdentity {
  const canonical = extension ? `${file}.${extension}` : file;
  const gzip = `${canonical}.${GZIP_SUFFIX}`;
  return Object.freeze({
    canonical,
    gzip,
    tmp: `${canonical}.${TMP_SUFFIX}`,
    gzipTmp: `${gzip}.${TMP_SUFFIX}`,
  });
}
