import { readFile, rename, rm, writeFile } from 'node:fs/promises';
import { errorCode, RepositoryCorruptError } from '../common/errors';

/** Contents of `cache.json` next to a mirror. */
export interface CacheMetadata {
  reference: string;
  branch: string;
  revision: string;
  /** epoch milliseconds of the last successful clone or update */
  syncedAt: number;
}

function isCacheMetadata(value: unknown): value is CacheMetadata {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return (
    'reference' in value && typeof value.reference === 'string'
    && 'branch' in value && typeof value.branch === 'string'
    && 'revision' in value && typeof value.revision === 'string'
    && 'syncedAt' in value && typeof value.syncedAt === 'number'
  );
}

/**
 * Read the metadata file. A missing file means "never synced"; unreadable or
 * malformed contents mean the cache directory cannot be trusted.
 */
export async function readCacheMetadata(path: string): Promise<CacheMetadata | undefined> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return undefined;
    }
    throw new RepositoryCorruptError(`Cannot read cache metadata ${path}`, path, {}, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new RepositoryCorruptError(`Cache metadata ${path} is not valid JSON`, path, {}, { cause: error });
  }
  if (!isCacheMetadata(parsed)) {
    throw new RepositoryCorruptError(`Cache metadata ${path} has an unexpected shape`, path);
  }
  return parsed;
}

export async function writeCacheMetadata(path: string, metadata: CacheMetadata): Promise<void> {
  // rename is atomic on POSIX, so readers never see a half-written file
  const tmp = `${path}.tmp.${process.pid}`;
  await writeFile(tmp, `${JSON.stringify(metadata, null, 2)}\n`, { encoding: 'utf8', mode: 0o644 });
  await rename(tmp, path);
}

export async function removeCacheMetadata(path: string): Promise<void> {
  await rm(path, { force: true });
}

export function isFresh(metadata: CacheMetadata, maxAgeMs: number, now: number): boolean {
  return metadata.syncedAt + maxAgeMs > now;
}
