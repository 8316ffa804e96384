import { access, mkdir, readdir, rename, rm } from 'node:fs/promises';
import { constants } from 'node:fs';
import { basename, join } from 'node:path';
import { errorCode, RepositoryCorruptError } from '../common/errors';
import { getLogger, Logger } from '../common/logger';
import { GitClient } from '../git';
import { MirrorLock, MirrorLockOptions } from './lock';
import { CacheMetadata, isFresh, readCacheMetadata, removeCacheMetadata, writeCacheMetadata } from './metadata';
import { mirrorLayout, MirrorLayout } from './paths';

export interface MirrorHandle {
  reference: string;
  branch: string;
  /** absolute path of the mirror's working tree */
  root: string;
  revision: string;
  /** whether git was asked to clone or update during this call */
  refreshed: boolean;
}

export interface MirrorManagerOptions {
  cacheRoot: string;
  git: GitClient;
  branch?: string;
  /** `Infinity` never updates an existing mirror. */
  maxAgeMs?: number;
  lockTimeoutMs?: number;
  lock?: Omit<MirrorLockOptions, 'logger'>;
  logger?: Logger;
  now?: () => number;
  /** Stops waiting for the lock and keeps a corrupt mirror from being re-cloned. */
  signal?: AbortSignal;
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

let cloneCounter = 0;

/**
 * Owns the on-disk mirrors below one cache root. Every read or write of a
 * mirror happens while holding that mirror's {@link MirrorLock}.
 */
export class MirrorManager {
  private readonly cacheRoot: string;
  private readonly git: GitClient;
  private readonly branch: string;
  private readonly maxAgeMs: number;
  private readonly lockTimeoutMs: number;
  private readonly lockOptions: Omit<MirrorLockOptions, 'logger'>;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly signal?: AbortSignal;

  constructor(options: MirrorManagerOptions) {
    this.cacheRoot = options.cacheRoot;
    this.git = options.git;
    this.branch = options.branch ?? 'master';
    this.maxAgeMs = options.maxAgeMs ?? 0;
    this.lockTimeoutMs = options.lockTimeoutMs ?? Infinity;
    this.lockOptions = options.lock ?? {};
    this.logger = options.logger ?? getLogger('mirror');
    this.now = options.now ?? Date.now;
    this.signal = options.signal;
  }

  layout(reference: string): MirrorLayout {
    return mirrorLayout(this.cacheRoot, reference, this.branch);
  }

  /** Refresh the mirror for `reference` and release the lock again. */
  async ensureUpToDate(reference: string): Promise<MirrorHandle> {
    return this.withMirror(reference, async (handle) => handle);
  }

  /**
   * Refresh the mirror for `reference` and run `fn` against it without
   * releasing the lock in between, so `fn` never sees a concurrent update.
   */
  async withMirror<T>(reference: string, fn: (handle: MirrorHandle) => Promise<T>): Promise<T> {
    const layout = this.layout(reference);
    await mkdir(layout.workDir, { recursive: true, mode: 0o755 });
    const lock = new MirrorLock(layout.lockFile, { ...this.lockOptions, logger: this.logger.child('lock') });
    return lock.withLock(async () => {
      const handle = await this.refreshWithRecovery(reference, layout);
      return fn(handle);
    }, { timeoutMs: this.lockTimeoutMs, signal: this.signal });
  }

  private async refreshWithRecovery(reference: string, layout: MirrorLayout): Promise<MirrorHandle> {
    try {
      return await this.refresh(reference, layout);
    } catch (error) {
      if (!(error instanceof RepositoryCorruptError)) {
        throw error;
      }
      this.signal?.throwIfAborted();
      this.logger.warn('Mirror is corrupt, cloning it again from scratch', {
        reference,
        path: layout.repoDir,
        error,
      });
      await this.discard(layout);
      return this.refresh(reference, layout);
    }
  }

  private async refresh(reference: string, layout: MirrorLayout): Promise<MirrorHandle> {
    const metadata = await readCacheMetadata(layout.metadataFile);
    if (metadata && (metadata.reference !== reference || metadata.branch !== this.branch)) {
      throw new RepositoryCorruptError(`Cache ${layout.workDir} belongs to another repository`, layout.workDir, {
        expected: { reference, branch: this.branch },
        found: { reference: metadata.reference, branch: metadata.branch },
      });
    }

    const hasMirror = await pathExists(join(layout.repoDir, '.git'));
    if (!hasMirror) {
      if (await pathExists(layout.repoDir)) {
        throw new RepositoryCorruptError(`Mirror ${layout.repoDir} exists but is not a git repository`, layout.repoDir);
      }
      await this.clone(reference, layout);
      return this.record(reference, layout);
    }

    if (!(await this.git.isRepository(layout.repoDir))) {
      throw new RepositoryCorruptError(`Mirror ${layout.repoDir} is not a valid git repository`, layout.repoDir);
    }

    if (metadata && isFresh(metadata, this.maxAgeMs, this.now())) {
      this.logger.debug('Mirror is fresh, skipping update', { reference, syncedAt: metadata.syncedAt });
      const revision = await this.git.revision(layout.repoDir);
      return { reference, branch: this.branch, root: layout.repoDir, revision, refreshed: false };
    }

    this.logger.info('Updating mirror', { reference, branch: this.branch, path: layout.repoDir });
    await this.git.update(layout.repoDir, this.branch);
    return this.record(reference, layout);
  }

  private async clone(reference: string, layout: MirrorLayout): Promise<void> {
    // clone beside the final location so `repo/` only ever holds a complete tree
    await this.removeStaleStaging(layout);
    cloneCounter += 1;
    const staging = `${layout.repoDir}.tmp-${process.pid}-${cloneCounter}`;
    this.logger.info('Cloning mirror', { reference, branch: this.branch, path: layout.repoDir });
    try {
      await this.git.clone(reference, staging, this.branch);
      await rename(staging, layout.repoDir);
    } catch (error) {
      await rm(staging, { recursive: true, force: true });
      throw error;
    }
  }

  // leftovers of clones whose process died; safe to remove while we hold the lock
  private async removeStaleStaging(layout: MirrorLayout): Promise<void> {
    const prefix = `${basename(layout.repoDir)}.tmp-`;
    const entries = await readdir(layout.workDir);
    for (const entry of entries.filter((name) => name.startsWith(prefix))) {
      this.logger.debug('Removing abandoned clone', { path: join(layout.workDir, entry) });
      await rm(join(layout.workDir, entry), { recursive: true, force: true });
    }
  }

  private async record(reference: string, layout: MirrorLayout): Promise<MirrorHandle> {
    const revision = await this.git.revision(layout.repoDir);
    const metadata: CacheMetadata = {
      reference,
      branch: this.branch,
      revision,
      syncedAt: this.now(),
    };
    await writeCacheMetadata(layout.metadataFile, metadata);
    return { reference, branch: this.branch, root: layout.repoDir, revision, refreshed: true };
  }

  private async discard(layout: MirrorLayout): Promise<void> {
    await removeCacheMetadata(layout.metadataFile);
    try {
      await rm(layout.repoDir, { recursive: true, force: true });
    } catch (error) {
      throw new RepositoryCorruptError(
        `Cannot remove corrupt mirror ${layout.repoDir} (${errorCode(error) ?? 'unknown error'})`,
        layout.repoDir,
        {},
        { cause: error },
      );
    }
  }
}
