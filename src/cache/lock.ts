import { mkdir, open, readFile, rm, stat, utimes, type FileHandle } from 'node:fs/promises';
import { readFileSync, unlinkSync, Stats } from 'node:fs';
import { randomUUID } from 'node:crypto';
import { hostname as osHostname } from 'node:os';
import { dirname } from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import { errorCode, LockTimeoutError } from '../common/errors';
import { getLogger, Logger } from '../common/logger';

/** Contents of a lock file: who holds it, and the token proving ownership. */
export interface LockRecord {
  pid: number;
  hostname: string;
  acquiredAt: string;
  token: string;
}

export interface LockLease {
  readonly path: string;
  readonly record: LockRecord;
  release(): Promise<void>;
}

export interface MirrorLockOptions {
  /** A lock file whose mtime has not moved for this long is reclaimed. */
  staleMs?: number;
  pollIntervalMs?: number;
  hostname?: string;
  logger?: Logger;
}

export interface AcquireOptions {
  /** `Infinity` waits forever; `0` tries exactly once. */
  timeoutMs?: number;
  /** Stops waiting; the rejection carries the signal's reason. */
  signal?: AbortSignal;
}

interface HolderState {
  record?: LockRecord;
  stats: Stats;
}

export const DEFAULT_STALE_MS = 60_000;
export const DEFAULT_POLL_INTERVAL_MS = 100;
/** Breaking a lock takes a few milliseconds; a guard older than this was abandoned. */
export const BREAK_GUARD_STALE_MS = 10_000;

function isLockRecord(value: unknown): value is LockRecord {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return (
    'pid' in value && typeof value.pid === 'number'
    && 'hostname' in value && typeof value.hostname === 'string'
    && 'acquiredAt' in value && typeof value.acquiredAt === 'string'
    && 'token' in value && typeof value.token === 'string'
  );
}

function parseLockRecord(raw: string): LockRecord | undefined {
  try {
    const parsed: unknown = JSON.parse(raw);
    return isLockRecord(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
}

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else
    return errorCode(error) !== 'ESRCH';
  }
}

// Lock files held by this process, removed synchronously on exit.
const heldLocks = new Map<string, string>();

/**
 * Remove every lock file this process still holds. Safe to call from an
 * `exit` listener or a signal handler; only files carrying our token are removed.
 */
export function releaseHeldLocksSync(): void {
  for (const [path, token] of heldLocks) {
    try {
      const record = parseLockRecord(readFileSync(path, 'utf8'));
      if (record?.token === token) {
        unlinkSync(path);
      }
    } catch {
      // already gone
    }
  }
  heldLocks.clear();
}

process.on('exit', releaseHeldLocksSync);

/**
 * Cross-process exclusive lock backed by a lock file.
 *
 * The file is created with O_EXCL. A holder that died on this host is
 * detected by pid; a holder on another host sharing the cache is detected
 * by its heartbeat (the file's mtime) going quiet for `staleMs`.
 *
 * Unlinking a stale lock is serialized through a second O_EXCL file,
 * `<path>.break`, and the holder is judged again while it is held.
 */
export class MirrorLock {
  readonly path: string;
  private readonly staleMs: number;
  private readonly pollIntervalMs: number;
  private readonly hostname: string;
  private readonly logger: Logger;

  constructor(path: string, options: MirrorLockOptions = {}) {
    this.path = path;
    this.staleMs = options.staleMs ?? DEFAULT_STALE_MS;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.hostname = options.hostname ?? osHostname();
    this.logger = options.logger ?? getLogger('lock');
  }

  async acquire(options: AcquireOptions = {}): Promise<LockLease> {
    const { signal } = options;
    const timeoutMs = options.timeoutMs ?? Infinity;
    const deadline = Date.now() + timeoutMs;
    let waiting = false;
    await mkdir(dirname(this.path), { recursive: true });

    for (;;) {
      signal?.throwIfAborted();
      const lease = await this.tryCreate();
      if (lease) {
        this.logger.debug('Lock acquired', { path: this.path, waited: waiting });
        return lease;
      }

      const holder = await readHolder(this.path);
      if (!holder) {
        // released between our attempt and the read
        continue;
      }
      const staleReason = this.staleReason(holder, this.staleMs);
      if (staleReason && (await this.breakStale(holder, staleReason))) {
        continue;
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        throw new LockTimeoutError(this.path, timeoutMs, holder.record);
      }
      if (!waiting) {
        this.logger.info('Waiting for lock held by another process', { path: this.path, holder: holder.record });
        waiting = true;
      }
      await sleep(Math.min(this.pollIntervalMs, remaining), undefined, { signal });
    }
  }

  /** Run `fn` while holding the lock; the lock is released on every exit path. */
  async withLock<T>(fn: (lease: LockLease) => Promise<T>, options: AcquireOptions = {}): Promise<T> {
    const lease = await this.acquire(options);
    try {
      return await fn(lease);
    } finally {
      await lease.release();
    }
  }

  /** Current holder, or undefined when the lock is free. */
  async inspect(): Promise<LockRecord | undefined> {
    const holder = await readHolder(this.path);
    return holder?.record;
  }

  private get guardPath(): string {
    return `${this.path}.break`;
  }

  private async tryCreate(): Promise<LockLease | undefined> {
    const record = await createExclusive(this.path, this.hostname);
    if (!record) {
      return undefined;
    }
    heldLocks.set(this.path, record.token);
    return new FileLease(this.path, record, Math.max(10, Math.floor(this.staleMs / 3)), this.logger);
  }

  private staleReason(holder: HolderState, staleMs: number): string | undefined {
    const { record, stats } = holder;
    if (record && record.hostname === this.hostname && !isProcessAlive(record.pid)) {
      return `holder process ${record.pid} is gone`;
    }
    const age = Date.now() - stats.mtimeMs;
    if (age > staleMs) {
      return record ? `no heartbeat for ${Math.round(age)}ms` : `unreadable lock file is ${Math.round(age)}ms old`;
    }
    return undefined;
  }

  /**
   * Remove the stale lock `judged`, holding the break guard so that no two
   * processes ever unlink it. Returns false while another process breaks it.
   */
  private async breakStale(judged: HolderState, reason: string): Promise<boolean> {
    const guard = await this.acquireGuard();
    if (!guard) {
      return false;
    }
    try {
      // whoever held the guard before us may already have replaced the file
      const current = await readHolder(this.path);
      if (!current || !sameFile(current.stats, judged.stats) || !this.staleReason(current, this.staleMs)) {
        return true;
      }
      this.logger.warn('Removing stale lock', { path: this.path, reason, holder: current.record });
      await rm(this.path, { force: true });
      return true;
    } finally {
      await releaseOwned(this.guardPath, guard.token);
    }
  }

  private async acquireGuard(): Promise<LockRecord | undefined> {
    const guard = await createExclusive(this.guardPath, this.hostname);
    if (guard) {
      heldLocks.set(this.guardPath, guard.token);
      return guard;
    }
    const holder = await readHolder(this.guardPath);
    if (!holder) {
      return undefined;
    }
    const reason = this.staleReason(holder, BREAK_GUARD_STALE_MS);
    if (!reason) {
      return undefined;
    }
    const current = await readHolder(this.guardPath);
    if (current && sameFile(current.stats, holder.stats)) {
      this.logger.warn('Removing abandoned lock break guard', { path: this.guardPath, reason, holder: holder.record });
      await rm(this.guardPath, { force: true });
    }
    return undefined;
  }
}

function sameFile(a: Stats, b: Stats): boolean {
  return a.ino === b.ino && a.mtimeMs === b.mtimeMs;
}

async function createExclusive(path: string, hostname: string): Promise<LockRecord | undefined> {
  const record: LockRecord = {
    pid: process.pid,
    hostname,
    acquiredAt: new Date().toISOString(),
    token: randomUUID(),
  };
  let handle: FileHandle;
  try {
    handle = await open(path, 'wx', 0o644);
  } catch (error) {
    if (errorCode(error) === 'EEXIST') {
      return undefined;
    }
    throw error;
  }
  try {
    await handle.writeFile(JSON.stringify(record), 'utf8');
  } finally {
    await handle.close();
  }
  return record;
}

async function readHolder(path: string): Promise<HolderState | undefined> {
  try {
    const stats = await stat(path);
    const raw = await readFile(path, 'utf8');
    return { record: parseLockRecord(raw), stats };
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return undefined;
    }
    throw error;
  }
}

type ReleaseOutcome =
  | { status: 'removed' }
  | { status: 'missing' }
  | { status: 'foreign'; holder?: LockRecord };

// drop `path` only while it still carries `token`
async function releaseOwned(path: string, token: string): Promise<ReleaseOutcome> {
  heldLocks.delete(path);
  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return { status: 'missing' };
    }
    throw error;
  }
  const current = parseLockRecord(raw);
  if (current?.token !== token) {
    return { status: 'foreign', holder: current };
  }
  await rm(path, { force: true });
  return { status: 'removed' };
}

class FileLease implements LockLease {
  private heartbeat?: NodeJS.Timeout;
  private released = false;

  constructor(
    readonly path: string,
    readonly record: LockRecord,
    heartbeatMs: number,
    private readonly logger: Logger,
  ) {
    this.heartbeat = setInterval(() => {
      const now = new Date();
      utimes(this.path, now, now).catch((error: unknown) => {
        this.logger.warn('Failed to refresh lock heartbeat', { path: this.path, error });
      });
    }, heartbeatMs);
    this.heartbeat.unref();
  }

  async release(): Promise<void> {
    if (this.released) {
      return;
    }
    this.released = true;
    clearInterval(this.heartbeat);
    this.heartbeat = undefined;

    const outcome = await releaseOwned(this.path, this.record.token);
    if (outcome.status === 'missing') {
      this.logger.warn('Lock file vanished before release', { path: this.path });
    } else if (outcome.status === 'foreign') {
      this.logger.warn('Lock was taken over by another process before release', {
        path: this.path,
        holder: outcome.holder,
      });
    }
  }
}
