import { describe, it, expect } from 'vitest';
import { spawnSync } from 'node:child_process';
import { readdir, readFile, stat, utimes, writeFile } from 'node:fs/promises';
import { hostname } from 'node:os';
import { join } from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import { LockTimeoutError } from '../../src/common/errors';
import { isProcessAlive, LockRecord, MirrorLock } from '../../src/cache';
import { withTempDir } from '../helpers/fakeGit';
import { memoryLogger } from '../helpers/streams';

function foreignRecord(overrides: Partial<LockRecord> = {}): LockRecord {
  return {
    pid: 1,
    hostname: 'other-host.invalid',
    acquiredAt: new Date(0).toISOString(),
    token: 'foreign-token',
    ...overrides,
  };
}

function finishedPid(): number {
  const child = spawnSync(process.execPath, ['-e', '']);
  if (child.pid === undefined) {
    throw new Error('could not start a child process');
  }
  return child.pid;
}

describe('MirrorLock', () => {
  it('writes the holder record and removes the file on release', async () => {
    await withTempDir(async (dir) => {
      const path = join(dir, 'nested', 'mirror.lock');
      const lock = new MirrorLock(path, { hostname: 'node-a' });
      const lease = await lock.acquire();
      const record: unknown = JSON.parse(await readFile(path, 'utf8'));
      expect(record).toEqual(lease.record);
      expect(lease.record.pid).toBe(process.pid);
      expect(lease.record.hostname).toBe('node-a');
      expect(await lock.inspect()).toEqual(lease.record);

      await lease.release();
      await lease.release();
      expect(await lock.inspect()).toBeUndefined();
    });
  });

  it('gives up with LockTimeoutError while another holder is alive', async () => {
    await withTempDir(async (dir) => {
      const path = join(dir, 'mirror.lock');
      const holder = await new MirrorLock(path).acquire();
      const { logger, messages } = memoryLogger();
      const started = Date.now();
      try {
        const error = await new MirrorLock(path, { pollIntervalMs: 50, logger })
          .acquire({ timeoutMs: 1000 })
          .catch((reason: unknown) => reason);
        expect(error).toBeInstanceOf(LockTimeoutError);
        expect(Date.now() - started).toBeGreaterThanOrEqual(950);
        if (error instanceof LockTimeoutError) {
          expect(error.details.holder).toEqual(holder.record);
        }
        expect(messages()).toEqual(['Waiting for lock held by another process']);
      } finally {
        await holder.release();
      }
    });
  });

  it('tries exactly once with a zero timeout', async () => {
    await withTempDir(async (dir) => {
      const path = join(dir, 'mirror.lock');
      const holder = await new MirrorLock(path).acquire();
      try {
        await expect(new MirrorLock(path).acquire({ timeoutMs: 0 })).rejects.toBeInstanceOf(LockTimeoutError);
      } finally {
        await holder.release();
      }
    });
  });

  it('reclaims a lock whose holder process is gone', async () => {
    await withTempDir(async (dir) => {
      const path = join(dir, 'mirror.lock');
      const deadPid = finishedPid();
      expect(isProcessAlive(deadPid)).toBe(false);
      await writeFile(path, JSON.stringify(foreignRecord({ pid: deadPid, hostname: hostname() })));

      const { logger, entries } = memoryLogger();
      const lease = await new MirrorLock(path, { logger }).acquire({ timeoutMs: 0 });
      try {
        expect(lease.record.pid).toBe(process.pid);
        const warning = entries().find((entry) => entry.level === 'warn');
        expect(warning?.message).toBe('Removing stale lock');
        expect(warning?.reason).toBe(`holder process ${deadPid} is gone`);
      } finally {
        await lease.release();
      }
    });
  });

  it('reclaims a lock from another host once its heartbeat stops', async () => {
    await withTempDir(async (dir) => {
      const path = join(dir, 'mirror.lock');
      await writeFile(path, JSON.stringify(foreignRecord()));
      const old = new Date(Date.now() - 120_000);
      await utimes(path, old, old);

      const lease = await new MirrorLock(path, { logger: memoryLogger().logger }).acquire({ timeoutMs: 0 });
      try {
        expect(lease.record.token).not.toBe('foreign-token');
      } finally {
        await lease.release();
      }
    });
  });

  it('clears a break guard abandoned by a dead process', async () => {
    await withTempDir(async (dir) => {
      const path = join(dir, 'mirror.lock');
      const deadPid = finishedPid();
      await writeFile(path, JSON.stringify(foreignRecord({ pid: deadPid, hostname: hostname() })));
      await writeFile(`${path}.break`, JSON.stringify(foreignRecord({ pid: deadPid, hostname: hostname() })));

      const { logger, messages } = memoryLogger('warn');
      const lease = await new MirrorLock(path, { pollIntervalMs: 5, logger }).acquire({ timeoutMs: 1000 });
      try {
        expect(messages()).toEqual(['Removing abandoned lock break guard', 'Removing stale lock']);
        expect(await readdir(dir)).toEqual(['mirror.lock']);
      } finally {
        await lease.release();
      }
    });
  });

  it('stops waiting when aborted', async () => {
    await withTempDir(async (dir) => {
      const path = join(dir, 'mirror.lock');
      const holder = await new MirrorLock(path).acquire();
      try {
        const controller = new AbortController();
        const waiting = new MirrorLock(path, { pollIntervalMs: 10 }).acquire({ signal: controller.signal });
        controller.abort();
        await expect(waiting).rejects.toThrow(/abort/i);
      } finally {
        await holder.release();
      }
    });
  });

  it('does not reclaim a foreign lock with a recent heartbeat', async () => {
    await withTempDir(async (dir) => {
      const path = join(dir, 'mirror.lock');
      await writeFile(path, JSON.stringify(foreignRecord()));
      await expect(new MirrorLock(path).acquire({ timeoutMs: 0 })).rejects.toBeInstanceOf(LockTimeoutError);
      expect(await new MirrorLock(path).inspect()).toEqual(foreignRecord());
    });
  });

  it('refreshes the heartbeat while held', async () => {
    await withTempDir(async (dir) => {
      const path = join(dir, 'mirror.lock');
      const lease = await new MirrorLock(path, { staleMs: 90 }).acquire();
      try {
        const old = new Date(Date.now() - 60_000);
        await utimes(path, old, old);
        await sleep(150);
        const { mtimeMs } = await stat(path);
        expect(Date.now() - mtimeMs).toBeLessThan(10_000);
      } finally {
        await lease.release();
      }
    });
  });

  it('leaves a lock taken over by someone else in place on release', async () => {
    await withTempDir(async (dir) => {
      const path = join(dir, 'mirror.lock');
      const { logger, messages } = memoryLogger();
      const lease = await new MirrorLock(path, { logger }).acquire();
      await writeFile(path, JSON.stringify(foreignRecord()));
      await lease.release();
      expect(await readFile(path, 'utf8')).toBe(JSON.stringify(foreignRecord()));
      expect(messages()).toContain('Lock was taken over by another process before release');
    });
  });

  it('releases the lock when the callback throws', async () => {
    await withTempDir(async (dir) => {
      const lock = new MirrorLock(join(dir, 'mirror.lock'));
      await expect(lock.withLock(async () => {
        throw new Error('boom');
      })).rejects.toThrow('boom');
      expect(await lock.inspect()).toBeUndefined();
    });
  });

  it('never lets two holders overlap', async () => {
    await withTempDir(async (dir) => {
      const path = join(dir, 'mirror.lock');
      let active = 0;
      let maxActive = 0;
      const order: number[] = [];
      await Promise.all([0, 1, 2, 3, 4].map((id) => new MirrorLock(path, { pollIntervalMs: 5 }).withLock(async () => {
        active += 1;
        maxActive = Math.max(maxActive, active);
        await sleep(20);
        order.push(id);
        active -= 1;
      })));
      expect(maxActive).toBe(1);
      expect([...order].sort()).toEqual([0, 1, 2, 3, 4]);
    });
  });
});
