import { describe, it, expect } from 'vitest';
import { mkdir, readdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ConfigurationError, NetworkError } from '../../src/common/errors';
import { MirrorManager, MirrorManagerOptions, readCacheMetadata, writeCacheMetadata } from '../../src/cache';
import { FakeGitClient, withTempDir, writeTree } from '../helpers/fakeGit';
import { memoryLogger } from '../helpers/streams';

const REFERENCE = 'https://git.example.invalid/pool/config.git';

interface Fixture {
  dir: string;
  git: FakeGitClient;
  remoteDir: string;
  clock: { now: number };
  manager(overrides?: Partial<MirrorManagerOptions>): MirrorManager;
}

async function withFixture(fn: (fixture: Fixture) => Promise<void>): Promise<void> {
  await withTempDir(async (dir) => {
    const remoteDir = join(dir, 'remote');
    await writeTree(remoteDir, { 'a.conf': 'A = 1\n' });
    const git = new FakeGitClient();
    git.addRemote(REFERENCE, remoteDir);
    const clock = { now: 1_700_000_000_000 };
    const manager = (overrides: Partial<MirrorManagerOptions> = {}) => new MirrorManager({
      cacheRoot: join(dir, 'cache'),
      git,
      maxAgeMs: 60_000,
      now: () => clock.now,
      logger: memoryLogger().logger,
      ...overrides,
    });
    await fn({ dir, git, remoteDir, clock, manager });
  });
}

describe('MirrorManager', () => {
  it('clones on first use and records the sync', async () => {
    await withFixture(async ({ git, clock, manager }) => {
      const mirrors = manager();
      const layout = mirrors.layout(REFERENCE);
      const handle = await mirrors.ensureUpToDate(REFERENCE);

      expect(handle).toEqual({
        reference: REFERENCE,
        branch: 'master',
        root: layout.repoDir,
        revision: 'rev-1',
        refreshed: true,
      });
      expect(await readFile(join(handle.root, 'a.conf'), 'utf8')).toBe('A = 1\n');
      expect(await readCacheMetadata(layout.metadataFile)).toEqual({
        reference: REFERENCE,
        branch: 'master',
        revision: 'rev-1',
        syncedAt: clock.now,
      });
      expect((await readdir(layout.workDir)).sort()).toEqual(['cache.json', 'repo']);
      expect(git.count('clone')).toBe(1);
      expect(git.calls[0].args[1]).toMatch(/repo\.tmp-\d+-\d+$/);
    });
  });

  it('returns the same path for the same reference', async () => {
    await withFixture(async ({ manager }) => {
      const first = await manager().ensureUpToDate(REFERENCE);
      const second = await manager().ensureUpToDate(REFERENCE);
      expect(second.root).toBe(first.root);
    });
  });

  it('skips git while the mirror is fresh and updates once it is not', async () => {
    await withFixture(async ({ git, clock, manager, remoteDir }) => {
      await manager().ensureUpToDate(REFERENCE);

      clock.now += 59_999;
      const fresh = await manager().ensureUpToDate(REFERENCE);
      expect(fresh.refreshed).toBe(false);
      expect(git.count('update')).toBe(0);

      git.setRevision(REFERENCE, 'rev-2');
      await writeFile(join(remoteDir, 'a.conf'), 'A = 2\n');
      clock.now += 1;
      const updated = await manager().ensureUpToDate(REFERENCE);
      expect(updated).toMatchObject({ revision: 'rev-2', refreshed: true });
      expect(git.count('update')).toBe(1);
      expect(git.count('clone')).toBe(1);
      expect(await readFile(join(updated.root, 'a.conf'), 'utf8')).toBe('A = 2\n');
    });
  });

  it('updates on every call with a zero max age', async () => {
    await withFixture(async ({ git, manager }) => {
      const mirrors = manager({ maxAgeMs: 0 });
      await mirrors.ensureUpToDate(REFERENCE);
      await mirrors.ensureUpToDate(REFERENCE);
      expect(git.count('update')).toBe(1);
    });
  });

  it('never updates with an infinite max age', async () => {
    await withFixture(async ({ git, clock, manager }) => {
      const mirrors = manager({ maxAgeMs: Infinity });
      await mirrors.ensureUpToDate(REFERENCE);
      clock.now += 365 * 24 * 3600 * 1000;
      expect((await mirrors.ensureUpToDate(REFERENCE)).refreshed).toBe(false);
      expect(git.count('update')).toBe(0);
    });
  });

  it('keeps branches of one repository in separate mirrors', async () => {
    await withFixture(async ({ manager }) => {
      const master = await manager().ensureUpToDate(REFERENCE);
      const production = await manager({ branch: 'production' }).ensureUpToDate(REFERENCE);
      expect(production.branch).toBe('production');
      expect(production.root).not.toBe(master.root);
    });
  });

  it('clones again when git no longer accepts the mirror', async () => {
    await withFixture(async ({ git, clock, manager }) => {
      const { logger, messages } = memoryLogger('warn');
      const mirrors = manager({ logger });
      await mirrors.ensureUpToDate(REFERENCE);
      git.markBroken(mirrors.layout(REFERENCE).repoDir);
      clock.now += 1;

      const handle = await mirrors.ensureUpToDate(REFERENCE);
      expect(handle.refreshed).toBe(true);
      expect(git.count('clone')).toBe(2);
      expect(messages()).toEqual(['Mirror is corrupt, cloning it again from scratch']);
    });
  });

  it('does not clone again once aborted', async () => {
    await withFixture(async ({ git, clock, manager }) => {
      const controller = new AbortController();
      const mirrors = manager({ signal: controller.signal });
      await mirrors.ensureUpToDate(REFERENCE);
      const layout = mirrors.layout(REFERENCE);
      git.markBroken(layout.repoDir);
      git.onCall = (op) => {
        if (op === 'isRepository') {
          controller.abort();
        }
      };
      clock.now += 1;

      await expect(mirrors.ensureUpToDate(REFERENCE)).rejects.toThrow(/abort/i);
      expect(git.count('clone')).toBe(1);
      expect(await readFile(join(layout.repoDir, 'a.conf'), 'utf8')).toBe('A = 1\n');
      expect(await readdir(layout.workDir)).not.toContain('mirror.lock');
    });
  });

  it('clones again over a working tree without git data', async () => {
    await withFixture(async ({ git, manager }) => {
      const mirrors = manager();
      const layout = mirrors.layout(REFERENCE);
      await writeTree(layout.repoDir, { 'leftover.conf': 'X = 1\n' });

      const handle = await mirrors.ensureUpToDate(REFERENCE);
      expect(git.count('clone')).toBe(1);
      expect((await readdir(handle.root)).sort()).toEqual(['.git', 'a.conf']);
    });
  });

  it('clones again when the metadata names another repository', async () => {
    await withFixture(async ({ git, manager }) => {
      const mirrors = manager();
      const layout = mirrors.layout(REFERENCE);
      await mirrors.ensureUpToDate(REFERENCE);
      await writeCacheMetadata(layout.metadataFile, {
        reference: 'https://git.example.invalid/other.git',
        branch: 'master',
        revision: 'rev-9',
        syncedAt: 0,
      });

      await mirrors.ensureUpToDate(REFERENCE);
      expect(git.count('clone')).toBe(2);
      expect((await readCacheMetadata(layout.metadataFile))?.reference).toBe(REFERENCE);
    });
  });

  it('leaves the previous mirror alone when the update fails', async () => {
    await withFixture(async ({ git, clock, manager }) => {
      const mirrors = manager();
      const layout = mirrors.layout(REFERENCE);
      await mirrors.ensureUpToDate(REFERENCE);
      const before = await readCacheMetadata(layout.metadataFile);

      clock.now += 120_000;
      git.failNext('update', new NetworkError('Failed to fetch master: unreachable', layout.repoDir));
      await expect(mirrors.ensureUpToDate(REFERENCE)).rejects.toBeInstanceOf(NetworkError);

      expect(await readCacheMetadata(layout.metadataFile)).toEqual(before);
      expect(await readFile(join(layout.repoDir, 'a.conf'), 'utf8')).toBe('A = 1\n');
      expect(await readdir(layout.workDir)).not.toContain('mirror.lock');
    });
  });

  it('leaves nothing behind when the first clone fails', async () => {
    await withFixture(async ({ git, manager }) => {
      const mirrors = manager();
      const layout = mirrors.layout(REFERENCE);
      git.failNext('clone', new NetworkError('Failed to clone', REFERENCE));

      await expect(mirrors.ensureUpToDate(REFERENCE)).rejects.toBeInstanceOf(NetworkError);
      expect(await readdir(layout.workDir)).toEqual([]);
    });
  });

  it('removes clones abandoned by a process that died', async () => {
    await withFixture(async ({ manager }) => {
      const mirrors = manager();
      const layout = mirrors.layout(REFERENCE);
      await mkdir(`${layout.repoDir}.tmp-99999-1`, { recursive: true });

      await mirrors.ensureUpToDate(REFERENCE);
      expect((await readdir(layout.workDir)).sort()).toEqual(['cache.json', 'repo']);
    });
  });

  it('rejects malformed references before touching the cache', async () => {
    await withFixture(async ({ dir, git, manager }) => {
      await expect(manager().ensureUpToDate('-oProxyCommand=x')).rejects.toBeInstanceOf(ConfigurationError);
      await expect(manager({ branch: 'a/../b' }).ensureUpToDate(REFERENCE)).rejects.toBeInstanceOf(ConfigurationError);
      expect(await readdir(dir)).toEqual(['remote']);
      expect(git.calls).toEqual([]);
    });
  });

  it('serializes concurrent refreshes of one mirror', async () => {
    await withFixture(async ({ git, manager }) => {
      git.delayMs = 20;
      const handles = await Promise.all(
        [0, 1, 2, 3, 4].map(() => manager({ maxAgeMs: 0, lock: { pollIntervalMs: 5 } }).ensureUpToDate(REFERENCE)),
      );
      expect(git.maxConcurrentMutations).toBe(1);
      expect(git.count('clone')).toBe(1);
      expect(git.count('update')).toBe(4);
      expect(new Set(handles.map((handle) => handle.root)).size).toBe(1);
    });
  });

  it('keeps the lock while the callback reads the mirror', async () => {
    await withFixture(async ({ manager }) => {
      const mirrors = manager();
      const lockFile = mirrors.layout(REFERENCE).lockFile;
      const seen = await mirrors.withMirror(REFERENCE, async () => readFile(lockFile, 'utf8'));
      expect(JSON.parse(seen).pid).toBe(process.pid);
    });
  });
});
