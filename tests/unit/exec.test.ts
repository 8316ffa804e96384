import { describe, it, expect } from 'vitest';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import { isProcessAlive } from '../../src/cache';
import { CommandError, isAbortedCommand, runCommand } from '../../src/common/exec';
import { withTempDir } from '../helpers/fakeGit';

async function waitForPid(pidFile: string): Promise<number> {
  for (let attempt = 0; attempt < 500; attempt += 1) {
    const text = await readFile(pidFile, 'utf8').catch(() => '');
    if (text !== '') {
      return Number(text);
    }
    await sleep(10);
  }
  throw new Error(`child never wrote ${pidFile}`);
}

describe('runCommand', () => {
  it('returns stdout/stderr on success', async () => {
    const { stdout, stderr } = await runCommand(process.execPath, ['--version']);
    expect(stdout).toMatch(/^v\d+/);
    expect(stderr).toBe('');
  });

  it('reports the exit code and stderr of a failing command', async () => {
    const error = await runCommand(process.execPath, ['-e', 'process.stderr.write("boom"); process.exit(3)'])
      .catch((reason: unknown) => reason);
    expect(error).toBeInstanceOf(CommandError);
    if (!(error instanceof CommandError)) {
      return;
    }
    expect(error.failure.exitCode).toBe(3);
    expect(error.failure.timedOut).toBe(false);
    expect(error.stderr).toBe('boom');
    expect(error.message).toContain('exited with code 3');
  });

  it('marks commands killed by the timeout', async () => {
    const error = await runCommand(process.execPath, ['-e', 'setTimeout(() => {}, 10000)'], { timeoutMs: 100 })
      .catch((reason: unknown) => reason);
    expect(error).toBeInstanceOf(CommandError);
    if (error instanceof CommandError) {
      expect(error.failure.timedOut).toBe(true);
    }
  });

  it('reports executables that cannot be started', async () => {
    const error = await runCommand('git-config-hook-no-such-binary', []).catch((reason: unknown) => reason);
    expect(error).toBeInstanceOf(CommandError);
    if (error instanceof CommandError) {
      expect(error.failure.spawnCode).toBe('ENOENT');
    }
  });

  it('kills an aborted command and settles only once it has exited', async () => {
    await withTempDir(async (dir) => {
      const pidFile = join(dir, 'child.pid');
      const script = `require('fs').writeFileSync(${JSON.stringify(pidFile)}, String(process.pid)); setInterval(() => {}, 1000);`;
      const controller = new AbortController();
      const pending = runCommand(process.execPath, ['-e', script], { signal: controller.signal })
        .catch((reason: unknown) => reason);

      const pid = await waitForPid(pidFile);
      controller.abort();
      const error = await pending;

      expect(isAbortedCommand(error)).toBe(true);
      if (error instanceof CommandError) {
        expect(error.failure.timedOut).toBe(false);
        expect(error.message).toContain(': aborted');
      }
      expect(isProcessAlive(pid)).toBe(false);
    });
  });
});
