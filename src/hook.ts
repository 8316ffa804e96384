import { Writable } from 'node:stream';
import { getLogger, Logger } from './common/logger';
import type { HookSettings } from './config';
import { MirrorHandle, MirrorLockOptions, MirrorManager } from './cache';
import { ConfigEmitter } from './emit';
import { CommandGitClient, GitClient } from './git';
import { FileSelector, SelectedFile } from './selection';

export interface RunHookOptions {
  settings: HookSettings;
  output: Writable;
  /** Defaults to the `git` executable on PATH. */
  git?: GitClient;
  lock?: Omit<MirrorLockOptions, 'logger'>;
  logger?: Logger;
  /** Aborting kills a running git command and stops waiting for the lock. */
  signal?: AbortSignal;
}

export interface HookResult {
  handle: MirrorHandle;
  files: SelectedFile[];
  bytes: number;
}

/**
 * Refresh the mirror, select files and write the configuration, all while
 * holding the mirror's lock. Errors propagate; on failure nothing has been
 * written to `output`.
 */
export async function runHook(options: RunHookOptions): Promise<HookResult> {
  const { settings, output } = options;
  const logger = options.logger ?? getLogger('hook');
  const { signal } = options;
  const git = options.git ?? new CommandGitClient({ timeoutMs: settings.gitTimeoutMs, signal });

  const manager = new MirrorManager({
    cacheRoot: settings.cachePath,
    branch: settings.branch,
    maxAgeMs: settings.maxAgeMs,
    lockTimeoutMs: settings.lockTimeoutMs,
    lock: options.lock,
    git,
    logger: logger.child('mirror'),
    signal,
  });
  const selector = new FileSelector(settings.selection, logger.child('selector'));
  const emitter = new ConfigEmitter(settings.output);

  return manager.withMirror(settings.repository, async (handle) => {
    const files = await selector.select(handle.root);
    if (files.length === 0) {
      logger.warn('No configuration files matched', { root: handle.root, patterns: settings.selection.patterns });
    }
    signal?.throwIfAborted();
    const { bytes } = await emitter.emit(files, output, { root: handle.root });
    logger.info('Configuration emitted', {
      reference: handle.reference,
      revision: handle.revision,
      refreshed: handle.refreshed,
      files: files.length,
      bytes,
    });
    return { handle, files, bytes };
  });
}
