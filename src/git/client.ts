import { realpath } from 'node:fs/promises';
import { CommandError, ExecOptions, isAbortedCommand, runCommand } from '../common/exec';
import { ConfigurationError, errorCode, NetworkError, RepositoryCorruptError } from '../common/errors';

/**
 * The version-control operations the mirror manager relies on. Failures are
 * reported as {@link NetworkError}, {@link RepositoryCorruptError} or
 * {@link ConfigurationError}.
 */
export interface GitClient {
  clone(reference: string, destination: string, branch: string): Promise<void>;
  /** Bring an existing working tree to the remote head of `branch`. */
  update(repoDir: string, branch: string): Promise<void>;
  revision(repoDir: string): Promise<string>;
  isRepository(repoDir: string): Promise<boolean>;
}

export interface CommandGitClientOptions {
  /** Path or name of the git executable. */
  executable?: string;
  timeoutMs?: number;
  env?: NodeJS.ProcessEnv;
  /** Kills a running git command; the aborted CommandError is rethrown as is. */
  signal?: AbortSignal;
}

const NETWORK_FAILURE = new RegExp(
  [
    'could not resolve host',
    'unable to access',
    'failed to connect',
    'connection (refused|timed out|reset)',
    'network is unreachable',
    'operation timed out',
    'authentication failed',
    'could not read (from remote repository|username)',
    'permission denied \\(publickey',
    'repository .* not found',
    'does not appear to be a git repository',
    'the remote end hung up',
  ].join('|'),
  'i',
);

const MISSING_BRANCH = /remote branch .* not found|couldn't find remote ref/i;

// git ran and failed on its own; anything else says nothing about the remote or the mirror
function isGitFailure(error: unknown): error is CommandError {
  return error instanceof CommandError && !error.failure.spawnCode && !isAbortedCommand(error);
}

function isNetworkFailure(error: CommandError): boolean {
  return error.failure.timedOut || NETWORK_FAILURE.test(error.stderr);
}

export class CommandGitClient implements GitClient {
  private readonly executable: string;
  private readonly timeoutMs?: number;
  private readonly env: NodeJS.ProcessEnv;
  private readonly signal?: AbortSignal;

  constructor(options: CommandGitClientOptions = {}) {
    this.executable = options.executable ?? 'git';
    this.timeoutMs = options.timeoutMs === Infinity ? undefined : options.timeoutMs;
    this.env = { ...(options.env ?? process.env), GIT_TERMINAL_PROMPT: '0' };
    this.signal = options.signal;
  }

  async clone(reference: string, destination: string, branch: string): Promise<void> {
    try {
      await this.git(['clone', '--quiet', '--branch', branch, '--', reference, destination]);
    } catch (error) {
      if (!isGitFailure(error)) {
        throw error;
      }
      if (MISSING_BRANCH.test(error.stderr)) {
        throw new ConfigurationError(`Branch ${branch} does not exist in ${reference}`, { reference, branch }, { cause: error });
      }
      throw new NetworkError(`Failed to clone ${reference}: ${error.stderr.trim() || error.message}`, reference, { branch }, {
        cause: error,
      });
    }
  }

  async update(repoDir: string, branch: string): Promise<void> {
    try {
      await this.git(['fetch', '--quiet', 'origin', branch], { cwd: repoDir });
    } catch (error) {
      if (!isGitFailure(error)) {
        throw error;
      }
      if (MISSING_BRANCH.test(error.stderr)) {
        throw new ConfigurationError(`Branch ${branch} no longer exists upstream of ${repoDir}`, { branch }, { cause: error });
      }
      if (isNetworkFailure(error)) {
        throw new NetworkError(`Failed to fetch ${branch}: ${error.stderr.trim() || error.message}`, repoDir, { branch }, {
          cause: error,
        });
      }
      throw new RepositoryCorruptError(`Fetch failed in mirror ${repoDir}`, repoDir, { stderr: error.stderr.trim() }, { cause: error });
    }

    // the mirror is a cache: local state always yields to upstream
    await this.local(repoDir, ['reset', '--quiet', '--hard', 'FETCH_HEAD']);
    await this.local(repoDir, ['clean', '-ffdxq']);
  }

  async revision(repoDir: string): Promise<string> {
    const { stdout } = await this.local(repoDir, ['rev-parse', 'HEAD']);
    return stdout.trim();
  }

  async isRepository(repoDir: string): Promise<boolean> {
    try {
      const { stdout } = await this.git(['rev-parse', '--show-toplevel'], { cwd: repoDir });
      const [toplevel, expected] = await Promise.all([realpath(stdout.trim()), realpath(repoDir)]);
      return toplevel === expected;
    } catch (error) {
      if (isGitFailure(error)) {
        return false;
      }
      if (errorCode(error) === 'ENOENT') {
        return false;
      }
      throw error;
    }
  }

  private async local(repoDir: string, args: string[]) {
    try {
      return await this.git(args, { cwd: repoDir });
    } catch (error) {
      if (isGitFailure(error)) {
        throw new RepositoryCorruptError(
          `git ${args[0]} failed in mirror ${repoDir}`,
          repoDir,
          { stderr: error.stderr.trim() },
          { cause: error },
        );
      }
      throw error;
    }
  }

  private async git(args: string[], options: Pick<ExecOptions, 'cwd'> = {}) {
    return runCommand(this.executable, args, {
      cwd: options.cwd,
      env: this.env,
      timeoutMs: this.timeoutMs,
      signal: this.signal,
    });
  }
}
