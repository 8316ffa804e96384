import { ChildProcess, execFile } from 'node:child_process';
import { once } from 'node:events';
import { promisify } from 'node:util';

const execFileAsync = promisify(execFile);

export interface ExecResult {
  stdout: string;
  stderr: string;
}

export interface ExecOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeoutMs?: number;
  /** Kills the command; the returned promise settles only once it has exited. */
  signal?: AbortSignal;
}

export interface CommandFailure {
  command: string;
  exitCode?: number;
  signal?: string;
  /** errno-style code when the process could not be started (ENOENT, EACCES, ...). */
  spawnCode?: string;
  timedOut: boolean;
  /** killed because the caller's AbortSignal fired */
  aborted?: boolean;
  stdout: string;
  stderr: string;
}

/**
 * A child process that could not be started, was killed or exited non-zero.
 */
export class CommandError extends Error {
  readonly failure: CommandFailure;

  constructor(failure: CommandFailure, options?: { cause?: unknown }) {
    const status = failure.aborted
      ? 'aborted'
      : failure.timedOut
      ? 'timed out'
      : failure.spawnCode
        ? `could not start (${failure.spawnCode})`
        : failure.signal
          ? `killed by ${failure.signal}`
          : `exited with code ${failure.exitCode ?? 'unknown'}`;
    const stderr = failure.stderr.trim();
    super(`Command failed (${failure.command}): ${status}${stderr ? `\n${stderr}` : ''}`, options);
    this.name = 'CommandError';
    this.failure = failure;
  }

  get stderr(): string {
    return this.failure.stderr;
  }
}

export function isAbortedCommand(error: unknown): error is CommandError {
  return error instanceof CommandError && error.failure.aborted === true;
}

function readOutput(error: object, key: 'stdout' | 'stderr'): string {
  const value: unknown = key in error ? Reflect.get(error, key) : undefined;
  if (typeof value === 'string') {
    return value;
  }
  if (Buffer.isBuffer(value)) {
    return value.toString('utf8');
  }
  return '';
}

function describeFailure(command: string, error: Error, aborted: boolean): CommandFailure {
  const rawCode: unknown = 'code' in error ? error.code : undefined;
  const rawSignal: unknown = 'signal' in error ? error.signal : undefined;
  const killed = 'killed' in error && error.killed === true;
  const signal = typeof rawSignal === 'string' ? rawSignal : undefined;
  return {
    command,
    exitCode: typeof rawCode === 'number' ? rawCode : undefined,
    spawnCode: typeof rawCode === 'string' ? rawCode : undefined,
    signal,
    timedOut: !aborted && killed && signal === 'SIGTERM',
    aborted,
    stdout: readOutput(error, 'stdout'),
    stderr: readOutput(error, 'stderr'),
  };
}

/**
 * Execute a command and return the raw stdout/stderr as UTF-8 strings.
 * Throws {@link CommandError} if the command cannot start, times out or exits non-zero.
 */
export async function runCommand(
  file: string,
  args: string[],
  options: ExecOptions = {},
): Promise<ExecResult> {
  const { cwd, env, timeoutMs, signal } = options;

  const pending = execFileAsync(file, args, {
    cwd,
    env,
    signal,
    timeout: timeoutMs,
    maxBuffer: 16 * 1024 * 1024,
    encoding: 'utf8',
  });
  try {
    const result = await pending;

    return {
      stdout: result.stdout,
      stderr: result.stderr,
    };
  } catch (error) {
    const aborted = signal?.aborted ?? false;
    if (aborted) {
      // execFile rejects as soon as it sends the kill; the child may still be writing
      await exited(pending.child);
    }
    if (error instanceof Error) {
      throw new CommandError(describeFailure([file, ...args].join(' '), error, aborted), { cause: error });
    }
    throw error;
  }
}

async function exited(child: ChildProcess): Promise<void> {
  if (child.exitCode !== null || child.signalCode !== null || child.pid === undefined) {
    return;
  }
  await once(child, 'exit');
}
