/**
 * Typed failures of a hook invocation. Every category is fatal for the
 * invocation; the CLI maps each one onto its own exit code.
 */

export type HookErrorCode =
  | 'CONFIGURATION'
  | 'NETWORK'
  | 'REPOSITORY_CORRUPT'
  | 'LOCK_TIMEOUT'
  | 'FILE_READ';

export const EXIT_CODES: Record<HookErrorCode, number> = {
  CONFIGURATION: 2,
  NETWORK: 3,
  REPOSITORY_CORRUPT: 4,
  LOCK_TIMEOUT: 5,
  FILE_READ: 6,
};

export const UNEXPECTED_EXIT_CODE = 1;

export class HookError extends Error {
  readonly code: HookErrorCode;
  readonly details: Record<string, unknown>;

  constructor(
    message: string,
    code: HookErrorCode,
    details: Record<string, unknown> = {},
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'HookError';
    this.code = code;
    this.details = details;
  }

  get exitCode(): number {
    return EXIT_CODES[this.code];
  }
}

/** Malformed repository reference, branch, pattern or configuration value. */
export class ConfigurationError extends HookError {
  constructor(message: string, details: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, 'CONFIGURATION', details, options);
    this.name = 'ConfigurationError';
  }
}

/** Remote unreachable, unknown or refusing our credentials. */
export class NetworkError extends HookError {
  readonly reference: string;

  constructor(message: string, reference: string, details: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, 'NETWORK', { reference, ...details }, options);
    this.name = 'NetworkError';
    this.reference = reference;
  }
}

/** The local mirror exists but git does not accept it as a repository. */
export class RepositoryCorruptError extends HookError {
  readonly path: string;

  constructor(message: string, path: string, details: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, 'REPOSITORY_CORRUPT', { path, ...details }, options);
    this.name = 'RepositoryCorruptError';
    this.path = path;
  }
}

export class LockTimeoutError extends HookError {
  readonly lockPath: string;
  readonly timeoutMs: number;

  constructor(lockPath: string, timeoutMs: number, holder?: unknown) {
    super(
      `Timed out after ${timeoutMs}ms waiting for lock ${lockPath}`,
      'LOCK_TIMEOUT',
      holder === undefined ? { lockPath, timeoutMs } : { lockPath, timeoutMs, holder },
    );
    this.name = 'LockTimeoutError';
    this.lockPath = lockPath;
    this.timeoutMs = timeoutMs;
  }
}

/** A selected file could not be read between selection and emission. */
export class FileReadError extends HookError {
  readonly path: string;

  constructor(path: string, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(`Failed to read configuration file ${path}${reason}`, 'FILE_READ', { path }, options);
    this.name = 'FileReadError';
    this.path = path;
  }
}

export function isHookError(error: unknown): error is HookError {
  return error instanceof HookError;
}

export function exitCodeFor(error: unknown): number {
  return isHookError(error) ? error.exitCode : UNEXPECTED_EXIT_CODE;
}

export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}
