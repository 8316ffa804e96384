import { resolve } from 'node:path';
import { ConfigurationError } from '../common/errors';
import { HookProfileConfig, HookSettings, OutputMode } from './types';

export const DEFAULT_CACHE_PATH = '/etc/condor/config.git/';
export const DEFAULT_BRANCH = 'master';
export const DEFAULT_PATTERNS = ['*.cfg'];
export const DEFAULT_LOCK_TIMEOUT_SECONDS = 120;
export const DEFAULT_GIT_TIMEOUT_SECONDS = 30;
export const CACHE_PATH_ENV = 'GIT_CONFIG_HOOK_CACHE_PATH';

/**
 * Default freshness window: five minutes, jittered by up to ten seconds so
 * that nodes started together do not all hit the remote at once.
 */
export function defaultMaxAgeSeconds(random: () => number = Math.random): number {
  return 300 + Math.round(random() * 20) - 10;
}

/** Values given on the command line; undefined means "not given". */
export interface SettingsOverrides {
  repository?: string;
  branch?: string;
  cachePath?: string;
  maxAge?: number;
  lockTimeout?: number;
  gitTimeout?: number;
  patterns?: string[];
  exclude?: string[];
  forceInclude?: string[];
  dot?: boolean;
  mode?: OutputMode;
  separators?: boolean;
  pathKey?: string;
}

export interface ResolveSettingsInput {
  overrides: SettingsOverrides;
  file?: HookProfileConfig;
  env?: NodeJS.ProcessEnv;
  random?: () => number;
}

function toMilliseconds(seconds: number): number {
  return seconds === Infinity ? Infinity : Math.round(seconds * 1000);
}

export function resolveSettings({ overrides, file = {}, env = process.env, random }: ResolveSettingsInput): HookSettings {
  const repository = overrides.repository ?? file.repository;
  if (!repository) {
    throw new ConfigurationError('A git repository URI is required');
  }

  const cachePath = overrides.cachePath ?? file.cache?.path ?? env[CACHE_PATH_ENV] ?? DEFAULT_CACHE_PATH;
  const gitTimeout = overrides.gitTimeout ?? file.cache?.gitTimeout ?? DEFAULT_GIT_TIMEOUT_SECONDS;
  if (gitTimeout === 0) {
    throw new ConfigurationError('The git timeout must be greater than zero');
  }

  return {
    repository,
    branch: overrides.branch ?? file.branch ?? DEFAULT_BRANCH,
    cachePath: resolve(cachePath),
    maxAgeMs: toMilliseconds(overrides.maxAge ?? file.cache?.maxAge ?? defaultMaxAgeSeconds(random)),
    lockTimeoutMs: toMilliseconds(overrides.lockTimeout ?? file.cache?.lockTimeout ?? DEFAULT_LOCK_TIMEOUT_SECONDS),
    gitTimeoutMs: toMilliseconds(gitTimeout),
    selection: {
      patterns: overrides.patterns ?? file.selection?.patterns ?? DEFAULT_PATTERNS,
      exclude: overrides.exclude ?? file.selection?.exclude ?? [],
      forceInclude: overrides.forceInclude ?? file.selection?.forceInclude ?? [],
      dot: overrides.dot ?? file.selection?.dot ?? false,
    },
    output: {
      mode: overrides.mode ?? file.output?.mode ?? 'content',
      separators: overrides.separators ?? file.output?.separators ?? false,
      pathKey: overrides.pathKey ?? file.output?.pathKey,
    },
  };
}
