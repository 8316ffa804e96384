import { readFile } from 'node:fs/promises';
import { dirname, extname, resolve, isAbsolute } from 'node:path';
import * as yaml from 'js-yaml';
import { parse as parseToml } from 'toml';
import { ConfigurationError } from '../common/errors';
import {
  CacheConfig,
  HookFileConfig,
  HookProfileConfig,
  OutputConfig,
  OutputMode,
  SelectionConfig,
} from './types';

export async function loadConfig(path: string, profile?: string): Promise<HookProfileConfig> {
  const absolute = resolve(path);
  const baseDir = dirname(absolute);
  let contents: string;
  try {
    contents = await readFile(absolute, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read config file ${absolute}`, { path: absolute }, { cause: error });
  }

  const parsed = parseHookConfig(parseByExtension(absolute, contents), absolute);

  if (profile) {
    const profileConfig = parsed.profiles?.[profile];
    if (!profileConfig) {
      throw new ConfigurationError(`Profile ${profile} not found in config ${absolute}`);
    }
    return normalizeConfigPaths(mergeConfigs(parsed, profileConfig), baseDir);
  }

  const { profiles: _profiles, ...base } = parsed;
  return normalizeConfigPaths(base, baseDir);
}

function parseByExtension(path: string, contents: string): unknown {
  const ext = extname(path).toLowerCase();
  try {
    switch (ext) {
      case '.yaml':
      case '.yml':
        return yaml.load(contents);
      case '.toml':
        return parseToml(contents);
      case '.json':
        return JSON.parse(contents);
      default:
        break;
    }
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Invalid config file ${path}: ${reason}`, { path }, { cause: error });
  }
  throw new ConfigurationError(`Unsupported config format for ${path}`, { path });
}

export function mergeConfigs(base: HookFileConfig, overlay: HookProfileConfig): HookProfileConfig {
  return {
    repository: overlay.repository ?? base.repository,
    branch: overlay.branch ?? base.branch,
    cache: {
      ...base.cache,
      ...overlay.cache,
    },
    selection: {
      ...base.selection,
      ...overlay.selection,
    },
    output: {
      ...base.output,
      ...overlay.output,
    },
  };
}

function normalizeConfigPaths(config: HookProfileConfig, baseDir: string): HookProfileConfig {
  const cachePath = config.cache?.path;
  if (!cachePath || isAbsolute(cachePath)) {
    return config;
  }
  return {
    ...config,
    cache: {
      ...config.cache,
      path: resolve(baseDir, cachePath),
    },
  };
}

type RawRecord = Record<string, unknown>;

function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function fail(source: string, key: string, expected: string): never {
  throw new ConfigurationError(`Config ${source}: "${key}" must be ${expected}`, { source, key });
}

function optionalString(record: RawRecord, key: string, source: string): string | undefined {
  const value = record[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string' || value.trim() === '') {
    fail(source, key, 'a non-empty string');
  }
  return value;
}

function optionalBoolean(record: RawRecord, key: string, source: string): boolean | undefined {
  const value = record[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'boolean') {
    fail(source, key, 'a boolean');
  }
  return value;
}

function optionalStringList(record: RawRecord, key: string, source: string): string[] | undefined {
  const value = record[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === 'string') {
    return [value];
  }
  if (!Array.isArray(value) || !value.every((entry): entry is string => typeof entry === 'string')) {
    fail(source, key, 'a string or a list of strings');
  }
  return value;
}

/** Accepts non-negative numbers and the strings "inf"/"infinity". */
export function parseSeconds(value: unknown, label: string): number {
  if (typeof value === 'number' && !Number.isNaN(value) && value >= 0) {
    return value;
  }
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (normalized === 'inf' || normalized === 'infinity') {
      return Infinity;
    }
    const numeric = Number(normalized);
    if (normalized !== '' && !Number.isNaN(numeric) && numeric >= 0) {
      return numeric;
    }
  }
  throw new ConfigurationError(`${label} must be a non-negative number of seconds or "inf", got ${String(value)}`);
}

function optionalSeconds(record: RawRecord, key: string, source: string): number | undefined {
  const value = record[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  return parseSeconds(value, `Config ${source}: "${key}"`);
}

function section(record: RawRecord, key: string, source: string): RawRecord | undefined {
  const value = record[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!isRecord(value)) {
    fail(source, key, 'a mapping');
  }
  return value;
}

export function parseOutputMode(value: string): OutputMode {
  if (value === 'content' || value === 'include') {
    return value;
  }
  throw new ConfigurationError(`Unsupported output mode "${value}". Use content or include.`);
}

function parseCache(raw: RawRecord, source: string): CacheConfig {
  const path = optionalString(raw, 'path', source);
  const maxAge = optionalSeconds(raw, 'maxAge', source);
  const lockTimeout = optionalSeconds(raw, 'lockTimeout', source);
  const gitTimeout = optionalSeconds(raw, 'gitTimeout', source);
  return {
    ...(path === undefined ? {} : { path }),
    ...(maxAge === undefined ? {} : { maxAge }),
    ...(lockTimeout === undefined ? {} : { lockTimeout }),
    ...(gitTimeout === undefined ? {} : { gitTimeout }),
  };
}

function parseSelection(raw: RawRecord, source: string): SelectionConfig {
  const patterns = optionalStringList(raw, 'patterns', source);
  const exclude = optionalStringList(raw, 'exclude', source);
  const forceInclude = optionalStringList(raw, 'forceInclude', source);
  const dot = optionalBoolean(raw, 'dot', source);
  return {
    ...(patterns === undefined ? {} : { patterns }),
    ...(exclude === undefined ? {} : { exclude }),
    ...(forceInclude === undefined ? {} : { forceInclude }),
    ...(dot === undefined ? {} : { dot }),
  };
}

function parseOutput(raw: RawRecord, source: string): OutputConfig {
  const mode = optionalString(raw, 'mode', source);
  const separators = optionalBoolean(raw, 'separators', source);
  const pathKey = optionalString(raw, 'pathKey', source);
  return {
    ...(mode === undefined ? {} : { mode: parseOutputMode(mode) }),
    ...(separators === undefined ? {} : { separators }),
    ...(pathKey === undefined ? {} : { pathKey }),
  };
}

// keys left out entirely, so a profile never overrides a base value with undefined
function parseProfile(raw: RawRecord, source: string): HookProfileConfig {
  const cache = section(raw, 'cache', source);
  const selection = section(raw, 'selection', source);
  const output = section(raw, 'output', source);
  const repository = optionalString(raw, 'repository', source);
  const branch = optionalString(raw, 'branch', source);
  return {
    ...(repository === undefined ? {} : { repository }),
    ...(branch === undefined ? {} : { branch }),
    ...(cache ? { cache: parseCache(cache, `${source} cache`) } : {}),
    ...(selection ? { selection: parseSelection(selection, `${source} selection`) } : {}),
    ...(output ? { output: parseOutput(output, `${source} output`) } : {}),
  };
}

/**
 * Validate a parsed configuration document.
 */
export function parseHookConfig(raw: unknown, source = 'config'): HookFileConfig {
  if (raw === undefined || raw === null) {
    return {};
  }
  if (!isRecord(raw)) {
    throw new ConfigurationError(`Config ${source} must be a mapping at the top level`, { source });
  }
  const config: HookFileConfig = parseProfile(raw, source);
  const profiles = section(raw, 'profiles', source);
  if (profiles) {
    config.profiles = {};
    for (const [name, profile] of Object.entries(profiles)) {
      if (!isRecord(profile)) {
        fail(source, `profiles.${name}`, 'a mapping');
      }
      config.profiles[name] = parseProfile(profile, `${source} profile ${name}`);
    }
  }
  return config;
}
