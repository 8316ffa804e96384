export type OutputMode = 'content' | 'include';

/** Durations are in seconds; `Infinity` (or "inf" in a file) disables the limit. */
export interface CacheConfig {
  path?: string;
  maxAge?: number;
  lockTimeout?: number;
  gitTimeout?: number;
}

export interface SelectionConfig {
  patterns?: string[];
  exclude?: string[];
  forceInclude?: string[];
  dot?: boolean;
}

export interface OutputConfig {
  mode?: OutputMode;
  separators?: boolean;
  pathKey?: string;
}

export interface HookFileConfig {
  repository?: string;
  branch?: string;
  cache?: CacheConfig;
  selection?: SelectionConfig;
  output?: OutputConfig;
  profiles?: Record<string, HookProfileConfig>;
}

export type HookProfileConfig = Omit<HookFileConfig, 'profiles'>;

/** Fully resolved settings for one invocation, durations in milliseconds. */
export interface HookSettings {
  repository: string;
  branch: string;
  cachePath: string;
  maxAgeMs: number;
  lockTimeoutMs: number;
  gitTimeoutMs: number;
  selection: Required<SelectionConfig>;
  output: {
    mode: OutputMode;
    separators: boolean;
    pathKey?: string;
  };
}
