export * from './common/errors';
export { Logger, getLogger, configureLogger } from './common/logger';
export type { LogLevel, LogFormat, LoggerOptions } from './common/logger';
export * from './config';
export * from './cache';
export * from './git';
export * from './selection';
export * from './emit';
export { runHook } from './hook';
export type { RunHookOptions, HookResult } from './hook';
export { runCli } from './cli';
export type { CliIO } from './cli';
export { VERSION } from './version';
