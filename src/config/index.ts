export * from './types';
export { loadConfig, mergeConfigs, parseHookConfig, parseOutputMode, parseSeconds } from './loader';
export * from './settings';
