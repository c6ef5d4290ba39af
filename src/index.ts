export * from './resiliency/index.js';
export { loadWatchdogConfig, createDefaultConfig, envOverrides, mergeDeep } from './config/watchdog-config.js';
export type { LoadConfigOptions, LoadedWatchdogConfig } from './config/watchdog-config.js';
export * from './config/schemas.js';
export * from './utils/errors.js';
