export * from './sync/index.js';
export { loadConfig, getDefaultConfig, getConfigPath } from './config.js';
export type { LauncherConfig, LauncherConfigFile } from './config.js';
export { launchClient, ClientNotFoundError } from './launcher.js';
export type * from './types.js';
