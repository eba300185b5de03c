export { ConfigManager } from './config_manager';
export { ConfigError } from './errors';
export type { BoardConfig, BoardSettings, IConfigManager } from './config_manager.types';
