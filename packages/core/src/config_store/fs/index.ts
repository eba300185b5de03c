export { FsConfigStore, createConfigManager, CONFIG_DIR } from './fs_config_store';
