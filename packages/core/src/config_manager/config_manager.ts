/**
 * ConfigManager - Board Configuration Manager
 *
 * Provides typed, schema-checked access to the board configuration.
 * Uses ConfigStore abstraction for backend-agnostic persistence.
 */

import type { ConfigStore } from '../config_store/config_store';
import type { BoardMode } from '../wanted/wanted.types';
import type { BoardConfig, BoardSettings, IConfigManager } from './config_manager.types';
import { boardConfigErrors, isBoardConfig } from '../validation/input_validator';
import { createLogger } from '../logger';
import { ConfigError } from './errors';

const logger = createLogger('[ConfigManager] ');

/**
 * Configuration Manager Class
 *
 * @example
 * ```typescript
 * // Production usage
 * import { FsConfigStore } from '@wantedboard/core/fs';
 * const configManager = new ConfigManager(new FsConfigStore('/path/to/rig'));
 *
 * // Test usage
 * import { MemoryConfigStore } from '@wantedboard/core/memory';
 * const configStore = new MemoryConfigStore();
 * configStore.setConfig({ ... });
 * const configManager = new ConfigManager(configStore);
 * ```
 */
export class ConfigManager implements IConfigManager {
  private readonly configStore: ConfigStore;

  constructor(configStore: ConfigStore) {
    this.configStore = configStore;
  }

  /**
   * Load board configuration. Invalid content is reported and treated as
   * missing.
   */
  async loadConfig(): Promise<BoardConfig | null> {
    const raw = await this.configStore.loadConfig();
    if (raw === null) return null;
    if (isBoardConfig(raw)) return raw;

    const fields = boardConfigErrors(raw).map(error => `${error.field} ${error.message}`);
    logger.warn(`Ignoring invalid board config: ${fields.join(', ')}`);
    return null;
  }

  async requireConfig(): Promise<BoardConfig> {
    const config = await this.loadConfig();
    if (!config) {
      throw new ConfigError('board config not found or invalid; join a commons first');
    }
    return config;
  }

  async getRigHandle(): Promise<string | null> {
    const config = await this.loadConfig();
    return config?.rigHandle ?? null;
  }

  async getSettings(): Promise<BoardSettings | null> {
    const config = await this.loadConfig();
    if (!config) return null;
    return { mode: config.mode, signing: config.signing };
  }

  async saveConfig(config: BoardConfig): Promise<void> {
    const errors = boardConfigErrors(config);
    if (errors.length > 0) {
      throw new ConfigError(`invalid board config: ${errors.map(e => `${e.field} ${e.message}`).join(', ')}`);
    }
    await this.configStore.saveConfig(config);
  }

  /**
   * Persists mode and signing. Used as the engine's save-settings capability.
   */
  async saveSettings(mode: BoardMode, signing: boolean): Promise<void> {
    const config = await this.requireConfig();
    await this.saveConfig({ ...config, mode, signing });
    logger.debug(`Saved settings: mode=${mode} signing=${signing}`);
  }
}
