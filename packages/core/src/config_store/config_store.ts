/**
 * ConfigStore Interface
 *
 * Abstraction for board config persistence (filesystem, or memory for tests).
 * Stores return raw parsed content; ConfigManager validates it.
 */

import type { BoardConfig } from '../config_manager/config_manager.types';

/**
 * Implementations:
 * - FsConfigStore: Filesystem-based (.wl/config.json)
 * - MemoryConfigStore: In-memory for tests
 */
export interface ConfigStore {
  /**
   * Load raw configuration
   *
   * @returns parsed JSON, or null if not found/unparseable
   */
  loadConfig(): Promise<unknown>;

  saveConfig(config: BoardConfig): Promise<void>;
}
