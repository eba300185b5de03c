/**
 * MemoryConfigStore - In-memory implementation of ConfigStore
 *
 * Useful for testing and serverless environments where filesystem
 * access is not available or not desired.
 */

import type { ConfigStore } from '../config_store';
import type { BoardConfig } from '../../config_manager';

/**
 * @example
 * ```typescript
 * const configStore = new MemoryConfigStore();
 * configStore.setConfig({ rigHandle: 'alice', upstream: 'org/commons', ... });
 * const manager = new ConfigManager(configStore);
 * ```
 */
export class MemoryConfigStore implements ConfigStore {
  private config: unknown = null;

  async loadConfig(): Promise<unknown> {
    return structuredClone(this.config);
  }

  async saveConfig(config: BoardConfig): Promise<void> {
    this.config = structuredClone(config);
  }

  // ==================== Test Helper Methods ====================

  /**
   * Set raw configuration directly (for test setup, including invalid content)
   */
  setConfig(config: unknown): void {
    this.config = config;
  }

  getConfig(): unknown {
    return this.config;
  }

  clear(): void {
    this.config = null;
  }
}
