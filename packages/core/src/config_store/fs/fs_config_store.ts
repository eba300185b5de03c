/**
 * FsConfigStore - Filesystem implementation of ConfigStore
 *
 * Persists the board config to <root>/.wl/config.json.
 */

import { promises as fs } from 'fs';
import { existsSync } from 'fs';
import * as path from 'path';
import type { ConfigStore } from '../config_store';
import type { BoardConfig } from '../../config_manager';
import { ConfigManager } from '../../config_manager';

export const CONFIG_DIR = '.wl';

/**
 * Filesystem-based ConfigStore implementation.
 * Returns null instead of throwing for missing or unparseable files.
 */
export class FsConfigStore implements ConfigStore {
  private readonly configPath: string;

  constructor(rootPath: string) {
    this.configPath = path.join(rootPath, CONFIG_DIR, 'config.json');
  }

  async loadConfig(): Promise<unknown> {
    try {
      const configContent = await fs.readFile(this.configPath, 'utf-8');
      const parsed: unknown = JSON.parse(configContent);
      return parsed;
    } catch {
      return null;
    }
  }

  async saveConfig(config: BoardConfig): Promise<void> {
    await fs.mkdir(path.dirname(this.configPath), { recursive: true });
    await fs.writeFile(this.configPath, JSON.stringify(config, null, 2), 'utf-8');
  }

  /**
   * Searches upward from startPath for a directory holding .wl/.
   */
  static findRoot(startPath: string = process.cwd()): string | null {
    let currentPath = path.resolve(startPath);
    while (true) {
      if (existsSync(path.join(currentPath, CONFIG_DIR))) {
        return currentPath;
      }
      const parent = path.dirname(currentPath);
      if (parent === currentPath) {
        return null;
      }
      currentPath = parent;
    }
  }
}

/**
 * Create a ConfigManager backed by FsConfigStore.
 * Auto-detects the root if not provided.
 */
export function createConfigManager(rootPath?: string): ConfigManager {
  const resolvedRoot = rootPath || FsConfigStore.findRoot() || process.cwd();
  return new ConfigManager(new FsConfigStore(resolvedRoot));
}
