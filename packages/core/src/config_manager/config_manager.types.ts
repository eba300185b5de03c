/**
 * ConfigManager Types
 */

import type { BoardMode } from '../wanted/wanted.types';

/**
 * Board configuration of one joined commons, stored in .wl/config.json
 */
export type BoardConfig = {
  rigHandle: string;
  /** Upstream commons as "org/db" */
  upstream: string;
  forkOrg: string;
  forkDb: string;
  mode: BoardMode;
  /** Sign commits */
  signing: boolean;
  /** Rig's public endpoint, when it advertises one */
  hopUri?: string;
};

export type BoardSettings = Pick<BoardConfig, 'mode' | 'signing'>;

/**
 * ConfigManager interface for dependency injection
 */
export interface IConfigManager {
  loadConfig(): Promise<BoardConfig | null>;
  requireConfig(): Promise<BoardConfig>;
  getRigHandle(): Promise<string | null>;
  getSettings(): Promise<BoardSettings | null>;
  saveConfig(config: BoardConfig): Promise<void>;
  saveSettings(mode: BoardMode, signing: boolean): Promise<void>;
}
