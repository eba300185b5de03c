/**
 * ConfigStore - Configuration persistence abstraction
 *
 * This module only exports the interface. For implementations, use:
 * - @wantedboard/core/fs for FsConfigStore and createConfigManager
 * - @wantedboard/core/memory for MemoryConfigStore
 */

export type { ConfigStore } from './config_store';
