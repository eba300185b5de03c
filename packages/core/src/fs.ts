/**
 * Filesystem-dependent implementations
 *
 * This module exports all implementations that require filesystem access
 * or a local dolt installation.
 * Use @wantedboard/core/memory for in-memory alternatives.
 */

// ConfigStore + ConfigManager Factory
export {
  FsConfigStore,
  // Factory with explicit rig root (for DI containers)
  createConfigManager,
} from './config_store/fs';

// LocalCommonsStore (CLI-based, uses execCommand for dolt operations)
export { LocalCommonsStore, execFileCommand } from './commons_store/local';
export type {
  ExecCommand,
  ExecOptions,
  ExecResult,
  LocalCommonsStoreDependencies,
} from './commons_store/local';
