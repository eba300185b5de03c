/**
 * Local Commons Store - dolt CLI implementation
 *
 * @module commons_store/local
 */

export { LocalCommonsStore } from './local_commons_store';
export { execFileCommand } from './exec_command';
export type {
  ExecCommand,
  ExecOptions,
  ExecResult,
  LocalCommonsStoreDependencies,
} from './local_commons_store.types';
