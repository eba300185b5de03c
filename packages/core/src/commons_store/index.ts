/**
 * CommonsStore - versioned commons database abstraction
 *
 * This module only exports the interface, statement types and errors.
 * For implementations, use:
 * - @wantedboard/core/memory for MemoryCommonsStore
 * - @wantedboard/core/fs for LocalCommonsStore (Dolt CLI)
 */

export type {
  CommonsStore,
  CommonsTables,
  CommonsSnapshot,
  CommitInfo,
  DeleteStatement,
  InsertStatement,
  OrderBy,
  PushLog,
  RowCondition,
  RowFilter,
  SelectQuery,
  Statement,
  TableName,
  UpdateStatement,
} from './commons_store.types';

export {
  CommonsStoreError,
  PreconditionFailedError,
  StoreCommandError,
  PushRejectedError,
  MergeConflictError,
  BranchNotFoundError,
  ConstraintViolationError,
} from './errors';
