/**
 * CommonsStore Errors
 */

import { WantedBoardError } from '../wanted/errors';

export class CommonsStoreError extends WantedBoardError {
  constructor(message: string) {
    super(message);
    this.name = 'CommonsStoreError';
    Object.setPrototypeOf(this, CommonsStoreError.prototype);
  }
}

/**
 * A guarded write changed nothing: the item moved, the role did not match,
 * or the row vanished. Never a silent success.
 */
export class PreconditionFailedError extends CommonsStoreError {
  public readonly commitMessage: string;

  constructor(message: string, commitMessage: string = '') {
    super(message);
    this.name = 'PreconditionFailedError';
    this.commitMessage = commitMessage;
    Object.setPrototypeOf(this, PreconditionFailedError.prototype);
  }
}

/**
 * Error thrown when a store command (subprocess or network call) fails
 */
export class StoreCommandError extends CommonsStoreError {
  public readonly stderr: string;
  public readonly command?: string | undefined;

  constructor(message: string, stderr: string = '', command?: string | undefined) {
    super(message);
    this.name = 'StoreCommandError';
    this.stderr = stderr;
    this.command = command;
    Object.setPrototypeOf(this, StoreCommandError.prototype);
  }
}

export class PushRejectedError extends CommonsStoreError {
  public readonly ref: string;

  constructor(ref: string, detail: string) {
    super(`push ${ref} rejected: ${detail}`);
    this.name = 'PushRejectedError';
    this.ref = ref;
    Object.setPrototypeOf(this, PushRejectedError.prototype);
  }
}

export class MergeConflictError extends CommonsStoreError {
  public readonly branch: string;
  public readonly conflicts: string[];

  constructor(branch: string, conflicts: string[]) {
    super(`merge conflict merging ${branch}: ${conflicts.join(', ')}`);
    this.name = 'MergeConflictError';
    this.branch = branch;
    this.conflicts = conflicts;
    Object.setPrototypeOf(this, MergeConflictError.prototype);
  }
}

/**
 * Error thrown when a branch does not exist
 */
export class BranchNotFoundError extends CommonsStoreError {
  public readonly branchName: string;

  constructor(branchName: string) {
    super(`Branch not found: ${branchName}`);
    this.name = 'BranchNotFoundError';
    this.branchName = branchName;
    Object.setPrototypeOf(this, BranchNotFoundError.prototype);
  }
}

/**
 * A write would break a table constraint (duplicate key, self-stamp)
 */
export class ConstraintViolationError extends CommonsStoreError {
  public readonly table: string;

  constructor(table: string, detail: string) {
    super(`constraint violation on ${table}: ${detail}`);
    this.name = 'ConstraintViolationError';
    this.table = table;
    Object.setPrototypeOf(this, ConstraintViolationError.prototype);
  }
}
