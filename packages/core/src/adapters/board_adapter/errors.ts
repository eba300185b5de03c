import { WantedBoardError } from '../../wanted/errors';

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * A branch lifecycle step failed after earlier steps took effect.
 * The message names the step ("delete local branch", "push origin main").
 */
export class BranchLifecycleError extends WantedBoardError {
  public readonly branch: string;
  public readonly step: string;

  constructor(branch: string, step: string, cause: unknown) {
    super(`${step}: ${messageOf(cause)}`, { cause });
    this.name = 'BranchLifecycleError';
    this.branch = branch;
    this.step = step;
    Object.setPrototypeOf(this, BranchLifecycleError.prototype);
  }
}

/**
 * Pushing a mutation branch failed. The message is the store's own push
 * output when it produced any.
 */
export class BranchPushError extends WantedBoardError {
  public readonly branch: string;

  constructor(branch: string, pushLog: string, cause: unknown) {
    super(pushLog !== '' ? pushLog : `push branch: ${messageOf(cause)}`, { cause });
    this.name = 'BranchPushError';
    this.branch = branch;
    Object.setPrototypeOf(this, BranchPushError.prototype);
  }
}

/**
 * Clearing a branch's rows failed; the pull request and branch deletion
 * were still attempted.
 */
export class DiscardFailedError extends WantedBoardError {
  public readonly branch: string;

  constructor(branch: string, cause: unknown) {
    super(`discard ${branch}: clear branch rows: ${messageOf(cause)}`, { cause });
    this.name = 'DiscardFailedError';
    this.branch = branch;
    Object.setPrototypeOf(this, DiscardFailedError.prototype);
  }
}
