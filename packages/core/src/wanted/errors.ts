/**
 * Wanted Board Errors
 *
 * Precondition errors are never retried by the engine; they surface
 * unchanged to the caller.
 */

/**
 * Base error class for all wanted-board errors
 */
export class WantedBoardError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'WantedBoardError';
    Object.setPrototypeOf(this, WantedBoardError.prototype);
  }
}

export class WantedNotFoundError extends WantedBoardError {
  public readonly wantedId: string;

  constructor(wantedId: string) {
    super(`wanted item "${wantedId}" not found`);
    this.name = 'WantedNotFoundError';
    this.wantedId = wantedId;
    Object.setPrototypeOf(this, WantedNotFoundError.prototype);
  }
}

export class CompletionNotFoundError extends WantedBoardError {
  public readonly wantedId: string;

  constructor(wantedId: string) {
    super(`no completion found for "${wantedId}"`);
    this.name = 'CompletionNotFoundError';
    this.wantedId = wantedId;
    Object.setPrototypeOf(this, CompletionNotFoundError.prototype);
  }
}

/**
 * Thrown when a rig tries to accept (and so stamp) its own completion
 */
export class SelfStampError extends WantedBoardError {
  constructor() {
    super('cannot accept your own completion');
    this.name = 'SelfStampError';
    Object.setPrototypeOf(this, SelfStampError.prototype);
  }
}

export class EmptyUpdateError extends WantedBoardError {
  constructor() {
    super('no fields to update');
    this.name = 'EmptyUpdateError';
    Object.setPrototypeOf(this, EmptyUpdateError.prototype);
  }
}

export class InvalidBranchNameError extends WantedBoardError {
  public readonly branch: string;

  constructor(branch: string) {
    super(`invalid branch name "${branch}": expected wl/{rig}/{wantedId}`);
    this.name = 'InvalidBranchNameError';
    this.branch = branch;
    Object.setPrototypeOf(this, InvalidBranchNameError.prototype);
  }
}

/**
 * Thrown when an operation needs a capability the current backend or
 * configuration does not provide
 */
export class CapabilityUnavailableError extends WantedBoardError {
  public readonly capability: string;

  constructor(capability: string, message: string) {
    super(message);
    this.name = 'CapabilityUnavailableError';
    this.capability = capability;
    Object.setPrototypeOf(this, CapabilityUnavailableError.prototype);
  }
}

/**
 * Input failed schema validation
 */
export class InputValidationError extends WantedBoardError {
  public readonly errors: Array<{ field: string; message: string }>;

  constructor(subject: string, errors: Array<{ field: string; message: string }>) {
    super(`invalid ${subject}: ${errors.map(e => `${e.field} ${e.message}`).join(', ')}`);
    this.name = 'InputValidationError';
    this.errors = errors;
    Object.setPrototypeOf(this, InputValidationError.prototype);
  }
}
