/**
 * Schema validation of mutation inputs and board configuration.
 */

import { SchemaValidationCache, toFieldErrors } from '../schemas/schema_cache';
import type { SchemaName } from '../schemas/schema_cache';
import { InputValidationError } from '../wanted/errors';
import type { AcceptInput, PostInput, WantedUpdate } from '../wanted/wanted.types';
import type { BoardConfig } from '../config_manager/config_manager.types';

function assertValid(name: SchemaName, subject: string, value: unknown): void {
  const validate = SchemaValidationCache.getNamedValidator(name);
  if (!validate(value)) {
    throw new InputValidationError(subject, toFieldErrors(validate.errors));
  }
}

export function validatePostInput(input: PostInput): void {
  assertValid('post_input', 'post input', input);
}

export function validateWantedUpdate(fields: WantedUpdate): void {
  assertValid('wanted_update', 'update', fields);
}

export function validateAcceptInput(input: AcceptInput): void {
  assertValid('accept_input', 'accept input', input);
}

export function isBoardConfig(value: unknown): value is BoardConfig {
  return SchemaValidationCache.getNamedValidator('board_config')(value);
}

/**
 * Field errors of a candidate board config; empty when valid.
 */
export function boardConfigErrors(value: unknown): Array<{ field: string; message: string }> {
  const validate = SchemaValidationCache.getNamedValidator('board_config');
  return validate(value) ? [] : toFieldErrors(validate.errors);
}
