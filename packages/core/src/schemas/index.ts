export { SchemaValidationCache, schemaPath, toFieldErrors } from './schema_cache';
export type { SchemaName, SchemaFieldError } from './schema_cache';
