/**
 * In-memory implementations (no filesystem or dolt binary required)
 *
 * Suitable for tests, embedded boards and CI.
 */

// CommonsStore
export { MemoryCommonsStore } from './commons_store/memory';
export type { MemoryCommonsStoreOptions } from './commons_store/memory';

// ConfigStore
export { MemoryConfigStore } from './config_store/memory';
