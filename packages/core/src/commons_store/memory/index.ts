export { MemoryCommonsStore } from './memory_commons_store';
export type { MemoryCommonsStoreOptions } from './memory_commons_store';
