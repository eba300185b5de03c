export { MutationLock } from './mutation_lock';
export { OutputBuffer } from './output_buffer';
export { generateWantedId, generatePrefixedId } from './id_generator';
