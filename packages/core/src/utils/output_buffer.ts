import type { PushLog } from '../commons_store/commons_store.types';

/**
 * Collects push diagnostics so a failed push can report the store's own
 * output instead of a generic wrapped error.
 */
export class OutputBuffer implements PushLog {
  private readonly chunks: string[] = [];

  write(chunk: string): void {
    this.chunks.push(chunk);
  }

  toString(): string {
    return this.chunks.join('');
  }
}
