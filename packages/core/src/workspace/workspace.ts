import type { IBoardAdapter } from '../adapters/board_adapter';
import { UpstreamNotFoundError } from './errors';
import type { UpstreamInfo } from './workspace.types';

type Entry = { info: UpstreamInfo; client: IBoardAdapter };

/**
 * Workspace - one BoardAdapter per joined upstream for a single rig.
 *
 * Entries are independent; nothing here coordinates work across upstreams.
 */
export class Workspace {
  private readonly entries = new Map<string, Entry>();
  private readonly handle: string;

  constructor(rigHandle: string) {
    this.handle = rigHandle;
  }

  /** Registers (or replaces) the client for `info.upstream`. */
  add(info: UpstreamInfo, client: IBoardAdapter): void {
    this.entries.set(info.upstream, { info: { ...info }, client });
  }

  remove(upstream: string): void {
    this.entries.delete(upstream);
  }

  client(upstream: string): IBoardAdapter {
    const entry = this.entries.get(upstream);
    if (!entry) {
      throw new UpstreamNotFoundError(upstream);
    }
    return entry.client;
  }

  /** Registered upstreams sorted by name. */
  upstreams(): UpstreamInfo[] {
    return [...this.entries.values()]
      .map(entry => ({ ...entry.info }))
      .sort((a, b) => (a.upstream < b.upstream ? -1 : a.upstream > b.upstream ? 1 : 0));
  }

  rigHandle(): string {
    return this.handle;
  }
}
