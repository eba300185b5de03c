import type { BoardMode } from '../wanted/wanted.types';

/**
 * A joined commons, keyed by its upstream (`org/db`).
 */
export type UpstreamInfo = {
  upstream: string;
  forkOrg: string;
  forkDb: string;
  mode: BoardMode;
};
