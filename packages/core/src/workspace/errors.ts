import { WantedBoardError } from '../wanted/errors';

/**
 * No engine is registered for the requested upstream
 */
export class UpstreamNotFoundError extends WantedBoardError {
  public readonly upstream: string;

  constructor(upstream: string) {
    super(`no client for upstream "${upstream}"`);
    this.name = 'UpstreamNotFoundError';
    this.upstream = upstream;
    Object.setPrototypeOf(this, UpstreamNotFoundError.prototype);
  }
}
