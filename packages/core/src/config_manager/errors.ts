import { WantedBoardError } from '../wanted/errors';

/**
 * Stored configuration is missing or fails its schema
 */
export class ConfigError extends WantedBoardError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}
