export type ConfigErrorCode = 'INVALID_CONFIG';

/**
 * Error thrown when a setting cannot be used: an unreadable or invalid
 * config file, or an environment value outside its allowed set.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly code: ConfigErrorCode = 'INVALID_CONFIG',
    public readonly source?: string
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}
