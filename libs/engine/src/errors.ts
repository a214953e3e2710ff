/**
 * Engine error classes
 */

export class ConfigLoadError extends Error {
  public readonly code = 'CONFIG_LOAD_FAILED';
  public readonly configPath: string;

  constructor(configPath: string, reason: string) {
    super(`Failed to load configuration from ${configPath}: ${reason}`);
    this.name = 'ConfigLoadError';
    this.configPath = configPath;
    Error.captureStackTrace?.(this, this.constructor);
  }
}
