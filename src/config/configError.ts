/**
 * ConfigError: missing or invalid configuration
 */

export class ConfigError extends Error {
  public readonly key: string;

  constructor(key: string, message: string) {
    super(message);
    this.name = "ConfigError";
    this.key = key;
  }
}
