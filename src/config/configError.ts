/**
 * ConfigError: raised when configuration values fail validation
 */

export class ConfigError extends Error {
  /** Offending option names with their validation messages */
  public readonly issues: Record<string, string[]>;

  constructor(message: string, issues: Record<string, string[]> = {}) {
    super(message);
    this.name = "ConfigError";
    this.issues = issues;
  }
}
