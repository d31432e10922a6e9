/**
 * Configuration Error Class
 *
 * Raised when a services config file cannot be read, parsed or validated.
 * Carries the file it came from and a hint for fixing it.
 */

export class ConfigurationError extends Error {
  public override readonly cause?: Error;

  constructor(
    message: string,
    public source?: string,
    public suggestion?: string,
    cause?: Error
  ) {
    super(message);
    this.name = 'ConfigurationError';
    this.cause = cause;
  }

  /**
   * Format the error for CLI output
   */
  override toString(): string {
    let output = `❌ ${this.message}`;
    if (this.source) {
      output += `\n   File: ${this.source}`;
    }
    if (this.suggestion) {
      output += `\n   💡 Suggestion: ${this.suggestion}`;
    }
    return output;
  }
}
