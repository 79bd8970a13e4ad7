import type { ZodError } from 'zod';

/**
 * Raised when environment variables or the categories file fail validation.
 * Carries one readable line per offending field.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
  }

  static fromZod(message: string, error: ZodError): ConfigError {
    const issues = error.issues.map((issue) => {
      const field = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${field}: ${issue.message}`;
    });
    return new ConfigError(message, issues);
  }
}
