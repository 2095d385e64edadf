import type { ZodError } from 'zod';

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid options: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }

  static fromZod(error: ZodError): ConfigError {
    return new ConfigError(
      error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
      )
    );
  }
}
