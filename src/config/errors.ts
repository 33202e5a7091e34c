import type { ZodError } from 'zod';

export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly zodError?: ZodError,
  ) {
    super(message);
    this.name = 'ConfigValidationError';
  }

  /** One `path: message` line per issue. */
  static fromZodError(error: ZodError): ConfigValidationError {
    const issues = error.issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`);
    const message = ['Configuration validation failed:', '', ...issues, '', 'Check the environment and the .env file.'].join(
      '\n',
    );

    return new ConfigValidationError(message, error);
  }
}
