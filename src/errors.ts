import type { ZodError } from 'zod';

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }

  static fromZodError(error: ZodError): ConfigError {
    return new ConfigError(
      error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
}

export class InvalidSeedUrlError extends Error {
  readonly url: string;

  constructor(url: string) {
    super(`Invalid seed URL: ${url}`);
    this.name = 'InvalidSeedUrlError';
    this.url = url;
  }
}
