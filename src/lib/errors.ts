/**
 * EconDigest — Errors
 *
 * Only configuration problems are fatal. Everything else in a run
 * (source failures, skipped entries, delivery) is reported as a value.
 */

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly issues: readonly string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
  }
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}
