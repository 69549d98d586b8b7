/**
 * Raised for an invalid split, timeout or generator configuration.
 * Fatal to the call that received it.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Historic test stats could not be fetched or were unusable.
 * Callers degrade to the round-robin split instead of failing.
 */
export class DataUnavailableError extends Error {
  constructor(
    message: string,
    readonly status?: number,
  ) {
    super(message);
    this.name = 'DataUnavailableError';
  }
}

export function getErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
