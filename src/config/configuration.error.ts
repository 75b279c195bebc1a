/**
 * Raised while building the configuration at startup. Never caught by the
 * application: a misconfigured process must not start.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly variables: string[] = [],
  ) {
    super(message);
    this.name = 'ConfigurationError';
    Error.captureStackTrace(this, this.constructor);
  }
}
