/**
 * Root of the bot's error hierarchy. `code` is the stable identifier that
 * ends up in log lines; `details` holds whatever the raiser wants logged
 * with it (zod issues, the offending value).
 */
export class BaseError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'BaseError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Bad or missing environment at start-up. The entry point exits with 1. */
export class ConfigurationError extends BaseError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

/** A value handed to a formatter or parser that it cannot use. */
export class ValidationError extends BaseError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}
