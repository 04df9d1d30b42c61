/**
 * Custom error classes
 *
 * All clientkey errors extend ClientKeyError for consistent error handling.
 */

export class ClientKeyError extends Error {
  constructor(
    message: string,
    public code: string,
    public statusCode: number = 500,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ClientKeyError';
  }
}

export class ValidationError extends ClientKeyError {
  constructor(message: string, code = 'validation_failed', details?: Record<string, unknown>) {
    super(message, code, 400, details);
    this.name = 'ValidationError';
  }
}

export class ConfigurationError extends ClientKeyError {
  constructor(message: string, code = 'configuration_error', details?: Record<string, unknown>) {
    super(message, code, 500, details);
    this.name = 'ConfigurationError';
  }
}
