/**
 * Base error for all connector-related errors
 */
export class ConnectorError extends Error {
  constructor(
    message: string,
    public readonly connector: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ConnectorError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Authentication errors (rejected or missing credentials)
 */
export class AuthenticationError extends ConnectorError {
  constructor(message: string, connector: string, context?: Record<string, unknown>) {
    super(message, connector, context);
    this.name = 'AuthenticationError';
  }
}

/**
 * Network errors (timeouts, connection failures, unexpected status codes)
 */
export class NetworkError extends ConnectorError {
  constructor(
    message: string,
    connector: string,
    public readonly statusCode?: number,
    context?: Record<string, unknown>
  ) {
    super(message, connector, context);
    this.name = 'NetworkError';
  }
}

/**
 * Validation errors (invalid connector configuration)
 */
export class ValidationError extends ConnectorError {
  constructor(
    message: string,
    connector: string,
    public readonly validationErrors: Array<{
      field: string;
      message: string;
    }>,
    context?: Record<string, unknown>
  ) {
    super(message, connector, context);
    this.name = 'ValidationError';
  }
}
