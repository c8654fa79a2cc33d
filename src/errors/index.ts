/**
 * Error types for the deployment annotator.
 *
 * Every remote call rejects with one of these; workflow steps record them
 * instead of rethrowing.
 */

/**
 * Base error class for all application errors
 */
export abstract class ApplicationError extends Error {
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown> | undefined;

  constructor(
    message: string,
    public readonly code: string,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.timestamp = new Date();
    this.context = context ?? {};
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): {
    name: string;
    message: string;
    code: string;
    timestamp: Date;
    context?: Record<string, unknown>;
    stack?: string;
  } {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp,
      context: this.context,
      stack: this.stack
    };
  }
}

/**
 * Malformed input: a descriptor that breaks a local rule or one the API server rejected
 */
export class ValidationError extends ApplicationError {
  constructor(
    message: string,
    public readonly fields?: string[],
    public readonly violations?: Array<{ field: string; message: string }>,
    context?: Record<string, unknown>
  ) {
    super(message, 'VALIDATION_ERROR', { ...context, fields, violations });
    this.name = 'ValidationError';
  }
}

/**
 * The resource already exists, or a concurrent writer won
 */
export class ConflictError extends ApplicationError {
  constructor(
    message: string,
    public readonly resourceType?: string,
    public readonly resourceId?: string,
    public override readonly cause?: Error | undefined,
    context?: Record<string, unknown>
  ) {
    super(message, 'CONFLICT', { ...context, resourceType, resourceId });
    this.name = 'ConflictError';
  }
}

/**
 * Error thrown when a resource is not found
 */
export class NotFoundError extends ApplicationError {
  constructor(
    message: string,
    public readonly resourceType?: string,
    public readonly resourceId?: string,
    context?: Record<string, unknown>
  ) {
    super(message, 'NOT_FOUND', { ...context, resourceType, resourceId });
    this.name = 'NotFoundError';
  }
}

/**
 * Connectivity, authentication or server-side failure talking to the cluster
 */
export class TransportError extends ApplicationError {
  constructor(
    message: string,
    public readonly statusCode?: number | undefined,
    public readonly operation?: string | undefined,
    public override readonly cause?: Error | undefined,
    context?: Record<string, unknown>
  ) {
    super(message, 'TRANSPORT_ERROR', { ...context, statusCode, operation });
    this.name = 'TransportError';
  }
}

/**
 * Error thrown when an operation times out
 */
export class TimeoutError extends ApplicationError {
  constructor(
    message: string,
    public readonly timeoutMs?: number,
    public readonly operation?: string,
    context?: Record<string, unknown>
  ) {
    super(message, 'TIMEOUT', { ...context, timeoutMs, operation });
    this.name = 'TimeoutError';
  }
}

/**
 * Error thrown when configuration is invalid
 */
export class ConfigurationError extends ApplicationError {
  constructor(
    message: string,
    public readonly configKey?: string,
    public readonly expectedType?: string,
    public readonly actualValue?: unknown,
    context?: Record<string, unknown>
  ) {
    super(message, 'CONFIG_ERROR', { ...context, configKey, expectedType, actualValue });
    this.name = 'ConfigurationError';
  }
}

/**
 * Helper function to check if an error is one of our custom error types
 */
export function isApplicationError(error: unknown): error is ApplicationError {
  return error instanceof ApplicationError;
}

/**
 * Wrap anything thrown outside the known taxonomy; transport is the only
 * category that makes no claim about the request itself.
 */
export function normalizeError(
  error: unknown,
  defaultMessage = 'An unexpected error occurred'
): ApplicationError {
  if (isApplicationError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new TransportError(error.message, undefined, undefined, error);
  }

  return new TransportError(typeof error === 'string' ? error : defaultMessage);
}

export function isNotFoundError(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError;
}

export function isConflictError(error: unknown): error is ConflictError {
  return error instanceof ConflictError;
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

/**
 * Compact form for log lines
 */
export function serializeError(error: ApplicationError): Record<string, unknown> {
  return {
    code: error.code,
    message: error.message,
    details: error.context,
    timestamp: error.timestamp.toISOString()
  };
}
