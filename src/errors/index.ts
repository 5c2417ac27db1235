/**
 * Custom error types for the preview deployer.
 * Infrastructure operations hand these out inside a `Result`; synthesis code throws
 * `InvariantViolationError` when it is fed input this package could never have built.
 */

/**
 * Base error class for all application errors
 */
export abstract class ApplicationError extends Error {
  public readonly timestamp: Date;
  public readonly context: Record<string, unknown>;

  constructor(
    message: string,
    public readonly code: string,
    context?: Record<string, unknown>,
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
    context: Record<string, unknown>;
    stack?: string;
  } {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp,
      context: this.context,
      ...(this.stack !== undefined && { stack: this.stack }),
    };
  }
}

/**
 * Error thrown when Kubernetes operations fail
 */
export class KubernetesError extends ApplicationError {
  constructor(
    message: string,
    code: string = 'K8S_ERROR',
    public readonly statusCode?: number | undefined,
    public readonly resource?: string | undefined,
    public readonly namespace?: string | undefined,
    public override readonly cause?: unknown,
    context?: Record<string, unknown> | undefined,
  ) {
    super(message, code, { ...context, statusCode, resource, namespace });
    this.name = 'KubernetesError';
  }

  get isNotFound(): boolean {
    return this.statusCode === 404;
  }

  get isConflict(): boolean {
    return this.statusCode === 409;
  }
}

/**
 * Error thrown when validation fails
 */
export class ValidationError extends ApplicationError {
  constructor(
    message: string,
    public readonly field?: string | undefined,
    public readonly value?: unknown,
    context?: Record<string, unknown>,
  ) {
    super(message, 'VALIDATION_ERROR', { ...context, field, value });
    this.name = 'ValidationError';
  }
}

/**
 * Error thrown when configuration is invalid
 */
export class ConfigurationError extends ApplicationError {
  constructor(
    message: string,
    public readonly configKey?: string | undefined,
    public readonly violations?: Array<{ path: string; message: string }>,
    context?: Record<string, unknown>,
  ) {
    super(message, 'CONFIG_ERROR', { ...context, configKey, violations });
    this.name = 'ConfigurationError';
  }
}

/**
 * Raised when internally constructed input breaks an invariant, i.e. a programming error.
 */
export class InvariantViolationError extends ApplicationError {
  constructor(
    message: string,
    public readonly invariant: string,
    context?: Record<string, unknown>,
  ) {
    super(message, 'INVARIANT_VIOLATION', { ...context, invariant });
    this.name = 'InvariantViolationError';
  }
}

/**
 * Helper function to check if an error is one of our custom error types
 */
export function isApplicationError(error: unknown): error is ApplicationError {
  return error instanceof ApplicationError;
}

export function isKubernetesError(error: unknown): error is KubernetesError {
  return error instanceof KubernetesError;
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

export function isInvariantViolation(error: unknown): error is InvariantViolationError {
  return error instanceof InvariantViolationError;
}

/**
 * Helper function to convert unknown errors to our error types
 */
export function normalizeError(
  error: unknown,
  defaultMessage = 'An unexpected error occurred',
): ApplicationError {
  if (isApplicationError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new KubernetesError(error.message, 'K8S_UNKNOWN', undefined, undefined, undefined, error);
  }

  return new KubernetesError(
    typeof error === 'string' ? error : defaultMessage,
    'K8S_UNKNOWN',
    undefined,
    undefined,
    undefined,
    undefined,
    { originalError: error },
  );
}
