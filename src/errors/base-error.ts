/**
 * Base Error Class
 *
 * Foundation for all retrieval-specific errors.
 */

export interface RetrievalErrorOptions {
  cause?: unknown;
  isOperational?: boolean;
  context?: Record<string, unknown>;
}

export class RetrievalError extends Error {
  public readonly code: string;
  public readonly isOperational: boolean;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(code: string, message: string, options: RetrievalErrorOptions = {}) {
    super(message);
    this.name = 'RetrievalError';
    this.code = code;
    this.isOperational = options.isOperational ?? true;
    this.timestamp = new Date();
    this.context = options.context;

    if (options.cause !== undefined) {
      this.cause = options.cause;
    }

    // Capture stack trace
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
    };
  }
}

/**
 * Invalid per-call input (query, topK, alpha, mode)
 */
export class ValidationError extends RetrievalError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = [], options: { context?: Record<string, unknown> } = {}) {
    super('VALIDATION_ERROR', message, options);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * Invalid construction-time settings or environment values
 */
export class ConfigurationError extends RetrievalError {
  public readonly setting?: string;

  constructor(message: string, options: { setting?: string; cause?: unknown } = {}) {
    super('CONFIGURATION_ERROR', message, {
      cause: options.cause,
      isOperational: false,
      context: options.setting ? { setting: options.setting } : undefined,
    });
    this.name = 'ConfigurationError';
    this.setting = options.setting;
  }
}

export function isRetrievalError(error: unknown): error is RetrievalError {
  return error instanceof RetrievalError;
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'An unknown error occurred';
}
