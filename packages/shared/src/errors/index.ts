/**
 * Custom error hierarchy for Kubemend
 */

export type ErrorCategory =
  | 'ORACLE'
  | 'KUBERNETES'
  | 'PERSISTENCE'
  | 'CONFIGURATION'
  | 'UNKNOWN';

export type ErrorSeverity = 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';

export interface ErrorContext {
  category: ErrorCategory;
  severity: ErrorSeverity;
  retryable: boolean;
  namespace?: string;
  [key: string]: unknown;
}

/**
 * Base error class for Kubemend
 */
export class KubemendError extends Error {
  public readonly code: string;
  public readonly context: ErrorContext;
  public readonly timestamp: Date;

  constructor(
    message: string,
    code: string,
    context: Partial<ErrorContext> = {}
  ) {
    super(message);
    this.name = 'KubemendError';
    this.code = code;
    this.context = {
      category: context.category ?? 'UNKNOWN',
      severity: context.severity ?? 'MEDIUM',
      retryable: context.retryable ?? false,
      ...context,
    };
    this.timestamp = new Date();

    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
    };
  }
}

/**
 * Reasoning oracle errors
 */
export class OracleError extends KubemendError {
  constructor(message: string, code: string = 'E2000', context: Partial<ErrorContext> = {}) {
    super(message, code, {
      category: 'ORACLE',
      severity: 'MEDIUM',
      retryable: true,
      ...context,
    });
    this.name = 'OracleError';
  }
}

export class OracleTimeoutError extends OracleError {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number, context: Partial<ErrorContext> = {}) {
    super(`Oracle call timed out after ${timeoutMs}ms`, 'E2002', {
      severity: 'MEDIUM',
      retryable: true,
      ...context,
    });
    this.name = 'OracleTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class OracleResponseError extends OracleError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E2003', {
      severity: 'LOW',
      retryable: false,
      ...context,
    });
    this.name = 'OracleResponseError';
  }
}

/**
 * Kubernetes errors
 */
export class KubernetesError extends KubemendError {
  constructor(message: string, code: string, context: Partial<ErrorContext> = {}) {
    super(message, code, {
      category: 'KUBERNETES',
      severity: 'HIGH',
      retryable: false,
      ...context,
    });
    this.name = 'KubernetesError';
  }
}

/**
 * The API server could not be reached at all
 */
export class TransportError extends KubernetesError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E3001', {
      severity: 'HIGH',
      retryable: true,
      ...context,
    });
    this.name = 'TransportError';
  }
}

/**
 * The API server answered with an error status
 */
export class KubernetesApiError extends KubernetesError {
  /** Reason reported by the API server, e.g. `NotFound` or `Forbidden` */
  public readonly reason: string;
  public readonly statusCode?: number;

  constructor(reason: string, message: string, statusCode?: number, context: Partial<ErrorContext> = {}) {
    super(message, 'E3002', {
      severity: 'MEDIUM',
      retryable: statusCode !== undefined && statusCode >= 500,
      statusCode,
      ...context,
    });
    this.name = 'KubernetesApiError';
    this.reason = reason;
    this.statusCode = statusCode;
  }
}

/**
 * Report persistence errors
 */
export class PersistenceError extends KubemendError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E4001', {
      category: 'PERSISTENCE',
      severity: 'LOW',
      retryable: false,
      ...context,
    });
    this.name = 'PersistenceError';
  }
}

/**
 * Configuration errors
 */
export class ConfigurationError extends KubemendError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E6001', {
      category: 'CONFIGURATION',
      severity: 'CRITICAL',
      retryable: false,
      ...context,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * Helper to check if an error is retryable
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof KubemendError) {
    return error.context.retryable;
  }
  return false;
}

/**
 * Helper to wrap unknown errors
 */
export function wrapError(error: unknown, context: Partial<ErrorContext> = {}): KubemendError {
  if (error instanceof KubemendError) {
    return error;
  }

  if (error instanceof Error) {
    return new KubemendError(error.message, 'E9999', {
      category: 'UNKNOWN',
      severity: 'MEDIUM',
      retryable: false,
      originalError: error.name,
      ...context,
    });
  }

  return new KubemendError(String(error), 'E9999', {
    category: 'UNKNOWN',
    severity: 'MEDIUM',
    retryable: false,
    ...context,
  });
}

/**
 * Message of any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
