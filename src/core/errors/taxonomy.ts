/**
 * Error taxonomy for crdb-version
 * Provides structured error codes with dev/prod differentiation
 */

/**
 * Error categories for systematic classification
 */
export enum ErrorCategory {
  VALIDATION = 'VALIDATION',
  ADAPTER = 'ADAPTER',
  SERIALIZATION = 'SERIALIZATION',
  STATE = 'STATE',
  CONFIGURATION = 'CONFIGURATION',
  PROGRAMMING = 'PROGRAMMING',
  INTERNAL = 'INTERNAL'
}

/**
 * Error severity levels
 */
export enum ErrorSeverity {
  CRITICAL = 'CRITICAL',  // Caller misuse or broken invariant, not a data condition
  ERROR = 'ERROR',        // Operation failed but recoverable
  WARNING = 'WARNING',
  INFO = 'INFO'
}

/**
 * Environment context for error messages
 */
export enum ErrorEnvironment {
  DEVELOPMENT = 'DEVELOPMENT',
  PRODUCTION = 'PRODUCTION',
  TEST = 'TEST'
}

/**
 * Structured error code with metadata.
 *
 * `devMessage` may contain `{key}` placeholders, filled from the error context.
 */
export interface ErrorCode {
  readonly code: string;
  readonly category: ErrorCategory;
  readonly severity: ErrorSeverity;
  readonly devMessage: string;
  readonly prodMessage: string;
  readonly possibleCauses?: readonly string[];
  readonly suggestions?: readonly string[];
}

/**
 * Registry of every known error code
 */
export class ErrorCodeRegistry {
  private static codes: Map<string, ErrorCode> = new Map();

  static register(errorCode: ErrorCode): void {
    this.codes.set(errorCode.code, errorCode);
  }

  static get(code: string): ErrorCode | undefined {
    return this.codes.get(code);
  }

  static getAllCodes(): ErrorCode[] {
    return Array.from(this.codes.values());
  }

  static getByCategory(category: ErrorCategory): ErrorCode[] {
    return this.getAllCodes().filter(error => error.category === category);
  }

  static getBySeverity(severity: ErrorSeverity): ErrorCode[] {
    return this.getAllCodes().filter(error => error.severity === severity);
  }
}

/**
 * Fills `{key}` placeholders from the context. Unknown keys are left as written.
 */
export function renderMessage(template: string, context: Record<string, unknown>): string {
  return template.replace(/\{(\w+)\}/g, (placeholder: string, key: string) =>
    key in context ? String(context[key]) : placeholder
  );
}

/**
 * Base structured error class
 */
export abstract class CrdbVersionError extends Error {
  readonly code: string;
  readonly category: ErrorCategory;
  readonly severity: ErrorSeverity;
  readonly timestamp: string;
  readonly context: Record<string, unknown>;
  readonly originalError?: Error;

  constructor(
    errorCode: ErrorCode,
    context: Record<string, unknown> = {},
    originalError?: Error,
    environment: ErrorEnvironment = ErrorEnvironment.DEVELOPMENT
  ) {
    const message = environment === ErrorEnvironment.PRODUCTION
      ? errorCode.prodMessage
      : renderMessage(errorCode.devMessage, context);

    super(message);

    this.name = this.constructor.name;
    this.code = errorCode.code;
    this.category = errorCode.category;
    this.severity = errorCode.severity;
    this.timestamp = new Date().toISOString();
    this.context = context;
    this.originalError = originalError;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Get user-facing error details
   */
  getDetails(environment: ErrorEnvironment = ErrorEnvironment.DEVELOPMENT): {
    code: string;
    message: string;
    suggestions?: readonly string[];
    context: Record<string, unknown>;
  } {
    const errorCode = ErrorCodeRegistry.get(this.code);

    return {
      code: this.code,
      message: this.message,
      suggestions: errorCode?.suggestions,
      context: environment === ErrorEnvironment.PRODUCTION ? {} : this.context
    };
  }

  /**
   * Serialize for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      category: this.category,
      severity: this.severity,
      message: this.message,
      timestamp: this.timestamp,
      context: this.context,
      stack: this.stack,
      originalError: this.originalError?.message
    };
  }
}

/**
 * Input text does not match the accepted grammar
 */
export class ValidationError extends CrdbVersionError {}

/**
 * A storage value could not be read into a version type
 */
export class AdapterError extends CrdbVersionError {}

/**
 * A JSON payload does not have the expected shape
 */
export class SerializationError extends CrdbVersionError {}

/**
 * A derivation was asked of a version whose state does not allow it
 */
export class StateError extends CrdbVersionError {}

/**
 * Invalid library configuration
 */
export class ConfigurationError extends CrdbVersionError {}

/**
 * Caller misuse, such as mustParse on bad input or an unknown format placeholder.
 * Never expected at run time in correct code.
 */
export class ProgrammingError extends CrdbVersionError {}

/**
 * A branch the grammar makes unreachable was reached
 */
export class InternalError extends CrdbVersionError {}

/**
 * Helper to create error instances with proper typing
 */
export function createError(
  errorCode: ErrorCode,
  context: Record<string, unknown> = {},
  originalError?: Error,
  environment: ErrorEnvironment = ErrorEnvironment.DEVELOPMENT
): CrdbVersionError {
  switch (errorCode.category) {
    case ErrorCategory.VALIDATION:
      return new ValidationError(errorCode, context, originalError, environment);
    case ErrorCategory.ADAPTER:
      return new AdapterError(errorCode, context, originalError, environment);
    case ErrorCategory.SERIALIZATION:
      return new SerializationError(errorCode, context, originalError, environment);
    case ErrorCategory.STATE:
      return new StateError(errorCode, context, originalError, environment);
    case ErrorCategory.CONFIGURATION:
      return new ConfigurationError(errorCode, context, originalError, environment);
    case ErrorCategory.PROGRAMMING:
      return new ProgrammingError(errorCode, context, originalError, environment);
    case ErrorCategory.INTERNAL:
      return new InternalError(errorCode, context, originalError, environment);
  }
}

/**
 * Type guard for crdb-version errors
 */
export function isCrdbVersionError(error: unknown): error is CrdbVersionError {
  return error instanceof CrdbVersionError;
}

/**
 * Extract error details safely from any error
 */
export function extractErrorDetails(
  error: unknown,
  environment: ErrorEnvironment = ErrorEnvironment.DEVELOPMENT
): {
  code?: string;
  message: string;
  category?: ErrorCategory;
  severity?: ErrorSeverity;
  context?: Record<string, unknown>;
} {
  if (isCrdbVersionError(error)) {
    const details = error.getDetails(environment);
    return {
      code: details.code,
      message: details.message,
      category: error.category,
      severity: error.severity,
      context: details.context
    };
  }

  if (error instanceof Error) {
    return {
      message: error.message,
      context: environment === ErrorEnvironment.PRODUCTION ? {} : { stack: error.stack }
    };
  }

  return {
    message: String(error),
    context: {}
  };
}
