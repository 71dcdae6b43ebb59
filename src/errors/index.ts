/**
 * sharedbloom Error Handling Module
 *
 * All errors extend from SharedBloomError which provides:
 * - Error codes for programmatic handling
 * - Serialization support
 * - Cause chaining for debugging
 * - Type guards for error checking
 *
 * Error Hierarchy:
 * - SharedBloomError (base class)
 *   - NoBackendError (remote client not configured)
 *   - DataTypeError (reply or cached value has an unexpected type)
 *   - ValidationError (invalid constructor or call input)
 *   - ConfigurationError (invalid configuration)
 *
 * Transport failures raised by a Redis client are not wrapped: they reach
 * the caller as the client threw them.
 *
 * @module errors
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Error codes for sharedbloom operations.
 * These codes are stable and can be used for programmatic error handling.
 */
export enum ErrorCode {
  UNKNOWN = 'UNKNOWN',

  // Backend errors
  NO_BACKEND = 'NO_BACKEND',
  DATA_TYPE = 'DATA_TYPE',

  // Validation errors
  VALIDATION_FAILED = 'VALIDATION_FAILED',

  // Configuration errors
  INVALID_CONFIG = 'INVALID_CONFIG',
}

// =============================================================================
// Serialized Error Format
// =============================================================================

export interface SerializedError {
  /** Error class name */
  name: string
  /** Error code for programmatic handling */
  code: ErrorCode
  /** Human-readable error message */
  message: string
  /** Stack trace (included outside production) */
  stack?: string | undefined
  /** Additional context data */
  context?: Record<string, unknown> | undefined
  /** Serialized cause (if error chaining) */
  cause?: SerializedError | undefined
}

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error class for all sharedbloom errors.
 *
 * @example
 * ```typescript
 * throw new SharedBloomError('Operation failed', ErrorCode.UNKNOWN, {
 *   operation: 'setAll',
 * })
 * ```
 */
export class SharedBloomError extends Error {
  override readonly name: string = 'SharedBloomError'
  readonly code: ErrorCode
  readonly context: Record<string, unknown>
  override readonly cause?: Error | undefined

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message)
    this.code = code
    this.context = context ?? {}
    this.cause = cause
    Object.setPrototypeOf(this, new.target.prototype)
  }

  toJSON(): SerializedError {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      stack: process.env.NODE_ENV !== 'production' ? this.stack : undefined,
      context: Object.keys(this.context).length > 0 ? this.context : undefined,
      cause: this.cause instanceof SharedBloomError ? this.cause.toJSON() : undefined,
    }
  }
}

// =============================================================================
// Backend Errors
// =============================================================================

/**
 * Thrown on every call to a remote-backed filter or cache that has no
 * client. Construction with an absent client is allowed; the failure
 * surfaces at call time.
 */
export class NoBackendError extends SharedBloomError {
  override readonly name = 'NoBackendError'

  constructor(operation: string, backend: string) {
    super(`No redis client configured for ${backend}.${operation}`, ErrorCode.NO_BACKEND, {
      operation,
      backend,
    })
  }
}

/**
 * A remote reply, or a cached value, could not be coerced to the type the
 * caller asked for.
 */
export class DataTypeError extends SharedBloomError {
  override readonly name = 'DataTypeError'
  readonly expected: string

  constructor(expected: string, actual: unknown, context?: Record<string, unknown>) {
    super(`Expected ${expected}, got ${describeValue(actual)}`, ErrorCode.DATA_TYPE, {
      ...context,
      expected,
      actual: describeValue(actual),
    })
    this.expected = expected
  }
}

// =============================================================================
// Validation / Configuration Errors
// =============================================================================

export class ValidationError extends SharedBloomError {
  override readonly name = 'ValidationError'
  readonly field: string | undefined

  constructor(message: string, field?: string, value?: unknown) {
    super(message, ErrorCode.VALIDATION_FAILED, { field, value })
    this.field = field
  }
}

export class ConfigurationError extends SharedBloomError {
  override readonly name = 'ConfigurationError'
  readonly variable: string | undefined

  constructor(message: string, variable?: string, cause?: Error) {
    super(message, ErrorCode.INVALID_CONFIG, { variable }, cause)
    this.variable = variable
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isSharedBloomError(error: unknown): error is SharedBloomError {
  return error instanceof SharedBloomError
}

export function isNoBackendError(error: unknown): error is NoBackendError {
  return error instanceof NoBackendError
}

export function isDataTypeError(error: unknown): error is DataTypeError {
  return error instanceof DataTypeError
}

// =============================================================================
// Helpers
// =============================================================================

function describeValue(value: unknown): string {
  if (value === null) return 'null'
  if (Buffer.isBuffer(value)) return 'Buffer'
  if (value instanceof Uint8Array) return 'Uint8Array'
  if (Array.isArray(value)) return 'array'
  return typeof value
}
