/**
 * Central error classes and validation utilities for bibdedup
 * @module utils/errors
 */

/**
 * Base error class for all bibdedup errors
 */
export class DedupError extends Error {
  /** Error code for programmatic error handling */
  public readonly code: string

  /** Additional error context */
  public readonly context?: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context?: Record<string, unknown>
  ) {
    super(message)
    this.name = 'DedupError'
    this.code = code
    this.context = context

    // Maintains proper stack trace (Node.js specific)
    Error.captureStackTrace(this, this.constructor)
  }
}

/**
 * Error thrown when a required parameter is missing
 */
export class MissingParameterError extends DedupError {
  public readonly parameterName: string

  constructor(parameterName: string, context?: Record<string, unknown>) {
    super(
      `Missing required parameter: '${parameterName}'`,
      'MISSING_PARAMETER',
      { parameterName, ...context }
    )
    this.name = 'MissingParameterError'
    this.parameterName = parameterName
  }
}

/**
 * Error thrown when a parameter value is invalid
 */
export class InvalidParameterError extends DedupError {
  public readonly parameterName: string
  public readonly value: unknown
  public readonly reason: string

  constructor(
    parameterName: string,
    value: unknown,
    reason: string,
    context?: Record<string, unknown>
  ) {
    super(
      `Invalid parameter '${parameterName}': ${reason}`,
      'INVALID_PARAMETER',
      { parameterName, value, reason, ...context }
    )
    this.name = 'InvalidParameterError'
    this.parameterName = parameterName
    this.value = value
    this.reason = reason
  }
}

/**
 * Error thrown when configuration is invalid
 */
export class ConfigurationError extends DedupError {
  public readonly field?: string

  constructor(message: string, field?: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', { field, ...context })
    this.name = 'ConfigurationError'
    this.field = field
  }
}

/**
 * Error thrown when a builder method is called in invalid sequence
 */
export class BuilderSequenceError extends DedupError {
  public readonly method: string

  constructor(method: string, message: string, context?: Record<string, unknown>) {
    super(
      `Builder sequence error in ${method}: ${message}`,
      'BUILDER_SEQUENCE_ERROR',
      { method, ...context }
    )
    this.name = 'BuilderSequenceError'
    this.method = method
  }
}

/**
 * Where a reporting failure happened: a stage of the log sink lifecycle, or
 * a write to the detector's logger (`'log'`)
 */
export type LogSinkStage = 'open' | 'record' | 'close' | 'log'

/**
 * Wraps a failure raised by a duplicate log sink or the detector's logger.
 * Never thrown out of detection; collected into the run's result instead.
 */
export class LogSinkError extends DedupError {
  public readonly stage: LogSinkStage
  public readonly originalError: unknown

  constructor(stage: LogSinkStage, originalError: unknown, context?: Record<string, unknown>) {
    super(
      stage === 'log'
        ? `Logger failed: ${describeError(originalError)}`
        : `Log sink failed during ${stage}: ${describeError(originalError)}`,
      'LOG_SINK_FAILURE',
      { stage, ...context }
    )
    this.name = 'LogSinkError'
    this.stage = stage
    this.originalError = originalError
  }
}

/**
 * Renders an unknown thrown value as a message string
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

// ==================== VALIDATION UTILITIES ====================

/**
 * Validates that a value is not null or undefined
 */
export function requireNonNull<T>(
  value: T | null | undefined,
  parameterName: string
): T {
  if (value === null || value === undefined) {
    throw new MissingParameterError(parameterName)
  }
  return value
}

/**
 * Validates that a number is within a specific range (inclusive)
 */
export function requireInRange(
  value: number,
  min: number,
  max: number,
  parameterName: string
): number {
  if (typeof value !== 'number' || isNaN(value)) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be a number'
    )
  }
  if (value < min || value > max) {
    throw new InvalidParameterError(
      parameterName,
      value,
      `must be between ${min} and ${max} (inclusive)`
    )
  }
  return value
}

/**
 * Validates that an array is non-empty
 */
export function requireNonEmptyArray<T>(
  value: readonly T[],
  parameterName: string
): readonly T[] {
  if (!Array.isArray(value)) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be an array'
    )
  }
  if (value.length === 0) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must not be empty'
    )
  }
  return value
}

/**
 * Validates that a string is non-empty
 */
export function requireNonEmptyString(value: string, parameterName: string): string {
  if (typeof value !== 'string') {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be a string'
    )
  }
  if (value.trim().length === 0) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must not be empty'
    )
  }
  return value
}

/**
 * Validates that a value is one of the allowed options
 */
export function requireOneOf<T>(
  value: T,
  allowedValues: readonly T[],
  parameterName: string
): T {
  if (!allowedValues.includes(value)) {
    throw new InvalidParameterError(
      parameterName,
      value,
      `must be one of: ${allowedValues.join(', ')}`
    )
  }
  return value
}

/**
 * Check if an error is a bibdedup error
 */
export function isDedupError(error: unknown): error is DedupError {
  return error instanceof DedupError
}
