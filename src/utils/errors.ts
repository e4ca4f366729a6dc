/**
 * Central error classes and validation utilities for threshold-match
 * @module utils/errors
 */

import type { RowKey } from '../types/table'

/**
 * Base error class for all threshold-match errors
 */
export class ThresholdMatchError extends Error {
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
    this.name = 'ThresholdMatchError'
    this.code = code
    this.context = context

    // Maintains proper stack trace (Node.js specific)
    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, this.constructor)
    }
  }
}

/**
 * Error thrown when a table contains the same row key more than once
 */
export class DuplicateRowKeyError extends ThresholdMatchError {
  public readonly table: string
  public readonly duplicates: RowKey[]

  constructor(table: string, duplicates: RowKey[]) {
    super(
      `Table '${table}' contains duplicate row keys: ${duplicates.join(', ')}. Every table needs keys free of duplicates.`,
      'DUPLICATE_ROW_KEY',
      { table, duplicates }
    )
    this.name = 'DuplicateRowKeyError'
    this.table = table
    this.duplicates = duplicates
  }
}

/**
 * Error thrown when two tables being matched do not share the same fields
 */
export class FieldSetMismatchError extends ThresholdMatchError {
  public readonly onlyLeft: string[]
  public readonly onlyRight: string[]

  constructor(onlyLeft: string[], onlyRight: string[]) {
    super(
      `Table fields are not equal (only in left: [${onlyLeft.join(', ')}], only in right: [${onlyRight.join(', ')}])`,
      'FIELD_SET_MISMATCH',
      { onlyLeft, onlyRight }
    )
    this.name = 'FieldSetMismatchError'
    this.onlyLeft = onlyLeft
    this.onlyRight = onlyRight
  }
}

/**
 * Error thrown when a required field is absent from a table or row
 */
export class MissingFieldError extends ThresholdMatchError {
  public readonly field: string

  constructor(field: string, context?: Record<string, unknown>) {
    super(`Field '${field}' does not exist`, 'MISSING_FIELD', {
      field,
      ...context,
    })
    this.name = 'MissingFieldError'
    this.field = field
  }
}

/**
 * Error thrown when a bucket key was never produced by the index
 */
export class UnknownBucketError extends ThresholdMatchError {
  public readonly bucketKey: string

  constructor(bucketKey: string, indexName: string) {
    super(
      `Bucket ${bucketKey} was not produced by index '${indexName}'`,
      'UNKNOWN_BUCKET',
      { bucketKey, indexName }
    )
    this.name = 'UnknownBucketError'
    this.bucketKey = bucketKey
  }
}

/**
 * Error thrown when a row key is not present in a table
 */
export class UnknownRowError extends ThresholdMatchError {
  public readonly rowKey: RowKey

  constructor(rowKey: RowKey, table?: string) {
    super(
      `Row '${String(rowKey)}' does not exist${table ? ` in table '${table}'` : ''}`,
      'UNKNOWN_ROW',
      { rowKey, table }
    )
    this.name = 'UnknownRowError'
    this.rowKey = rowKey
  }
}

/**
 * Error thrown when a parameter value is invalid
 */
export class InvalidParameterError extends ThresholdMatchError {
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
export class ConfigurationError extends ThresholdMatchError {
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
export class BuilderSequenceError extends ThresholdMatchError {
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

// ==================== VALIDATION UTILITIES ====================

/**
 * Validates that a number is positive (> 0)
 */
export function requirePositive(value: number, parameterName: string): number {
  if (typeof value !== 'number' || isNaN(value)) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be a number'
    )
  }
  if (value <= 0) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be positive (> 0)'
    )
  }
  return value
}

/**
 * Validates that a number is a positive integer
 */
export function requirePositiveInteger(
  value: number,
  parameterName: string
): number {
  requirePositive(value, parameterName)
  if (!Number.isInteger(value)) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be an integer'
    )
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
 * Validates that one number does not exceed another
 */
export function requireAtMost(
  value: number,
  otherValue: number,
  parameterName: string,
  otherParameterName: string
): void {
  if (value > otherValue) {
    throw new InvalidParameterError(
      parameterName,
      value,
      `must not be greater than ${otherParameterName} (${otherValue})`
    )
  }
}

/**
 * Check if an error is a threshold-match error
 */
export function isThresholdMatchError(error: unknown): error is ThresholdMatchError {
  return error instanceof ThresholdMatchError
}
