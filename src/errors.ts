/**
 * Consolidated error system for the field algebra.
 *
 * All error classes extend FieldError, which carries a typed error code.
 * Field operations throw these as contract violations; see validation.ts for
 * the Result-returning forms.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const FieldErrorCode = {
  ILLEGAL_FIELD_VALUE: 'ILLEGAL_FIELD_VALUE',
  ARITHMETIC_OVERFLOW: 'ARITHMETIC_OVERFLOW',
  UNSUPPORTED_FIELD: 'UNSUPPORTED_FIELD',
  INCOMPATIBLE_FIELDS: 'INCOMPATIBLE_FIELDS',
  INVALID_ARGUMENT: 'INVALID_ARGUMENT',
} as const

export type FieldErrorCode = (typeof FieldErrorCode)[keyof typeof FieldErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class FieldError extends Error {
  readonly code: FieldErrorCode

  constructor(code: FieldErrorCode, message: string) {
    super(message)
    this.name = 'FieldError'
    this.code = code
  }
}

// ============================================================================
// Value Errors
// ============================================================================

function describeBounds(lowerBound: number | null, upperBound: number | null): string {
  if (lowerBound === null) {
    return upperBound === null ? 'is not supported' : `must not be larger than ${upperBound}`
  }
  if (upperBound === null) return `must not be smaller than ${lowerBound}`
  return `must be in the range [${lowerBound},${upperBound}]`
}

/**
 * A value lies outside the bounds a field accepts. Null bounds mean the value
 * is rejected outright, e.g. the skipped value of a skip field.
 */
export class IllegalFieldValueError extends FieldError {
  readonly fieldName: string
  readonly value: number
  readonly lowerBound: number | null
  readonly upperBound: number | null

  constructor(fieldName: string, value: number, lowerBound: number | null, upperBound: number | null) {
    super(
      FieldErrorCode.ILLEGAL_FIELD_VALUE,
      `Value ${value} for ${fieldName} ${describeBounds(lowerBound, upperBound)}`
    )
    this.name = 'IllegalFieldValueError'
    this.fieldName = fieldName
    this.value = value
    this.lowerBound = lowerBound
    this.upperBound = upperBound
  }
}

// ============================================================================
// Arithmetic Errors
// ============================================================================

export class ArithmeticOverflowError extends FieldError {
  constructor(message: string) {
    super(FieldErrorCode.ARITHMETIC_OVERFLOW, message)
    this.name = 'ArithmeticOverflowError'
  }
}

// ============================================================================
// Field Capability Errors
// ============================================================================

export class UnsupportedFieldError extends FieldError {
  readonly fieldName: string

  constructor(fieldName: string) {
    super(FieldErrorCode.UNSUPPORTED_FIELD, `${fieldName} field is unsupported`)
    this.name = 'UnsupportedFieldError'
    this.fieldName = fieldName
  }
}

export class IncompatibleFieldsError extends FieldError {
  constructor(message: string) {
    super(FieldErrorCode.INCOMPATIBLE_FIELDS, message)
    this.name = 'IncompatibleFieldsError'
  }
}

// ============================================================================
// Construction Errors
// ============================================================================

export class InvalidFieldArgumentError extends FieldError {
  constructor(message: string) {
    super(FieldErrorCode.INVALID_ARGUMENT, message)
    this.name = 'InvalidFieldArgumentError'
  }
}
