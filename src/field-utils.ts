/**
 * Safe Arithmetic
 *
 * Overflow-checked integer arithmetic for the field algebra. "Long" values are
 * numbers within the safe-integer range, "int" values are signed 32-bit.
 * Nothing here wraps silently: leaving the range throws ArithmeticOverflowError.
 */

import { ArithmeticOverflowError, IllegalFieldValueError, InvalidFieldArgumentError } from './errors'

// ============================================================================
// Limits
// ============================================================================

export const INT_MIN = -2147483648
export const INT_MAX = 2147483647
export const LONG_MIN = Number.MIN_SAFE_INTEGER
export const LONG_MAX = Number.MAX_SAFE_INTEGER

function isInt(value: number): boolean {
  return Number.isInteger(value) && value >= INT_MIN && value <= INT_MAX
}

// ============================================================================
// Integer Division
// ============================================================================

/** Quotient rounded toward zero. */
export function truncDiv(dividend: number, divisor: number): number {
  const quotient = (dividend - (dividend % divisor)) / divisor
  return quotient === 0 ? 0 : quotient
}

/** Quotient rounded toward negative infinity. */
export function floorDiv(dividend: number, divisor: number): number {
  const quotient = truncDiv(dividend, divisor)
  const rem = dividend % divisor
  return rem !== 0 && (rem < 0) !== (divisor < 0) ? quotient - 1 : quotient
}

/** Remainder with the sign of the divisor. */
export function floorMod(dividend: number, divisor: number): number {
  return dividend - floorDiv(dividend, divisor) * divisor
}

// ============================================================================
// Checked Operations
// ============================================================================

export function safeNegate(value: number): number {
  if (value === INT_MIN) {
    throw new ArithmeticOverflowError('Integer.MIN_VALUE cannot be negated')
  }
  return value === 0 ? 0 : -value
}

export function safeAddInt(val1: number, val2: number): number {
  const sum = val1 + val2
  if (!isInt(sum)) {
    throw new ArithmeticOverflowError(`The calculation caused an overflow: ${val1} + ${val2}`)
  }
  return sum
}

export function safeAdd(val1: number, val2: number): number {
  const sum = val1 + val2
  if (!Number.isSafeInteger(sum)) {
    throw new ArithmeticOverflowError(`The calculation caused an overflow: ${val1} + ${val2}`)
  }
  return sum
}

export function safeSubtract(val1: number, val2: number): number {
  const diff = val1 - val2
  if (!Number.isSafeInteger(diff)) {
    throw new ArithmeticOverflowError(`The calculation caused an overflow: ${val1} - ${val2}`)
  }
  return diff
}

export function safeMultiplyInt(val1: number, val2: number): number {
  if (val1 === 0 || val2 === 0) return 0
  const total = val1 * val2
  if (!isInt(total)) {
    throw new ArithmeticOverflowError(`Multiplication overflows an int: ${val1} * ${val2}`)
  }
  return total
}

export function safeMultiply(val1: number, val2: number): number {
  if (val1 === 0 || val2 === 0) return 0
  const total = val1 * val2
  // an exact product within the safe range is always representable
  if (!Number.isSafeInteger(total)) {
    throw new ArithmeticOverflowError(`Multiplication overflows a long: ${val1} * ${val2}`)
  }
  return total
}

export function safeDivide(dividend: number, divisor: number): number {
  if (divisor === 0) {
    throw new ArithmeticOverflowError(`Division by zero: ${dividend} / ${divisor}`)
  }
  return truncDiv(dividend, divisor)
}

export function safeToInt(value: number): number {
  if (isInt(value)) return value
  throw new ArithmeticOverflowError(`Value cannot fit in an int: ${value}`)
}

export function safeMultiplyToInt(val1: number, val2: number): number {
  return safeToInt(safeMultiply(val1, val2))
}

// ============================================================================
// Bounds
// ============================================================================

type Named = string | { readonly name: string }

/**
 * Throws IllegalFieldValueError unless `lowerBound <= value <= upperBound`.
 */
export function verifyValueBounds(field: Named, value: number, lowerBound: number, upperBound: number): void {
  if (value < lowerBound || value > upperBound) {
    const fieldName = typeof field === 'string' ? field : field.name
    throw new IllegalFieldValueError(fieldName, value, lowerBound, upperBound)
  }
}

// ============================================================================
// Wrap-Around
// ============================================================================

/**
 * Fits a value into `[minValue, maxValue]` modulo the range size. The
 * four-argument form wraps `currentValue + wrapValue`.
 */
export function getWrappedValue(value: number, minValue: number, maxValue: number): number
export function getWrappedValue(currentValue: number, wrapValue: number, minValue: number, maxValue: number): number
export function getWrappedValue(a: number, b: number, c: number, d?: number): number {
  if (d === undefined) return wrapInto(a, b, c)
  return wrapInto(a + b, c, d)
}

function wrapInto(value: number, minValue: number, maxValue: number): number {
  if (minValue >= maxValue) {
    throw new InvalidFieldArgumentError('MIN > MAX')
  }
  const wrapRange = maxValue - minValue + 1
  return floorMod(value - minValue, wrapRange) + minValue
}
