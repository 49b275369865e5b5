/**
 * Checked Operations
 *
 * Result-returning counterparts of the throwing field operations, for callers
 * that treat an out-of-range value as an expected outcome.
 */

import type { DateTimeField } from './datetime-field'
import type { ReadablePartial } from './partial'
import type { Result } from './result'
import { FieldError } from './errors'
import { verifyValueBounds } from './field-utils'
import { Err, Ok } from './result'

/**
 * Runs a field operation, returning field errors as values. Any other error
 * propagates.
 */
export function attemptField<T>(operation: () => T): Result<T, FieldError> {
  try {
    return Ok(operation())
  } catch (error) {
    if (error instanceof FieldError) return Err(error)
    throw error
  }
}

/** Checks `value` against the field's bounds at `instant`. */
export function checkFieldValue(field: DateTimeField, instant: number, value: number): Result<number, FieldError> {
  return attemptField(() => {
    verifyValueBounds(field, value, field.getMinimumValueAt(instant), field.getMaximumValueAt(instant))
    return value
  })
}

/** Checks `value` against the field's bounds given the other values of a partial. */
export function checkPartialValue(
  field: DateTimeField,
  partial: ReadablePartial,
  values: readonly number[],
  value: number
): Result<number, FieldError> {
  return attemptField(() => {
    verifyValueBounds(
      field,
      value,
      field.getMinimumValueForPartial(partial, values),
      field.getMaximumValueForPartial(partial, values)
    )
    return value
  })
}
