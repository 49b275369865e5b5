/**
 * Partial Carry
 *
 * Value-array algorithms shared by every field: set with clamping of the
 * smaller fields, add with carry into the next larger field, and wrap within
 * a single field. Inputs are copied; callers always get a fresh array.
 */

import type { DateTimeField } from '../datetime-field'
import type { ReadablePartial } from '../partial'
import { IncompatibleFieldsError, InvalidFieldArgumentError } from '../errors'
import { getWrappedValue, verifyValueBounds } from '../field-utils'

export type CarryPolicy = 'bounded' | 'wrapped'

function checkIndex(partial: ReadablePartial, fieldIndex: number, values: readonly number[]): void {
  if (!Number.isInteger(fieldIndex) || fieldIndex < 0 || fieldIndex >= partial.size()) {
    throw new InvalidFieldArgumentError(`Field index ${fieldIndex} is out of range for a partial of size ${partial.size()}`)
  }
  if (values.length !== partial.size()) {
    throw new InvalidFieldArgumentError(
      `Values array has length ${values.length} but the partial has ${partial.size()} fields`
    )
  }
}

// ============================================================================
// Set
// ============================================================================

export function setAndClamp(
  field: DateTimeField,
  partial: ReadablePartial,
  fieldIndex: number,
  values: readonly number[],
  newValue: number
): number[] {
  checkIndex(partial, fieldIndex, values)
  verifyValueBounds(
    field,
    newValue,
    field.getMinimumValueForPartial(partial, values),
    field.getMaximumValueForPartial(partial, values)
  )
  const result = [...values]
  result[fieldIndex] = newValue

  // smaller fields may now be out of range, e.g. day 31 after moving to February
  for (let i = fieldIndex + 1; i < partial.size(); i++) {
    const smaller = partial.getField(i)
    const max = smaller.getMaximumValueForPartial(partial, result)
    if (result[i] > max) result[i] = max
    const min = smaller.getMinimumValueForPartial(partial, result)
    if (result[i] < min) result[i] = min
  }
  return result
}

// ============================================================================
// Add With Carry
// ============================================================================

function nextLargerField(field: DateTimeField, partial: ReadablePartial, fieldIndex: number): DateTimeField {
  const next = partial.getField(fieldIndex - 1)
  const range = field.getRangeDurationField()
  if (range === null || range.type !== next.getDurationField().type) {
    throw new IncompatibleFieldsError('Fields invalid for add')
  }
  return next
}

function carry(
  next: DateTimeField,
  partial: ReadablePartial,
  fieldIndex: number,
  values: readonly number[],
  amount: number,
  policy: CarryPolicy
): number[] {
  return policy === 'bounded'
    ? next.addPartial(partial, fieldIndex - 1, values, amount)
    : next.addWrapPartial(partial, fieldIndex - 1, values, amount)
}

export function addWithCarry(
  field: DateTimeField,
  partial: ReadablePartial,
  fieldIndex: number,
  values: readonly number[],
  amount: number,
  policy: CarryPolicy
): number[] {
  checkIndex(partial, fieldIndex, values)
  let result = [...values]
  if (amount === 0) return result

  let remaining = amount
  let next: DateTimeField | null = null

  while (remaining > 0) {
    const max = field.getMaximumValueForPartial(partial, result)
    const proposed = result[fieldIndex] + remaining
    if (proposed <= max) {
      result[fieldIndex] = proposed
      break
    }
    if (next === null) {
      if (fieldIndex === 0) {
        if (policy === 'bounded') {
          throw new IncompatibleFieldsError('Maximum value exceeded for add')
        }
        remaining -= max + 1 - result[fieldIndex]
        result[fieldIndex] = field.getMinimumValueForPartial(partial, result)
        continue
      }
      next = nextLargerField(field, partial, fieldIndex)
    }
    remaining -= max + 1 - result[fieldIndex]
    result = carry(next, partial, fieldIndex, result, 1, policy)
    result[fieldIndex] = field.getMinimumValueForPartial(partial, result)
  }

  while (remaining < 0) {
    const min = field.getMinimumValueForPartial(partial, result)
    const proposed = result[fieldIndex] + remaining
    if (proposed >= min) {
      result[fieldIndex] = proposed
      break
    }
    if (next === null) {
      if (fieldIndex === 0) {
        if (policy === 'bounded') {
          throw new IncompatibleFieldsError('Maximum value exceeded for add')
        }
        remaining -= min - 1 - result[fieldIndex]
        result[fieldIndex] = field.getMaximumValueForPartial(partial, result)
        continue
      }
      next = nextLargerField(field, partial, fieldIndex)
    }
    remaining -= min - 1 - result[fieldIndex]
    result = carry(next, partial, fieldIndex, result, -1, policy)
    result[fieldIndex] = field.getMaximumValueForPartial(partial, result)
  }

  return field.setPartial(partial, fieldIndex, result, result[fieldIndex])
}

// ============================================================================
// Wrap Within Field
// ============================================================================

export function wrapWithinField(
  field: DateTimeField,
  partial: ReadablePartial,
  fieldIndex: number,
  values: readonly number[],
  amount: number
): number[] {
  checkIndex(partial, fieldIndex, values)
  const wrapped = getWrappedValue(
    values[fieldIndex],
    amount,
    field.getMinimumValueForPartial(partial, values),
    field.getMaximumValueForPartial(partial, values)
  )
  return field.setPartial(partial, fieldIndex, values, wrapped)
}
