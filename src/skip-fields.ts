/**
 * Skip Fields
 *
 * Skip removes one value from a wrapped field's numbering, e.g. turning a
 * proleptic year (..., -1, 0, 1, ...) into one with no year zero. SkipUndo
 * puts the value back.
 *
 * Partial values are held in the field's own numbering. Adds and wraps
 * renumber the value into the wrapped field, run there, and renumber the
 * result back, so they step over the skipped value.
 */

import type { DateTimeField } from './datetime-field'
import type { WrappedDateTimeField } from './delegation'
import type { ReadablePartial } from './partial'
import { defineDateTimeField } from './datetime-field'
import { delegateTo } from './delegation'
import { IllegalFieldValueError } from './errors'
import { verifyValueBounds } from './field-utils'
import { setAndClamp } from './internal/partial-carry'

export interface SkipDateTimeField extends WrappedDateTimeField {
  getSkip(): number
}

export type SkipFieldOptions = {
  /** Value removed from the numbering, 0 by default. */
  skip?: number
}

type Renumbering = {
  toWrapped(value: number): number
  fromWrapped(value: number): number
}

function minimumBounds(min: number): Pick<DateTimeField, 'getMinimumValue' | 'getMinimumValueAt' | 'getMinimumValueForPartial'> {
  return {
    getMinimumValue: () => min,
    getMinimumValueAt: () => min,
    getMinimumValueForPartial: () => min,
  }
}

function renumberedPartialOperations(
  field: DateTimeField,
  numbering: Renumbering
): Pick<DateTimeField, 'addPartial' | 'addWrapPartial' | 'addWrapFieldPartial'> {
  function throughWrapped(
    fieldIndex: number,
    values: readonly number[],
    operation: (wrappedValues: readonly number[]) => number[]
  ): number[] {
    const wrappedValues = [...values]
    if (fieldIndex >= 0 && fieldIndex < values.length) {
      wrappedValues[fieldIndex] = numbering.toWrapped(values[fieldIndex])
    }
    const result = operation(wrappedValues)
    result[fieldIndex] = numbering.fromWrapped(result[fieldIndex])
    return result
  }

  return {
    addPartial: (partial: ReadablePartial, fieldIndex: number, values: readonly number[], amount: number): number[] =>
      throughWrapped(fieldIndex, values, (wrappedValues) => field.addPartial(partial, fieldIndex, wrappedValues, amount)),
    addWrapPartial: (partial: ReadablePartial, fieldIndex: number, values: readonly number[], amount: number): number[] =>
      throughWrapped(fieldIndex, values, (wrappedValues) =>
        field.addWrapPartial(partial, fieldIndex, wrappedValues, amount)
      ),
    addWrapFieldPartial: (partial: ReadablePartial, fieldIndex: number, values: readonly number[], amount: number): number[] =>
      throughWrapped(fieldIndex, values, (wrappedValues) =>
        field.addWrapFieldPartial(partial, fieldIndex, wrappedValues, amount)
      ),
  }
}

// ============================================================================
// Skip
// ============================================================================

export function createSkipDateTimeField(field: DateTimeField, options: SkipFieldOptions = {}): SkipDateTimeField {
  const { skip = 0 } = options
  const wrappedMin = field.getMinimumValue()
  let min = wrappedMin
  if (wrappedMin < skip) {
    min = wrappedMin - 1
  } else if (wrappedMin === skip) {
    min = skip + 1
  }

  const numbering: Renumbering = {
    toWrapped: (value) => (value < skip ? value + 1 : value),
    fromWrapped: (value) => (value <= skip ? value - 1 : value),
  }

  return defineDateTimeField((self) => ({
    ...delegateTo(field),
    ...minimumBounds(min),
    ...renumberedPartialOperations(field, numbering),
    getSkip: () => skip,

    get: (instant: number): number => numbering.fromWrapped(field.get(instant)),

    set(instant: number, value: number): number {
      const current = self()
      verifyValueBounds(current, value, min, current.getMaximumValue())
      if (value === skip) {
        throw new IllegalFieldValueError(current.name, value, null, null)
      }
      return field.set(instant, numbering.toWrapped(value))
    },

    setPartial(partial: ReadablePartial, fieldIndex: number, values: readonly number[], newValue: number): number[] {
      const current = self()
      if (newValue === skip) {
        throw new IllegalFieldValueError(current.name, newValue, null, null)
      }
      return setAndClamp(current, partial, fieldIndex, values, newValue)
    },
  }))
}

// ============================================================================
// Skip Undo
// ============================================================================

export function createSkipUndoDateTimeField(field: DateTimeField, options: SkipFieldOptions = {}): SkipDateTimeField {
  const { skip = 0 } = options
  const wrappedMin = field.getMinimumValue()
  let min = wrappedMin
  if (wrappedMin < skip) {
    min = wrappedMin + 1
  } else if (wrappedMin === skip + 1) {
    min = skip
  }

  const numbering: Renumbering = {
    toWrapped: (value) => (value <= skip ? value - 1 : value),
    fromWrapped: (value) => (value < skip ? value + 1 : value),
  }

  return defineDateTimeField((self) => ({
    ...delegateTo(field),
    ...minimumBounds(min),
    ...renumberedPartialOperations(field, numbering),
    getSkip: () => skip,

    get: (instant: number): number => numbering.fromWrapped(field.get(instant)),

    set(instant: number, value: number): number {
      const current = self()
      verifyValueBounds(current, value, min, current.getMaximumValue())
      return field.set(instant, numbering.toWrapped(value))
    },

    setPartial: (partial: ReadablePartial, fieldIndex: number, values: readonly number[], newValue: number): number[] =>
      setAndClamp(self(), partial, fieldIndex, values, newValue),
  }))
}
