/**
 * Zero-Is-Max Field
 *
 * Reports a wrapped zero as the maximum, e.g. clockhourOfDay (1..24) from
 * hourOfDay (0..23).
 */

import type { DateTimeField } from './datetime-field'
import type { WrappedDateTimeField } from './delegation'
import type { DateTimeFieldType } from './field-types'
import type { ReadablePartial } from './partial'
import { defineDateTimeField } from './datetime-field'
import { decorate, delegateLeap, delegateRounding, requireSupported } from './delegation'
import { InvalidFieldArgumentError } from './errors'
import { verifyValueBounds } from './field-utils'

export type ZeroIsMaxFieldOptions = {
  type: DateTimeFieldType
}

export function createZeroIsMaxDateTimeField(
  field: DateTimeField,
  options: ZeroIsMaxFieldOptions
): WrappedDateTimeField {
  requireSupported(field)
  if (field.getMinimumValue() !== 0) {
    throw new InvalidFieldArgumentError("Wrapped field's minimum value must be zero")
  }

  return defineDateTimeField((self) => ({
    ...decorate(field, options.type),
    ...delegateRounding(field),
    ...delegateLeap(field),

    get(instant: number): number {
      const value = field.get(instant)
      return value === 0 ? self().getMaximumValue() : value
    },

    set(instant: number, value: number): number {
      const max = self().getMaximumValue()
      verifyValueBounds(self(), value, 1, max)
      return field.set(instant, value === max ? 0 : value)
    },

    add: (instant: number, amount: number): number => field.add(instant, amount),
    addWrapField: (instant: number, amount: number): number => field.addWrapField(instant, amount),
    getDifference: (minuend: number, subtrahend: number): number => field.getDifference(minuend, subtrahend),
    getDifferenceAsLong: (minuend: number, subtrahend: number): number =>
      field.getDifferenceAsLong(minuend, subtrahend),

    getMinimumValue: () => 1,
    getMinimumValueAt: () => 1,
    getMinimumValueForPartial: () => 1,
    getMaximumValue: () => field.getMaximumValue() + 1,
    getMaximumValueAt: (instant: number): number => field.getMaximumValueAt(instant) + 1,
    getMaximumValueForPartial: (partial: ReadablePartial, values: readonly number[]): number =>
      field.getMaximumValueForPartial(partial, values) + 1,
  }))
}
