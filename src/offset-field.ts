/**
 * Offset Field
 *
 * Shifts the values of a wrapped field by a constant. Bounds are the wrapped
 * bounds shifted by the offset, optionally narrowed by caller limits.
 */

import type { DateTimeField } from './datetime-field'
import type { WrappedDateTimeField } from './delegation'
import type { DateTimeFieldType } from './field-types'
import { defineDateTimeField } from './datetime-field'
import { decorate, delegateLeap, delegateRounding, requireSupported } from './delegation'
import { InvalidFieldArgumentError } from './errors'
import { INT_MAX, INT_MIN, getWrappedValue, verifyValueBounds } from './field-utils'

export interface OffsetDateTimeField extends WrappedDateTimeField {
  getOffset(): number
}

export type OffsetFieldOptions = {
  offset: number
  type?: DateTimeFieldType
  /** Lower limit; the shifted wrapped minimum wins when it is larger. */
  minValue?: number
  /** Upper limit; the shifted wrapped maximum wins when it is smaller. */
  maxValue?: number
}

export function createOffsetDateTimeField(field: DateTimeField, options: OffsetFieldOptions): OffsetDateTimeField {
  requireSupported(field)
  const { offset, type = field.type, minValue = INT_MIN, maxValue = INT_MAX } = options
  if (!Number.isInteger(offset) || offset === 0) {
    throw new InvalidFieldArgumentError('The offset cannot be zero')
  }
  const min = Math.max(minValue, field.getMinimumValue() + offset)
  const max = Math.min(maxValue, field.getMaximumValue() + offset)

  return defineDateTimeField((self) => ({
    ...decorate(field, type),
    ...delegateRounding(field),
    ...delegateLeap(field),
    getOffset: () => offset,
    getMinimumValue: () => min,
    getMaximumValue: () => max,

    get: (instant: number): number => field.get(instant) + offset,

    set(instant: number, value: number): number {
      verifyValueBounds(self(), value, min, max)
      return field.set(instant, value - offset)
    },

    add(instant: number, amount: number): number {
      const result = field.getDurationField().add(instant, amount)
      verifyValueBounds(self(), self().get(result), min, max)
      return result
    },

    addWrapField(instant: number, amount: number): number {
      const current = self()
      return current.set(instant, getWrappedValue(current.get(instant), amount, min, max))
    },
  }))
}
