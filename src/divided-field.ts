/**
 * Divided Field
 *
 * Divides the values of a wrapped field by a constant, e.g. centuryOfEra from
 * yearOfEra. Negative values divide toward negative infinity so that the
 * matching remainder field stays within [0, divisor-1].
 */

import type { DateTimeField } from './datetime-field'
import type { DurationField } from './duration-field'
import type { DateTimeFieldType } from './field-types'
import type { WrappedDateTimeField } from './delegation'
import type { RemainderDateTimeField } from './remainder-field'
import { defineDateTimeField } from './datetime-field'
import { decorate, requireSupported } from './delegation'
import { InvalidFieldArgumentError } from './errors'
import {
  floorDiv,
  floorMod,
  getWrappedValue,
  safeMultiply,
  truncDiv,
  verifyValueBounds,
} from './field-utils'
import { createScaledDurationField } from './scaled-duration-field'

export interface DividedDateTimeField extends WrappedDateTimeField {
  getDivisor(): number
}

export type DividedFieldOptions = {
  type: DateTimeFieldType
  divisor: number
  /** Defaults to the wrapped field's range duration. */
  rangeDurationField?: DurationField
}

export function checkDivisor(divisor: number): void {
  if (!Number.isInteger(divisor) || divisor < 2) {
    throw new InvalidFieldArgumentError('The divisor must be at least 2')
  }
}

function buildDivided(
  wrapped: DateTimeField,
  type: DateTimeFieldType,
  divisor: number,
  durationField: DurationField,
  rangeDurationField: DurationField | undefined
): DividedDateTimeField {
  const min = floorDiv(wrapped.getMinimumValue(), divisor)
  const max = floorDiv(wrapped.getMaximumValue(), divisor)

  return defineDateTimeField((self) => ({
    ...decorate(wrapped, type),
    getDivisor: () => divisor,
    getDurationField: () => durationField,
    getRangeDurationField: () => rangeDurationField ?? wrapped.getRangeDurationField(),
    getMinimumValue: () => min,
    getMaximumValue: () => max,

    get: (instant: number): number => floorDiv(wrapped.get(instant), divisor),

    set(instant: number, value: number): number {
      verifyValueBounds(self(), value, min, max)
      const remainder = floorMod(wrapped.get(instant), divisor)
      return wrapped.set(instant, value * divisor + remainder)
    },

    add: (instant: number, amount: number): number => wrapped.add(instant, safeMultiply(amount, divisor)),

    addWrapField(instant: number, amount: number): number {
      const field = self()
      return field.set(instant, getWrappedValue(field.get(instant), amount, min, max))
    },

    getDifference: (minuend: number, subtrahend: number): number =>
      truncDiv(wrapped.getDifference(minuend, subtrahend), divisor),
    getDifferenceAsLong: (minuend: number, subtrahend: number): number =>
      truncDiv(wrapped.getDifferenceAsLong(minuend, subtrahend), divisor),

    roundFloor: (instant: number): number => wrapped.roundFloor(wrapped.set(instant, self().get(instant) * divisor)),
  }))
}

export function createDividedDateTimeField(field: DateTimeField, options: DividedFieldOptions): DividedDateTimeField {
  requireSupported(field)
  const { type, divisor, rangeDurationField } = options
  checkDivisor(divisor)
  const durationField = createScaledDurationField(field.getDurationField(), {
    type: type.durationType,
    scalar: divisor,
  })
  return buildDivided(field, type, divisor, durationField, rangeDurationField)
}

export type DividedOfRemainderOptions = {
  type: DateTimeFieldType
  rangeDurationField?: DurationField
}

/**
 * The quotient companion of a remainder field: same wrapped field and
 * divisor, with the remainder's range duration as its unit.
 */
export function dividedOfRemainder(
  remainder: RemainderDateTimeField,
  options: DividedOfRemainderOptions
): DividedDateTimeField {
  return buildDivided(
    remainder.getWrappedField(),
    options.type,
    remainder.getDivisor(),
    remainder.getRangeDurationField(),
    options.rangeDurationField
  )
}
