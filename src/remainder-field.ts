/**
 * Remainder Field
 *
 * The remainder of a wrapped field's value modulo a constant, e.g.
 * yearOfCentury from yearOfEra. Always within [0, divisor-1], including for
 * negative wrapped values.
 */

import type { DateTimeField } from './datetime-field'
import type { DividedDateTimeField } from './divided-field'
import type { DurationField } from './duration-field'
import type { DateTimeFieldType } from './field-types'
import type { WrappedDateTimeField } from './delegation'
import { defineDateTimeField } from './datetime-field'
import { decorate, delegateRounding, requireSupported } from './delegation'
import { checkDivisor } from './divided-field'
import { InvalidFieldArgumentError } from './errors'
import { floorDiv, floorMod, getWrappedValue, verifyValueBounds } from './field-utils'
import { createScaledDurationField } from './scaled-duration-field'

export interface RemainderDateTimeField extends WrappedDateTimeField {
  getDivisor(): number
  getRangeDurationField(): DurationField
}

export type RemainderFieldOptions = {
  type: DateTimeFieldType
  divisor: number
  /** Defaults to the wrapped unit scaled by the divisor. */
  rangeDurationField?: DurationField
}

function buildRemainder(
  wrapped: DateTimeField,
  type: DateTimeFieldType,
  divisor: number,
  durationField: DurationField,
  rangeDurationField: DurationField
): RemainderDateTimeField {
  const max = divisor - 1

  return defineDateTimeField((self) => ({
    ...decorate(wrapped, type),
    ...delegateRounding(wrapped),
    getDivisor: () => divisor,
    getDurationField: () => durationField,
    getRangeDurationField: () => rangeDurationField,
    getMinimumValue: () => 0,
    getMaximumValue: () => max,

    get: (instant: number): number => floorMod(wrapped.get(instant), divisor),

    set(instant: number, value: number): number {
      verifyValueBounds(self(), value, 0, max)
      const divided = floorDiv(wrapped.get(instant), divisor)
      return wrapped.set(instant, divided * divisor + value)
    },

    addWrapField(instant: number, amount: number): number {
      const field = self()
      return field.set(instant, getWrappedValue(field.get(instant), amount, 0, max))
    },
  }))
}

export function createRemainderDateTimeField(
  field: DateTimeField,
  options: RemainderFieldOptions
): RemainderDateTimeField {
  requireSupported(field)
  const { type, divisor } = options
  checkDivisor(divisor)

  let rangeDurationField = options.rangeDurationField
  if (rangeDurationField === undefined) {
    if (type.rangeDurationType === null) {
      throw new InvalidFieldArgumentError(`Field kind ${type.name} has no range duration kind`)
    }
    rangeDurationField = createScaledDurationField(field.getDurationField(), {
      type: type.rangeDurationType,
      scalar: divisor,
    })
  }
  return buildRemainder(field, type, divisor, field.getDurationField(), rangeDurationField)
}

export type RemainderOfDividedOptions = {
  /** Defaults to the divided field's kind. */
  type?: DateTimeFieldType
  /** Defaults to the wrapped field's unit. */
  durationField?: DurationField
}

/**
 * The remainder companion of a divided field: same wrapped field and
 * divisor, ranging over the divided field's unit.
 */
export function remainderOfDivided(
  divided: DividedDateTimeField,
  options: RemainderOfDividedOptions = {}
): RemainderDateTimeField {
  const wrapped = divided.getWrappedField()
  return buildRemainder(
    wrapped,
    options.type ?? divided.type,
    divided.getDivisor(),
    options.durationField ?? wrapped.getDurationField(),
    divided.getDurationField()
  )
}
