/**
 * Leniency
 *
 * A lenient field accepts any value in set and rolls the excess into larger
 * fields by adding the difference in local time. A strict field rejects
 * values outside the bounds at the instant. Each wrapper unwraps the other,
 * and a field that already has the requested leniency is returned as is.
 */

import type { DateTimeField } from './datetime-field'
import type { DateTimeFieldType } from './field-types'
import { defineDateTimeField } from './datetime-field'
import { delegateTo } from './delegation'
import { safeSubtract, verifyValueBounds } from './field-utils'

/** Time-zone conversion between UTC and local millisecond instants. */
export interface ZoneConversion {
  convertUTCToLocal(instant: number): number
  convertLocalToUTC(localInstant: number, strict: boolean, originalInstant: number): number
}

/** Chronology capabilities a lenient field needs. */
export interface LenientBase {
  readonly zone: ZoneConversion
  /** The non-lenient field of the given kind in the UTC form of the chronology. */
  fieldInUTC(type: DateTimeFieldType): DateTimeField
}

// wrapper -> the field it wraps
const lenientWrappers = new WeakMap<DateTimeField, DateTimeField>()
const strictWrappers = new WeakMap<DateTimeField, DateTimeField>()

export function lenientDateTimeField(field: DateTimeField, base: LenientBase): DateTimeField {
  const target = strictWrappers.get(field) ?? field
  if (target.isLenient()) return target

  const lenient = defineDateTimeField((self) => ({
    ...delegateTo(target),
    isLenient: () => true,

    set(instant: number, value: number): number {
      const current = self()
      const localInstant = base.zone.convertUTCToLocal(instant)
      const difference = safeSubtract(value, current.get(instant))
      const adjusted = base.fieldInUTC(current.type).add(localInstant, difference)
      return base.zone.convertLocalToUTC(adjusted, false, instant)
    },
  }))
  lenientWrappers.set(lenient, target)
  return lenient
}

export function strictDateTimeField(field: DateTimeField): DateTimeField {
  const target = lenientWrappers.get(field) ?? field
  if (!target.isLenient()) return target

  const strict = defineDateTimeField((self) => ({
    ...delegateTo(target),
    isLenient: () => false,

    set(instant: number, value: number): number {
      const current = self()
      verifyValueBounds(current, value, current.getMinimumValueAt(instant), current.getMaximumValueAt(instant))
      return target.set(instant, value)
    },
  }))
  strictWrappers.set(strict, target)
  return strict
}
