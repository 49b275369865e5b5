/**
 * Unsupported DateTime Field
 *
 * Sentinel for a field kind a chronology does not provide. Arithmetic still
 * works through its duration field; everything else throws
 * UnsupportedFieldError. Cached per kind; a request with a different
 * duration field replaces the cached entry.
 */

import type { DateTimeField } from './datetime-field'
import type { DurationField } from './duration-field'
import type { DateTimeFieldType } from './field-types'
import { UnsupportedFieldError } from './errors'

const cache = new Map<string, DateTimeField>()

function createUnsupportedDateTimeField(type: DateTimeFieldType, durationField: DurationField): DateTimeField {
  const unsupported = (): never => {
    throw new UnsupportedFieldError(type.name)
  }
  return Object.freeze({
    type,
    name: type.name,
    isSupported: () => false,
    isLenient: () => false,

    get: unsupported,
    set: unsupported,
    add: (instant: number, amount: number): number => durationField.add(instant, amount),
    addWrapField: unsupported,
    getDifference: (minuend: number, subtrahend: number): number => durationField.getDifference(minuend, subtrahend),
    getDifferenceAsLong: (minuend: number, subtrahend: number): number =>
      durationField.getDifferenceAsLong(minuend, subtrahend),

    setPartial: unsupported,
    addPartial: unsupported,
    addWrapPartial: unsupported,
    addWrapFieldPartial: unsupported,

    getDurationField: () => durationField,
    getRangeDurationField: () => null,

    isLeap: unsupported,
    getLeapAmount: unsupported,
    getLeapDurationField: () => null,

    getMinimumValue: unsupported,
    getMinimumValueAt: unsupported,
    getMinimumValueForPartial: unsupported,
    getMaximumValue: unsupported,
    getMaximumValueAt: unsupported,
    getMaximumValueForPartial: unsupported,

    roundFloor: unsupported,
    roundCeiling: unsupported,
    roundHalfFloor: unsupported,
    roundHalfCeiling: unsupported,
    roundHalfEven: unsupported,
    remainder: unsupported,

    toString: () => `UnsupportedDateTimeField[${type.name}]`,
  })
}

export function getUnsupportedDateTimeField(type: DateTimeFieldType, durationField: DurationField): DateTimeField {
  let field = cache.get(type.name)
  if (field === undefined || field.getDurationField() !== durationField) {
    field = createUnsupportedDateTimeField(type, durationField)
    cache.set(type.name, field)
  }
  return field
}
