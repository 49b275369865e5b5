/**
 * Unsupported Duration Field
 *
 * Sentinel for a duration kind a chronology does not provide. Instances are
 * cached process-wide per kind: the cache is populated on first request and
 * never evicted.
 */

import type { DurationField } from './duration-field'
import type { DurationFieldType } from './field-types'
import { UnsupportedFieldError } from './errors'

const cache = new Map<DurationFieldType, DurationField>()

function createUnsupportedDurationField(type: DurationFieldType): DurationField {
  const unsupported = (): never => {
    throw new UnsupportedFieldError(type)
  }
  return Object.freeze({
    type,
    name: type,
    isSupported: () => false,
    isPrecise: () => true,
    getUnitMillis: () => 0,
    getValue: unsupported,
    getValueAsLong: unsupported,
    getMillis: unsupported,
    add: unsupported,
    getDifference: unsupported,
    getDifferenceAsLong: unsupported,
    compareTo: () => 0,
    toString: () => `UnsupportedDurationField[${type}]`,
  })
}

export function getUnsupportedDurationField(type: DurationFieldType): DurationField {
  let field = cache.get(type)
  if (field === undefined) {
    field = createUnsupportedDurationField(type)
    cache.set(type, field)
  }
  return field
}
