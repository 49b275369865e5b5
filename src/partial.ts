/**
 * Partial Descriptor
 *
 * Ordered set of fields describing the shape of a partial values array, e.g.
 * [year, monthOfYear, dayOfMonth]. Fields run from the largest unit to the
 * smallest; values themselves are passed alongside on every call.
 */

import type { DateTimeField } from './datetime-field'
import type { DurationField } from './duration-field'
import type { DateTimeFieldType } from './field-types'
import { InvalidFieldArgumentError } from './errors'
import { sameFieldType } from './field-types'

export interface ReadablePartial {
  size(): number
  getField(index: number): DateTimeField
  getFieldType(index: number): DateTimeFieldType
  /** Index of the field of the given kind, or -1. */
  indexOf(type: DateTimeFieldType): number
}

/** Null range durations (unbounded fields) sort above every other range. */
function compareRange(a: DurationField | null, b: DurationField | null): number {
  if (a === null) return b === null ? 0 : 1
  if (b === null) return -1
  return a.compareTo(b)
}

function checkOrder(previous: DateTimeField, current: DateTimeField): void {
  const unitOrder = previous.getDurationField().compareTo(current.getDurationField())
  if (unitOrder < 0) {
    throw new InvalidFieldArgumentError(
      `Fields must be in order largest-smallest: ${previous.name} < ${current.name}`
    )
  }
  if (unitOrder === 0 && compareRange(previous.getRangeDurationField(), current.getRangeDurationField()) <= 0) {
    throw new InvalidFieldArgumentError(
      `Fields must be in order largest-smallest: ${previous.name} and ${current.name} overlap`
    )
  }
}

export function createPartial(fields: readonly DateTimeField[]): ReadablePartial {
  const list = [...fields]

  list.forEach((field, i) => {
    for (let j = 0; j < i; j++) {
      if (sameFieldType(list[j].type, field.type)) {
        throw new InvalidFieldArgumentError(`Duplicate field kind in partial: ${field.name}`)
      }
    }
    if (i > 0) checkOrder(list[i - 1], field)
  })

  function getField(index: number): DateTimeField {
    const field = list[index]
    if (field === undefined) {
      throw new InvalidFieldArgumentError(`Invalid field index: ${index}`)
    }
    return field
  }

  return Object.freeze({
    size: () => list.length,
    getField,
    getFieldType: (index: number): DateTimeFieldType => getField(index).type,
    indexOf: (type: DateTimeFieldType): number => list.findIndex((field) => sameFieldType(field.type, type)),
  })
}
