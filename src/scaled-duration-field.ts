/**
 * Scaled Duration Field
 *
 * Multiplies the unit of a wrapped duration field by a constant scalar, e.g.
 * centuries from years.
 */

import type { DurationField } from './duration-field'
import type { DurationFieldType } from './field-types'
import { defineDurationField } from './duration-field'
import { InvalidFieldArgumentError } from './errors'
import { safeMultiply, truncDiv } from './field-utils'

export type ScaledDurationFieldOptions = {
  type: DurationFieldType
  scalar: number
}

export interface ScaledDurationField extends DurationField {
  getWrappedField(): DurationField
  getScalar(): number
}

export function createScaledDurationField(
  field: DurationField,
  options: ScaledDurationFieldOptions
): ScaledDurationField {
  const { type, scalar } = options
  if (!field.isSupported()) {
    throw new InvalidFieldArgumentError('The field must be supported')
  }
  if (!Number.isInteger(scalar) || scalar === 0 || scalar === 1) {
    throw new InvalidFieldArgumentError('The scalar must not be 0 or 1')
  }

  const scaled = defineDurationField(() => ({
    type,
    isPrecise: () => field.isPrecise(),
    getUnitMillis: () => safeMultiply(field.getUnitMillis(), scalar),
    getValue: (duration: number, instant?: number): number => truncDiv(field.getValue(duration, instant), scalar),
    getValueAsLong: (duration: number, instant?: number): number =>
      truncDiv(field.getValueAsLong(duration, instant), scalar),
    getMillis: (value: number, instant?: number): number => field.getMillis(safeMultiply(value, scalar), instant),
    add: (instant: number, value: number): number => field.add(instant, safeMultiply(value, scalar)),
    getDifference: (minuendInstant: number, subtrahendInstant: number): number =>
      truncDiv(field.getDifference(minuendInstant, subtrahendInstant), scalar),
    getDifferenceAsLong: (minuendInstant: number, subtrahendInstant: number): number =>
      truncDiv(field.getDifferenceAsLong(minuendInstant, subtrahendInstant), scalar),
  }))

  return Object.freeze({
    ...scaled,
    getWrappedField: () => field,
    getScalar: () => scalar,
  })
}
