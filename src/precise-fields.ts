/**
 * Precise Fields
 *
 * Date-time fields whose unit has a fixed length, such as minute of hour or
 * millis of day. Values step by exactly `unitMillis` milliseconds, so set
 * and the rounding operations reduce to integer arithmetic aligned on the
 * epoch.
 */

import type { DateTimeField, DefaultFieldOperations } from './datetime-field'
import type { DurationField } from './duration-field'
import type { DateTimeFieldType } from './field-types'
import { defineDateTimeField } from './datetime-field'
import { InvalidFieldArgumentError } from './errors'
import { floorDiv, floorMod, getWrappedValue, safeAdd, safeMultiply, truncDiv, verifyValueBounds } from './field-utils'

// ============================================================================
// Precise-Unit Base
// ============================================================================

export interface PreciseDurationDateTimeField extends DateTimeField {
  getUnitMillis(): number
  /** Upper bound used by set; a field may accept more than it reports. */
  getMaximumValueForSet(instant: number, value: number): number
}

export type PreciseDurationDateTimeFieldDefinition = Partial<DefaultFieldOperations> &
  Pick<DateTimeField, 'type' | 'get' | 'getRangeDurationField' | 'getMaximumValue'> &
  Partial<Pick<DateTimeField, 'set' | 'getMinimumValue' | 'roundFloor'>> & {
    unitField: DurationField
    getMaximumValueForSet?(instant: number, value: number): number
  }

export function definePreciseDurationDateTimeField<S extends PreciseDurationDateTimeFieldDefinition>(
  build: (self: () => PreciseDurationDateTimeField) => S
): PreciseDurationDateTimeField & S {
  let built: (PreciseDurationDateTimeField & S) | null = null
  const self = (): PreciseDurationDateTimeField => {
    if (built === null) throw new InvalidFieldArgumentError('Field used before construction completed')
    return built
  }

  const field = defineDateTimeField(() => {
    const definition = build(self)
    const { unitField } = definition
    if (!unitField.isPrecise()) {
      throw new InvalidFieldArgumentError('Unit duration field must be precise')
    }
    const unitMillis = unitField.getUnitMillis()
    if (unitMillis < 1) {
      throw new InvalidFieldArgumentError('The unit milliseconds must be at least 1')
    }

    return {
      getUnitMillis: () => unitMillis,
      getDurationField: () => unitField,
      getMinimumValue: () => 0,
      getMaximumValueForSet: (instant: number): number => self().getMaximumValueAt(instant),

      set(instant: number, value: number): number {
        const f = self()
        verifyValueBounds(f, value, f.getMinimumValue(), f.getMaximumValueForSet(instant, value))
        return safeAdd(instant, safeMultiply(value - f.get(instant), unitMillis))
      },

      roundFloor: (instant: number): number => instant - floorMod(instant, unitMillis),

      roundCeiling(instant: number): number {
        const offset = floorMod(instant, unitMillis)
        return offset === 0 ? instant : safeAdd(instant - offset, unitMillis)
      },

      remainder: (instant: number): number => floorMod(instant, unitMillis),

      ...definition,
    }
  })

  built = field
  return field
}

// ============================================================================
// Precise Range Field
// ============================================================================

export interface PreciseDateTimeField extends PreciseDurationDateTimeField {
  /** Number of units in one range unit. */
  getRange(): number
}

/**
 * Field counting units within a fixed-length range, e.g. minuteOfHour from
 * the minutes and hours duration fields.
 */
export function createPreciseDateTimeField(
  type: DateTimeFieldType,
  unitField: DurationField,
  rangeField: DurationField
): PreciseDateTimeField {
  if (!rangeField.isPrecise()) {
    throw new InvalidFieldArgumentError('Range duration field must be precise')
  }
  const unitMillis = unitField.getUnitMillis()
  const range = unitMillis < 1 ? 0 : truncDiv(rangeField.getUnitMillis(), unitMillis)
  if (range < 2) {
    throw new InvalidFieldArgumentError('The effective range must be at least 2')
  }

  return definePreciseDurationDateTimeField((self) => ({
    type,
    unitField,
    get: (instant: number): number => floorMod(floorDiv(instant, unitMillis), range),
    getRangeDurationField: () => rangeField,
    getMaximumValue: () => range - 1,
    getRange: () => range,

    // stays within the current range unit
    addWrapField(instant: number, amount: number): number {
      const f = self()
      const current = f.get(instant)
      const wrapped = getWrappedValue(current, amount, f.getMinimumValue(), f.getMaximumValue())
      return safeAdd(instant, safeMultiply(wrapped - current, unitMillis))
    },
  }))
}
