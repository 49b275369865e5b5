/**
 * Imprecise Fields
 *
 * Base for date-time fields whose unit varies in length, such as months and
 * years. The field supplies an average unit length and its own add; the base
 * builds the linked duration field, which answers through the owning field.
 */

import type { DateTimeField, DefaultFieldOperations } from './datetime-field'
import type { DurationField } from './duration-field'
import { defineDateTimeField } from './datetime-field'
import { defineDurationField } from './duration-field'
import { InvalidFieldArgumentError } from './errors'
import type { DurationFieldType } from './field-types'
import { safeAdd, safeMultiply, safeSubtract, truncDiv } from './field-utils'

export type ImpreciseDateTimeFieldDefinition = Partial<DefaultFieldOperations> &
  Pick<
    DateTimeField,
    | 'type'
    | 'get'
    | 'set'
    | 'add'
    | 'getRangeDurationField'
    | 'getMinimumValue'
    | 'getMaximumValue'
    | 'roundFloor'
  > & {
    /** Average length of one unit. */
    averageUnitMillis: number
  }

export interface ImpreciseDateTimeField extends DateTimeField {
  getAverageUnitMillis(): number
}

/**
 * Whole units between two instants for a field whose unit length varies:
 * estimate from the average, then correct by stepping with `add`.
 */
function guessAndCorrect(field: DateTimeField, averageUnitMillis: number, minuend: number, subtrahend: number): number {
  if (minuend < subtrahend) {
    const reversed = guessAndCorrect(field, averageUnitMillis, subtrahend, minuend)
    return reversed === 0 ? 0 : -reversed
  }
  let difference = truncDiv(minuend - subtrahend, averageUnitMillis)
  if (field.add(subtrahend, difference) < minuend) {
    do {
      difference++
    } while (field.add(subtrahend, difference) <= minuend)
    difference--
  } else if (field.add(subtrahend, difference) > minuend) {
    do {
      difference--
    } while (field.add(subtrahend, difference) > minuend)
  }
  return difference
}

function createLinkedDurationField(
  type: DurationFieldType,
  owner: () => DateTimeField,
  averageUnitMillis: number
): DurationField {
  return defineDurationField(() => ({
    type,
    isPrecise: () => false,
    getUnitMillis: () => averageUnitMillis,

    getValueAsLong(duration: number, instant?: number): number {
      if (instant === undefined) return truncDiv(duration, averageUnitMillis)
      return owner().getDifferenceAsLong(safeAdd(instant, duration), instant)
    },

    getMillis(value: number, instant?: number): number {
      if (instant === undefined) return safeMultiply(value, averageUnitMillis)
      return safeSubtract(owner().add(instant, value), instant)
    },

    add: (instant: number, value: number): number => owner().add(instant, value),
    getDifferenceAsLong: (minuend: number, subtrahend: number): number =>
      owner().getDifferenceAsLong(minuend, subtrahend),
  }))
}

export function defineImpreciseDateTimeField<S extends ImpreciseDateTimeFieldDefinition>(
  build: (self: () => ImpreciseDateTimeField) => S
): ImpreciseDateTimeField & S {
  let built: (ImpreciseDateTimeField & S) | null = null
  const self = (): ImpreciseDateTimeField => {
    if (built === null) throw new InvalidFieldArgumentError('Field used before construction completed')
    return built
  }

  const field = defineDateTimeField(() => {
    const definition = build(self)
    const { averageUnitMillis } = definition
    if (!Number.isSafeInteger(averageUnitMillis) || averageUnitMillis < 1) {
      throw new InvalidFieldArgumentError('The average unit milliseconds must be at least 1')
    }
    const durationField = createLinkedDurationField(definition.type.durationType, self, averageUnitMillis)

    return {
      getAverageUnitMillis: () => averageUnitMillis,
      getDurationField: () => durationField,
      getDifferenceAsLong: (minuend: number, subtrahend: number): number =>
        guessAndCorrect(self(), averageUnitMillis, minuend, subtrahend),
      ...definition,
    }
  })

  built = field
  return field
}
