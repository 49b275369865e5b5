/**
 * Delegation
 *
 * Pass-through building blocks for decorator fields. A decorated field
 * forwards only the core operations to the field it wraps and re-derives the
 * rest from them; a delegated field forwards every operation. Decorators
 * spread one of these and override what they change. Duration fields get the
 * same pair, returned as finished fields.
 */

import type { DateTimeField, DateTimeFieldDefinition, DefaultFieldOperations } from './datetime-field'
import type { DurationField } from './duration-field'
import type { DateTimeFieldType, DurationFieldType } from './field-types'
import type { ReadablePartial } from './partial'
import { defineDurationField } from './duration-field'
import { InvalidFieldArgumentError } from './errors'

export type DecoratedOperations = Pick<
  DateTimeFieldDefinition,
  'type' | 'get' | 'set' | 'getDurationField' | 'getRangeDurationField' | 'getMinimumValue' | 'getMaximumValue' | 'roundFloor'
> &
  Pick<DefaultFieldOperations, 'isLenient'> & {
    getWrappedField(): DateTimeField
  }

export type DelegatedOperations = DecoratedOperations & DefaultFieldOperations

/** A field built around another one. */
export interface WrappedDateTimeField extends DateTimeField {
  getWrappedField(): DateTimeField
}

export function requireSupported(field: DateTimeField): void {
  if (!field.isSupported()) {
    throw new InvalidFieldArgumentError('The field must be supported')
  }
}

/**
 * Core operations of `wrapped`, optionally under a different kind.
 */
export function decorate(wrapped: DateTimeField, type: DateTimeFieldType = wrapped.type): DecoratedOperations {
  requireSupported(wrapped)
  return {
    type,
    getWrappedField: () => wrapped,
    isLenient: () => wrapped.isLenient(),
    get: (instant: number): number => wrapped.get(instant),
    set: (instant: number, value: number): number => wrapped.set(instant, value),
    getDurationField: () => wrapped.getDurationField(),
    getRangeDurationField: () => wrapped.getRangeDurationField(),
    getMinimumValue: () => wrapped.getMinimumValue(),
    getMaximumValue: () => wrapped.getMaximumValue(),
    roundFloor: (instant: number): number => wrapped.roundFloor(instant),
  }
}

export type DelegateOptions = {
  type?: DateTimeFieldType
  /** Replaces the wrapped field's range duration. */
  rangeDurationField?: DurationField
}

/**
 * Every operation of `wrapped`, with an optional kind and range duration.
 */
export function delegateTo(wrapped: DateTimeField, options: DelegateOptions = {}): DelegatedOperations {
  const { type = wrapped.type, rangeDurationField } = options
  return {
    ...decorate(wrapped, type),
    getRangeDurationField: () => rangeDurationField ?? wrapped.getRangeDurationField(),

    add: (instant: number, amount: number): number => wrapped.add(instant, amount),
    addWrapField: (instant: number, amount: number): number => wrapped.addWrapField(instant, amount),
    getDifference: (minuend: number, subtrahend: number): number => wrapped.getDifference(minuend, subtrahend),
    getDifferenceAsLong: (minuend: number, subtrahend: number): number =>
      wrapped.getDifferenceAsLong(minuend, subtrahend),

    setPartial: (partial: ReadablePartial, index: number, values: readonly number[], value: number): number[] =>
      wrapped.setPartial(partial, index, values, value),
    addPartial: (partial: ReadablePartial, index: number, values: readonly number[], amount: number): number[] =>
      wrapped.addPartial(partial, index, values, amount),
    addWrapPartial: (partial: ReadablePartial, index: number, values: readonly number[], amount: number): number[] =>
      wrapped.addWrapPartial(partial, index, values, amount),
    addWrapFieldPartial: (partial: ReadablePartial, index: number, values: readonly number[], amount: number): number[] =>
      wrapped.addWrapFieldPartial(partial, index, values, amount),

    ...delegateLeap(wrapped),

    getMinimumValueAt: (instant: number): number => wrapped.getMinimumValueAt(instant),
    getMinimumValueForPartial: (partial: ReadablePartial, values: readonly number[]): number =>
      wrapped.getMinimumValueForPartial(partial, values),
    getMaximumValueAt: (instant: number): number => wrapped.getMaximumValueAt(instant),
    getMaximumValueForPartial: (partial: ReadablePartial, values: readonly number[]): number =>
      wrapped.getMaximumValueForPartial(partial, values),

    ...delegateRounding(wrapped),
  }
}

/** The rounding family of `wrapped`, for decorators that keep its alignment. */
export function delegateRounding(
  wrapped: DateTimeField
): Pick<DateTimeField, 'roundFloor' | 'roundCeiling' | 'roundHalfFloor' | 'roundHalfCeiling' | 'roundHalfEven' | 'remainder'> {
  return {
    roundFloor: (instant: number): number => wrapped.roundFloor(instant),
    roundCeiling: (instant: number): number => wrapped.roundCeiling(instant),
    roundHalfFloor: (instant: number): number => wrapped.roundHalfFloor(instant),
    roundHalfCeiling: (instant: number): number => wrapped.roundHalfCeiling(instant),
    roundHalfEven: (instant: number): number => wrapped.roundHalfEven(instant),
    remainder: (instant: number): number => wrapped.remainder(instant),
  }
}

/** Leap queries of `wrapped`. */
export function delegateLeap(wrapped: DateTimeField): Pick<DateTimeField, 'isLeap' | 'getLeapAmount' | 'getLeapDurationField'> {
  return {
    isLeap: (instant: number): boolean => wrapped.isLeap(instant),
    getLeapAmount: (instant: number): number => wrapped.getLeapAmount(instant),
    getLeapDurationField: () => wrapped.getLeapDurationField(),
  }
}

// ============================================================================
// Duration Fields
// ============================================================================

/** A duration field built around another one. */
export interface WrappedDurationField extends DurationField {
  getWrappedField(): DurationField
}

/**
 * Unit conversions and arithmetic of a supported duration field, optionally
 * under a different kind. Narrowing and ordering are re-derived.
 */
export function decorateDuration(field: DurationField, type: DurationFieldType = field.type): WrappedDurationField {
  if (!field.isSupported()) {
    throw new InvalidFieldArgumentError('The field must be supported')
  }
  const decorated = defineDurationField(() => ({
    type,
    isPrecise: () => field.isPrecise(),
    getUnitMillis: () => field.getUnitMillis(),
    getValueAsLong: (duration: number, instant?: number): number => field.getValueAsLong(duration, instant),
    getMillis: (value: number, instant?: number): number => field.getMillis(value, instant),
    add: (instant: number, value: number): number => field.add(instant, value),
    getDifferenceAsLong: (minuendInstant: number, subtrahendInstant: number): number =>
      field.getDifferenceAsLong(minuendInstant, subtrahendInstant),
  }))

  return Object.freeze({
    ...decorated,
    getWrappedField: () => field,
  })
}

/**
 * Every operation of `field`, support included, optionally under a different
 * kind.
 */
export function delegateDuration(field: DurationField, type: DurationFieldType = field.type): WrappedDurationField {
  return Object.freeze({
    type,
    name: type,
    getWrappedField: () => field,
    isSupported: (): boolean => field.isSupported(),
    isPrecise: (): boolean => field.isPrecise(),
    getUnitMillis: (): number => field.getUnitMillis(),
    getValue: (duration: number, instant?: number): number => field.getValue(duration, instant),
    getValueAsLong: (duration: number, instant?: number): number => field.getValueAsLong(duration, instant),
    getMillis: (value: number, instant?: number): number => field.getMillis(value, instant),
    add: (instant: number, value: number): number => field.add(instant, value),
    getDifference: (minuendInstant: number, subtrahendInstant: number): number =>
      field.getDifference(minuendInstant, subtrahendInstant),
    getDifferenceAsLong: (minuendInstant: number, subtrahendInstant: number): number =>
      field.getDifferenceAsLong(minuendInstant, subtrahendInstant),
    compareTo: (other: DurationField): number => field.compareTo(other),
    toString: (): string => `DurationField[${type}]`,
  })
}
