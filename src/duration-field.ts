/**
 * Duration Field
 *
 * A unit of elapsed time, possibly imprecise (a month has no fixed length).
 * Converts between millisecond durations and whole unit counts, optionally
 * relative to a reference instant.
 */

import type { DurationFieldType } from './field-types'
import { InvalidFieldArgumentError } from './errors'
import { safeAdd, safeMultiply, safeSubtract, safeToInt, truncDiv } from './field-utils'

// ============================================================================
// Contract
// ============================================================================

export interface DurationField {
  readonly type: DurationFieldType
  readonly name: string

  isSupported(): boolean
  isPrecise(): boolean
  /** Exact unit length when precise, otherwise the average. */
  getUnitMillis(): number

  /** Whole units in `duration`, narrowed to int. */
  getValue(duration: number, instant?: number): number
  getValueAsLong(duration: number, instant?: number): number
  getMillis(value: number, instant?: number): number

  add(instant: number, value: number): number
  getDifference(minuendInstant: number, subtrahendInstant: number): number
  getDifferenceAsLong(minuendInstant: number, subtrahendInstant: number): number

  /** Orders by nominal unit length only. */
  compareTo(other: DurationField): number
  toString(): string
}

type RequiredDurationOperations =
  | 'type'
  | 'isPrecise'
  | 'getUnitMillis'
  | 'getValueAsLong'
  | 'getMillis'
  | 'add'
  | 'getDifferenceAsLong'

export type DurationFieldDefinition = Pick<DurationField, RequiredDurationOperations> &
  Partial<Pick<DurationField, 'getValue' | 'getDifference' | 'compareTo'>>

export type SelfDurationField = () => DurationField

// ============================================================================
// Assembly
// ============================================================================

export function compareUnitMillis(field: DurationField, other: DurationField): number {
  const thisMillis = field.getUnitMillis()
  const otherMillis = other.getUnitMillis()
  if (thisMillis === otherMillis) return 0
  return thisMillis < otherMillis ? -1 : 1
}

/**
 * Builds a supported duration field from its core operations. `build`
 * receives a handle to the finished field so the defaults dispatch through
 * any override.
 */
export function defineDurationField(build: (self: SelfDurationField) => DurationFieldDefinition): DurationField {
  let built: DurationField | null = null
  const self: SelfDurationField = () => {
    if (built === null) throw new InvalidFieldArgumentError('Duration field used before construction completed')
    return built
  }

  const definition = build(self)
  built = Object.freeze({
    getValue: (duration: number, instant?: number): number => safeToInt(self().getValueAsLong(duration, instant)),
    getDifference: (minuendInstant: number, subtrahendInstant: number): number =>
      safeToInt(self().getDifferenceAsLong(minuendInstant, subtrahendInstant)),
    compareTo: (other: DurationField): number => compareUnitMillis(self(), other),
    ...definition,
    name: definition.type,
    isSupported: (): boolean => true,
    toString: (): string => `DurationField[${definition.type}]`,
  })
  return built
}

// ============================================================================
// Precise Fields
// ============================================================================

/**
 * Duration field with a fixed unit length.
 */
export function createPreciseDurationField(type: DurationFieldType, unitMillis: number): DurationField {
  if (!Number.isSafeInteger(unitMillis) || unitMillis < 1) {
    throw new InvalidFieldArgumentError('The unit milliseconds must be at least 1')
  }
  return defineDurationField(() => ({
    type,
    isPrecise: () => true,
    getUnitMillis: () => unitMillis,
    getValueAsLong: (duration: number): number => truncDiv(duration, unitMillis),
    getMillis: (value: number): number => safeMultiply(value, unitMillis),
    add: (instant: number, value: number): number => safeAdd(instant, safeMultiply(value, unitMillis)),
    getDifferenceAsLong: (minuendInstant: number, subtrahendInstant: number): number =>
      truncDiv(safeSubtract(minuendInstant, subtrahendInstant), unitMillis),
  }))
}

/** The identity duration field: one unit is one millisecond. */
export const millisDurationField: DurationField = defineDurationField(() => ({
  type: 'millis',
  isPrecise: () => true,
  getUnitMillis: () => 1,
  getValueAsLong: (duration: number): number => duration,
  getMillis: (value: number): number => value,
  add: (instant: number, value: number): number => safeAdd(instant, value),
  getDifferenceAsLong: (minuendInstant: number, subtrahendInstant: number): number =>
    safeSubtract(minuendInstant, subtrahendInstant),
}))
