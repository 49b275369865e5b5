/**
 * DateTime Field
 *
 * A calendar component (month of year, hour of day, ...) read from and
 * written to an absolute instant or a partial values array. Concrete fields
 * are assembled with defineDateTimeField, which supplies the carry, wrap,
 * rounding, leap and bounds algorithms on top of a handful of core operations.
 */

import type { DurationField } from './duration-field'
import type { DateTimeFieldType } from './field-types'
import type { ReadablePartial } from './partial'
import { InvalidFieldArgumentError } from './errors'
import { baseOperations } from './internal/base-operations'

// ============================================================================
// Contract
// ============================================================================

export interface DateTimeField {
  readonly type: DateTimeFieldType
  readonly name: string

  isSupported(): boolean
  isLenient(): boolean

  // ---- Instant access ----
  get(instant: number): number
  set(instant: number, value: number): number
  add(instant: number, amount: number): number
  addWrapField(instant: number, amount: number): number
  getDifference(minuendInstant: number, subtrahendInstant: number): number
  getDifferenceAsLong(minuendInstant: number, subtrahendInstant: number): number

  // ---- Partial access (values are never mutated; a new array is returned) ----
  setPartial(partial: ReadablePartial, fieldIndex: number, values: readonly number[], newValue: number): number[]
  /** Adds with carry into larger fields; fails past the outermost field. */
  addPartial(partial: ReadablePartial, fieldIndex: number, values: readonly number[], amount: number): number[]
  /** Adds with carry into larger fields; the outermost field wraps. */
  addWrapPartial(partial: ReadablePartial, fieldIndex: number, values: readonly number[], amount: number): number[]
  /** Wraps within this field only. */
  addWrapFieldPartial(partial: ReadablePartial, fieldIndex: number, values: readonly number[], amount: number): number[]

  // ---- Units ----
  getDurationField(): DurationField
  getRangeDurationField(): DurationField | null

  // ---- Leap ----
  isLeap(instant: number): boolean
  getLeapAmount(instant: number): number
  getLeapDurationField(): DurationField | null

  // ---- Bounds ----
  getMinimumValue(): number
  getMinimumValueAt(instant: number): number
  getMinimumValueForPartial(partial: ReadablePartial, values: readonly number[]): number
  getMaximumValue(): number
  getMaximumValueAt(instant: number): number
  getMaximumValueForPartial(partial: ReadablePartial, values: readonly number[]): number

  // ---- Rounding ----
  roundFloor(instant: number): number
  roundCeiling(instant: number): number
  roundHalfFloor(instant: number): number
  roundHalfCeiling(instant: number): number
  roundHalfEven(instant: number): number
  remainder(instant: number): number

  toString(): string
}

export type RequiredFieldOperations =
  | 'type'
  | 'get'
  | 'set'
  | 'getDurationField'
  | 'getRangeDurationField'
  | 'getMinimumValue'
  | 'getMaximumValue'
  | 'roundFloor'

type DerivedMembers = 'name' | 'isSupported' | 'toString'

export type DefaultFieldOperations = Omit<DateTimeField, RequiredFieldOperations | DerivedMembers>

export type DateTimeFieldDefinition = Pick<DateTimeField, RequiredFieldOperations> & Partial<DefaultFieldOperations>

/** Late-bound handle to the field under construction. */
export type SelfField = () => DateTimeField

// ============================================================================
// Assembly
// ============================================================================

/**
 * Builds a supported date-time field. Operations the definition leaves out come
 * from the base algorithms, which call back through `self` so that overrides
 * such as a custom roundFloor or maximum take effect everywhere. Members the
 * definition adds beyond the contract are kept on the returned field.
 */
export function defineDateTimeField<S extends DateTimeFieldDefinition>(
  build: (self: SelfField) => S
): DateTimeField & S {
  let built: (DateTimeField & S) | null = null
  const self: SelfField = () => {
    if (built === null) throw new InvalidFieldArgumentError('Field used before construction completed')
    return built
  }

  const definition = build(self)
  const field = {
    ...baseOperations(self),
    ...definition,
    name: definition.type.name,
    isSupported: (): boolean => true,
    toString: (): string => `DateTimeField[${definition.type.name}]`,
  }
  built = field
  Object.freeze(field)
  return field
}
