/**
 * Base Operations
 *
 * Default implementations of every DateTimeField operation beyond the core
 * set. Each one reaches the field through the late-bound `self` handle.
 */

import type { DefaultFieldOperations, SelfField } from '../datetime-field'
import type { ReadablePartial } from '../partial'
import { floorMod, getWrappedValue } from '../field-utils'
import { addWithCarry, setAndClamp, wrapWithinField } from './partial-carry'

export function baseOperations(self: SelfField): DefaultFieldOperations {
  function roundCeiling(instant: number): number {
    const field = self()
    const floor = field.roundFloor(instant)
    return floor === instant ? instant : field.add(floor, 1)
  }

  /** Distances from the floor and to the ceiling for the half-rounding modes. */
  function bracket(instant: number): { floor: number; ceiling: number; fromFloor: number; toCeiling: number } {
    const field = self()
    const floor = field.roundFloor(instant)
    const ceiling = field.roundCeiling(instant)
    return { floor, ceiling, fromFloor: instant - floor, toCeiling: ceiling - instant }
  }

  return {
    isLenient: () => false,

    // ========== Instant Arithmetic ==========

    add(instant: number, amount: number): number {
      return self().getDurationField().add(instant, amount)
    },

    addWrapField(instant: number, amount: number): number {
      const field = self()
      const wrapped = getWrappedValue(
        field.get(instant), amount,
        field.getMinimumValueAt(instant), field.getMaximumValueAt(instant)
      )
      return field.set(instant, wrapped)
    },

    getDifference(minuendInstant: number, subtrahendInstant: number): number {
      return self().getDurationField().getDifference(minuendInstant, subtrahendInstant)
    },

    getDifferenceAsLong(minuendInstant: number, subtrahendInstant: number): number {
      return self().getDurationField().getDifferenceAsLong(minuendInstant, subtrahendInstant)
    },

    // ========== Partial Arithmetic ==========

    setPartial(partial: ReadablePartial, fieldIndex: number, values: readonly number[], newValue: number): number[] {
      return setAndClamp(self(), partial, fieldIndex, values, newValue)
    },

    addPartial(partial: ReadablePartial, fieldIndex: number, values: readonly number[], amount: number): number[] {
      return addWithCarry(self(), partial, fieldIndex, values, amount, 'bounded')
    },

    addWrapPartial(partial: ReadablePartial, fieldIndex: number, values: readonly number[], amount: number): number[] {
      return addWithCarry(self(), partial, fieldIndex, values, amount, 'wrapped')
    },

    addWrapFieldPartial(partial: ReadablePartial, fieldIndex: number, values: readonly number[], amount: number): number[] {
      return wrapWithinField(self(), partial, fieldIndex, values, amount)
    },

    // ========== Leap ==========

    isLeap: () => false,
    getLeapAmount: () => 0,
    getLeapDurationField: () => null,

    // ========== Bounds ==========

    getMinimumValueAt: () => self().getMinimumValue(),
    getMinimumValueForPartial: () => self().getMinimumValue(),
    getMaximumValueAt: () => self().getMaximumValue(),
    getMaximumValueForPartial: () => self().getMaximumValue(),

    // ========== Rounding ==========

    roundCeiling,

    roundHalfFloor(instant: number): number {
      const { floor, ceiling, fromFloor, toCeiling } = bracket(instant)
      return fromFloor <= toCeiling ? floor : ceiling
    },

    roundHalfCeiling(instant: number): number {
      const { floor, ceiling, fromFloor, toCeiling } = bracket(instant)
      return toCeiling <= fromFloor ? ceiling : floor
    },

    roundHalfEven(instant: number): number {
      const { floor, ceiling, fromFloor, toCeiling } = bracket(instant)
      if (fromFloor < toCeiling) return floor
      if (toCeiling < fromFloor) return ceiling
      // tie: pick whichever candidate leaves this field even
      return floorMod(self().get(ceiling), 2) === 0 ? ceiling : floor
    },

    remainder(instant: number): number {
      return instant - self().roundFloor(instant)
    },
  }
}
