/**
 * Segment 08: Offset and Skip Field Tests
 */

import { describe, it, expect } from 'vitest'
import { createOffsetDateTimeField } from '../src/offset-field'
import { createSkipDateTimeField, createSkipUndoDateTimeField } from '../src/skip-fields'
import { createPartial } from '../src/partial'
import { IllegalFieldValueError, IncompatibleFieldsError, InvalidFieldArgumentError } from '../src/errors'
import { MILLIS_PER_HOUR, hourOfDayField, monthField, toInstant, yearField } from './helpers/gregorian'

// ============================================================================
// 1. OFFSET
// ============================================================================

describe('createOffsetDateTimeField', () => {
  const hourFromOne = createOffsetDateTimeField(hourOfDayField, { offset: 1 })

  it('shifts values and bounds', () => {
    expect(hourFromOne.get(0)).toBe(1)
    expect(hourFromOne.getMinimumValue()).toBe(1)
    expect(hourFromOne.getMaximumValue()).toBe(24)
    expect(hourFromOne.getOffset()).toBe(1)
    expect(hourFromOne.name).toBe('hourOfDay')
  })

  it('set removes the offset', () => {
    expect(hourFromOne.set(0, 24)).toBe(23 * MILLIS_PER_HOUR)
    expect(() => hourFromOne.set(0, 0)).toThrow('Value 0 for hourOfDay must be in the range [1,24]')
  })

  it('addWrapField wraps within the shifted bounds', () => {
    expect(hourFromOne.addWrapField(23 * MILLIS_PER_HOUR, 1)).toBe(0)
  })

  it('rounds like the wrapped field', () => {
    expect(hourFromOne.roundFloor(5400000)).toBe(3600000)
    expect(hourFromOne.remainder(5400000)).toBe(1800000)
  })

  describe('with caller limits', () => {
    const limited = createOffsetDateTimeField(hourOfDayField, { offset: 1, minValue: 5, maxValue: 100 })

    it('narrows only where the limit is tighter', () => {
      expect(limited.getMinimumValue()).toBe(5)
      expect(limited.getMaximumValue()).toBe(24)
    })

    it('add verifies the result', () => {
      expect(limited.add(4 * MILLIS_PER_HOUR, 1)).toBe(5 * MILLIS_PER_HOUR)
      expect(() => limited.add(0, 1)).toThrow(IllegalFieldValueError)
    })
  })

  it('delegates leap queries', () => {
    const yearFrom1900 = createOffsetDateTimeField(yearField, { offset: -1900 })
    expect(yearFrom1900.get(toInstant(2000, 6, 1))).toBe(100)
    expect(yearFrom1900.isLeap(toInstant(2000, 6, 1))).toBe(true)
    expect(yearFrom1900.getMinimumValue()).toBe(-5900)
  })

  it('rejects a zero offset', () => {
    expect(() => createOffsetDateTimeField(hourOfDayField, { offset: 0 })).toThrow(InvalidFieldArgumentError)
  })
})

// ============================================================================
// 2. SKIP
// ============================================================================

describe('createSkipDateTimeField', () => {
  const yearWithoutZero = createSkipDateTimeField(yearField)

  it('renumbers values at or below the skipped one', () => {
    expect(yearWithoutZero.get(toInstant(1, 6, 1))).toBe(1)
    expect(yearWithoutZero.get(toInstant(0, 6, 1))).toBe(-1)
    expect(yearWithoutZero.get(toInstant(-1, 6, 1))).toBe(-2)
    expect(yearWithoutZero.getSkip()).toBe(0)
  })

  it('extends the minimum below the skipped value', () => {
    expect(yearWithoutZero.getMinimumValue()).toBe(-4001)
    expect(yearWithoutZero.getMinimumValueAt(0)).toBe(-4001)
    expect(yearWithoutZero.getMaximumValue()).toBe(9999)
  })

  it('set maps values back onto the wrapped numbering', () => {
    const t = toInstant(2001, 6, 1)
    expect(yearWithoutZero.set(t, -1)).toBe(toInstant(0, 6, 1))
    expect(yearWithoutZero.set(t, 1)).toBe(toInstant(1, 6, 1))
  })

  it('set rejects the skipped value', () => {
    expect(() => yearWithoutZero.set(0, 0)).toThrow('Value 0 for year is not supported')
  })

  it('set rejects values outside the bounds', () => {
    expect(() => yearWithoutZero.set(0, -4002)).toThrow('Value -4002 for year must be in the range [-4001,9999]')
  })

  it('starts one above a minimum equal to the skip', () => {
    expect(createSkipDateTimeField(hourOfDayField).getMinimumValue()).toBe(1)
  })

  describe('on partial values', () => {
    const yearMonth = createPartial([yearWithoutZero, monthField])

    it('setPartial rejects the skipped value', () => {
      expect(() => yearWithoutZero.setPartial(yearMonth, 0, [5, 1], 0)).toThrow(IllegalFieldValueError)
      expect(() => yearWithoutZero.setPartial(yearMonth, 0, [5, 1], 0)).toThrow('Value 0 for year is not supported')
    })

    it('setPartial accepts its own minimum', () => {
      expect(yearWithoutZero.setPartial(yearMonth, 0, [5, 1], -4001)).toEqual([-4001, 1])
      expect(() => yearWithoutZero.setPartial(yearMonth, 0, [5, 1], -4002)).toThrow(
        'Value -4002 for year must be in the range [-4001,9999]'
      )
    })

    it('addPartial steps over the skipped value', () => {
      expect(yearWithoutZero.addPartial(yearMonth, 0, [-1, 1], 1)).toEqual([1, 1])
      expect(yearWithoutZero.addPartial(yearMonth, 0, [1, 1], -1)).toEqual([-1, 1])
      expect(yearWithoutZero.addPartial(yearMonth, 0, [-2, 7], 3)).toEqual([2, 7])
    })

    it('a carry from a smaller field steps over the skipped value', () => {
      expect(monthField.addPartial(yearMonth, 1, [-1, 12], 1)).toEqual([1, 1])
      expect(monthField.addPartial(yearMonth, 1, [1, 1], -1)).toEqual([-1, 12])
    })

    it('addWrapFieldPartial steps over the skipped value', () => {
      expect(yearWithoutZero.addWrapFieldPartial(yearMonth, 0, [-1, 3], 1)).toEqual([1, 3])
    })

    it('addPartial still fails past the maximum', () => {
      expect(() => yearWithoutZero.addPartial(yearMonth, 0, [9999, 1], 1)).toThrow(IncompatibleFieldsError)
    })

    it('leaves the input array untouched', () => {
      const values = [-1, 12]
      yearWithoutZero.addPartial(yearMonth, 0, values, 1)
      expect(values).toEqual([-1, 12])
    })
  })
})

describe('createSkipUndoDateTimeField', () => {
  const yearWithoutZero = createSkipDateTimeField(yearField)
  const restored = createSkipUndoDateTimeField(yearWithoutZero)

  it('restores the wrapped numbering', () => {
    expect(restored.get(toInstant(0, 6, 1))).toBe(0)
    expect(restored.get(toInstant(-1, 6, 1))).toBe(-1)
    expect(restored.get(toInstant(5, 6, 1))).toBe(5)
    expect(restored.getMinimumValue()).toBe(-4000)
  })

  it('set accepts the value the skip field rejects', () => {
    expect(restored.set(toInstant(2001, 6, 1), 0)).toBe(toInstant(0, 6, 1))
  })

  it('moves a minimum just above the skip down onto it', () => {
    const hourFromOne = createOffsetDateTimeField(hourOfDayField, { offset: 1 })
    expect(createSkipUndoDateTimeField(hourFromOne).getMinimumValue()).toBe(0)
  })

  describe('on partial values', () => {
    const yearMonth = createPartial([restored, monthField])

    it('setPartial accepts the restored value', () => {
      expect(restored.setPartial(yearMonth, 0, [5, 1], 0)).toEqual([0, 1])
    })

    it('addPartial counts through the restored value', () => {
      expect(restored.addPartial(yearMonth, 0, [-1, 1], 1)).toEqual([0, 1])
      expect(restored.addPartial(yearMonth, 0, [0, 1], 1)).toEqual([1, 1])
      expect(monthField.addPartial(yearMonth, 1, [0, 1], -1)).toEqual([-1, 12])
    })
  })
})
