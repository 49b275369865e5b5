/**
 * Segment 05: Imprecise Field Tests
 *
 * The imprecise-unit base: linked duration fields and guess-and-correct
 * differences over variable-length years and months.
 */

import { describe, it, expect } from 'vitest'
import { defineImpreciseDateTimeField } from '../src/imprecise-field'
import { DateTimeFieldType } from '../src/field-types'
import { IllegalFieldValueError } from '../src/errors'
import { MILLIS_PER_DAY, daysField, monthField, toInstant, yearField } from './helpers/gregorian'

// ============================================================================
// 1. FIELD VALUES
// ============================================================================

describe('Gregorian year and month', () => {
  it('read the calendar values of an instant', () => {
    const moonLanding = toInstant(1969, 7, 20)
    expect(yearField.get(moonLanding)).toBe(1969)
    expect(monthField.get(moonLanding)).toBe(7)
    expect(yearField.get(toInstant(-43, 3, 15))).toBe(-43)
  })

  it('clamp the day when setting', () => {
    expect(yearField.set(toInstant(2004, 2, 29, 3600000), 2001)).toBe(toInstant(2001, 2, 28, 3600000))
    expect(monthField.set(toInstant(2001, 1, 31), 4)).toBe(toInstant(2001, 4, 30))
  })

  it('reject out-of-range values', () => {
    expect(() => yearField.set(0, 10000)).toThrow('Value 10000 for year must be in the range [-4000,9999]')
    expect(() => monthField.set(0, 13)).toThrow(IllegalFieldValueError)
  })

  it('add months across year ends', () => {
    expect(monthField.add(toInstant(2001, 1, 31), 1)).toBe(toInstant(2001, 2, 28))
    expect(monthField.add(toInstant(2001, 12, 31), 1)).toBe(toInstant(2002, 1, 31))
    expect(monthField.add(toInstant(2001, 3, 31), -1)).toBe(toInstant(2001, 2, 28))
  })

  it('report leap years and months', () => {
    expect(yearField.isLeap(toInstant(2000, 6, 1))).toBe(true)
    expect(yearField.getLeapAmount(toInstant(2000, 6, 1))).toBe(1)
    expect(yearField.isLeap(toInstant(1900, 6, 1))).toBe(false)
    expect(monthField.isLeap(toInstant(2004, 2, 10))).toBe(true)
    expect(monthField.isLeap(toInstant(2004, 3, 10))).toBe(false)
    expect(yearField.getLeapDurationField()).toBe(daysField)
  })
})

// ============================================================================
// 2. DIFFERENCE
// ============================================================================

describe('Guess-and-correct difference', () => {
  it('counts whole months between instants', () => {
    expect(monthField.getDifference(toInstant(2001, 3, 1), toInstant(2001, 1, 31))).toBe(1)
    expect(monthField.getDifference(toInstant(2001, 1, 31), toInstant(2001, 3, 1))).toBe(-1)
  })

  it('returns zero rather than negative zero', () => {
    expect(Object.is(monthField.getDifference(toInstant(2001, 1, 31), toInstant(2001, 2, 27)), 0)).toBe(true)
  })

  it('counts whole years across leap days', () => {
    expect(yearField.getDifference(toInstant(2004, 2, 29), toInstant(2000, 2, 29))).toBe(4)
    expect(yearField.getDifference(toInstant(2004, 2, 28), toInstant(2000, 2, 29))).toBe(3)
  })
})

// ============================================================================
// 3. LINKED DURATION FIELD
// ============================================================================

describe('Linked duration field', () => {
  const years = yearField.getDurationField()

  it('is imprecise with the average unit', () => {
    expect(years.type).toBe('years')
    expect(years.isPrecise()).toBe(false)
    expect(years.getUnitMillis()).toBe(31556952000)
    expect(yearField.getAverageUnitMillis()).toBe(31556952000)
  })

  it('adds through the owning field', () => {
    expect(years.add(toInstant(2001, 1, 1), 2)).toBe(toInstant(2003, 1, 1))
  })

  it('measures durations relative to an instant', () => {
    expect(years.getValue(366 * MILLIS_PER_DAY, toInstant(2000, 1, 1))).toBe(1)
    expect(years.getValue(365 * MILLIS_PER_DAY, toInstant(2000, 1, 1))).toBe(0)
    expect(years.getMillis(1, toInstant(2000, 1, 1))).toBe(31622400000)
    expect(years.getMillis(1, toInstant(2001, 1, 1))).toBe(31536000000)
  })

  it('falls back to the average without an instant', () => {
    expect(years.getValue(63113904000)).toBe(2)
    expect(years.getMillis(2)).toBe(63113904000)
  })

  it('differences route to the owning field', () => {
    const months = monthField.getDurationField()
    expect(months.getDifference(toInstant(2001, 3, 1), toInstant(2001, 1, 31))).toBe(1)
  })

  it('serves as the range of the month field', () => {
    expect(monthField.getRangeDurationField()).toBe(years)
  })
})

// ============================================================================
// 4. ROUNDING AND CONSTRUCTION
// ============================================================================

describe('Imprecise rounding', () => {
  it('rounds to calendar boundaries', () => {
    const t = toInstant(1969, 7, 20, 5000)
    expect(yearField.roundFloor(t)).toBe(toInstant(1969, 1, 1))
    expect(yearField.roundCeiling(t)).toBe(0)
    expect(monthField.remainder(toInstant(2001, 4, 3))).toBe(2 * MILLIS_PER_DAY)
  })

  it('breaks half-way ties by mode', () => {
    const mid = toInstant(2001, 4, 16)
    expect(monthField.roundHalfFloor(mid)).toBe(toInstant(2001, 4, 1))
    expect(monthField.roundHalfCeiling(mid)).toBe(toInstant(2001, 5, 1))
    expect(monthField.roundHalfEven(mid)).toBe(toInstant(2001, 4, 1))
  })

  it('requires a positive average unit', () => {
    expect(() =>
      defineImpreciseDateTimeField(() => ({
        type: DateTimeFieldType.monthOfYear,
        averageUnitMillis: 0,
        get: monthField.get,
        set: monthField.set,
        add: monthField.add,
        getRangeDurationField: () => null,
        getMinimumValue: () => 1,
        getMaximumValue: () => 12,
        roundFloor: monthField.roundFloor,
      }))
    ).toThrow('The average unit milliseconds must be at least 1')
  })
})
