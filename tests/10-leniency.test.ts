/**
 * Segment 10: Lenient and Strict Field Tests
 */

import { describe, it, expect } from 'vitest'
import { lenientDateTimeField, strictDateTimeField } from '../src/leniency'
import { defineDateTimeField } from '../src/datetime-field'
import { delegateTo } from '../src/delegation'
import { IllegalFieldValueError } from '../src/errors'
import { MILLIS_PER_DAY, MILLIS_PER_HOUR, hourOfDayField, monthField, toInstant, yearField } from './helpers/gregorian'
import { fixedOffsetZone, lenientBase } from './helpers/zone'

const base = lenientBase(fixedOffsetZone(MILLIS_PER_HOUR), [yearField, monthField, hourOfDayField])

// ============================================================================
// 1. LENIENT
// ============================================================================

describe('lenientDateTimeField', () => {
  const lenientMonth = lenientDateTimeField(monthField, base)

  it('reports lenient and keeps the wrapped identity', () => {
    expect(lenientMonth.isLenient()).toBe(true)
    expect(lenientMonth.name).toBe('monthOfYear')
    expect(lenientMonth.get(toInstant(2001, 3, 15))).toBe(3)
    expect(lenientMonth.getMaximumValue()).toBe(12)
  })

  it('rolls values past the maximum into the next year', () => {
    expect(lenientMonth.set(toInstant(2001, 3, 15), 14)).toBe(toInstant(2002, 2, 15))
  })

  it('rolls values below the minimum into the previous year', () => {
    expect(lenientMonth.set(toInstant(2001, 3, 15), 0)).toBe(toInstant(2000, 12, 15))
  })

  it('adds the difference in local time', () => {
    expect(lenientMonth.set(toInstant(2001, 1, 31), 2)).toBe(toInstant(2001, 2, 28))
  })

  it('rolls hours into the next day', () => {
    const lenientHour = lenientDateTimeField(hourOfDayField, base)
    expect(lenientHour.set(0, 25)).toBe(MILLIS_PER_DAY + MILLIS_PER_HOUR)
  })

  it('returns an already lenient field unchanged', () => {
    expect(lenientDateTimeField(lenientMonth, base)).toBe(lenientMonth)
  })

  it('strict unwraps the lenient wrapper', () => {
    expect(strictDateTimeField(lenientMonth)).toBe(monthField)
  })
})

// ============================================================================
// 2. STRICT
// ============================================================================

describe('strictDateTimeField', () => {
  const looseHour = defineDateTimeField(() => ({ ...delegateTo(hourOfDayField), isLenient: () => true }))
  const strictHour = strictDateTimeField(looseHour)

  it('returns a non-lenient field unchanged', () => {
    expect(strictDateTimeField(monthField)).toBe(monthField)
    expect(strictDateTimeField(strictHour)).toBe(strictHour)
  })

  it('checks bounds at the instant', () => {
    expect(strictHour.isLenient()).toBe(false)
    expect(strictHour.set(0, 5)).toBe(5 * MILLIS_PER_HOUR)
    expect(() => strictHour.set(0, 24)).toThrow(IllegalFieldValueError)
    expect(() => strictHour.set(0, 24)).toThrow('Value 24 for hourOfDay must be in the range [0,23]')
  })

  it('lenient unwraps the strict wrapper', () => {
    expect(lenientDateTimeField(strictHour, base)).toBe(looseHour)
  })
})
