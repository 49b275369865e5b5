/**
 * Property tests for decorator fields.
 */
import { describe, it, expect } from 'vitest'
import * as fc from 'fast-check'
import {
  DateTimeFieldType,
  createDividedDateTimeField,
  createSkipDateTimeField,
  createSkipUndoDateTimeField,
  remainderOfDivided,
} from '../../../src/index'
import { anyYearInstantGen, instantGen } from '../generators'
import { clockhourOfDayField, hourOfDayField, yearField } from '../../helpers/gregorian'

const century = createDividedDateTimeField(yearField, { type: DateTimeFieldType.centuryOfEra, divisor: 100 })
const yearOfCentury = remainderOfDivided(century, { type: DateTimeFieldType.yearOfCentury })

// ============================================================================
// Divided / Remainder
// ============================================================================

describe('Divided and remainder fields', () => {
  it('recombine to the wrapped value', () => {
    fc.assert(
      fc.property(anyYearInstantGen(), (instant) => {
        const yoc = yearOfCentury.get(instant)
        expect(yoc).toBeGreaterThanOrEqual(0)
        expect(yoc).toBeLessThanOrEqual(99)
        expect(century.get(instant) * 100 + yoc).toBe(yearField.get(instant))
      })
    )
  })

  it('setting the remainder keeps the quotient', () => {
    fc.assert(
      fc.property(anyYearInstantGen(), fc.integer({ min: 0, max: 99 }), (instant, value) => {
        const result = yearOfCentury.set(instant, value)
        expect(yearOfCentury.get(result)).toBe(value)
        expect(century.get(result)).toBe(century.get(instant))
      })
    )
  })
})

// ============================================================================
// Skip
// ============================================================================

describe('Skip fields', () => {
  const noYearZero = createSkipDateTimeField(yearField)
  const restored = createSkipUndoDateTimeField(noYearZero)

  it('never yields the skipped value', () => {
    fc.assert(
      fc.property(anyYearInstantGen(), (instant) => {
        expect(noYearZero.get(instant)).not.toBe(0)
      })
    )
  })

  it('undo restores the wrapped numbering', () => {
    fc.assert(
      fc.property(anyYearInstantGen(), (instant) => {
        expect(restored.get(instant)).toBe(yearField.get(instant))
      })
    )
  })
})

// ============================================================================
// Zero Is Max
// ============================================================================

describe('Zero-is-max field', () => {
  it('maps zero to the maximum and leaves other values alone', () => {
    fc.assert(
      fc.property(instantGen(), (instant) => {
        const hour = hourOfDayField.get(instant)
        expect(clockhourOfDayField.get(instant)).toBe(hour === 0 ? 24 : hour)
      })
    )
  })
})
