/**
 * calendar-field-algebra
 *
 * Public API exports
 */

// Error system (base class, codes, all error classes)
export {
  FieldError, FieldErrorCode,
  IllegalFieldValueError, ArithmeticOverflowError, UnsupportedFieldError,
  IncompatibleFieldsError, InvalidFieldArgumentError,
} from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err } from './result'

// Safe arithmetic
export {
  INT_MIN, INT_MAX, LONG_MIN, LONG_MAX,
  truncDiv, floorDiv, floorMod,
  safeNegate, safeAdd, safeAddInt, safeSubtract,
  safeMultiply, safeMultiplyInt, safeMultiplyToInt, safeDivide, safeToInt,
  verifyValueBounds, getWrappedValue,
} from './field-utils'

// Field kinds
export { DurationFieldType, DateTimeFieldType, defineDateTimeFieldType, sameFieldType } from './field-types'

// Duration fields
export type { DurationField, DurationFieldDefinition, SelfDurationField } from './duration-field'
export { defineDurationField, createPreciseDurationField, millisDurationField, compareUnitMillis } from './duration-field'
export type { ScaledDurationField, ScaledDurationFieldOptions } from './scaled-duration-field'
export { createScaledDurationField } from './scaled-duration-field'
export { getUnsupportedDurationField } from './unsupported-duration-field'

// Date-time fields
export type {
  DateTimeField, DateTimeFieldDefinition, DefaultFieldOperations, RequiredFieldOperations, SelfField,
} from './datetime-field'
export { defineDateTimeField } from './datetime-field'
export type {
  PreciseDurationDateTimeField, PreciseDurationDateTimeFieldDefinition, PreciseDateTimeField,
} from './precise-fields'
export { definePreciseDurationDateTimeField, createPreciseDateTimeField } from './precise-fields'
export type { ImpreciseDateTimeField, ImpreciseDateTimeFieldDefinition } from './imprecise-field'
export { defineImpreciseDateTimeField } from './imprecise-field'
export { getUnsupportedDateTimeField } from './unsupported-datetime-field'

// Partials
export type { ReadablePartial } from './partial'
export { createPartial } from './partial'

// Decorators
export type {
  DecoratedOperations, DelegatedOperations, DelegateOptions, WrappedDateTimeField, WrappedDurationField,
} from './delegation'
export {
  decorate, delegateTo, delegateRounding, delegateLeap, decorateDuration, delegateDuration,
} from './delegation'
export type { DividedDateTimeField, DividedFieldOptions, DividedOfRemainderOptions } from './divided-field'
export { createDividedDateTimeField, dividedOfRemainder } from './divided-field'
export type { RemainderDateTimeField, RemainderFieldOptions, RemainderOfDividedOptions } from './remainder-field'
export { createRemainderDateTimeField, remainderOfDivided } from './remainder-field'
export type { OffsetDateTimeField, OffsetFieldOptions } from './offset-field'
export { createOffsetDateTimeField } from './offset-field'
export type { SkipDateTimeField, SkipFieldOptions } from './skip-fields'
export { createSkipDateTimeField, createSkipUndoDateTimeField } from './skip-fields'
export type { ZeroIsMaxFieldOptions } from './zero-is-max-field'
export { createZeroIsMaxDateTimeField } from './zero-is-max-field'
export type { LenientBase, ZoneConversion } from './leniency'
export { lenientDateTimeField, strictDateTimeField } from './leniency'

// Checked operations
export { attemptField, checkFieldValue, checkPartialValue } from './validation'
