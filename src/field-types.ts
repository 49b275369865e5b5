/**
 * Field Kinds
 *
 * Catalog of duration kinds and date-time field kinds. A date-time kind names
 * the duration of one unit of the field and the duration over which its
 * values range (null for unbounded fields such as year).
 */

// ============================================================================
// Duration Kinds
// ============================================================================

export const DurationFieldType = {
  eras: 'eras',
  centuries: 'centuries',
  weekyears: 'weekyears',
  years: 'years',
  months: 'months',
  weeks: 'weeks',
  days: 'days',
  halfdays: 'halfdays',
  hours: 'hours',
  minutes: 'minutes',
  seconds: 'seconds',
  millis: 'millis',
} as const

export type DurationFieldType = (typeof DurationFieldType)[keyof typeof DurationFieldType]

// ============================================================================
// Date-Time Kinds
// ============================================================================

export type DateTimeFieldType = {
  readonly name: string
  readonly durationType: DurationFieldType
  readonly rangeDurationType: DurationFieldType | null
}

export function defineDateTimeFieldType(
  name: string,
  durationType: DurationFieldType,
  rangeDurationType: DurationFieldType | null
): DateTimeFieldType {
  return Object.freeze({ name, durationType, rangeDurationType })
}

const D = DurationFieldType

export const DateTimeFieldType = {
  era: defineDateTimeFieldType('era', D.eras, null),
  yearOfEra: defineDateTimeFieldType('yearOfEra', D.years, D.eras),
  centuryOfEra: defineDateTimeFieldType('centuryOfEra', D.centuries, D.eras),
  yearOfCentury: defineDateTimeFieldType('yearOfCentury', D.years, D.centuries),
  year: defineDateTimeFieldType('year', D.years, null),
  dayOfYear: defineDateTimeFieldType('dayOfYear', D.days, D.years),
  monthOfYear: defineDateTimeFieldType('monthOfYear', D.months, D.years),
  dayOfMonth: defineDateTimeFieldType('dayOfMonth', D.days, D.months),
  weekyearOfCentury: defineDateTimeFieldType('weekyearOfCentury', D.weekyears, D.centuries),
  weekyear: defineDateTimeFieldType('weekyear', D.weekyears, null),
  weekOfWeekyear: defineDateTimeFieldType('weekOfWeekyear', D.weeks, D.weekyears),
  dayOfWeek: defineDateTimeFieldType('dayOfWeek', D.days, D.weeks),
  halfdayOfDay: defineDateTimeFieldType('halfdayOfDay', D.halfdays, D.days),
  hourOfHalfday: defineDateTimeFieldType('hourOfHalfday', D.hours, D.halfdays),
  clockhourOfHalfday: defineDateTimeFieldType('clockhourOfHalfday', D.hours, D.halfdays),
  clockhourOfDay: defineDateTimeFieldType('clockhourOfDay', D.hours, D.days),
  hourOfDay: defineDateTimeFieldType('hourOfDay', D.hours, D.days),
  minuteOfDay: defineDateTimeFieldType('minuteOfDay', D.minutes, D.days),
  minuteOfHour: defineDateTimeFieldType('minuteOfHour', D.minutes, D.hours),
  secondOfDay: defineDateTimeFieldType('secondOfDay', D.seconds, D.days),
  secondOfMinute: defineDateTimeFieldType('secondOfMinute', D.seconds, D.minutes),
  millisOfDay: defineDateTimeFieldType('millisOfDay', D.millis, D.days),
  millisOfSecond: defineDateTimeFieldType('millisOfSecond', D.millis, D.seconds),
} as const satisfies Record<string, DateTimeFieldType>

export function sameFieldType(a: DateTimeFieldType, b: DateTimeFieldType): boolean {
  return a === b || a.name === b.name
}
