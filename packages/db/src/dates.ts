import { addDays, format, isValid, parse, subYears } from 'date-fns'

/** Storage format for every date column: `YYYY-MM-DD`. */
export const ISO_DATE_FORMAT = 'yyyy-MM-dd'

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/

/** Parse a `YYYY-MM-DD` string to a local-midnight Date, or null if invalid. */
export function parseIsoDate(value: string): Date | null {
  if (!ISO_DATE_PATTERN.test(value)) return null
  const parsed = parse(value, ISO_DATE_FORMAT, new Date(0))
  return isValid(parsed) ? parsed : null
}

export function isIsoDate(value: string): boolean {
  return parseIsoDate(value) !== null
}

function requireIsoDate(value: string): Date {
  const parsed = parseIsoDate(value)
  if (!parsed) {
    throw new RangeError(`Expected a YYYY-MM-DD date, got "${value}"`)
  }
  return parsed
}

/** Today's local calendar date in storage format. */
export function todayIso(now: Date = new Date()): string {
  return format(now, ISO_DATE_FORMAT)
}

/** Shift an ISO date by a whole number of days. */
export function addIsoDays(date: string, days: number): string {
  return format(addDays(requireIsoDate(date), days), ISO_DATE_FORMAT)
}

/**
 * First day of the trailing window ending on `today`.
 *
 * `windowStart('2021-09-05', 1)` is `'2020-09-05'`.
 */
export function windowStart(today: string, years: number): string {
  return format(subYears(requireIsoDate(today), years), ISO_DATE_FORMAT)
}

/** Every calendar day from `fromDate` to `toDate`, both inclusive. */
export function eachIsoDay(fromDate: string, toDate: string): string[] {
  requireIsoDate(toDate)
  const days: string[] = []
  for (let day = fromDate; day <= toDate; day = addIsoDays(day, 1)) {
    days.push(day)
  }
  return days
}
