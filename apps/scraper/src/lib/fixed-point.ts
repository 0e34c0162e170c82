import { FIXED_POINT_MULTIPLIER } from '@etf-tracker/db'

const FRACTION_DIGITS = String(FIXED_POINT_MULTIPLIER).length - 1
const DECIMAL_PATTERN = /^([+-])?(\d*)(?:\.(\d*))?$/

/**
 * Parse a decimal string into the stored fixed-point integer.
 *
 * Works on the digits, not on a float, so `"0.0123"` is exactly `123`.
 * Digits past the fourth decimal are dropped (truncated toward zero).
 * Thousands separators, currency signs and whitespace are ignored.
 */
export function toFixedPoint(text: string): number {
  const cleaned = text.replace(/[\s,$]/g, '')
  const match = DECIMAL_PATTERN.exec(cleaned)
  if (!match || (match[2] === '' && !match[3])) {
    throw new TypeError(`Not a decimal number: "${text}"`)
  }

  const [, sign, whole, fraction = ''] = match
  const magnitude = Number(`${whole || '0'}${fraction.padEnd(FRACTION_DIGITS, '0').slice(0, FRACTION_DIGITS)}`)
  if (!Number.isSafeInteger(magnitude)) {
    throw new RangeError(`Decimal out of range: "${text}"`)
  }
  if (magnitude === 0) return 0
  return sign === '-' ? -magnitude : magnitude
}

/**
 * Render a fixed-point integer as a decimal string.
 *
 * Trailing zeros are trimmed down to `minFractionDigits`:
 * `formatFixedPoint(20000)` is `"2"`, `formatFixedPoint(20000, 4)` is `"2.0000"`.
 */
export function formatFixedPoint(value: number, minFractionDigits = 0): string {
  if (!Number.isSafeInteger(value)) {
    throw new RangeError(`Fixed-point value must be an integer, got ${value}`)
  }

  const sign = value < 0 ? '-' : ''
  const magnitude = Math.abs(value)
  const whole = Math.floor(magnitude / FIXED_POINT_MULTIPLIER)
  let fraction = String(magnitude % FIXED_POINT_MULTIPLIER).padStart(FRACTION_DIGITS, '0')
  while (fraction.length > minFractionDigits && fraction.endsWith('0')) {
    fraction = fraction.slice(0, -1)
  }
  return fraction ? `${sign}${whole}.${fraction}` : `${sign}${whole}`
}
