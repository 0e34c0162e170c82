import { format, isValid, parse } from 'date-fns'
import { ISO_DATE_FORMAT } from '@etf-tracker/db'

/** How the source prints its as-of date, e.g. `04-Sep-2021`. */
export const SOURCE_DATE_FORMAT = 'dd-MMM-yyyy'

/** Convert the source's as-of date to `YYYY-MM-DD`, or null if unreadable. */
export function parseSourceDate(text: string): string | null {
  const parsed = parse(text.trim(), SOURCE_DATE_FORMAT, new Date(0))
  return isValid(parsed) ? format(parsed, ISO_DATE_FORMAT) : null
}
