// Date helpers shared with the scraper
export * from './dates.js'
export * from './errors.js'

// Schema exports
export * from './schema/funds.js'
export * from './schema/dollar_changes.js'

export {
  FIXED_POINT_MULTIPLIER,
  TimeSeriesStore,
  schema,
  type ChangePoint,
  type FundRegistration,
  type TrackerDatabase,
} from './store.js'

import { TimeSeriesStore } from './store.js'

/** Default on-disk location, relative to the working directory. */
export const DEFAULT_DATABASE_PATH = 'funds.db'

/**
 * Open the store named by `DATABASE_PATH`, falling back to `funds.db`.
 */
export function openStore(path: string = process.env.DATABASE_PATH || DEFAULT_DATABASE_PATH): TimeSeriesStore {
  return TimeSeriesStore.open(path)
}
