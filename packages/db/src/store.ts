import { readFileSync } from 'node:fs'
import Database from 'better-sqlite3'
import { and, asc, eq, gte, lte } from 'drizzle-orm'
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3'
import { isIsoDate, todayIso } from './dates.js'
import { UnknownFundError } from './errors.js'
import { dollarChanges } from './schema/dollar_changes.js'
import { funds, type Fund } from './schema/funds.js'

export const schema = { funds, dollarChanges }

export type TrackerDatabase = BetterSQLite3Database<typeof schema>

/** Multiplier between a decimal dollar change and its stored integer. */
export const FIXED_POINT_MULTIPLIER = 10_000

export type FundRegistration = {
  name: string
  lookupCode: string
}

/** One stored observation, as returned by range queries. */
export type ChangePoint = {
  date: string
  delta: number
}

const SCHEMA_SQL_URL = new URL('../sql/schema.sql', import.meta.url)
const DROP_SQL_URL = new URL('../sql/drop.sql', import.meta.url)

function assertIsoDate(label: string, value: string) {
  if (!isIsoDate(value)) {
    throw new RangeError(`${label} must be a YYYY-MM-DD date, got "${value}"`)
  }
}

/**
 * Append-only store of daily dollar changes keyed by (fund, date).
 *
 * Backed by a single SQLite file. Every mutation runs in SQLite's
 * autocommit mode, so it is durable as soon as the call returns.
 */
export class TimeSeriesStore {
  readonly db: TrackerDatabase
  private readonly client: Database.Database
  private closed = false

  constructor(client: Database.Database) {
    this.client = client
    this.db = drizzle(client, { schema })
  }

  /**
   * Open (or create) the store at `path`. `:memory:` gives a private
   * in-process database.
   */
  static open(path: string): TimeSeriesStore {
    const client = new Database(path)
    client.pragma('foreign_keys = ON')
    const store = new TimeSeriesStore(client)
    store.ensureSchema()
    return store
  }

  /** Create missing tables. Never touches existing data. */
  ensureSchema(): void {
    this.client.exec(readFileSync(SCHEMA_SQL_URL, 'utf8'))
  }

  /** Drop every table and recreate the empty schema. */
  reset(): void {
    this.client.exec(readFileSync(DROP_SQL_URL, 'utf8'))
    this.ensureSchema()
  }

  /**
   * Insert funds whose lookup code is not yet known; known codes are skipped.
   * Returns the number of funds actually inserted.
   */
  registerFunds(entries: readonly FundRegistration[]): number {
    if (entries.length === 0) return 0

    const result = this.db
      .insert(funds)
      .values(entries.map((entry) => ({ fundName: entry.name, fundLookup: entry.lookupCode })))
      .onConflictDoNothing({ target: funds.fundLookup })
      .run()
    return result.changes
  }

  registerFund(name: string, lookupCode: string): boolean {
    return this.registerFunds([{ name, lookupCode }]) === 1
  }

  /**
   * Append one observation. `delta` is the fixed-point integer, `date`
   * defaults to today's local date.
   *
   * @throws UnknownFundError when `lookupCode` is not registered.
   */
  recordChange(lookupCode: string, delta: number, date: string = todayIso()): void {
    if (!Number.isSafeInteger(delta)) {
      throw new RangeError(`delta must be an integer, got ${delta}`)
    }
    assertIsoDate('date', date)

    const fund = this.db
      .select({ fundId: funds.fundId })
      .from(funds)
      .where(eq(funds.fundLookup, lookupCode))
      .get()
    if (!fund) {
      throw new UnknownFundError(lookupCode)
    }

    this.db.insert(dollarChanges).values({ date, fundId: fund.fundId, dollarChange: delta }).run()
  }

  /**
   * Observations for one fund with `fromDate <= date <= toDate`, oldest
   * first. Same-day duplicates come back in insertion order.
   */
  rangeQuery(lookupCode: string, fromDate: string, toDate: string): ChangePoint[] {
    assertIsoDate('fromDate', fromDate)
    assertIsoDate('toDate', toDate)

    return this.db
      .select({ date: dollarChanges.date, delta: dollarChanges.dollarChange })
      .from(dollarChanges)
      .innerJoin(funds, eq(funds.fundId, dollarChanges.fundId))
      .where(
        and(
          eq(funds.fundLookup, lookupCode),
          gte(dollarChanges.date, fromDate),
          lte(dollarChanges.date, toDate),
        ),
      )
      .orderBy(asc(dollarChanges.date), asc(dollarChanges.dollarChangeId))
      .all()
  }

  listFunds(): Fund[] {
    return this.db.select().from(funds).orderBy(asc(funds.fundId)).all()
  }

  /** Safe to call more than once. */
  close(): void {
    if (this.closed) return
    this.closed = true
    this.client.close()
  }
}
