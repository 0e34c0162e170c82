import { integer, sqliteTable, text } from 'drizzle-orm/sqlite-core'

/**
 * Funds tracked by the scraper.
 *
 * `fund_lookup` is the code typed into the source site's search box and is
 * the fund's identity everywhere else in the system. Rows are created on
 * first mention in a manifest and never deleted.
 */
export const funds = sqliteTable('funds', {
  fundId: integer('fund_id').primaryKey(),

  /** Display name exactly as the source site prints it. */
  fundName: text('fund_name').notNull(),

  /** Lookup code, unique per fund. */
  fundLookup: text('fund_lookup').notNull().unique(),
})

export type Fund = typeof funds.$inferSelect
export type NewFund = typeof funds.$inferInsert
