import { index, integer, sqliteTable, text } from 'drizzle-orm/sqlite-core'
import { funds } from './funds.js'

/**
 * One fund's price change for one trading day.
 *
 * ELI5:
 * Money is never stored as a float. `dollar_change` holds ten-thousandths
 * of a dollar, so `1.2050` is stored as `12050` and reads back exactly.
 *
 * There is deliberately no unique key on (fund_id, date): the table is an
 * append-only log and the caller runs ingestion once per day.
 */
export const dollarChanges = sqliteTable(
  'dollar_changes',
  {
    dollarChangeId: integer('dollar_change_id').primaryKey(),

    /** Calendar day in `YYYY-MM-DD`; sorts correctly as text. */
    date: text('date').notNull(),

    fundId: integer('fund_id')
      .notNull()
      .references(() => funds.fundId, { onUpdate: 'cascade', onDelete: 'cascade' }),

    dollarChange: integer('dollar_change').notNull(),
  },
  (table) => ({
    fundDateIdx: index('dollar_changes_fund_date_idx').on(table.fundId, table.date),
  }),
)

export type DollarChange = typeof dollarChanges.$inferSelect
export type NewDollarChange = typeof dollarChanges.$inferInsert
