import { writeFileSync } from 'node:fs'
import { stringify } from 'csv-stringify/sync'
import { eachIsoDay, type ChangePoint } from '@etf-tracker/db'
import { formatFixedPoint } from '../lib/fixed-point.js'
import type { ManifestFund } from './manifest.js'

export const DEFAULT_REPORT_PATH = 'ETFs.csv'

export type ReportTable = {
  header: string[]
  rows: string[][]
}

/**
 * Lay the trailing window out as a dense calendar.
 *
 * One row per day in `[fromDate, toDate]` on which at least one fund has a
 * value, one column per fund in manifest order, blank where a fund has no
 * value that day. If a day was ingested twice, the later row wins.
 */
export function buildReport(
  funds: readonly ManifestFund[],
  history: ReadonlyMap<string, readonly ChangePoint[]>,
  fromDate: string,
  toDate: string,
): ReportTable {
  const byFund = funds.map((fund) => {
    const byDate = new Map<string, number>()
    for (const point of history.get(fund.lookupCode) ?? []) {
      byDate.set(point.date, point.delta)
    }
    return byDate
  })

  const rows: string[][] = []
  for (const day of eachIsoDay(fromDate, toDate)) {
    const cells = byFund.map((byDate) => {
      const delta = byDate.get(day)
      return delta === undefined ? '' : formatFixedPoint(delta)
    })
    if (cells.some((cell) => cell !== '')) {
      rows.push([day, ...cells])
    }
  }

  return {
    header: ['Date', ...funds.map((fund) => fund.simplifiedName)],
    rows,
  }
}

export function renderReport(report: ReportTable): string {
  return stringify([report.header, ...report.rows], { record_delimiter: '\n' })
}

export function writeReport(path: string, report: ReportTable) {
  writeFileSync(path, renderReport(report), 'utf8')
}
