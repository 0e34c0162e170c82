import { windowStart, type ChangePoint, type TimeSeriesStore } from '@etf-tracker/db'
import { formatFixedPoint } from '../lib/fixed-point.js'
import { stderrProgress, stdoutProgress, type ProgressWriter } from '../lib/logger.js'
import { CannotMatchFundError } from './acquisition/errors.js'
import type { AcquisitionSession, AcquisitionSource } from './acquisition/types.js'
import type { ManifestFund } from './manifest.js'
import { buildReport, type ReportTable } from './report.js'

export type FundFailure = {
  lookupCode: string
  error: CannotMatchFundError
}

export type CaptureOutcome = {
  /** lookupCode -> fixed-point delta, in manifest order. */
  deltas: Map<string, number>
  failures: FundFailure[]
}

export type DailyCaptureOptions = {
  funds: readonly ManifestFund[]
  source: AcquisitionSource
  /** Opened only after every fund has been fetched; closed before returning. */
  openStore: () => TimeSeriesStore
  /** `YYYY-MM-DD`; the source must agree on it. */
  today: string
  maxRetries: number
  trailingWindowYears: number
  progress?: ProgressWriter
  errors?: ProgressWriter
}

export type DailyCaptureResult = CaptureOutcome & {
  asOfDate: string
  windowStart: string
  report: ReportTable
}

/**
 * Fetch every fund's delta through one session.
 *
 * Progress is streamed as it happens: the fund name, an `x` per failed
 * attempt, then dots (more dots = fewer attempts needed) and the value.
 *
 * An identity mismatch on the last attempt gives up on that fund only. Any
 * other error on the last attempt is rethrown and ends the run.
 */
export async function captureDeltas(
  session: AcquisitionSession,
  funds: readonly ManifestFund[],
  maxRetries: number,
  progress: ProgressWriter = stdoutProgress,
  errors: ProgressWriter = stderrProgress,
): Promise<CaptureOutcome> {
  const deltas = new Map<string, number>()
  const failures: FundFailure[] = []

  for (const fund of funds) {
    progress.write(`${fund.name} `)

    for (let attempt = 0; attempt < maxRetries; attempt++) {
      const isLastAttempt = attempt + 1 === maxRetries
      try {
        const delta = await session.fetchDelta(fund.name, fund.lookupCode)
        deltas.set(fund.lookupCode, delta)
        progress.write(`${'.'.repeat(maxRetries - attempt)} ${formatFixedPoint(delta, 4)}\n`)
        break
      } catch (error) {
        progress.write(isLastAttempt ? 'x\n' : 'x')
        if (!isLastAttempt) continue

        if (error instanceof CannotMatchFundError) {
          errors.write(`Error: ${error.message}\n`)
          failures.push({ lookupCode: fund.lookupCode, error })
          break
        }
        throw error
      }
    }
  }

  return { deltas, failures }
}

/** Register every manifest fund, then append today's deltas. */
export function persistDeltas(
  store: TimeSeriesStore,
  funds: readonly ManifestFund[],
  deltas: ReadonlyMap<string, number>,
  date: string,
) {
  store.registerFunds(funds.map((fund) => ({ name: fund.name, lookupCode: fund.lookupCode })))
  for (const [lookupCode, delta] of deltas) {
    store.recordChange(lookupCode, delta, date)
  }
}

export function loadHistory(
  store: TimeSeriesStore,
  funds: readonly ManifestFund[],
  fromDate: string,
  toDate: string,
): Map<string, ChangePoint[]> {
  return new Map(funds.map((fund) => [fund.lookupCode, store.rangeQuery(fund.lookupCode, fromDate, toDate)]))
}

/**
 * One full daily run: validate the source date, fetch, store, report.
 *
 * The browser session is closed on every path out of the fetch loop and the
 * store is closed on every path out of the write/read phase. Session-level
 * failures (`CannotFindDateError`, `DifferentDateError`) propagate before
 * the store is ever opened.
 */
export async function runDailyCapture(options: DailyCaptureOptions): Promise<DailyCaptureResult> {
  const { funds, source, today, maxRetries } = options
  const progress = options.progress ?? stdoutProgress

  if (!Number.isInteger(maxRetries) || maxRetries < 1) {
    throw new RangeError(`maxRetries must be a positive integer, got ${maxRetries}`)
  }

  const session = await source.openSession(today)
  let outcome: CaptureOutcome
  try {
    progress.write(`Daily prices for ${session.asOfDate}:\n`)
    outcome = await captureDeltas(session, funds, maxRetries, progress, options.errors)
  } finally {
    await session.close()
  }

  const fromDate = windowStart(today, options.trailingWindowYears)
  const store = options.openStore()
  try {
    persistDeltas(store, funds, outcome.deltas, today)
    const history = loadHistory(store, funds, fromDate, today)

    return {
      ...outcome,
      asOfDate: session.asOfDate,
      windowStart: fromDate,
      report: buildReport(funds, history, fromDate, today),
    }
  } finally {
    store.close()
  }
}
