import { chromium, errors } from 'playwright-core'
import { toFixedPoint } from '../../lib/fixed-point.js'
import { systemClock, type RequestThrottle, type ThrottleClock } from '../../lib/request-throttle.js'
import { CannotFindDateError, CannotMatchFundError, DifferentDateError } from './errors.js'
import { parseSourceDate } from './source-date.js'
import type { AcquisitionSession, AcquisitionSource } from './types.js'

/**
 * DOM hooks on the price-and-performance page.
 *
 * The page has no API; everything is read off the rendered listing.
 */
export const SOURCE_SELECTORS = {
  priceDate: '.AG_price_date',
  search: '#listing_search',
  fund: '.fund',
  fundName: '.fund_name',
  numeric: '.numeric',
} as const

/** Position of the dollar-change cell among a fund row's numeric cells. */
const DOLLAR_CHANGE_CELL = 1
const DATE_POLL_MS = 100

/**
 * The slice of Playwright's `Locator`, `Page` and `Browser` the source uses.
 * The real classes satisfy these structurally.
 */
export interface SourceLocator {
  first(): SourceLocator
  nth(index: number): SourceLocator
  locator(selector: string): SourceLocator
  waitFor(options: { state: 'attached'; timeout: number }): Promise<void>
  textContent(): Promise<string | null>
  innerText(options: { timeout: number }): Promise<string>
  clear(options: { timeout: number }): Promise<void>
  pressSequentially(text: string, options: { timeout: number }): Promise<void>
}

export interface SourcePage {
  goto(url: string): Promise<unknown>
  locator(selector: string): SourceLocator
}

export interface SourceBrowser {
  newPage(): Promise<SourcePage>
  close(): Promise<void>
}

export type BrowserSourceOptions = {
  url: string
  /** Shared throttle; every fund lookup goes through it. */
  throttle: RequestThrottle
  /** Pause after the page is validated and after each search. */
  settleDelayMs: number
  /** Upper bound for any single wait on the page. */
  waitTimeoutMs: number
  headless: boolean
  executablePath?: string
  clock?: ThrottleClock
  /** Defaults to launching Chromium with `headless` and `executablePath`. */
  launch?: () => Promise<SourceBrowser>
}

/**
 * Headless-browser driver for the source site.
 *
 * ELI5:
 * 1) open the page and wait for its "prices as of" date,
 * 2) refuse to continue unless that date is today,
 * 3) for each fund, type its code in the search box and read the row.
 */
export class BrowserAcquisitionSource implements AcquisitionSource {
  private readonly options: BrowserSourceOptions

  constructor(options: BrowserSourceOptions) {
    this.options = options
  }

  async openSession(expectedDate: string): Promise<AcquisitionSession> {
    const { url, headless, executablePath, settleDelayMs } = this.options
    const clock = this.options.clock ?? systemClock
    const launch = this.options.launch ?? (() => chromium.launch({ headless, executablePath }))
    const browser = await launch()

    try {
      const page = await browser.newPage()
      await page.goto(url)

      const asOfDate = await this.readAsOfDate(page, clock)
      if (asOfDate !== expectedDate) {
        // Weekend, holiday or the site has not rolled over yet.
        throw new DifferentDateError(asOfDate, expectedDate)
      }
      await clock.sleep(settleDelayMs)

      return new BrowserAcquisitionSession(browser, page, asOfDate, this.options, clock)
    } catch (error) {
      await browser.close()
      throw error
    }
  }

  private async readAsOfDate(page: SourcePage, clock: ThrottleClock): Promise<string> {
    const { waitTimeoutMs } = this.options
    const dateCell = page.locator(SOURCE_SELECTORS.priceDate).first()

    try {
      await dateCell.waitFor({ state: 'attached', timeout: waitTimeoutMs })
    } catch (error) {
      if (error instanceof errors.TimeoutError) {
        throw new CannotFindDateError()
      }
      throw error
    }

    // The element renders before its text is filled in.
    const deadline = clock.now() + waitTimeoutMs
    let text = ((await dateCell.textContent()) ?? '').trim()
    while (text === '') {
      if (clock.now() >= deadline) {
        throw new CannotFindDateError('as-of date stayed empty')
      }
      await clock.sleep(DATE_POLL_MS)
      text = ((await dateCell.textContent()) ?? '').trim()
    }

    const asOfDate = parseSourceDate(text)
    if (!asOfDate) {
      throw new CannotFindDateError(`unreadable as-of date "${text}"`)
    }
    return asOfDate
  }
}

class BrowserAcquisitionSession implements AcquisitionSession {
  readonly asOfDate: string
  private readonly browser: SourceBrowser
  private readonly search: SourceLocator
  private readonly firstFund: SourceLocator
  private readonly options: BrowserSourceOptions
  private readonly clock: ThrottleClock
  private closed = false

  constructor(browser: SourceBrowser, page: SourcePage, asOfDate: string, options: BrowserSourceOptions, clock: ThrottleClock) {
    this.browser = browser
    this.asOfDate = asOfDate
    this.options = options
    this.clock = clock
    this.search = page.locator(SOURCE_SELECTORS.search)
    this.firstFund = page.locator(SOURCE_SELECTORS.fund).first()
  }

  fetchDelta(fundName: string, lookupCode: string): Promise<number> {
    return this.options.throttle.throttle(() => this.lookUp(fundName, lookupCode))
  }

  private async lookUp(fundName: string, lookupCode: string): Promise<number> {
    const timeout = this.options.waitTimeoutMs

    // Typed key by key: the listing filters on key events, not on `input`.
    await this.search.clear({ timeout })
    await this.search.pressSequentially(lookupCode, { timeout })
    await this.clock.sleep(this.options.settleDelayMs)

    const nameText = await this.firstFund.locator(SOURCE_SELECTORS.fundName).first().innerText({ timeout })
    const foundName = nameText.split('\n', 1)[0].trim()
    if (foundName !== fundName) {
      throw new CannotMatchFundError(fundName, lookupCode, foundName)
    }

    const changeText = await this.firstFund.locator(SOURCE_SELECTORS.numeric).nth(DOLLAR_CHANGE_CELL).innerText({ timeout })
    return toFixedPoint(changeText)
  }

  async close(): Promise<void> {
    if (this.closed) return
    this.closed = true
    await this.browser.close()
  }
}
