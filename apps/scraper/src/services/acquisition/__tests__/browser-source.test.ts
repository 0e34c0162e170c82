/**
 * @fileoverview Browser acquisition source tests
 *
 * @description
 * Runs the browser-backed source against a scripted page: the as-of date
 * cell, the search box and the first listing row are answered from plain
 * data, and every sleep goes through a virtual clock.
 *
 * @architecture
 * Tests: apps/scraper/src/services/acquisition/__tests__/browser-source.test.ts
 * Tests: browser-source.ts
 */

import { errors } from 'playwright-core'
import { describe, expect, it } from 'vitest'
import { RequestThrottle, type ThrottleClock } from '../../../lib/request-throttle.js'
import {
  BrowserAcquisitionSource,
  type SourceBrowser,
  type SourceLocator,
  type SourcePage,
} from '../browser-source.js'
import { CannotFindDateError, CannotMatchFundError, DifferentDateError } from '../errors.js'

type ListingRow = { name: string; numerics: string[] }

type PageScript = {
  /** Successive reads of the date cell; the last one repeats. */
  dateTexts?: string[]
  /** Thrown by the wait for the date cell to attach. */
  dateWaitError?: Error
  rows?: Record<string, ListingRow>
}

class ScriptedPage implements SourcePage {
  readonly visited: string[] = []
  readonly searchActions: string[] = []
  private readonly script: PageScript
  private dateReads = 0
  private searchText = ''

  constructor(script: PageScript) {
    this.script = script
  }

  async goto(url: string): Promise<unknown> {
    this.visited.push(url)
    return null
  }

  locator(selector: string): SourceLocator {
    return new ScriptedLocator(this, [selector])
  }

  waitFor(path: string) {
    if (path !== '.AG_price_date first') throw new Error(`Unexpected wait on ${path}`)
    if (this.script.dateWaitError) throw this.script.dateWaitError
  }

  textContent(path: string): string | null {
    if (path !== '.AG_price_date first') throw new Error(`Unexpected read of ${path}`)
    const texts = this.script.dateTexts ?? ['04-Sep-2021']
    const text = texts[Math.min(this.dateReads, texts.length - 1)]
    this.dateReads++
    return text
  }

  innerText(path: string): string {
    const row = this.script.rows?.[this.searchText]
    if (!row) throw new Error(`No listing row for "${this.searchText}"`)
    if (path === '.fund first .fund_name first') return row.name
    if (path === '.fund first .numeric nth=1') return row.numerics[1]
    throw new Error(`Unexpected read of ${path}`)
  }

  clear(path: string) {
    if (path !== '#listing_search') throw new Error(`Unexpected clear of ${path}`)
    this.searchActions.push('clear')
    this.searchText = ''
  }

  type(path: string, text: string) {
    if (path !== '#listing_search') throw new Error(`Unexpected typing into ${path}`)
    this.searchActions.push(`type:${text}`)
    this.searchText += text
  }
}

class ScriptedLocator implements SourceLocator {
  private readonly page: ScriptedPage
  private readonly path: string[]

  constructor(page: ScriptedPage, path: string[]) {
    this.page = page
    this.path = path
  }

  private get key() {
    return this.path.join(' ')
  }

  first(): SourceLocator {
    return new ScriptedLocator(this.page, [...this.path, 'first'])
  }

  nth(index: number): SourceLocator {
    return new ScriptedLocator(this.page, [...this.path, `nth=${index}`])
  }

  locator(selector: string): SourceLocator {
    return new ScriptedLocator(this.page, [...this.path, selector])
  }

  async waitFor(): Promise<void> {
    this.page.waitFor(this.key)
  }

  async textContent(): Promise<string | null> {
    return this.page.textContent(this.key)
  }

  async innerText(): Promise<string> {
    return this.page.innerText(this.key)
  }

  async clear(): Promise<void> {
    this.page.clear(this.key)
  }

  async pressSequentially(text: string): Promise<void> {
    this.page.type(this.key, text)
  }
}

class ScriptedBrowser implements SourceBrowser {
  readonly page: ScriptedPage
  closeCalls = 0

  constructor(script: PageScript) {
    this.page = new ScriptedPage(script)
  }

  async newPage(): Promise<SourcePage> {
    return this.page
  }

  async close(): Promise<void> {
    this.closeCalls++
  }
}

function virtualClock() {
  let now = 0
  const sleeps: number[] = []
  const clock: ThrottleClock = {
    now: () => now,
    sleep: async (ms) => {
      sleeps.push(ms)
      now += ms
    },
  }
  return { clock, sleeps }
}

function createSource(script: PageScript, waitTimeoutMs = 1000) {
  const { clock, sleeps } = virtualClock()
  const browser = new ScriptedBrowser(script)
  const throttle = new RequestThrottle(1000, clock)
  const source = new BrowserAcquisitionSource({
    url: 'https://prices.example.test/etfs',
    throttle,
    settleDelayMs: 500,
    waitTimeoutMs,
    headless: true,
    clock,
    launch: async () => browser,
  })
  return { source, browser, throttle, sleeps }
}

describe('BrowserAcquisitionSource.openSession', () => {
  it('should open a session when the as-of date is today', async () => {
    const { source, browser, sleeps } = createSource({ dateTexts: ['04-Sep-2021'] })

    const session = await source.openSession('2021-09-04')

    expect(session.asOfDate).toBe('2021-09-04')
    expect(browser.page.visited).toEqual(['https://prices.example.test/etfs'])
    expect(sleeps).toEqual([500])
    expect(browser.closeCalls).toBe(0)
  })

  it('should poll the date cell until its text is filled in', async () => {
    const { source, sleeps } = createSource({ dateTexts: ['', '  ', '04-Sep-2021'] })

    const session = await source.openSession('2021-09-04')

    expect(session.asOfDate).toBe('2021-09-04')
    expect(sleeps).toEqual([100, 100, 500])
  })

  it('should give up with CannotFindDateError when the date stays empty', async () => {
    const { source, browser, sleeps } = createSource({ dateTexts: [''] }, 1000)

    const opening = source.openSession('2021-09-04')

    await expect(opening).rejects.toBeInstanceOf(CannotFindDateError)
    await expect(opening).rejects.toThrow('Cannot find date on source website: as-of date stayed empty')
    expect(sleeps).toHaveLength(10)
    expect(browser.closeCalls).toBe(1)
  })

  it('should turn a timeout on the date cell into CannotFindDateError and close the browser', async () => {
    const { source, browser } = createSource({
      dateWaitError: new errors.TimeoutError('Timeout 1000ms exceeded.'),
    })

    const opening = source.openSession('2021-09-04')

    await expect(opening).rejects.toBeInstanceOf(CannotFindDateError)
    await expect(opening).rejects.toThrow(/^Cannot find date on source website$/)
    expect(browser.closeCalls).toBe(1)
  })

  it('should pass other wait failures through unchanged and close the browser', async () => {
    const failure = new Error('Target page, context or browser has been closed')
    const { source, browser } = createSource({ dateWaitError: failure })

    await expect(source.openSession('2021-09-04')).rejects.toBe(failure)
    expect(browser.closeCalls).toBe(1)
  })

  it('should reject unreadable date text with CannotFindDateError', async () => {
    const { source, browser } = createSource({ dateTexts: ['Sept 4'] })

    await expect(source.openSession('2021-09-04')).rejects.toThrow(
      'Cannot find date on source website: unreadable as-of date "Sept 4"',
    )
    expect(browser.closeCalls).toBe(1)
  })

  it('should raise DifferentDateError for another day and close the browser', async () => {
    const { source, browser, sleeps } = createSource({ dateTexts: ['03-Sep-2021'] })

    const opening = source.openSession('2021-09-04')

    await expect(opening).rejects.toBeInstanceOf(DifferentDateError)
    await expect(opening).rejects.toMatchObject({ sourceDate: '2021-09-03', expectedDate: '2021-09-04' })
    expect(sleeps).toEqual([])
    expect(browser.closeCalls).toBe(1)
  })
})

describe('BrowserAcquisitionSession', () => {
  const rows: Record<string, ListingRow> = {
    XIU: { name: 'iShares Core S&P/TSX\nXIU', numerics: ['31.42', '-0.0123', '-0.04%'] },
    ZSP: { name: 'BMO S&P 500 Index ETF', numerics: ['70.10', '0.5', '0.71%'] },
  }

  it('should clear the search box, type the code and read the dollar-change cell', async () => {
    const { source, browser } = createSource({ rows })
    const session = await source.openSession('2021-09-04')

    await expect(session.fetchDelta('iShares Core S&P/TSX', 'XIU')).resolves.toBe(-123)
    await expect(session.fetchDelta('BMO S&P 500 Index ETF', 'ZSP')).resolves.toBe(5000)
    expect(browser.page.searchActions).toEqual(['clear', 'type:XIU', 'clear', 'type:ZSP'])
  })

  it('should space lookups through the shared throttle', async () => {
    const { source, throttle, sleeps } = createSource({ rows })
    const session = await source.openSession('2021-09-04')

    await session.fetchDelta('iShares Core S&P/TSX', 'XIU')
    await session.fetchDelta('BMO S&P 500 Index ETF', 'ZSP')

    // open settle, first search settle, throttle wait, second search settle
    expect(sleeps).toEqual([500, 500, 500, 500])
    expect(throttle.lastRequestAt).toBe(1500)
  })

  it('should raise CannotMatchFundError when the row shows another fund', async () => {
    const { source } = createSource({
      rows: { XIU: { name: 'Some Other Fund\nXIU', numerics: ['1', '2', '3'] } },
    })
    const session = await source.openSession('2021-09-04')

    const lookup = session.fetchDelta('iShares Core S&P/TSX', 'XIU')

    await expect(lookup).rejects.toBeInstanceOf(CannotMatchFundError)
    await expect(lookup).rejects.toMatchObject({
      fundName: 'iShares Core S&P/TSX',
      lookupCode: 'XIU',
      foundName: 'Some Other Fund',
    })
  })

  it('should close the browser only once', async () => {
    const { source, browser } = createSource({ rows })
    const session = await source.openSession('2021-09-04')

    await session.close()
    await session.close()

    expect(browser.closeCalls).toBe(1)
  })
})
