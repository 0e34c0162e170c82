import 'dotenv/config'
import { z } from 'zod'

/**
 * Runtime configuration.
 *
 * Every knob has a default, so a bare checkout runs with no `.env` at all.
 * Values come from `process.env` (after `.env` is loaded) and are validated
 * once, up front, so a typo fails the run before a browser is launched.
 */

const booleanFromEnv = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1')

export const configSchema = z.object({
  /** SQLite file holding funds and dollar changes. */
  DATABASE_PATH: z.string().min(1).default('funds.db'),
  /** Run log, overwritten on every run that reaches a verdict. */
  RUN_LOG_PATH: z.string().min(1).default('output.log'),
  /** Price-and-performance page that lists every fund. */
  SOURCE_URL: z.string().url().default('https://www.fidelity.ca/fidca/en/priceandperformance'),
  /** Minimum gap between two fund lookups, also used as the settle delay. */
  REQUEST_DELAY_MS: z.coerce.number().int().nonnegative().default(3000),
  /** How long to wait for the as-of date to render. */
  DATE_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  /** Attempts per fund before giving up on it. */
  MAX_RETRIES: z.coerce.number().int().positive().default(3),
  /** Length of the history window written to the report. */
  TRAILING_WINDOW_YEARS: z.coerce.number().int().positive().default(1),
  /** Chromium/Chrome binary; playwright-core ships no browser of its own. */
  BROWSER_EXECUTABLE_PATH: z.string().min(1).optional(),
  BROWSER_HEADLESS: booleanFromEnv.default('true'),
})

export type AppConfig = {
  databasePath: string
  runLogPath: string
  sourceUrl: string
  requestDelayMs: number
  dateTimeoutMs: number
  maxRetries: number
  trailingWindowYears: number
  browserExecutablePath?: string
  browserHeadless: boolean
}

export class ConfigError extends Error {
  issues: string[]

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`)
    this.name = 'ConfigError'
    this.issues = issues
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = configSchema.safeParse(env)
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`))
  }

  const values = parsed.data
  return {
    databasePath: values.DATABASE_PATH,
    runLogPath: values.RUN_LOG_PATH,
    sourceUrl: values.SOURCE_URL,
    requestDelayMs: values.REQUEST_DELAY_MS,
    dateTimeoutMs: values.DATE_TIMEOUT_MS,
    maxRetries: values.MAX_RETRIES,
    trailingWindowYears: values.TRAILING_WINDOW_YEARS,
    browserExecutablePath: values.BROWSER_EXECUTABLE_PATH,
    browserHeadless: values.BROWSER_HEADLESS,
  }
}
