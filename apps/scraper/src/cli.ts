#!/usr/bin/env tsx
import { realpathSync } from 'node:fs'
import { pathToFileURL } from 'node:url'
import { openStore, todayIso } from '@etf-tracker/db'
import { loadConfig, type AppConfig } from './config.js'
import { log, logError, writeRunLog } from './lib/logger.js'
import { RequestThrottle } from './lib/request-throttle.js'
import { BrowserAcquisitionSource } from './services/acquisition/browser-source.js'
import { CannotFindDateError, DifferentDateError } from './services/acquisition/errors.js'
import type { AcquisitionSource } from './services/acquisition/types.js'
import { runDailyCapture } from './services/daily-capture.js'
import { readManifest } from './services/manifest.js'
import { DEFAULT_REPORT_PATH, writeReport } from './services/report.js'

export const PROGRAM_NAME = 'etf-tracker'

export const EXIT_CODES = {
  success: 0,
  fatal: 1,
  usage: -1,
  cannotFindDate: -2,
  differentDate: -3,
} as const

export const USAGE = [
  `Usage: ${PROGRAM_NAME} run <funds.csv> [${DEFAULT_REPORT_PATH}]`,
  `       ${PROGRAM_NAME} init`,
].join('\n')

export type CliDependencies = {
  config?: AppConfig
  /** Replaces the browser-backed source (tests). */
  source?: AcquisitionSource
  now?: () => Date
}

function createBrowserSource(config: AppConfig): AcquisitionSource {
  return new BrowserAcquisitionSource({
    url: config.sourceUrl,
    throttle: new RequestThrottle(config.requestDelayMs),
    settleDelayMs: config.requestDelayMs,
    waitTimeoutMs: config.dateTimeoutMs,
    headless: config.browserHeadless,
    executablePath: config.browserExecutablePath,
  })
}

function usageError(message: string): number {
  process.stderr.write(`${message}\n${USAGE}\n`)
  return EXIT_CODES.usage
}

async function runCommand(args: string[], config: AppConfig, deps: CliDependencies): Promise<number> {
  if (args.length < 1) {
    return usageError(`Not enough arguments given. Expected a manifest path, got ${args.length} arguments`)
  }

  const [manifestPath, outputPath = DEFAULT_REPORT_PATH] = args
  const funds = readManifest(manifestPath)
  const today = todayIso(deps.now ? deps.now() : new Date())

  try {
    const result = await runDailyCapture({
      funds,
      source: deps.source ?? createBrowserSource(config),
      openStore: () => openStore(config.databasePath),
      today,
      maxRetries: config.maxRetries,
      trailingWindowYears: config.trailingWindowYears,
    })

    writeReport(outputPath, result.report)
    log(
      `Captured ${result.deltas.size}/${funds.length} funds for ${today}; ` +
        `wrote ${result.report.rows.length} rows to ${outputPath}`,
    )
  } catch (error) {
    if (error instanceof CannotFindDateError || error instanceof DifferentDateError) {
      writeRunLog(config.runLogPath, PROGRAM_NAME, error.message)
      logError(error.message)
      return error instanceof CannotFindDateError ? EXIT_CODES.cannotFindDate : EXIT_CODES.differentDate
    }
    throw error
  }

  writeRunLog(config.runLogPath, PROGRAM_NAME)
  return EXIT_CODES.success
}

function initCommand(config: AppConfig): number {
  const store = openStore(config.databasePath)
  try {
    store.reset()
  } finally {
    store.close()
  }
  log(`Initialized empty database at ${config.databasePath}`)
  return EXIT_CODES.success
}

/**
 * CLI entry point. Resolves to the process exit code; unexpected failures
 * reject and are reported by the caller.
 */
export async function main(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const [command, ...args] = argv

  switch (command) {
    case 'run':
      return runCommand(args, deps.config ?? loadConfig(), deps)
    case 'init':
      return initCommand(deps.config ?? loadConfig())
    case undefined:
      return usageError('Not enough arguments given. Expected a command')
    default:
      return usageError(`Unknown command "${command}"`)
  }
}

const isDirectRun = (() => {
  const argv1 = process.argv[1]
  if (!argv1) return false
  try {
    return import.meta.url === pathToFileURL(realpathSync(argv1)).href
  } catch {
    return false
  }
})()

if (isDirectRun) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code
    })
    .catch((error) => {
      logError('Run failed:', error)
      process.exitCode = EXIT_CODES.fatal
    })
}
