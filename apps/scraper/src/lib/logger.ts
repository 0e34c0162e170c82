import { writeFileSync } from 'node:fs'

// ============================================
// Console
// ============================================

function timestamp() {
  return new Date().toISOString().split('T')[1].split('.')[0]
}

export function log(message: string) {
  console.log(`[${timestamp()}] ${message}`)
}

export function logError(message: string, error?: unknown) {
  if (error === undefined) {
    console.error(`[${timestamp()}] ${message}`)
    return
  }
  console.error(`[${timestamp()}] ${message}`, error)
}

// ============================================
// Run log
// ============================================

/**
 * Overwrite the run log with the outcome of this run.
 *
 * ELI5:
 * The scheduler that launches us keeps no output, so this file is the only
 * proof a run happened. It holds the latest run only.
 */
export function writeRunLog(path: string, program: string, error?: string) {
  const body = error === undefined ? `${program} ran successfully.\n` : `${program} ran; Error:\n${error}\n`
  writeFileSync(path, body, 'utf8')
}

// ============================================
// Progress
// ============================================

/** Sink for the incremental per-fund progress marks. */
export interface ProgressWriter {
  write(text: string): void
}

export const stdoutProgress: ProgressWriter = {
  write(text) {
    process.stdout.write(text)
  },
}

export const stderrProgress: ProgressWriter = {
  write(text) {
    process.stderr.write(text)
  },
}
