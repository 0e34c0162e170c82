import { readFileSync } from 'node:fs'
import { parse } from 'csv-parse/sync'
import { z } from 'zod'

/**
 * Fund manifest: the list of funds to track, in report-column order.
 *
 * File shape (first line is a header and is ignored):
 *
 *   name,lookupCode,simplifiedName
 *   Fidelity Global Equity ETF,FGEQ,Global Equity
 *   Fidelity Core Bond ETF,FCBD,
 */

export type ManifestFund = {
  /** Name exactly as the source prints it; used to verify lookups. */
  name: string
  lookupCode: string
  /** Report column header; defaults to `name`. */
  simplifiedName: string
}

export class ManifestError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ManifestError'
  }
}

const parsedRowsSchema = z.array(
  z.object({
    record: z.array(z.string()),
    info: z.object({ lines: z.number() }),
  }),
)

const manifestFundSchema = z
  .object({
    name: z.string().min(1, 'fund name is empty'),
    lookupCode: z
      .string()
      .min(1, 'lookup code is empty')
      .regex(/^\S+$/, 'lookup code must not contain whitespace'),
    simplifiedName: z.string().optional(),
  })
  .transform(
    (fund): ManifestFund => ({
      name: fund.name,
      lookupCode: fund.lookupCode,
      simplifiedName: fund.simplifiedName || fund.name,
    }),
  )

function parseRows(text: string) {
  let rows: unknown
  try {
    rows = parse(text, {
      from_line: 2,
      info: true,
      relax_column_count: true,
      skip_empty_lines: true,
      trim: true,
    })
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new ManifestError(`Manifest is not valid CSV: ${reason}`)
  }
  return parsedRowsSchema.parse(rows)
}

/**
 * Parse manifest text. Later rows repeating a lookup code are dropped so
 * each fund is fetched and reported once.
 */
export function parseManifest(text: string): ManifestFund[] {
  const funds: ManifestFund[] = []
  const seen = new Set<string>()

  for (const { record, info } of parseRows(text)) {
    if (record.length < 2 || record.length > 3) {
      throw new ManifestError(`Manifest line ${info.lines}: expected 2 or 3 fields, got ${record.length}`)
    }

    const [name, lookupCode, simplifiedName] = record
    const result = manifestFundSchema.safeParse({ name, lookupCode, simplifiedName })
    if (!result.success) {
      const reasons = result.error.issues.map((issue) => issue.message).join('; ')
      throw new ManifestError(`Manifest line ${info.lines}: ${reasons}`)
    }

    if (seen.has(result.data.lookupCode)) continue
    seen.add(result.data.lookupCode)
    funds.push(result.data)
  }

  return funds
}

export function readManifest(path: string): ManifestFund[] {
  let text: string
  try {
    text = readFileSync(path, 'utf8')
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new ManifestError(`Cannot read manifest ${path}: ${reason}`)
  }
  return parseManifest(text)
}
