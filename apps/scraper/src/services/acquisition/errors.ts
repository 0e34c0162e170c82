/**
 * Failures raised while reading the source site.
 *
 * ELI5:
 * - `CannotFindDateError` / `DifferentDateError` mean "don't trust anything
 *   on this page today" and end the run.
 * - `CannotMatchFundError` means the search showed the wrong fund; trying
 *   the same lookup again usually fixes it.
 */
export class AcquisitionError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'AcquisitionError'
  }
}

export class CannotFindDateError extends AcquisitionError {
  constructor(detail?: string) {
    super(detail ? `Cannot find date on source website: ${detail}` : 'Cannot find date on source website')
    this.name = 'CannotFindDateError'
  }
}

export class DifferentDateError extends AcquisitionError {
  sourceDate: string
  expectedDate: string

  constructor(sourceDate: string, expectedDate: string) {
    super(`Different dates. Source date: ${sourceDate}; Today's date: ${expectedDate}`)
    this.name = 'DifferentDateError'
    this.sourceDate = sourceDate
    this.expectedDate = expectedDate
  }
}

export class CannotMatchFundError extends AcquisitionError {
  fundName: string
  lookupCode: string
  foundName: string

  constructor(fundName: string, lookupCode: string, foundName: string) {
    super(
      `Fund name provided does not match what was searched. Fund name: ${fundName}; Fund look-up ID: ${lookupCode}; Found: ${foundName}`,
    )
    this.name = 'CannotMatchFundError'
    this.fundName = fundName
    this.lookupCode = lookupCode
    this.foundName = foundName
  }
}
