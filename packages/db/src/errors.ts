/**
 * Raised when a change is recorded for a lookup code that was never
 * registered. Nothing is written.
 */
export class UnknownFundError extends Error {
  lookupCode: string

  constructor(lookupCode: string) {
    super(`No fund registered with lookup code "${lookupCode}"`)
    this.name = 'UnknownFundError'
    this.lookupCode = lookupCode
  }
}
