/**
 * Capability boundary around the price source.
 *
 * The orchestrator only ever sees these two interfaces, so it can be driven
 * by a real browser in production and by an in-memory fake in tests.
 */

/** An open, date-validated connection to the source. */
export interface AcquisitionSession {
  /** As-of date the source reported, `YYYY-MM-DD`. */
  readonly asOfDate: string

  /**
   * Look one fund up and return its daily change as a fixed-point integer.
   *
   * @throws CannotMatchFundError when the source shows a different fund.
   */
  fetchDelta(fundName: string, lookupCode: string): Promise<number>

  /** Release the session. Idempotent. */
  close(): Promise<void>
}

export interface AcquisitionSource {
  /**
   * Open a session whose as-of date equals `expectedDate`.
   *
   * @throws CannotFindDateError when the as-of date never renders.
   * @throws DifferentDateError when the source is showing another day.
   */
  openSession(expectedDate: string): Promise<AcquisitionSession>
}
