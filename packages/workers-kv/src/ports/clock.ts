export type Milliseconds = number

/** Whole seconds since the Unix epoch, the unit the host uses for expiration. */
export type UnixSeconds = number

export interface Clock {
  /**
   * Current time as a Date object.
   *
   * @remarks
   * Avoid for arithmetic; prefer `nowMs()` for calculations.
   */
  now(): Date

  /** Current time as milliseconds since Unix epoch. */
  nowMs(): Milliseconds
}
