import type { Clock, Milliseconds } from "../../ports/clock"

/**
 * Manually driven clock for tests and local runs of `MemoryKvNamespace`.
 */
export class FakeClock implements Clock {
  private time: Milliseconds

  constructor(start: Milliseconds = 0) {
    this.time = start
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): Milliseconds {
    return this.time
  }

  advance(ms: Milliseconds): void {
    this.time = this.time + ms
  }

  set(ms: Milliseconds): void {
    this.time = ms
  }
}
