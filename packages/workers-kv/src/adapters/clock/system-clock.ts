import type { Clock, Milliseconds } from "../../ports/clock"

export class SystemClock implements Clock {
  now(): Date {
    return new Date()
  }

  nowMs(): Milliseconds {
    return Date.now()
  }
}
