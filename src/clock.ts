/**
 * Clock
 *
 * Source of "now" for the poller and evaluator. Injected so tests and
 * simulations can drive time explicitly.
 */

import type { LocalDateTime } from './time-date'
import { addSeconds, fromJsDate } from './time-date'

export type Clock = {
  now(): LocalDateTime
}

/** Host wall-clock time, read in the local timezone */
export const systemClock: Clock = {
  now() {
    return fromJsDate(new Date())
  },
}

export type ManualClock = Clock & {
  set(now: LocalDateTime): void
  advanceSeconds(n: number): LocalDateTime
}

export function createManualClock(start: LocalDateTime): ManualClock {
  let current = start
  return {
    now() {
      return current
    },
    set(now) {
      current = now
    },
    advanceSeconds(n) {
      current = addSeconds(current, n)
      return current
    },
  }
}
