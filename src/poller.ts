/**
 * Clock/Poller
 *
 * A single cooperative timer loop that drives evaluation at a fixed interval,
 * independent of task count. Ticks are chained with setTimeout so they never
 * overlap, and a failing tick is logged and counted without ending the loop.
 */

import type { LocalDateTime } from './time-date'
import { type Clock, systemClock } from './clock'
import { type Logger, silentLogger } from './logger'
import { ConfigError, errorMessage } from './errors'
import { MAX_POLL_INTERVAL_SECONDS } from './config'

export type PollerOptions = {
  intervalMs: number
  onTick: () => void | Promise<void>
  logger?: Logger
  clock?: Clock
  /**
   * Keep the Node event loop alive while started (default true), so closing a
   * UI does not end monitoring; only stop() does.
   */
  keepAlive?: boolean
}

export type PollerHealth = {
  /** True while started and a tick is either pending or in flight */
  running: boolean
  ticks: number
  lastTickAt: LocalDateTime | null
  lastSuccessAt: LocalDateTime | null
  consecutiveFailures: number
  lastError: string | null
}

export type Poller = {
  /** Begin ticking; the first tick runs immediately. No-op when already started. */
  start(): void
  /** Cancel the pending tick and wait for an in-flight one. Safe when never started. */
  stop(): Promise<void>
  isRunning(): boolean
  health(): PollerHealth
}

export function createPoller(opts: PollerOptions): Poller {
  const { intervalMs, onTick } = opts
  const logger = opts.logger ?? silentLogger
  const clock = opts.clock ?? systemClock
  const keepAlive = opts.keepAlive ?? true

  if (!Number.isFinite(intervalMs) || intervalMs <= 0 || intervalMs > MAX_POLL_INTERVAL_SECONDS * 1000) {
    throw new ConfigError(`Poll interval must be in (0, ${MAX_POLL_INTERVAL_SECONDS * 1000}] ms, got ${intervalMs}`)
  }

  let started = false
  let generation = 0
  let timer: ReturnType<typeof setTimeout> | null = null
  let inFlight: Promise<void> | null = null

  const stats: Omit<PollerHealth, 'running'> = {
    ticks: 0,
    lastTickAt: null,
    lastSuccessAt: null,
    consecutiveFailures: 0,
    lastError: null,
  }

  async function executeTick(): Promise<void> {
    stats.ticks++
    try {
      stats.lastTickAt = clock.now()
      await onTick()
      stats.consecutiveFailures = 0
      stats.lastSuccessAt = stats.lastTickAt
      stats.lastError = null
    } catch (e) {
      stats.consecutiveFailures++
      stats.lastError = errorMessage(e)
      logger.error(`Tick failed (${stats.consecutiveFailures} in a row): ${stats.lastError}`)
    }
  }

  function schedule(gen: number): void {
    timer = setTimeout(() => {
      timer = null
      void runTick(gen)
    }, intervalMs)
    if (!keepAlive) timer.unref()
  }

  async function runTick(gen: number): Promise<void> {
    if (!started || gen !== generation) return
    const tick = executeTick()
    inFlight = tick
    try {
      await tick
    } finally {
      if (inFlight === tick) inFlight = null
    }
    if (started && gen === generation) schedule(gen)
  }

  return {
    start() {
      if (started) return
      started = true
      generation++
      logger.debug(`Poller started (every ${intervalMs} ms)`)
      void runTick(generation)
    },

    async stop() {
      if (!started && !inFlight) return
      started = false
      generation++
      if (timer) {
        clearTimeout(timer)
        timer = null
      }
      if (inFlight) await inFlight
      logger.debug('Poller stopped')
    },

    isRunning() {
      return started
    },

    health() {
      return {
        running: started && (timer !== null || inFlight !== null),
        ...stats,
      }
    },
  }
}
