/**
 * Supervisor
 *
 * Keeps a reminder service monitoring for the lifetime of the host. A periodic
 * health check restarts the service when its loop is not running, with a
 * cooldown between restarts and a cap on how many it will attempt.
 */

import type { ReminderService } from './reminder-service'
import { type Logger, silentLogger } from './logger'
import { ConfigError, errorMessage } from './errors'

export type SupervisorOptions = {
  /** Minimum time between two restarts (default 5 minutes) */
  restartCooldownMs?: number
  /** Restarts attempted before giving up (default 10) */
  maxRestarts?: number
  /** How often health is checked (default 60 s) */
  checkIntervalMs?: number
  logger?: Logger
  keepAlive?: boolean
}

export type SupervisorStatus = {
  watching: boolean
  restarts: number
  lastRestartAt: number | null
  gaveUp: boolean
}

export type Supervisor = {
  /** Start the service and begin health checks */
  start(): void
  /** Stop health checks, then the service */
  stop(): Promise<void>
  /** Run one health check now; resolves true when the service was restarted */
  check(): Promise<boolean>
  status(): SupervisorStatus
}

export function createSupervisor(service: ReminderService, opts: SupervisorOptions = {}): Supervisor {
  const restartCooldownMs = opts.restartCooldownMs ?? 300_000
  const maxRestarts = opts.maxRestarts ?? 10
  const checkIntervalMs = opts.checkIntervalMs ?? 60_000
  const logger = opts.logger ?? silentLogger
  const keepAlive = opts.keepAlive ?? true

  if (!Number.isInteger(maxRestarts) || maxRestarts < 0) {
    throw new ConfigError(`maxRestarts must be a non-negative integer, got ${maxRestarts}`)
  }
  if (!(checkIntervalMs > 0)) {
    throw new ConfigError(`checkIntervalMs must be positive, got ${checkIntervalMs}`)
  }

  let watching = false
  let timer: ReturnType<typeof setInterval> | null = null
  let restarts = 0
  let lastRestartAt: number | null = null
  let gaveUp = false

  async function check(): Promise<boolean> {
    if (!watching) return false
    const health = service.health()
    if (!health.enabled || health.running) return false

    if (restarts >= maxRestarts) {
      if (!gaveUp) {
        gaveUp = true
        logger.error(`Monitoring is down and ${maxRestarts} restarts were used up; not restarting again`)
      }
      return false
    }

    const now = Date.now()
    if (lastRestartAt !== null && now - lastRestartAt < restartCooldownMs) {
      logger.debug(`Monitoring is down; next restart allowed in ${restartCooldownMs - (now - lastRestartAt)} ms`)
      return false
    }

    restarts++
    lastRestartAt = now
    logger.warn(
      `Monitoring is not running (last error: ${health.lastError ?? 'none'}), restarting (${restarts}/${maxRestarts})`
    )
    await service.stop()
    service.start()
    return true
  }

  return {
    start() {
      if (watching) return
      watching = true
      service.start()
      timer = setInterval(() => {
        check().catch((e: unknown) => {
          logger.error(`Health check failed: ${errorMessage(e)}`)
        })
      }, checkIntervalMs)
      if (!keepAlive) timer.unref()
    },

    async stop() {
      watching = false
      if (timer) {
        clearInterval(timer)
        timer = null
      }
      await service.stop()
    },

    check,

    status() {
      return { watching, restarts, lastRestartAt, gaveUp }
    },
  }
}
