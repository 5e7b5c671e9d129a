/**
 * Reminder Service
 *
 * Wires the poller, evaluator, dedup store and notifier together. Each tick
 * reads a snapshot of eligible tasks, evaluates the due set, and fires every
 * candidate whose (task, offset) key has not been recorded yet.
 *
 * Ticks are single-flight: a tick requested while one is running joins it,
 * so the check-deliver-record sequence for a key never interleaves.
 */

import type { LocalDateTime } from './time-date'
import { addMinutes, compareDateTimes } from './time-date'
import type { NotificationEvent, SkippedTask, TaskId } from './types'
import type { TaskSource } from './task-source'
import type { DedupStore } from './dedup-store'
import type { Notifier } from './notifier'
import { type Candidate, type Evaluation, evaluateDueSet } from './evaluator'
import { type ReminderConfig, type ReminderConfigInput, resolveReminderConfig } from './config'
import { type Clock, systemClock } from './clock'
import { type Logger, silentLogger } from './logger'
import { type Poller, type PollerHealth, createPoller } from './poller'
import { describeKey } from './offsets'
import { errorMessage, toError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type ReminderServiceDeps = {
  taskSource: TaskSource
  store: DedupStore
  notifier: Notifier
  config?: ReminderConfigInput
  logger?: Logger
  clock?: Clock
  /** Keep the process alive while monitoring (default true) */
  keepAlive?: boolean
}

export type TickReport = {
  at: LocalDateTime
  fired: NotificationEvent[]
  skipped: SkippedTask[]
  /** Tasks whose dedup history was dropped this tick */
  invalidated: TaskId[]
}

export type ServiceHealth = PollerHealth & {
  enabled: boolean
  consecutiveStoreFailures: number
  storeDegraded: boolean
  eventsFired: number
  lastReport: TickReport | null
}

export type ServiceEvents = {
  notification: NotificationEvent
  tickFailed: Error
  /** Payload is the current streak of store failures */
  storeDegraded: number
  taskSkipped: SkippedTask
}

export type ServiceEventName = keyof ServiceEvents

export type ReminderService = {
  readonly config: ReminderConfig
  start(): void
  stop(): Promise<void>
  isRunning(): boolean
  /** Run one evaluation now; joins a tick already in flight */
  tick(): Promise<TickReport>
  /** Forget every fired record of a task, e.g. after it was rescheduled */
  invalidate(taskId: TaskId): Promise<void>
  /** Delete fired records older than the given number of days */
  purgeHistory(olderThanDays: number): Promise<number>
  health(): ServiceHealth
  on<K extends ServiceEventName>(event: K, handler: (payload: ServiceEvents[K]) => void): () => void
}

type HandlerTable = { [K in ServiceEventName]: Array<(payload: ServiceEvents[K]) => void> }

// ============================================================================
// Factory
// ============================================================================

export function createReminderService(deps: ReminderServiceDeps): ReminderService {
  const { taskSource, store, notifier } = deps
  const config = resolveReminderConfig(deps.config ?? {})
  const logger = deps.logger ?? silentLogger
  const clock = deps.clock ?? systemClock

  const handlers: HandlerTable = { notification: [], tickFailed: [], storeDegraded: [], taskSkipped: [] }

  let current: Promise<TickReport> | null = null
  let consecutiveStoreFailures = 0
  let eventsFired = 0
  let lastReport: TickReport | null = null

  const poller: Poller = createPoller({
    intervalMs: config.pollIntervalSeconds * 1000,
    onTick: async () => {
      await tick()
    },
    logger,
    clock,
    keepAlive: deps.keepAlive,
  })

  // --------------------------------------------------------------------------
  // Events
  // --------------------------------------------------------------------------

  function emit<K extends ServiceEventName>(event: K, payload: ServiceEvents[K]): void {
    for (const handler of handlers[event]) {
      try {
        handler(payload)
      } catch (e) {
        logger.error(`Event handler error on '${event}': ${errorMessage(e)}`)
      }
    }
  }

  function on<K extends ServiceEventName>(event: K, handler: (payload: ServiceEvents[K]) => void): () => void {
    const list: Array<(payload: ServiceEvents[K]) => void> = handlers[event]
    list.push(handler)
    return () => {
      const i = list.indexOf(handler)
      if (i !== -1) list.splice(i, 1)
    }
  }

  // --------------------------------------------------------------------------
  // Store failure accounting
  // --------------------------------------------------------------------------

  /** Run a store call; a failure is logged and counted, and yields undefined */
  async function guardStore<T>(what: string, fn: () => Promise<T>): Promise<T | undefined> {
    try {
      const value = await fn()
      consecutiveStoreFailures = 0
      return value
    } catch (e) {
      consecutiveStoreFailures++
      logger.warn(`Dedup store failure (${what}): ${errorMessage(e)}`)
      if (consecutiveStoreFailures === config.storeFailureThreshold) {
        logger.error(
          `Dedup store failed ${consecutiveStoreFailures} times in a row; duplicates are possible until it recovers`
        )
        emit('storeDegraded', consecutiveStoreFailures)
      }
      return undefined
    }
  }

  // --------------------------------------------------------------------------
  // Tick
  // --------------------------------------------------------------------------

  /** Drop history fired against a stale due time or for tasks that left the snapshot */
  async function reconcile(evaluation: Evaluation): Promise<TaskId[]> {
    const invalidated: TaskId[] = []
    const present = new Set<TaskId>()

    for (const task of evaluation.eligible) {
      present.add(task.id)
      const moved = await guardStore(`anchor of '${task.id}'`, async () => {
        const anchor = await store.getAnchor(task.id)
        if (anchor === task.dueAt) return null
        await store.transaction(async () => {
          if (anchor !== null) await store.invalidate(task.id)
          await store.setAnchor(task.id, task.dueAt)
        })
        return anchor
      })
      if (moved) {
        invalidated.push(task.id)
        logger.info(`Task '${task.id}' moved from ${moved} to ${task.dueAt}, reminders reset`)
      }
    }

    // A malformed record keeps its history: the task still exists
    for (const skipped of evaluation.skipped) {
      if (skipped.taskId !== null) present.add(skipped.taskId)
    }

    const tracked = await guardStore('list tracked tasks', () => store.listTrackedTaskIds())
    for (const id of tracked ?? []) {
      if (present.has(id)) continue
      const ok = await guardStore(`invalidate '${id}'`, async () => {
        await store.invalidate(id)
        return true
      })
      if (ok) {
        invalidated.push(id)
        logger.debug(`Task '${id}' is no longer eligible, history dropped`)
      }
    }

    return invalidated
  }

  function dispatch(event: NotificationEvent): void {
    const onFailure = (e: unknown) => {
      logger.warn(`Notifier failed for task '${event.taskId}': ${errorMessage(e)}`)
    }
    try {
      const pending = notifier.deliver(event)
      void Promise.resolve(pending).catch(onFailure)
    } catch (e) {
      onFailure(e)
    }
  }

  async function fire(candidate: Candidate, now: LocalDateTime): Promise<NotificationEvent | null> {
    const { task, offset, minutesUntilDue } = candidate
    if (task.dueAt === null) return null
    const key = { taskId: task.id, offset }
    const label = describeKey(key)

    // An unreadable store does not suppress delivery
    const already = await guardStore(`check ${label}`, () => store.hasFired(key))
    if (already === true) return null

    const event: NotificationEvent = {
      taskId: task.id,
      title: task.title,
      dueAt: task.dueAt,
      minutesUntilDue,
      offset,
      firedAt: now,
    }
    dispatch(event)
    eventsFired++
    emit('notification', event)
    await guardStore(`record ${label}`, () => store.markFired(key, now))
    logger.debug(`Fired ${label}`)
    return event
  }

  async function runTick(): Promise<TickReport> {
    const now = clock.now()

    let records: readonly unknown[]
    try {
      records = await taskSource.listEligibleTasks(now)
    } catch (e) {
      const error = toError(e)
      logger.warn(`Task source unavailable, skipping tick: ${error.message}`)
      emit('tickFailed', error)
      throw error
    }

    const evaluation = evaluateDueSet(records, now, config)
    for (const skipped of evaluation.skipped) {
      logger.warn(`Skipping task ${skipped.taskId === null ? '(no id)' : `'${skipped.taskId}'`}: ${skipped.reason}`)
      emit('taskSkipped', skipped)
    }

    const invalidated = await reconcile(evaluation)

    const fired: NotificationEvent[] = []
    for (const candidate of evaluation.candidates) {
      const event = await fire(candidate, now)
      if (event) fired.push(event)
    }

    const report: TickReport = { at: now, fired, skipped: evaluation.skipped, invalidated }
    lastReport = report
    return report
  }

  function tick(): Promise<TickReport> {
    if (current) return current
    const run = runTick().finally(() => {
      if (current === run) current = null
    })
    current = run
    return run
  }

  /** Wait for the running tick; its failure belongs to whoever requested it */
  async function idle(): Promise<void> {
    const running = current
    if (!running) return
    try {
      await running
    } catch (e) {
      logger.debug(`Waited on a failed tick: ${errorMessage(e)}`)
    }
  }

  // --------------------------------------------------------------------------
  // Public surface
  // --------------------------------------------------------------------------

  return {
    config,

    start() {
      if (!config.enabled) {
        logger.info('Notification monitoring is disabled, not starting')
        return
      }
      if (poller.isRunning()) return
      logger.info(
        `Monitoring started: every ${config.pollIntervalSeconds}s, ${config.reminderWindowMinutes} min window, channel '${config.channel}'`
      )
      poller.start()
    },

    async stop() {
      const wasRunning = poller.isRunning()
      await poller.stop()
      await idle()
      if (wasRunning) logger.info('Monitoring stopped')
    },

    isRunning() {
      return poller.isRunning()
    },

    tick,

    async invalidate(taskId) {
      await idle()
      await store.invalidate(taskId)
      logger.debug(`Task '${taskId}' invalidated`)
    },

    async purgeHistory(olderThanDays) {
      await idle()
      const now = clock.now()
      const requested = addMinutes(now, -Math.max(0, olderThanDays) * 1440)
      // Records younger than the overdue lookback may still be checked by a tick
      const oldestLive = addMinutes(now, -config.overdueLookbackMinutes)
      const cutoff = compareDateTimes(requested, oldestLive) < 0 ? requested : oldestLive
      const removed = await store.purgeFiredBefore(cutoff)
      if (removed > 0) logger.info(`Purged ${removed} fired notification record(s) before ${cutoff}`)
      return removed
    },

    health() {
      return {
        ...poller.health(),
        enabled: config.enabled,
        consecutiveStoreFailures,
        storeDegraded: consecutiveStoreFailures >= config.storeFailureThreshold,
        eventsFired,
        lastReport,
      }
    },

    on,
  }
}
