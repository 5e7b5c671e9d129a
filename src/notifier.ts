/**
 * Notifier
 *
 * Delivery is external: OS toasts, sounds and browser push live in the host.
 * The core calls deliver() once per fired event and does not wait on it.
 * Retrying a failed delivery is the notifier's job; createRetryingNotifier
 * wraps any notifier with that behaviour.
 */

import type { NotificationEvent } from './types'
import { type Logger, silentLogger } from './logger'
import { errorMessage, toError } from './errors'

export type Notifier = {
  deliver(event: NotificationEvent): void | Promise<void>
}

export type FormattedNotification = {
  title: string
  message: string
  /** Which alert sound a host should play */
  urgency: 'reminder' | 'urgent'
}

// ============================================================================
// Formatting
// ============================================================================

function plural(n: number, unit: string): string {
  return `${n} ${unit}${n === 1 ? '' : 's'}`
}

export function formatNotification(event: NotificationEvent): FormattedNotification {
  const name = `'${event.title}'`
  switch (event.offset.kind) {
    case 'countdown':
      return {
        title: 'Task Reminder',
        message: `${name} is due in ${plural(event.offset.minutes, 'minute')}`,
        urgency: 'reminder',
      }
    case 'dueNow':
      return { title: 'Task Due', message: `${name} is due now`, urgency: 'urgent' }
    case 'overdue': {
      const hours = Math.trunc(-event.minutesUntilDue / 60)
      return {
        title: 'Overdue Task',
        message: hours < 1 ? `${name} is overdue` : `${name} is ${plural(hours, 'hour')} overdue`,
        urgency: 'urgent',
      }
    }
  }
}

// ============================================================================
// Notifiers
// ============================================================================

export function createConsoleNotifier(logger: Logger): Notifier {
  return {
    deliver(event) {
      const { title, message } = formatNotification(event)
      logger.info(`${title}: ${message}`)
    },
  }
}

async function deliverAsync(notifier: Notifier, event: NotificationEvent): Promise<void> {
  await notifier.deliver(event)
}

/** Deliver to every channel; one failing channel does not block the others */
export function createFanoutNotifier(notifiers: readonly Notifier[], logger: Logger = silentLogger): Notifier {
  return {
    async deliver(event) {
      const results = await Promise.allSettled(notifiers.map((n) => deliverAsync(n, event)))
      results.forEach((result, i) => {
        if (result.status === 'rejected') {
          logger.warn(`Channel #${i} failed to deliver for task '${event.taskId}': ${errorMessage(result.reason)}`)
        }
      })
    },
  }
}

export type RetryOptions = {
  /** Total attempts, including the first (default 3) */
  attempts?: number
  delayMs?: number
  logger?: Logger
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

export function createRetryingNotifier(notifier: Notifier, opts: RetryOptions = {}): Notifier {
  const attempts = Math.max(1, opts.attempts ?? 3)
  const delayMs = opts.delayMs ?? 1000
  const logger = opts.logger ?? silentLogger

  return {
    async deliver(event) {
      let lastError: Error = new Error('no delivery attempted')
      for (let attempt = 1; attempt <= attempts; attempt++) {
        try {
          await deliverAsync(notifier, event)
          return
        } catch (e) {
          lastError = toError(e)
          logger.warn(`Delivery attempt ${attempt}/${attempts} for task '${event.taskId}' failed: ${lastError.message}`)
          if (attempt < attempts) await sleep(delayMs)
        }
      }
      throw lastError
    },
  }
}
