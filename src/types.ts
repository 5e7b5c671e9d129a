/**
 * Shared Types
 *
 * Domain types used across the evaluator, dedup stores and the reminder service.
 */

import type { LocalDateTime } from './time-date'

export type { LocalDate, LocalTime, LocalDateTime } from './time-date'

// ============================================================================
// Tasks
// ============================================================================

export const TASK_STATUSES = ['pending', 'in_progress', 'completed', 'cancelled'] as const

export type TaskStatus = (typeof TASK_STATUSES)[number]

/** Statuses that still generate notifications */
export const ELIGIBLE_STATUSES: readonly TaskStatus[] = ['pending', 'in_progress']

/** Task ids are opaque: integer rows from the planner database or UUIDs */
export type TaskId = string

export type Task = {
  id: TaskId
  title: string
  status: TaskStatus
  dueAt: LocalDateTime | null
  reminderWindowMinutes: number
}

// ============================================================================
// Offsets & Dedup Keys
// ============================================================================

/** One notification opportunity relative to a task's due time */
export type ReminderOffset =
  | { kind: 'countdown'; minutes: number }
  | { kind: 'dueNow' }
  | { kind: 'overdue'; occurrence: number }

export type ReminderOffsetKind = ReminderOffset['kind']

export type DedupKey = {
  taskId: TaskId
  offset: ReminderOffset
}

export type FiredRecord = DedupKey & {
  firedAt: LocalDateTime
}

// ============================================================================
// Events
// ============================================================================

export type NotificationEvent = {
  taskId: TaskId
  title: string
  dueAt: LocalDateTime
  /** Positive while counting down, 0 when due, negative once overdue */
  minutesUntilDue: number
  offset: ReminderOffset
  firedAt: LocalDateTime
}

export type SkippedTask = {
  taskId: TaskId | null
  reason: string
}
