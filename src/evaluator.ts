/**
 * Due-Set Evaluator
 *
 * Pure computation: given "now" and a snapshot of raw task records, decide
 * which (task, offset) notification opportunities are due this tick. The
 * evaluator never touches the dedup store; the reminder service filters the
 * candidates against it.
 */

import { z } from 'zod'
import type { LocalDateTime } from './time-date'
import { parseDate, parseDateTime, parseTime, makeDateTime, secondsBetween } from './time-date'
import type { ReminderOffset, SkippedTask, Task, TaskId } from './types'
import { ELIGIBLE_STATUSES, TASK_STATUSES } from './types'
import { type OverduePolicy, MAX_REMINDER_WINDOW_MINUTES } from './config'
import { type Result, Ok, Err } from './result'
import { InvalidTaskError } from './errors'
import { countdown, dueNow, overdue } from './offsets'

// ============================================================================
// Types
// ============================================================================

export type EvaluateOptions = {
  /** Window for tasks that do not carry their own */
  reminderWindowMinutes: number
  overdue: OverduePolicy
  /** Overdue tasks first seen later than this are not reported */
  overdueLookbackMinutes: number
}

export type Candidate = {
  task: Task
  minutesUntilDue: number
  offset: ReminderOffset
}

export type EligibleTask = Task & { dueAt: LocalDateTime }

export type Evaluation = {
  candidates: Candidate[]
  skipped: SkippedTask[]
  /** Valid tasks with a due time and an eligible status */
  eligible: EligibleTask[]
}

// ============================================================================
// Record validation
// ============================================================================

const TaskRecordSchema = z.object({
  id: z.union([z.string().min(1), z.number().int()]).transform(String),
  title: z.string().default(''),
  status: z.enum(TASK_STATUSES),
  dueAt: z.string().nullish(),
  dueDate: z.string().nullish(),
  dueTime: z.string().nullish(),
  // Longer per-task lead times are cut to the widest window rather than rejected
  reminderWindowMinutes: z
    .number()
    .int()
    .min(0)
    .nullish()
    .transform((v) => (v == null ? v : Math.min(v, MAX_REMINDER_WINDOW_MINUTES))),
})

export type TaskRecord = z.input<typeof TaskRecordSchema>

/** Best-effort id of a record that failed validation */
export function readRecordId(raw: unknown): TaskId | null {
  if (typeof raw !== 'object' || raw === null || !('id' in raw)) return null
  const id = raw.id
  if (typeof id === 'string' && id !== '') return id
  if (typeof id === 'number' && Number.isFinite(id)) return String(id)
  return null
}

function resolveDueAt(
  record: z.output<typeof TaskRecordSchema>
): Result<LocalDateTime | null, string> {
  if (record.dueAt) {
    const parsed = parseDateTime(record.dueAt)
    return parsed.ok ? Ok(parsed.value) : Err(parsed.error.message)
  }
  // Date-only tasks have no instant to count down to
  if (!record.dueDate || !record.dueTime) return Ok(null)

  const date = parseDate(record.dueDate)
  if (!date.ok) return Err(date.error.message)
  const time = parseTime(record.dueTime)
  if (!time.ok) return Err(time.error.message)
  return Ok(makeDateTime(date.value, time.value))
}

export function parseTaskRecord(
  raw: unknown,
  defaults: { reminderWindowMinutes: number }
): Result<Task, InvalidTaskError> {
  const parsed = TaskRecordSchema.safeParse(raw)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : ''
    return Err(new InvalidTaskError(`Malformed task record: ${where}${issue?.message ?? 'invalid'}`, readRecordId(raw)))
  }

  const record = parsed.data
  const dueAt = resolveDueAt(record)
  if (!dueAt.ok) {
    return Err(new InvalidTaskError(`Task '${record.id}' has an unparsable due time: ${dueAt.error}`, record.id))
  }

  return Ok({
    id: record.id,
    title: record.title,
    status: record.status,
    dueAt: dueAt.value,
    reminderWindowMinutes: record.reminderWindowMinutes ?? defaults.reminderWindowMinutes,
  })
}

// ============================================================================
// Offset classification
// ============================================================================

/**
 * Whole minutes until due, rounded up: offset m first appears when the
 * clock reaches dueAt - m minutes.
 */
export function minutesUntilDue(dueAt: LocalDateTime, now: LocalDateTime): number {
  const m = Math.ceil(secondsBetween(now, dueAt) / 60)
  return m === 0 ? 0 : m
}

export function classifyOffset(
  minutes: number,
  windowMinutes: number,
  policy: OverduePolicy,
  lookbackMinutes: number
): ReminderOffset | null {
  if (minutes > 0) return minutes <= windowMinutes ? countdown(minutes) : null
  if (minutes === 0) return dueNow
  if (-minutes > lookbackMinutes) return null
  const occurrence = policy.policy === 'repeat' ? Math.floor((-minutes - 1) / policy.everyMinutes) : 0
  return overdue(occurrence)
}

export function isEligible(task: Task): task is EligibleTask {
  return task.dueAt !== null && ELIGIBLE_STATUSES.includes(task.status)
}

// ============================================================================
// Evaluation
// ============================================================================

export function evaluateDueSet(
  records: readonly unknown[],
  now: LocalDateTime,
  options: EvaluateOptions
): Evaluation {
  const candidates: Candidate[] = []
  const skipped: SkippedTask[] = []
  const eligible: EligibleTask[] = []

  for (const raw of records) {
    const parsed = parseTaskRecord(raw, options)
    if (!parsed.ok) {
      skipped.push({ taskId: parsed.error.taskId, reason: parsed.error.message })
      continue
    }

    const task = parsed.value
    if (!isEligible(task)) continue
    eligible.push(task)

    const minutes = minutesUntilDue(task.dueAt, now)
    const offset = classifyOffset(minutes, task.reminderWindowMinutes, options.overdue, options.overdueLookbackMinutes)
    if (offset) candidates.push({ task, minutesUntilDue: minutes, offset })
  }

  candidates.sort((a, b) => a.minutesUntilDue - b.minutesUntilDue || a.task.id.localeCompare(b.task.id))
  return { candidates, skipped, eligible }
}
