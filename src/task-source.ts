/**
 * Task Source
 *
 * The reminder core reads tasks through this interface and never writes them.
 * Records are returned raw; the evaluator validates each one.
 */

import type { LocalDateTime } from './time-date'
import type { TaskId, TaskStatus } from './types'
import { ELIGIBLE_STATUSES } from './types'
import type { TaskRecord } from './evaluator'
import { NotFoundError } from './errors'

export type TaskSource = {
  /** Tasks with status pending/in_progress and a due timestamp */
  listEligibleTasks(now: LocalDateTime): Promise<readonly unknown[]> | readonly unknown[]
}

// ============================================================================
// In-memory implementation
// ============================================================================

export type MemoryTaskSource = TaskSource & {
  get(id: TaskId): TaskRecord | undefined
  upsert(record: TaskRecord): void
  setStatus(id: TaskId, status: TaskStatus): void
  setDueAt(id: TaskId, dueAt: string | null): void
  remove(id: TaskId): void
}

function hasDue(record: TaskRecord): boolean {
  return Boolean(record.dueAt) || (Boolean(record.dueDate) && Boolean(record.dueTime))
}

export function createMemoryTaskSource(initial: readonly TaskRecord[] = []): MemoryTaskSource {
  const tasks = new Map<TaskId, TaskRecord>()
  for (const record of initial) tasks.set(String(record.id), { ...record })

  function mustGet(id: TaskId): TaskRecord {
    const record = tasks.get(id)
    if (!record) throw new NotFoundError(`Task '${id}' not found`)
    return record
  }

  return {
    listEligibleTasks() {
      return [...tasks.values()]
        .filter((t) => ELIGIBLE_STATUSES.includes(t.status) && hasDue(t))
        .map((t) => ({ ...t }))
    },

    get(id) {
      const record = tasks.get(id)
      return record ? { ...record } : undefined
    },

    upsert(record) {
      tasks.set(String(record.id), { ...record })
    },

    setStatus(id, status) {
      mustGet(id).status = status
    },

    setDueAt(id, dueAt) {
      const record = mustGet(id)
      record.dueAt = dueAt
      record.dueDate = null
      record.dueTime = null
    },

    remove(id) {
      tasks.delete(id)
    },
  }
}
