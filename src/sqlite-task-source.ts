/**
 * SQLite Task Source
 *
 * Reads due tasks from the planner's `tasks` table (separate due_date and
 * due_time columns, per-task reminder_time in minutes). Rows are handed to the
 * evaluator unvalidated.
 */
import Database from 'better-sqlite3'
import type { LocalDateTime } from './time-date'
import { addDays, dateOf } from './time-date'
import type { TaskSource } from './task-source'
import { ELIGIBLE_STATUSES } from './types'
import { StoreError, errorMessage } from './errors'

/** Planner task table, trimmed to the columns the reminder core reads */
export const TASKS_SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS tasks (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    title VARCHAR(255) NOT NULL,
    description TEXT,
    due_date DATE,
    due_time TIME,
    status VARCHAR(20) DEFAULT 'pending',
    reminder_time INTEGER DEFAULT 15,
    completed_at TIMESTAMP NULL,
    created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
    updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
  );
  CREATE INDEX IF NOT EXISTS idx_tasks_status_due ON tasks(status, due_date);
`

/** Raw record shape handed to the evaluator */
export type TaskRowRecord = {
  id: number | string
  title: string
  status: string
  dueDate: string
  dueTime: string
  reminderWindowMinutes: number | null
}

export type SqliteTaskSource = TaskSource & {
  listEligibleTasks(now: LocalDateTime): Promise<TaskRowRecord[]>
  close(): Promise<void>
}

type TaskRow = {
  id: number | string
  title: string
  status: string
  due_date: string
  due_time: string
  reminder_time: number | null
}

// Rows outside ELIGIBLE_STATUSES never reach the evaluator
const ELIGIBLE_SQL = ELIGIBLE_STATUSES.map((s) => `'${s}'`).join(', ')

/**
 * Open the planner database. A path is opened read-only and must exist;
 * a handle is used as-is and left open on close().
 */
export function createSqliteTaskSource(target: string | Database.Database): SqliteTaskSource {
  const owned = typeof target === 'string'
  let db: Database.Database
  try {
    db = typeof target === 'string' ? new Database(target, { readonly: true, fileMustExist: true }) : target
  } catch (e) {
    throw new StoreError(`Cannot open task database: ${errorMessage(e)}`, { cause: e })
  }

  // Windows are capped at MAX_REMINDER_WINDOW_MINUTES, so nothing due after tomorrow is relevant yet
  let query: Database.Statement<[string], TaskRow>
  try {
    query = db.prepare<[string], TaskRow>(`
      SELECT id, title, status, due_date, due_time, reminder_time
      FROM tasks
      WHERE status IN (${ELIGIBLE_SQL})
        AND due_date IS NOT NULL
        AND due_time IS NOT NULL
        AND due_date <= ?
      ORDER BY due_date, due_time, id
    `)
  } catch (e) {
    throw new StoreError(`Task database has no usable tasks table: ${errorMessage(e)}`, { cause: e })
  }

  return {
    async listEligibleTasks(now) {
      let rows: TaskRow[]
      try {
        rows = query.all(addDays(dateOf(now), 1))
      } catch (e) {
        throw new StoreError(`Task query failed: ${errorMessage(e)}`, { cause: e })
      }
      return rows.map((row) => ({
        id: row.id,
        title: row.title,
        status: row.status,
        dueDate: row.due_date,
        dueTime: row.due_time,
        reminderWindowMinutes: row.reminder_time,
      }))
    },

    async close() {
      if (owned && db.open) db.close()
    },
  }
}
