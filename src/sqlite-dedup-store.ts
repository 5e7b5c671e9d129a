/**
 * SQLite Dedup Store
 *
 * Production implementation of the DedupStore interface using better-sqlite3.
 * Records are scoped by notification channel, so a desktop and a web host may
 * share one database file without sharing delivery history.
 */
import Database from 'better-sqlite3'
import type { LocalDateTime } from './time-date'
import { parseDateTime } from './time-date'
import type { FiredRecord, TaskId } from './types'
import type { DedupStore } from './dedup-store'
import { decodeOffset, encodeOffset } from './offsets'
import { StoreError, TaskpulseError, errorMessage } from './errors'

export type SqliteDedupStoreOptions = {
  /** Delivery channel the records belong to (default 'desktop') */
  channel?: string
}

export type SqliteDedupStore = DedupStore & {
  readonly channel: string
  listTables(): Promise<string[]>
  getSchemaVersion(): Promise<number>
  inTransaction(): Promise<boolean>
}

// ============================================================================
// Schema DDL
// ============================================================================

const SCHEMA_VERSION = 1

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS fired_notification (
    channel TEXT NOT NULL,
    task_id TEXT NOT NULL,
    offset_kind TEXT NOT NULL CHECK (offset_kind IN ('countdown', 'dueNow', 'overdue')),
    offset_value INTEGER NOT NULL,
    fired_at TEXT NOT NULL,
    PRIMARY KEY (channel, task_id, offset_kind, offset_value)
  );
  CREATE INDEX IF NOT EXISTS idx_fired_notification_fired_at ON fired_notification(channel, fired_at);

  CREATE TABLE IF NOT EXISTS task_anchor (
    channel TEXT NOT NULL,
    task_id TEXT NOT NULL,
    due_at TEXT NOT NULL,
    PRIMARY KEY (channel, task_id)
  );

  CREATE TABLE IF NOT EXISTS schema_version (
    version INTEGER PRIMARY KEY,
    applied_at TEXT NOT NULL
  );
`

// ============================================================================
// Error Mapping
// ============================================================================

function mapError(e: unknown): never {
  if (e instanceof TaskpulseError) throw e
  throw new StoreError(`Dedup store failure: ${errorMessage(e)}`, { cause: e })
}

function safe<T>(fn: () => T): T {
  try { return fn() }
  catch (e) { mapError(e) }
}

// ============================================================================
// SQL Row Types
// ============================================================================

type FiredRow = {
  task_id: string
  offset_kind: string
  offset_value: number
  fired_at: string
}

type AnchorRow = {
  due_at: string
}

type SchemaVersionRow = {
  v: number | null
}

function toFired(row: FiredRow): FiredRecord {
  const offset = decodeOffset(row.offset_kind, row.offset_value)
  if (!offset.ok) throw new StoreError(`Corrupt record for task '${row.task_id}': ${offset.error.message}`)
  const firedAt = parseDateTime(row.fired_at)
  if (!firedAt.ok) throw new StoreError(`Corrupt fired_at for task '${row.task_id}': ${firedAt.error.message}`)
  return { taskId: row.task_id, offset: offset.value, firedAt: firedAt.value }
}

function toLocalDateTime(raw: string, what: string): LocalDateTime {
  const parsed = parseDateTime(raw)
  if (!parsed.ok) throw new StoreError(`Corrupt ${what}: ${parsed.error.message}`)
  return parsed.value
}

// ============================================================================
// Factory
// ============================================================================

export async function createSqliteDedupStore(
  target: string | Database.Database,
  opts: SqliteDedupStoreOptions = {}
): Promise<SqliteDedupStore> {
  const owned = typeof target === 'string'
  const db = safe(() => (typeof target === 'string' ? new Database(target) : target))
  const channel = opts.channel ?? 'desktop'

  safe(() => {
    if (owned && target !== ':memory:') db.pragma('journal_mode = WAL')
    db.exec(SCHEMA_SQL)
    const ver = db.prepare<[], SchemaVersionRow>('SELECT MAX(version) AS v FROM schema_version').get()
    if (ver?.v == null) {
      db.prepare('INSERT INTO schema_version (version, applied_at) VALUES (?, ?)').run(
        SCHEMA_VERSION, new Date().toISOString(),
      )
    }
  })

  const stmts = safe(() => ({
    has: db.prepare<[string, string, string, number], { one: number }>(
      'SELECT 1 AS one FROM fired_notification WHERE channel = ? AND task_id = ? AND offset_kind = ? AND offset_value = ?',
    ),
    insert: db.prepare<[string, string, string, number, string]>(
      'INSERT OR IGNORE INTO fired_notification (channel, task_id, offset_kind, offset_value, fired_at) VALUES (?, ?, ?, ?, ?)',
    ),
    deleteFired: db.prepare<[string, string]>('DELETE FROM fired_notification WHERE channel = ? AND task_id = ?'),
    deleteAnchor: db.prepare<[string, string]>('DELETE FROM task_anchor WHERE channel = ? AND task_id = ?'),
    getAnchor: db.prepare<[string, string], AnchorRow>('SELECT due_at FROM task_anchor WHERE channel = ? AND task_id = ?'),
    setAnchor: db.prepare<[string, string, string]>(
      'INSERT INTO task_anchor (channel, task_id, due_at) VALUES (?, ?, ?) ON CONFLICT (channel, task_id) DO UPDATE SET due_at = excluded.due_at',
    ),
    tracked: db.prepare<[string, string], { task_id: string }>(
      'SELECT task_id FROM task_anchor WHERE channel = ? UNION SELECT task_id FROM fired_notification WHERE channel = ? ORDER BY task_id',
    ),
    listFired: db.prepare<[string, string], FiredRow>(
      'SELECT task_id, offset_kind, offset_value, fired_at FROM fired_notification WHERE channel = ? AND task_id = ? ORDER BY fired_at, offset_kind, offset_value',
    ),
    purge: db.prepare<[string, string]>('DELETE FROM fired_notification WHERE channel = ? AND fired_at < ?'),
  }))

  let _inTx = false

  const store: SqliteDedupStore = {
    channel,

    // ================================================================
    // Fired records
    // ================================================================
    async hasFired(key) {
      const { kind, value } = encodeOffset(key.offset)
      return safe(() => stmts.has.get(channel, key.taskId, kind, value)) !== undefined
    },

    async markFired(key, firedAt) {
      const { kind, value } = encodeOffset(key.offset)
      const info = safe(() => stmts.insert.run(channel, key.taskId, kind, value, firedAt))
      return info.changes > 0
    },

    async invalidate(taskId) {
      safe(() =>
        db.transaction(() => {
          stmts.deleteFired.run(channel, taskId)
          stmts.deleteAnchor.run(channel, taskId)
        })(),
      )
    },

    async listFired(taskId) {
      const rows = safe(() => stmts.listFired.all(channel, taskId))
      return rows.map(toFired)
    },

    async purgeFiredBefore(cutoff) {
      return safe(() => stmts.purge.run(channel, cutoff)).changes
    },

    // ================================================================
    // Anchors
    // ================================================================
    async getAnchor(taskId) {
      const row = safe(() => stmts.getAnchor.get(channel, taskId))
      return row ? toLocalDateTime(row.due_at, `anchor for task '${taskId}'`) : null
    },

    async setAnchor(taskId: TaskId, dueAt: LocalDateTime) {
      safe(() => stmts.setAnchor.run(channel, taskId, dueAt))
    },

    async listTrackedTaskIds() {
      return safe(() => stmts.tracked.all(channel, channel)).map((r) => r.task_id)
    },

    // ================================================================
    // Transaction
    // ================================================================
    async transaction<T>(fn: () => Promise<T>): Promise<T> {
      if (_inTx) return await fn()
      _inTx = true
      safe(() => db.exec('BEGIN IMMEDIATE'))
      try {
        const result = await fn()
        safe(() => db.exec('COMMIT'))
        return result
      } catch (e) {
        if (db.inTransaction) db.exec('ROLLBACK')
        throw e
      } finally {
        _inTx = false
      }
    },

    async inTransaction() {
      return _inTx
    },

    // ================================================================
    // Lifecycle & introspection
    // ================================================================
    async close() {
      if (owned && db.open) db.close()
    },

    async listTables() {
      const rows = safe(() =>
        db.prepare<[], { name: string }>(
          "SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' ORDER BY name",
        ).all(),
      )
      return rows.map((r) => r.name)
    },

    async getSchemaVersion() {
      const row = safe(() => db.prepare<[], SchemaVersionRow>('SELECT MAX(version) AS v FROM schema_version').get())
      return row?.v ?? 0
    },
  }

  return store
}
