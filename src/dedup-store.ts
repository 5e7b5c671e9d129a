/**
 * Notification Dedup Store
 *
 * Durable at-most-once bookkeeping keyed by (task id, offset), plus the due
 * time ("anchor") each task's records were fired against. The interface is
 * async so a file-backed store and the in-memory store are interchangeable.
 */

import type { LocalDateTime } from './time-date'
import type { DedupKey, FiredRecord, ReminderOffsetKind, TaskId } from './types'
import { encodeOffset } from './offsets'

// ============================================================================
// Interface
// ============================================================================

export type DedupStore = {
  hasFired(key: DedupKey): Promise<boolean>

  /** Insert-if-absent. Resolves true when the key was newly recorded. */
  markFired(key: DedupKey, firedAt: LocalDateTime): Promise<boolean>

  /** Drop every record and the anchor of a task */
  invalidate(taskId: TaskId): Promise<void>

  getAnchor(taskId: TaskId): Promise<LocalDateTime | null>
  setAnchor(taskId: TaskId, dueAt: LocalDateTime): Promise<void>

  /** Ids with an anchor or at least one fired record */
  listTrackedTaskIds(): Promise<TaskId[]>

  /** Fired records of a task, oldest first */
  listFired(taskId: TaskId): Promise<FiredRecord[]>

  /** Delete records fired before the cutoff; resolves the number removed */
  purgeFiredBefore(cutoff: LocalDateTime): Promise<number>

  /** Run fn atomically. Nested calls join the outer transaction. */
  transaction<T>(fn: () => Promise<T>): Promise<T>

  close(): Promise<void>
}

export function compareFired(a: FiredRecord, b: FiredRecord): number {
  if (a.firedAt !== b.firedAt) return a.firedAt < b.firedAt ? -1 : 1
  const ea = encodeOffset(a.offset)
  const eb = encodeOffset(b.offset)
  if (ea.kind !== eb.kind) return ea.kind < eb.kind ? -1 : 1
  return ea.value - eb.value
}

// ============================================================================
// In-memory implementation
// ============================================================================

type OffsetTable = Map<ReminderOffsetKind, Map<number, FiredRecord>>

type MemoryState = {
  fired: Map<TaskId, OffsetTable>
  anchors: Map<TaskId, LocalDateTime>
}

/**
 * Map-backed store for tests and hosts that accept losing history on exit.
 * Records are lost with the process, so duplicates after a restart are possible.
 */
export function createMemoryDedupStore(): DedupStore {
  let state: MemoryState = { fired: new Map(), anchors: new Map() }
  let txDepth = 0

  function lookup(key: DedupKey): FiredRecord | undefined {
    const { kind, value } = encodeOffset(key.offset)
    return state.fired.get(key.taskId)?.get(kind)?.get(value)
  }

  return {
    async hasFired(key) {
      return lookup(key) !== undefined
    },

    async markFired(key, firedAt) {
      if (lookup(key)) return false
      const { kind, value } = encodeOffset(key.offset)
      let table = state.fired.get(key.taskId)
      if (!table) {
        table = new Map()
        state.fired.set(key.taskId, table)
      }
      let values = table.get(kind)
      if (!values) {
        values = new Map()
        table.set(kind, values)
      }
      values.set(value, { taskId: key.taskId, offset: { ...key.offset }, firedAt })
      return true
    },

    async invalidate(taskId) {
      state.fired.delete(taskId)
      state.anchors.delete(taskId)
    },

    async getAnchor(taskId) {
      return state.anchors.get(taskId) ?? null
    },

    async setAnchor(taskId, dueAt) {
      state.anchors.set(taskId, dueAt)
    },

    async listTrackedTaskIds() {
      const ids = new Set<TaskId>([...state.anchors.keys(), ...state.fired.keys()])
      return [...ids].sort()
    },

    async listFired(taskId) {
      const table = state.fired.get(taskId)
      if (!table) return []
      const records: FiredRecord[] = []
      for (const values of table.values()) {
        for (const r of values.values()) records.push({ ...r, offset: { ...r.offset } })
      }
      return records.sort(compareFired)
    },

    async purgeFiredBefore(cutoff) {
      let removed = 0
      for (const [taskId, table] of state.fired) {
        for (const [kind, values] of table) {
          for (const [value, r] of values) {
            if (r.firedAt < cutoff) {
              values.delete(value)
              removed++
            }
          }
          if (values.size === 0) table.delete(kind)
        }
        if (table.size === 0) state.fired.delete(taskId)
      }
      return removed
    },

    async transaction<T>(fn: () => Promise<T>): Promise<T> {
      if (txDepth > 0) return fn()
      const snapshot = structuredClone(state)
      txDepth++
      try {
        return await fn()
      } catch (e) {
        state = snapshot
        throw e
      } finally {
        txDepth--
      }
    },

    async close() {},
  }
}
