/**
 * Laws every DedupStore implementation satisfies. Each store's test file
 * runs these against a fresh instance per test.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import type { DedupStore } from '../../src/dedup-store'
import { countdown, dueNow, overdue } from '../../src/offsets'
import { dt } from './reminders'

export function describeDedupStoreContract(name: string, create: () => Promise<DedupStore>): void {
  describe(`${name}: DedupStore contract`, () => {
    let store: DedupStore

    beforeEach(async () => {
      store = await create()
    })

    afterEach(async () => {
      await store.close()
    })

    describe('fired records', () => {
      it('reports unseen keys as not fired', async () => {
        expect(await store.hasFired({ taskId: 't1', offset: countdown(15) })).toBe(false)
      })

      it('markFired inserts once and reports duplicates', async () => {
        const key = { taskId: 't1', offset: countdown(15) }
        expect(await store.markFired(key, dt('2025-01-01T10:30:00'))).toBe(true)
        expect(await store.markFired(key, dt('2025-01-01T10:30:30'))).toBe(false)
        expect(await store.hasFired(key)).toBe(true)
        expect(await store.listFired('t1')).toEqual([
          { taskId: 't1', offset: countdown(15), firedAt: '2025-01-01T10:30:00' },
        ])
      })

      it('keys on the exact offset', async () => {
        await store.markFired({ taskId: 't1', offset: countdown(1) }, dt('2025-01-01T10:44:00'))
        expect(await store.hasFired({ taskId: 't1', offset: countdown(10) })).toBe(false)
        expect(await store.hasFired({ taskId: 't1', offset: dueNow })).toBe(false)
        expect(await store.hasFired({ taskId: 't2', offset: countdown(1) })).toBe(false)
      })

      it('keeps overdue occurrences apart', async () => {
        await store.markFired({ taskId: 't1', offset: overdue(0) }, dt('2025-01-01T10:46:00'))
        expect(await store.hasFired({ taskId: 't1', offset: overdue(0) })).toBe(true)
        expect(await store.hasFired({ taskId: 't1', offset: overdue(1) })).toBe(false)
      })

      it('lists records oldest first', async () => {
        await store.markFired({ taskId: 't1', offset: dueNow }, dt('2025-01-01T10:45:00'))
        await store.markFired({ taskId: 't1', offset: countdown(1) }, dt('2025-01-01T10:44:00'))
        await store.markFired({ taskId: 't1', offset: overdue(0) }, dt('2025-01-01T10:46:00'))
        const fired = await store.listFired('t1')
        expect(fired.map((r) => r.offset)).toEqual([countdown(1), dueNow, overdue(0)])
      })
    })

    describe('invalidation and anchors', () => {
      it('invalidate drops records and the anchor of one task only', async () => {
        await store.markFired({ taskId: 't1', offset: countdown(10) }, dt('2025-01-01T10:35:00'))
        await store.markFired({ taskId: 't2', offset: countdown(10) }, dt('2025-01-01T10:35:00'))
        await store.setAnchor('t1', dt('2025-01-01T10:45:00'))

        await store.invalidate('t1')

        expect(await store.hasFired({ taskId: 't1', offset: countdown(10) })).toBe(false)
        expect(await store.getAnchor('t1')).toBeNull()
        expect(await store.hasFired({ taskId: 't2', offset: countdown(10) })).toBe(true)
      })

      it('invalidating an unknown task is a no-op', async () => {
        await store.invalidate('missing')
        expect(await store.listTrackedTaskIds()).toEqual([])
      })

      it('stores and replaces anchors', async () => {
        expect(await store.getAnchor('t1')).toBeNull()
        await store.setAnchor('t1', dt('2025-01-01T10:45:00'))
        await store.setAnchor('t1', dt('2025-01-01T11:00:00'))
        expect(await store.getAnchor('t1')).toBe('2025-01-01T11:00:00')
      })

      it('tracks ids with an anchor or a record, sorted', async () => {
        await store.setAnchor('b', dt('2025-01-01T10:45:00'))
        await store.markFired({ taskId: 'a', offset: dueNow }, dt('2025-01-01T10:45:00'))
        await store.setAnchor('a', dt('2025-01-01T10:45:00'))
        await store.markFired({ taskId: 'c', offset: dueNow }, dt('2025-01-01T10:45:00'))
        expect(await store.listTrackedTaskIds()).toEqual(['a', 'b', 'c'])
      })
    })

    describe('purge', () => {
      it('deletes records fired before the cutoff', async () => {
        await store.markFired({ taskId: 'old', offset: dueNow }, dt('2024-12-01T09:00:00'))
        await store.markFired({ taskId: 'old', offset: overdue(0) }, dt('2024-12-01T09:01:00'))
        await store.markFired({ taskId: 'new', offset: dueNow }, dt('2025-01-01T09:00:00'))

        expect(await store.purgeFiredBefore(dt('2024-12-31T00:00:00'))).toBe(2)
        expect(await store.listFired('old')).toEqual([])
        expect(await store.listFired('new')).toHaveLength(1)
      })
    })

    describe('transactions', () => {
      it('commits on success', async () => {
        await store.transaction(async () => {
          await store.markFired({ taskId: 't1', offset: dueNow }, dt('2025-01-01T10:45:00'))
          await store.setAnchor('t1', dt('2025-01-01T10:45:00'))
        })
        expect(await store.hasFired({ taskId: 't1', offset: dueNow })).toBe(true)
        expect(await store.getAnchor('t1')).toBe('2025-01-01T10:45:00')
      })

      it('rolls back on error', async () => {
        await store.setAnchor('t1', dt('2025-01-01T10:45:00'))
        await expect(
          store.transaction(async () => {
            await store.invalidate('t1')
            await store.markFired({ taskId: 't1', offset: dueNow }, dt('2025-01-01T10:45:00'))
            throw new Error('boom')
          })
        ).rejects.toThrow('boom')
        expect(await store.getAnchor('t1')).toBe('2025-01-01T10:45:00')
        expect(await store.hasFired({ taskId: 't1', offset: dueNow })).toBe(false)
      })

      it('nested transactions join the outer one', async () => {
        await expect(
          store.transaction(async () => {
            await store.transaction(async () => {
              await store.setAnchor('t1', dt('2025-01-01T10:45:00'))
            })
            throw new Error('outer failed')
          })
        ).rejects.toThrow('outer failed')
        expect(await store.getAnchor('t1')).toBeNull()
      })

      it('returns the value of fn', async () => {
        expect(await store.transaction(async () => 42)).toBe(42)
      })
    })
  })
}
