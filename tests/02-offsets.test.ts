/**
 * Segment 02: Reminder Offsets Tests
 *
 * Offsets are structured values. Stores persist them as a (kind, value) pair.
 */

import { describe, it, expect } from 'vitest'
import {
  countdown,
  dueNow,
  overdue,
  encodeOffset,
  decodeOffset,
  offsetEquals,
  describeOffset,
  describeKey,
} from '../src/offsets'
import { InvalidTaskError } from '../src/errors'

describe('encodeOffset', () => {
  it('encodes each kind', () => {
    expect(encodeOffset(countdown(15))).toEqual({ kind: 'countdown', value: 15 })
    expect(encodeOffset(dueNow)).toEqual({ kind: 'dueNow', value: 0 })
    expect(encodeOffset(overdue())).toEqual({ kind: 'overdue', value: 0 })
    expect(encodeOffset(overdue(3))).toEqual({ kind: 'overdue', value: 3 })
  })
})

describe('decodeOffset', () => {
  it('restores what encodeOffset produced', () => {
    for (const offset of [countdown(1), countdown(15), dueNow, overdue(0), overdue(2)]) {
      const { kind, value } = encodeOffset(offset)
      const decoded = decodeOffset(kind, value)
      expect(decoded.ok && decoded.value).toEqual(offset)
    }
  })

  it('rejects a countdown below 1', () => {
    const result = decodeOffset('countdown', 0)
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(InvalidTaskError)
      expect(result.error.message).toBe('Countdown offset must be >= 1, got 0')
    }
  })

  it('rejects a negative overdue occurrence', () => {
    const result = decodeOffset('overdue', -1)
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.message).toBe('Overdue occurrence must be >= 0, got -1')
  })

  it('rejects unknown kinds and fractional values', () => {
    const unknown = decodeOffset('snooze', 5)
    expect(unknown.ok).toBe(false)
    if (!unknown.ok) expect(unknown.error.message).toBe("Unknown offset kind 'snooze'")

    const fractional = decodeOffset('countdown', 1.5)
    expect(fractional.ok).toBe(false)
    if (!fractional.ok) expect(fractional.error.message).toBe('Offset value must be an integer, got 1.5')
  })
})

describe('offsetEquals', () => {
  it('compares by kind and value', () => {
    expect(offsetEquals(countdown(5), countdown(5))).toBe(true)
    expect(offsetEquals(countdown(5), countdown(4))).toBe(false)
    expect(offsetEquals(dueNow, overdue(0))).toBe(false)
    expect(offsetEquals(overdue(1), overdue(1))).toBe(true)
  })
})

describe('labels', () => {
  it('describes offsets', () => {
    expect(describeOffset(countdown(15))).toBe('T-15m')
    expect(describeOffset(dueNow)).toBe('due')
    expect(describeOffset(overdue())).toBe('overdue')
    expect(describeOffset(overdue(2))).toBe('overdue#2')
  })

  it('describes keys', () => {
    expect(describeKey({ taskId: '42', offset: countdown(1) })).toBe('42@T-1m')
  })
})
