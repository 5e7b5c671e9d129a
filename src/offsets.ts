/**
 * Reminder Offsets
 *
 * Constructors and the storage encoding for ReminderOffset. Stores persist an
 * offset as a (kind, value) column pair so a key never depends on string
 * formatting.
 */

import type { DedupKey, ReminderOffset, ReminderOffsetKind } from './types'
import { type Result, Ok, Err } from './result'
import { InvalidTaskError } from './errors'

export type EncodedOffset = { kind: ReminderOffsetKind; value: number }

// ============================================================================
// Constructors
// ============================================================================

export function countdown(minutes: number): ReminderOffset {
  return { kind: 'countdown', minutes }
}

export const dueNow: ReminderOffset = { kind: 'dueNow' }

export function overdue(occurrence = 0): ReminderOffset {
  return { kind: 'overdue', occurrence }
}

// ============================================================================
// Encoding
// ============================================================================

export function encodeOffset(offset: ReminderOffset): EncodedOffset {
  switch (offset.kind) {
    case 'countdown':
      return { kind: 'countdown', value: offset.minutes }
    case 'dueNow':
      return { kind: 'dueNow', value: 0 }
    case 'overdue':
      return { kind: 'overdue', value: offset.occurrence }
  }
}

export function decodeOffset(kind: string, value: number): Result<ReminderOffset, InvalidTaskError> {
  if (!Number.isInteger(value)) {
    return Err(new InvalidTaskError(`Offset value must be an integer, got ${value}`))
  }
  switch (kind) {
    case 'countdown':
      return value >= 1 ? Ok(countdown(value)) : Err(new InvalidTaskError(`Countdown offset must be >= 1, got ${value}`))
    case 'dueNow':
      return Ok(dueNow)
    case 'overdue':
      return value >= 0 ? Ok(overdue(value)) : Err(new InvalidTaskError(`Overdue occurrence must be >= 0, got ${value}`))
    default:
      return Err(new InvalidTaskError(`Unknown offset kind '${kind}'`))
  }
}

export function offsetEquals(a: ReminderOffset, b: ReminderOffset): boolean {
  const ea = encodeOffset(a)
  const eb = encodeOffset(b)
  return ea.kind === eb.kind && ea.value === eb.value
}

/** Short human label, used in log lines */
export function describeOffset(offset: ReminderOffset): string {
  switch (offset.kind) {
    case 'countdown':
      return `T-${offset.minutes}m`
    case 'dueNow':
      return 'due'
    case 'overdue':
      return offset.occurrence === 0 ? 'overdue' : `overdue#${offset.occurrence}`
  }
}

export function describeKey(key: DedupKey): string {
  return `${key.taskId}@${describeOffset(key.offset)}`
}
