/**
 * Consolidated error system for taskpulse.
 *
 * All error classes extend TaskpulseError, which carries a typed error code.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const TaskpulseErrorCode = {
  // Storage layer
  NOT_FOUND: 'NOT_FOUND',
  STORE_FAILURE: 'STORE_FAILURE',

  // Input
  INVALID_TASK: 'INVALID_TASK',
  INVALID_CONFIG: 'INVALID_CONFIG',

  // Time & date
  PARSE_ERROR: 'PARSE_ERROR',
} as const

export type TaskpulseErrorCode = (typeof TaskpulseErrorCode)[keyof typeof TaskpulseErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class TaskpulseError extends Error {
  readonly code: TaskpulseErrorCode

  constructor(code: TaskpulseErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'TaskpulseError'
    this.code = code
  }
}

// ============================================================================
// Storage Errors
// ============================================================================

export class NotFoundError extends TaskpulseError {
  constructor(message: string) {
    super(TaskpulseErrorCode.NOT_FOUND, message)
    this.name = 'NotFoundError'
  }
}

/** Wraps a failure of the underlying dedup or task database. */
export class StoreError extends TaskpulseError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(TaskpulseErrorCode.STORE_FAILURE, message, options)
    this.name = 'StoreError'
  }
}

// ============================================================================
// Input Errors
// ============================================================================

export class InvalidTaskError extends TaskpulseError {
  /** Id of the offending record, when one could be read */
  readonly taskId: string | null

  constructor(message: string, taskId: string | null = null) {
    super(TaskpulseErrorCode.INVALID_TASK, message)
    this.name = 'InvalidTaskError'
    this.taskId = taskId
  }
}

export class ConfigError extends TaskpulseError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(TaskpulseErrorCode.INVALID_CONFIG, message, options)
    this.name = 'ConfigError'
  }
}

// ============================================================================
// Time & Date Errors
// ============================================================================

export class ParseError extends TaskpulseError {
  constructor(message: string) {
    super(TaskpulseErrorCode.PARSE_ERROR, message)
    this.name = 'ParseError'
  }
}

/** Message of an unknown thrown value */
export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e)
}

/** Normalise an unknown thrown value into an Error */
export function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e))
}
