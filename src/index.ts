/**
 * taskpulse
 *
 * Public API exports
 */

// Error system
export {
  TaskpulseError, TaskpulseErrorCode,
  NotFoundError, StoreError, InvalidTaskError, ConfigError, ParseError,
  errorMessage, toError,
} from './errors'
export type { TaskpulseErrorCode as TaskpulseErrorCodeType } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err } from './result'

// Time & Date (branded types + utilities)
export type { LocalDate, LocalTime, LocalDateTime } from './time-date'
export {
  parseDate, parseTime, parseDateTime,
  makeDate, makeTime, makeDateTime, fromJsDate,
  dateOf, timeOf,
  addDays, addSeconds, addMinutes, secondsBetween, compareDateTimes,
} from './time-date'

// Domain types
export type {
  TaskId, TaskStatus, Task,
  ReminderOffset, ReminderOffsetKind, DedupKey, FiredRecord,
  NotificationEvent, SkippedTask,
} from './types'
export { TASK_STATUSES, ELIGIBLE_STATUSES } from './types'

// Offsets
export type { EncodedOffset } from './offsets'
export {
  countdown, dueNow, overdue,
  encodeOffset, decodeOffset, offsetEquals, describeOffset, describeKey,
} from './offsets'

// Configuration
export type { ReminderConfig, ReminderConfigInput, OverduePolicy, PlannerSettings } from './config'
export {
  MAX_POLL_INTERVAL_SECONDS, MAX_REMINDER_WINDOW_MINUTES, ReminderConfigSchema,
  parseReminderConfig, resolveReminderConfig,
  fromPlannerSettings, loadSettingsFile, fromEnv,
} from './config'

// Logging
export type { Logger, LogLevel } from './logger'
export { createConsoleLogger, silentLogger, isLogLevel } from './logger'

// Clock & poller
export type { Clock, ManualClock } from './clock'
export { systemClock, createManualClock } from './clock'
export type { Poller, PollerOptions, PollerHealth } from './poller'
export { createPoller } from './poller'

// Due-set evaluation
export type { EvaluateOptions, Candidate, Evaluation, EligibleTask, TaskRecord } from './evaluator'
export {
  evaluateDueSet, parseTaskRecord, minutesUntilDue, classifyOffset, isEligible,
} from './evaluator'

// Dedup stores
export type { DedupStore } from './dedup-store'
export { createMemoryDedupStore } from './dedup-store'
export type { SqliteDedupStore, SqliteDedupStoreOptions } from './sqlite-dedup-store'
export { createSqliteDedupStore } from './sqlite-dedup-store'

// Task sources
export type { TaskSource, MemoryTaskSource } from './task-source'
export { createMemoryTaskSource } from './task-source'
export type { SqliteTaskSource, TaskRowRecord } from './sqlite-task-source'
export { createSqliteTaskSource, TASKS_SCHEMA_SQL } from './sqlite-task-source'

// Notifiers
export type { Notifier, FormattedNotification, RetryOptions } from './notifier'
export {
  formatNotification, createConsoleNotifier, createFanoutNotifier, createRetryingNotifier,
} from './notifier'

// Service & supervision
export type {
  ReminderService, ReminderServiceDeps, TickReport, ServiceHealth,
  ServiceEvents, ServiceEventName,
} from './reminder-service'
export { createReminderService } from './reminder-service'
export type { Supervisor, SupervisorOptions, SupervisorStatus } from './supervisor'
export { createSupervisor } from './supervisor'
