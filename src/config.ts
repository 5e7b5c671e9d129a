/**
 * Configuration
 *
 * Reminder settings, validated with zod. Settings come from code, from the
 * planner's JSON settings file, or from TASKPULSE_* environment variables,
 * and are read once when a service is constructed.
 */

import { readFile } from 'node:fs/promises'
import { z } from 'zod'
import { type Result, Ok, Err } from './result'
import { ConfigError, errorMessage } from './errors'
import { type Logger, silentLogger } from './logger'

// ============================================================================
// Schema
// ============================================================================

/** Longest poll interval that still observes every whole-minute offset */
export const MAX_POLL_INTERVAL_SECONDS = 30

/** Widest reminder window; task sources only look one day ahead */
export const MAX_REMINDER_WINDOW_MINUTES = 1440

const OverduePolicySchema = z.discriminatedUnion('policy', [
  z.object({ policy: z.literal('once') }),
  z.object({ policy: z.literal('repeat'), everyMinutes: z.number().int().min(1) }),
])

export const ReminderConfigSchema = z.object({
  pollIntervalSeconds: z.number().positive().max(MAX_POLL_INTERVAL_SECONDS).default(MAX_POLL_INTERVAL_SECONDS),
  reminderWindowMinutes: z.number().int().min(0).max(MAX_REMINDER_WINDOW_MINUTES).default(15),
  overdue: OverduePolicySchema.default({ policy: 'once' }),
  overdueLookbackMinutes: z.number().int().min(1).default(1440),
  storeFailureThreshold: z.number().int().min(1).default(5),
  channel: z.string().min(1).default('desktop'),
  enabled: z.boolean().default(true),
})

export type OverduePolicy = z.infer<typeof OverduePolicySchema>
export type ReminderConfig = z.infer<typeof ReminderConfigSchema>
export type ReminderConfigInput = z.input<typeof ReminderConfigSchema>

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ')
}

export function parseReminderConfig(input: unknown = {}): Result<ReminderConfig, ConfigError> {
  const parsed = ReminderConfigSchema.safeParse(input)
  if (!parsed.success) {
    return Err(new ConfigError(`Invalid reminder config: ${formatIssues(parsed.error)}`))
  }
  return Ok(parsed.data)
}

export function resolveReminderConfig(input: unknown = {}): ReminderConfig {
  const result = parseReminderConfig(input)
  if (!result.ok) throw result.error
  return result.value
}

// ============================================================================
// Planner settings file
// ============================================================================

const SettingsFileSchema = z
  .object({
    reminder_minutes_before: z.number().optional(),
    notification_check_interval: z.number().optional(),
    notification_monitoring_enabled: z.boolean().optional(),
  })
  .passthrough()

export type PlannerSettings = z.infer<typeof SettingsFileSchema>

/**
 * Map planner settings onto config input. Older settings files carry a 60 s
 * check interval, which is clamped to the maximum.
 */
export function fromPlannerSettings(settings: PlannerSettings, logger: Logger = silentLogger): ReminderConfigInput {
  const input: ReminderConfigInput = {}
  if (settings.reminder_minutes_before !== undefined) {
    input.reminderWindowMinutes = settings.reminder_minutes_before
  }
  if (settings.notification_check_interval !== undefined) {
    const interval = settings.notification_check_interval
    if (interval > MAX_POLL_INTERVAL_SECONDS) {
      logger.warn(`notification_check_interval ${interval}s exceeds ${MAX_POLL_INTERVAL_SECONDS}s, using ${MAX_POLL_INTERVAL_SECONDS}s`)
      input.pollIntervalSeconds = MAX_POLL_INTERVAL_SECONDS
    } else {
      input.pollIntervalSeconds = interval
    }
  }
  if (settings.notification_monitoring_enabled !== undefined) {
    input.enabled = settings.notification_monitoring_enabled
  }
  return input
}

function isMissingFile(e: unknown): boolean {
  return e instanceof Error && 'code' in e && e.code === 'ENOENT'
}

/** Load a planner settings.json. A missing file yields the defaults. */
export async function loadSettingsFile(
  path: string,
  opts: { logger?: Logger; overrides?: ReminderConfigInput } = {}
): Promise<ReminderConfig> {
  const logger = opts.logger ?? silentLogger
  let text: string
  try {
    text = await readFile(path, 'utf8')
  } catch (e) {
    if (isMissingFile(e)) {
      logger.info(`Settings file '${path}' not found, using defaults`)
      return resolveReminderConfig({ ...opts.overrides })
    }
    throw new ConfigError(`Cannot read settings file '${path}': ${errorMessage(e)}`, { cause: e })
  }

  let json: unknown
  try {
    json = JSON.parse(text)
  } catch (e) {
    throw new ConfigError(`Settings file '${path}' is not valid JSON: ${errorMessage(e)}`, { cause: e })
  }

  const settings = SettingsFileSchema.safeParse(json)
  if (!settings.success) {
    throw new ConfigError(`Invalid settings file '${path}': ${formatIssues(settings.error)}`)
  }
  return resolveReminderConfig({ ...fromPlannerSettings(settings.data, logger), ...opts.overrides })
}

// ============================================================================
// Environment
// ============================================================================

function envNumber(env: Record<string, string | undefined>, name: string): number | undefined {
  const raw = env[name]
  if (raw === undefined || raw.trim() === '') return undefined
  const n = Number(raw)
  if (!Number.isFinite(n)) throw new ConfigError(`${name} must be a number, got '${raw}'`)
  return n
}

export function fromEnv(env: Record<string, string | undefined>): ReminderConfigInput {
  const input: ReminderConfigInput = {}
  const interval = envNumber(env, 'TASKPULSE_POLL_INTERVAL_SECONDS')
  if (interval !== undefined) input.pollIntervalSeconds = interval
  const window = envNumber(env, 'TASKPULSE_REMINDER_WINDOW_MINUTES')
  if (window !== undefined) input.reminderWindowMinutes = window
  const channel = env['TASKPULSE_CHANNEL']?.trim()
  if (channel) input.channel = channel
  return input
}
