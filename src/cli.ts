#!/usr/bin/env node
/**
 * taskpulse CLI
 *
 *   taskpulse watch --tasks <tasks.db> --state <state.db> [options]
 *   taskpulse check --tasks <tasks.db> --state <state.db> [options]
 *
 * `watch` monitors until SIGINT/SIGTERM; `check` runs a single tick and
 * prints what fired.
 */

import { parseArgs } from 'node:util'
import { pathToFileURL } from 'node:url'
import { type ReminderConfig, type ReminderConfigInput, fromEnv, loadSettingsFile, resolveReminderConfig } from './config'
import { type Logger, createConsoleLogger, isLogLevel } from './logger'
import { createConsoleNotifier } from './notifier'
import { createReminderService, type TickReport } from './reminder-service'
import { type SqliteDedupStore, createSqliteDedupStore } from './sqlite-dedup-store'
import { createSqliteTaskSource } from './sqlite-task-source'
import { createSupervisor } from './supervisor'
import { describeKey } from './offsets'
import { TaskpulseError, errorMessage } from './errors'

export const USAGE = `Usage: taskpulse <watch|check> --tasks <tasks.db> --state <state.db> [options]

Options:
  --tasks <path>       planner database with a tasks table (required)
  --state <path>       dedup state database, created if missing (required)
  --settings <path>    planner settings.json
  --channel <name>     notification channel (default: desktop)
  --interval <secs>    poll interval in seconds, at most 30
  --window <mins>      reminder window in minutes
  --log-level <level>  debug | info | warn | error (default: info)
  -h, --help           show this help`

export type CliCommand = 'watch' | 'check'

export type CliArgs = {
  command: CliCommand
  tasks: string
  state: string
  settings: string | undefined
  logLevel: string
  overrides: ReminderConfigInput
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'UsageError'
  }
}

function numberOption(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined
  const n = Number(raw)
  if (raw.trim() === '' || !Number.isFinite(n)) throw new UsageError(`--${name} must be a number, got '${raw}'`)
  return n
}

function readArgs(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: true,
      options: {
        tasks: { type: 'string' },
        state: { type: 'string' },
        settings: { type: 'string' },
        channel: { type: 'string' },
        interval: { type: 'string' },
        window: { type: 'string' },
        'log-level': { type: 'string' },
        help: { type: 'boolean', short: 'h' },
      },
    })
  } catch (e) {
    throw new UsageError(errorMessage(e))
  }
}

/** Returns null when help was requested */
export function parseCliArgs(argv: readonly string[]): CliArgs | null {
  const parsed = readArgs(argv)
  const { values, positionals } = parsed
  if (values.help === true) return null

  const command = positionals[0]
  if (command !== 'watch' && command !== 'check') {
    throw new UsageError(command === undefined ? 'Missing command' : `Unknown command '${command}'`)
  }
  if (positionals.length > 1) throw new UsageError(`Unexpected argument '${positionals[1]}'`)
  if (!values.tasks) throw new UsageError('--tasks is required')
  if (!values.state) throw new UsageError('--state is required')

  const overrides: ReminderConfigInput = {}
  if (values.channel !== undefined) overrides.channel = values.channel
  const interval = numberOption('interval', values.interval)
  if (interval !== undefined) overrides.pollIntervalSeconds = interval
  const window = numberOption('window', values.window)
  if (window !== undefined) overrides.reminderWindowMinutes = window

  return {
    command,
    tasks: values.tasks,
    state: values.state,
    settings: values.settings,
    logLevel: values['log-level'] ?? 'info',
    overrides,
  }
}

// Flags beat the environment, which beats the settings file
async function resolveConfig(args: CliArgs, env: NodeJS.ProcessEnv, logger: Logger): Promise<ReminderConfig> {
  const overrides = { ...fromEnv(env), ...args.overrides }
  if (args.settings) return loadSettingsFile(args.settings, { logger, overrides })
  return resolveReminderConfig(overrides)
}

export function formatReport(report: TickReport): string[] {
  const lines = [`Tick at ${report.at}: ${report.fired.length} fired, ${report.skipped.length} skipped`]
  for (const event of report.fired) lines.push(`  fired ${describeKey(event)} '${event.title}'`)
  for (const skipped of report.skipped) lines.push(`  skipped ${skipped.taskId ?? '(no id)'}: ${skipped.reason}`)
  for (const id of report.invalidated) lines.push(`  reset ${id}`)
  return lines
}

function waitForSignal(logger: Logger): Promise<void> {
  return new Promise((resolve) => {
    const onSignal = (signal: NodeJS.Signals) => {
      process.off('SIGINT', onSignal)
      process.off('SIGTERM', onSignal)
      logger.info(`Received ${signal}, shutting down`)
      resolve()
    }
    process.on('SIGINT', onSignal)
    process.on('SIGTERM', onSignal)
  })
}

async function run(args: CliArgs, env: NodeJS.ProcessEnv): Promise<number> {
  if (!isLogLevel(args.logLevel)) throw new UsageError(`Unknown log level '${args.logLevel}'`)
  const logger = createConsoleLogger('taskpulse', { level: args.logLevel })
  const config = await resolveConfig(args, env, logger)

  const taskSource = createSqliteTaskSource(args.tasks)
  let store: SqliteDedupStore
  try {
    store = await createSqliteDedupStore(args.state, { channel: config.channel })
  } catch (e) {
    await taskSource.close()
    throw e
  }

  try {
    const service = createReminderService({
      taskSource,
      store,
      notifier: createConsoleNotifier(logger),
      config,
      logger,
    })

    if (args.command === 'check') {
      const report = await service.tick()
      for (const line of formatReport(report)) console.log(line)
      return 0
    }

    const supervisor = createSupervisor(service, { logger })
    supervisor.start()
    await waitForSignal(logger)
    await supervisor.stop()
    return 0
  } finally {
    await store.close()
    await taskSource.close()
  }
}

export async function main(argv: readonly string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  let args: CliArgs | null
  try {
    args = parseCliArgs(argv)
  } catch (e) {
    console.error(errorMessage(e))
    console.error(USAGE)
    return 2
  }
  if (!args) {
    console.log(USAGE)
    return 0
  }

  try {
    return await run(args, env)
  } catch (e) {
    if (e instanceof UsageError) {
      console.error(e.message)
      return 2
    }
    if (e instanceof TaskpulseError) {
      console.error(`[taskpulse] ${e.name} (${e.code}): ${e.message}`)
      return 1
    }
    throw e
  }
}

const entry = process.argv[1]
if (entry !== undefined && import.meta.url === pathToFileURL(entry).href) {
  void main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code
    },
    (e: unknown) => {
      console.error('[taskpulse] Unexpected failure:', e)
      process.exitCode = 1
    }
  )
}
