/* eslint-disable no-console */
import { ConfigLoadError, ConfigValidationError, loadConfig } from '../core/config'
import { RunNotFoundError, errorMessage } from '../core/errors'
import type { Goal, RunEvent, SweepConfig } from '../core/types'
import type { PlainObject } from '../core/utils/deep-merge'
import { logger, setLogLevel } from '../logger'
import { CLIReporter, JSONReporter, formatParams, generateRecommendations, type RunReport } from '../reporting'
import { SqliteRunStore } from '../store'
import type { BaseArgs } from './types'

export function applyLogLevel(args: BaseArgs): void {
  if (args.verbose) {
    setLogLevel('debug')
  } else if (args.quiet) {
    setLogLevel('warn')
  }
}

export function loadCliConfig(args: BaseArgs, cliArgs: PlainObject = {}): Promise<SweepConfig> {
  return loadConfig({ cwd: process.cwd(), configPath: args.config, cliArgs })
}

/**
 * Opens the store, hands it to `body` and always closes it again
 */
export async function withStore<T>(config: SweepConfig, body: (store: SqliteRunStore) => Promise<T>): Promise<T> {
  const store = SqliteRunStore.open(config.database.path)
  try {
    return await body(store)
  } finally {
    await store.close()
  }
}

/**
 * Reports a failed command on stderr and exits with status 1
 */
export function exitWithError(error: unknown): never {
  if (error instanceof ConfigLoadError) {
    console.error('❌ Failed to load configuration:')
    console.error(error.message)
  } else if (error instanceof ConfigValidationError) {
    console.error('❌ Configuration validation failed:')
    console.error(error.getErrorSummary())
  } else if (error instanceof RunNotFoundError) {
    console.error(`❌ ${error.message}`)
  } else {
    console.error('❌ Unexpected error:', errorMessage(error))
    logger.debug('Stack:', error)
  }
  process.exit(1)
}

/**
 * Aborts the returned signal on SIGINT or SIGTERM until `dispose` is called
 */
export function watchShutdownSignals(): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController()
  const onSignal = (name: NodeJS.Signals) => {
    logger.info(`Received ${name}, stopping the run...`)
    controller.abort()
  }
  process.on('SIGINT', onSignal)
  process.on('SIGTERM', onSignal)

  return {
    signal: controller.signal,
    dispose: () => {
      process.off('SIGINT', onSignal)
      process.off('SIGTERM', onSignal)
    },
  }
}

/**
 * Progress lines for a run's events
 */
export function logRunEvent(_runId: number, event: RunEvent): void {
  switch (event.type) {
    case 'run_started':
      logger.info(`🚀 Run ${event.runId} started with ${event.totalTasks} task(s)`)
      break
    case 'task_started':
      logger.info(
        `⏳ Task ${event.taskId} (${formatParams(event.params)}) attempt ${event.attempt} on worker ${event.workerId}`,
      )
      break
    case 'task_completed':
      logger.info(`✅ Task ${event.taskId} (${formatParams(event.params)})${event.cached ? ' from cache' : ''}`)
      break
    case 'task_failed':
      if (event.willRetry) {
        logger.warn(`🔄 Task ${event.taskId} [${event.failureType}]: ${event.error}, retrying`)
      } else {
        logger.error(`❌ Task ${event.taskId} [${event.failureType}]: ${event.error}`)
      }
      break
    case 'worker_restarted':
      logger.warn(`Worker ${event.workerId} restarted (${event.reason})`)
      break
    case 'run_paused':
    case 'run_resumed':
      logger.info(`Run ${event.runId} ${event.type === 'run_paused' ? 'paused' : 'resumed'}`)
      break
    case 'progress':
      logger.debug(
        `Progress: ${event.stats.completed} completed, ${event.stats.failed} failed, ` +
          `${event.stats.inProgress} running, ${event.stats.pending} pending`,
      )
      break
    case 'run_completed':
      logger.info(`🏁 Run ${event.runId} ${event.status}`)
      break
  }
}

export interface PrintReportOptions {
  quiet?: boolean
  goal?: Goal
  format?: 'cli' | 'json'
}

/**
 * Prints a run report with recommendations and writes the JSON file when
 * `output.formats` asks for it
 */
export async function printReport(report: RunReport, config: SweepConfig, options: PrintReportOptions = {}): Promise<void> {
  const recommendations =
    report.entries.length > 0 ? generateRecommendations(report.entries, options.goal ?? config.goal) : undefined

  if (options.quiet || options.format === 'json') {
    console.log(new JSONReporter({ prettyPrint: true }).generate(report, recommendations))
  } else {
    new CLIReporter({ showColors: true }).print(report, recommendations)
  }

  if (config.output.formats.includes('json')) {
    const filePath = await new JSONReporter({ prettyPrint: true }).writeFile(report, config.output.dir, recommendations)
    logger.info(`JSON report written to ${filePath}`)
  }
}
