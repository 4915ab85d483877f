import { ZodError, type ZodIssue } from 'zod'
import { createBrowserWorkerFactory } from './browser'
import { ConfigValidationError, validateConfig } from './core/config'
import { createRunRegistry } from './core/run-registry'
import type { RunOutcome } from './core/run-executor'
import {
  RunConfigSchema,
  type ParameterValues,
  type RunRecord,
  type SweepConfig,
  type TaskRecord,
  type WorkerFactory,
} from './core/types'
import { logger } from './logger'
import { generateCombinations } from './parameters'
import { buildRunReport, type RunReport } from './reporting'
import { SqliteRunStore, type RunStore } from './store'
import type { CreateSweepRunRequest, ExecuteSweepOptions, RunSweepOptions } from './api'

export interface SweepRunPlan {
  run: RunRecord
  tasks: TaskRecord[]
}

export interface SweepResult {
  outcome: RunOutcome
  report: RunReport
}

/**
 * Creates a run and one pending task per parameter combination.
 *
 * Examples:
 * ```ts
 * const { run, tasks } = await createSweepRun(store, {
 *   url: 'https://app.example.com/test/abc',
 *   config: { mode: 'sweep', parameter: 'delta', values: [5, 10, 15] },
 * })
 *
 * const { run } = await createSweepRun(store, {
 *   url: 'https://app.example.com/test/abc',
 *   config: { mode: 'grid', parameters: { delta: {}, stopLoss: { values: [50, 100] } } },
 * })
 * ```
 */
export async function createSweepRun(store: RunStore, request: CreateSweepRunRequest): Promise<SweepRunPlan> {
  const parsed = RunConfigSchema.safeParse(request.config)
  if (!parsed.success) {
    throw new ConfigValidationError('Invalid run configuration', parsed.error.issues)
  }
  const config = parsed.data

  let combinations: ParameterValues[]
  try {
    combinations = generateCombinations(config)
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigValidationError('Invalid parameter values', error.issues)
    }
    throw error
  }

  const target = await store.getOrCreateTarget(request.url, request.name)
  const run = await store.createRun({ targetId: target.id, config })
  const tasks = await store.createTasks(run.id, combinations)
  await store.recordTargetRun(target.id)

  logger.info(`Created run ${run.id} (${config.mode}) with ${tasks.length} tasks for ${target.url}`)
  return { run, tasks }
}

/**
 * Creates a run from `config.target` and `config.sweep`, executes it and
 * returns the outcome with the run report
 */
export async function runSweep(options: RunSweepOptions): Promise<SweepResult> {
  const config = validateConfig(options.config)
  const { target, sweep } = requireSweep(config)

  return withStore(config, options.store, async (store) => {
    const { run } = await createSweepRun(store, { url: target.url, name: target.name, config: sweep })
    return executeSweep(store, run.id, config, options)
  })
}

/**
 * Executes the unfinished tasks of an existing run
 */
export async function resumeSweep(runId: number, options: ExecuteSweepOptions): Promise<SweepResult> {
  const config = validateConfig(options.config ?? {})
  return withStore(config, options.store, (store) => executeSweep(store, runId, config, options))
}

async function executeSweep(
  store: RunStore,
  runId: number,
  config: SweepConfig,
  options: ExecuteSweepOptions,
): Promise<SweepResult> {
  const registry = createRunRegistry({
    store,
    workerFactory: options.workerFactory ?? defaultWorkerFactory(config),
    defaults: {
      maxRetries: config.maxRetries,
      maxConsecutiveFailures: config.maxConsecutiveFailures,
      watchdog: config.watchdog,
      progressIntervalMs: config.progressIntervalMs,
      queueWaitMs: config.queueWaitMs,
      idlePollMs: config.idlePollMs,
      artifactsDir: config.artifactsDir,
    },
  })

  const stop = () => {
    logger.info(`Stopping run ${runId}...`)
    registry.stopRunExecution(runId)
  }
  if (options.signal?.aborted) {
    throw new Error(`Run ${runId} was not started: the signal is already aborted`)
  }
  options.signal?.addEventListener('abort', stop, { once: true })

  try {
    // A false flag leaves the run's own skipCache in effect
    const outcome = await registry.startRunExecution(
      runId,
      options.credentials,
      config.workers,
      { skipCache: config.skipCache || undefined },
      options.onUpdate,
    )
    const report = await buildRunReport(store, runId)
    return { outcome, report }
  } finally {
    options.signal?.removeEventListener('abort', stop)
  }
}

function defaultWorkerFactory(config: SweepConfig): WorkerFactory {
  return createBrowserWorkerFactory(config)
}

async function withStore<T>(
  config: SweepConfig,
  store: RunStore | undefined,
  body: (store: RunStore) => Promise<T>,
): Promise<T> {
  if (store) {
    return body(store)
  }
  const owned = SqliteRunStore.open(config.database.path)
  try {
    return await body(owned)
  } finally {
    await owned.close()
  }
}

function requireSweep(config: SweepConfig): Required<Pick<SweepConfig, 'target' | 'sweep'>> {
  const issues: ZodIssue[] = []
  if (!config.target) {
    issues.push({ code: 'custom', path: ['target'], message: 'a target with a url is required' })
  }
  if (!config.sweep) {
    issues.push({ code: 'custom', path: ['sweep'], message: 'a sweep, grid or staged run config is required' })
  }
  if (!config.target || !config.sweep) {
    throw new ConfigValidationError('Configuration cannot start a run', issues)
  }
  return { target: config.target, sweep: config.sweep }
}
