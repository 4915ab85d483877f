import { logger } from '../logger'
import type { RunStore } from '../store'
import { parameterConfigsOf } from '../parameters'
import { CacheGate } from './cache-gate'
import { RunExecutionError, RunNotFoundError, StoreError, errorMessage } from './errors'
import { PriorityTaskQueue, type QueueItem } from './priority-task-queue'
import { ProgressChannel } from './progress-channel'
import { assertRunTransition } from './run-state'
import {
  NON_TERMINAL_TASK_STATUSES,
  type Credentials,
  type FailureType,
  type QueueStats,
  type RestartReason,
  type RunRecord,
  type RunUpdateListener,
  type TargetRecord,
  type TaskOutcome,
  type WatchdogConfig,
  type WorkerFactory,
} from './types'
import { classifyException } from './utils/classify-error'
import { sleep } from './utils/sleep'
import { Watchdog, type WatchdogHost } from './watchdog'
import { WorkerSlot } from './worker-slot'

export interface ExecutionOptions {
  maxRetries?: number
  maxConsecutiveFailures?: number
  watchdog?: Partial<WatchdogConfig>
  progressIntervalMs?: number
  queueWaitMs?: number
  idlePollMs?: number
  artifactsDir?: string
  // Overrides the run's own skipCache flag
  skipCache?: boolean
  clock?: () => number
}

export interface RunExecutorOptions extends ExecutionOptions {
  store: RunStore
  workerFactory: WorkerFactory
  credentials: Credentials
  numWorkers: number
  onUpdate?: RunUpdateListener
}

export type FinalRunStatus = 'completed' | 'failed'

export interface RunOutcome {
  runId: number
  status: FinalRunStatus
  stats: QueueStats
}

type ExecutorState = 'idle' | 'running' | 'paused' | 'stopping' | 'finished'

interface ExecutorSettings {
  maxRetries: number
  maxConsecutiveFailures: number
  watchdog: WatchdogConfig
  progressIntervalMs: number
  queueWaitMs: number
  idlePollMs: number
  artifactsDir: string
}

function resolveSettings(options: ExecutionOptions): ExecutorSettings {
  return {
    maxRetries: options.maxRetries ?? 3,
    maxConsecutiveFailures: options.maxConsecutiveFailures ?? 5,
    watchdog: {
      intervalMs: options.watchdog?.intervalMs ?? 30000,
      stallThresholdMs: options.watchdog?.stallThresholdMs ?? 300000,
    },
    progressIntervalMs: options.progressIntervalMs ?? 2000,
    queueWaitMs: options.queueWaitMs ?? 1000,
    idlePollMs: options.idlePollMs ?? 500,
    artifactsDir: options.artifactsDir ?? './artifacts',
  }
}

/**
 * Executes one run: N worker loops pull tasks from a priority queue, consult
 * the cache, delegate to worker handles and retry or finalize failures, while
 * a watchdog replaces stalled workers and a ticker reports progress.
 */
export class RunExecutor implements WatchdogHost {
  readonly channel: ProgressChannel
  readonly queue = new PriorityTaskQueue()
  private readonly cacheGate: CacheGate
  private readonly watchdog: Watchdog
  private readonly options: RunExecutorOptions
  private readonly settings: ExecutorSettings
  private readonly clock: () => number
  private readonly wake = new AbortController()
  private workerSlots: WorkerSlot[] = []
  private state: ExecutorState = 'idle'
  private stopRequested = false
  private fatalError?: unknown
  private settle?: () => void
  private skipCache = false
  private target?: TargetRecord
  private parameterConfigs: Record<string, unknown> = {}

  constructor(
    readonly runId: number,
    options: RunExecutorOptions,
  ) {
    if (!Number.isInteger(options.numWorkers) || options.numWorkers < 1) {
      throw new RangeError(`numWorkers must be a positive integer, got ${options.numWorkers}`)
    }

    this.options = options
    this.settings = resolveSettings(options)
    this.clock = options.clock ?? Date.now
    this.channel = new ProgressChannel(runId, () => new Date(this.clock()))
    if (options.onUpdate) {
      this.channel.subscribe(options.onUpdate)
    }
    this.cacheGate = new CacheGate(options.store, this.queue, this.channel)
    this.watchdog = new Watchdog(this, this.settings.watchdog, this.clock)
  }

  async execute(): Promise<RunOutcome> {
    if (this.state !== 'idle') {
      throw new Error(`Run ${this.runId} executor has already been started`)
    }

    const { store } = this.options
    const run = await store.getRun(this.runId)
    if (!run) {
      throw new RunNotFoundError(this.runId)
    }
    assertRunTransition(run.status, 'running')

    let totalTasks: number
    try {
      totalTasks = await this.prepare(run)
    } catch (error) {
      this.fatalError = error
      return this.finalize()
    }

    if (totalTasks === 0) {
      logger.info(`Run ${this.runId}: nothing left to execute`)
      return this.finalize()
    }

    try {
      await store.updateRunStatus(this.runId, 'running')
    } catch (error) {
      this.fatalError = error
      return this.finalize()
    }
    this.state = 'running'
    this.channel.publish({ type: 'run_started', totalTasks })
    logger.info(`Run ${this.runId}: ${totalTasks} task(s) on ${this.options.numWorkers} worker(s)`)

    const done = new Promise<void>((resolve) => {
      this.settle = resolve
    })
    this.workerSlots = Array.from(
      { length: this.options.numWorkers },
      (_, i) => new WorkerSlot(i + 1, this.options.workerFactory, this.clock),
    )
    const loops = this.workerSlots.map((slot) => this.workerLoop(slot))
    this.watchdog.start()
    const stopTicker = this.channel.startTicker(this.settings.progressIntervalMs, () => this.queue.stats())

    await done
    if (this.isActive()) {
      this.state = 'stopping'
    }

    this.wake.abort()
    this.queue.close()
    await Promise.all(loops)
    stopTicker()
    await this.watchdog.stop()
    await Promise.all(this.workerSlots.map((slot) => slot.release()))

    return this.finalize()
  }

  async pause(): Promise<boolean> {
    if (this.state !== 'running') return false

    this.state = 'paused'
    await this.guardStore(() => this.options.store.updateRunStatus(this.runId, 'paused'))
    this.channel.publish({ type: 'run_paused' })
    logger.info(`Run ${this.runId} paused`)
    return true
  }

  async resume(): Promise<boolean> {
    if (this.state !== 'paused') return false

    this.state = 'running'
    for (const slot of this.workerSlots) {
      slot.touch()
    }
    await this.guardStore(() => this.options.store.updateRunStatus(this.runId, 'running'))
    this.channel.publish({ type: 'run_resumed' })
    logger.info(`Run ${this.runId} resumed`)
    return true
  }

  /**
   * Requests a graceful stop: in-flight tasks settle, nothing new is dequeued
   */
  stop(): boolean {
    if (this.state !== 'running' && this.state !== 'paused') return false

    this.stopRequested = true
    this.state = 'stopping'
    logger.info(`Run ${this.runId} stopping`)
    this.settle?.()
    return true
  }

  isPaused(): boolean {
    return this.state === 'paused'
  }

  isActive(): boolean {
    return this.state === 'running' || this.state === 'paused'
  }

  /**
   * Runs one watchdog pass immediately; returns the restarted worker ids
   */
  checkHealth(): Promise<number[]> {
    return this.watchdog.check()
  }

  getStats(): QueueStats {
    return this.queue.stats()
  }

  slots(): readonly WorkerSlot[] {
    return this.workerSlots
  }

  hasPendingWork(): boolean {
    return this.queue.stats().pending > 0
  }

  async restartSlot(slot: WorkerSlot, reason: RestartReason): Promise<void> {
    logger.info(`Run ${this.runId}: restarting worker ${slot.workerId} (${reason})`)
    await slot.restart()
    this.channel.publish({ type: 'worker_restarted', workerId: slot.workerId, reason })
  }

  private async prepare(run: RunRecord): Promise<number> {
    const { store } = this.options
    const target = await store.getTarget(run.targetId)
    if (!target) {
      throw new StoreError(`Target ${run.targetId} of run ${run.id} does not exist`)
    }
    this.target = target
    this.skipCache = this.options.skipCache ?? run.config.skipCache
    this.parameterConfigs = parameterConfigsOf(run.config)

    const tasks = await store.listTasks(this.runId, NON_TERMINAL_TASK_STATUSES)
    for (const task of tasks) {
      if (task.status === 'running') {
        // left behind by an interrupted process
        await store.updateTaskStatus(task.id, 'pending')
      }
      this.queue.put({ taskId: task.id, params: task.params, attempts: task.attempts }, task.attempts)
    }
    return tasks.length
  }

  private async workerLoop(slot: WorkerSlot): Promise<void> {
    while (this.isActive()) {
      if (this.state === 'paused') {
        await sleep(this.settings.idlePollMs, this.wake.signal)
        continue
      }

      const item = await this.queue.get(this.settings.queueWaitMs)
      if (!item) {
        slot.touch()
        continue
      }
      if (!this.isActive()) {
        this.queue.requeue(item, item.attempts)
        break
      }

      slot.touch()
      try {
        await this.processItem(slot, item)
      } catch (error) {
        this.fail(error)
        return
      }

      if (this.queue.isDrained()) {
        this.settle?.()
      }
    }
  }

  private async processItem(slot: WorkerSlot, item: QueueItem): Promise<void> {
    const { store } = this.options
    const target = this.requireTarget()

    const cached = await this.cacheGate.lookup(item, { targetId: target.id, skipCache: this.skipCache })
    if (cached.hit) return

    const task = await store.updateTaskStatus(item.taskId, 'running', { incrementAttempts: true })
    this.channel.publish({
      type: 'task_started',
      taskId: task.id,
      params: item.params,
      attempt: task.attempts,
      workerId: slot.workerId,
    })

    slot.touch()
    let outcome: TaskOutcome
    let abandoned = false
    try {
      const delegation = await slot.delegate({
        taskId: task.id,
        params: item.params,
        parameterConfigs: this.parameterConfigs,
        credentials: this.options.credentials,
        target: { id: target.id, url: target.url },
        artifactsDir: this.settings.artifactsDir,
      })
      if (delegation.kind === 'abandoned') {
        abandoned = true
        outcome = { success: false, failureType: 'timing', message: 'Worker stalled and was replaced' }
      } else {
        outcome = delegation.outcome
      }
    } catch (error) {
      outcome = { success: false, failureType: classifyException(error), message: errorMessage(error) }
    }
    slot.touch()

    if (outcome.success) {
      const result = await store.completeTask(task.id, outcome.metrics, outcome.rawData)
      slot.consecutiveFailures = 0
      this.queue.markCompleted(task.id)
      this.channel.publish({
        type: 'task_completed',
        taskId: task.id,
        params: item.params,
        result: result.metrics,
        cached: false,
      })
      return
    }

    await this.handleFailure(slot, { ...item, attempts: task.attempts }, outcome, abandoned)
  }

  private async handleFailure(
    slot: WorkerSlot,
    item: QueueItem,
    outcome: Extract<TaskOutcome, { success: false }>,
    abandoned: boolean,
  ): Promise<void> {
    const { store } = this.options
    const { maxRetries, maxConsecutiveFailures } = this.settings
    if (!abandoned) {
      slot.consecutiveFailures++
    }

    // zero-based index of the attempt that just failed
    const attemptIndex = item.attempts - 1
    const willRetry = outcome.failureType !== 'permanent' && attemptIndex < maxRetries

    if (willRetry) {
      await store.updateTaskStatus(item.taskId, 'pending')
      this.queue.requeue(item, item.attempts)
    } else {
      await store.failTask(item.taskId, {
        attemptNumber: attemptIndex,
        failureType: outcome.failureType,
        errorMessage: outcome.message,
        screenshotPath: outcome.artifacts?.screenshotPath,
        htmlPath: outcome.artifacts?.htmlPath,
      })
      this.queue.markFailed(item.taskId)
    }

    logger.debug(`Task ${item.taskId} failed (${outcome.failureType}): ${outcome.message}`)
    this.channel.publish({
      type: 'task_failed',
      taskId: item.taskId,
      params: item.params,
      error: outcome.message,
      failureType: outcome.failureType,
      willRetry,
    })

    if (abandoned) return

    const reason = restartReason(outcome.failureType, slot.consecutiveFailures, maxConsecutiveFailures)
    if (reason) {
      await this.restartSlot(slot, reason)
    }
  }

  private async finalize(): Promise<RunOutcome> {
    const stats = this.queue.stats()
    let status: FinalRunStatus = 'completed'
    if (this.fatalError !== undefined || (this.stopRequested && !this.queue.isDrained())) {
      status = 'failed'
    }

    try {
      await this.options.store.updateRunStatus(this.runId, status)
    } catch (error) {
      logger.error(`Run ${this.runId}: could not record final status:`, error)
      if (this.fatalError === undefined) this.fatalError = error
      status = 'failed'
    }

    this.state = 'finished'
    this.channel.publish({ type: 'run_completed', status, stats })
    logger.info(`Run ${this.runId} ${status}: ${stats.completed} completed, ${stats.failed} failed`)

    if (this.fatalError !== undefined) {
      const message = `Run ${this.runId} failed: ${errorMessage(this.fatalError)}`
      throw new RunExecutionError(this.runId, message, this.fatalError)
    }
    return { runId: this.runId, status, stats }
  }

  private fail(error: unknown): void {
    logger.error(`Run ${this.runId}: infrastructure error, stopping:`, error)
    if (this.fatalError === undefined) {
      this.fatalError = error
    }
    if (this.isActive()) {
      this.state = 'stopping'
    }
    this.settle?.()
  }

  private async guardStore(write: () => Promise<unknown>): Promise<void> {
    try {
      await write()
    } catch (error) {
      this.fail(error)
    }
  }

  private requireTarget(): TargetRecord {
    if (!this.target) {
      throw new Error(`Run ${this.runId} executor used before it was prepared`)
    }
    return this.target
  }
}

function restartReason(
  failureType: FailureType,
  consecutiveFailures: number,
  threshold: number,
): RestartReason | undefined {
  if (failureType === 'browser') return 'browser'
  if (consecutiveFailures >= threshold) return 'consecutive_failures'
  return undefined
}
