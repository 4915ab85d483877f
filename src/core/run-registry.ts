import type { RunStore } from '../store'
import { RunAlreadyActiveError } from './errors'
import { RunExecutor, type ExecutionOptions, type RunOutcome } from './run-executor'
import type { Credentials, RunUpdateListener, WorkerFactory } from './types'

export interface RunRegistryDeps {
  store: RunStore
  workerFactory: WorkerFactory
  // Applied under the per-call options
  defaults?: ExecutionOptions
}

/**
 * Executors of the runs currently executing, owned by whoever created the
 * registry. An executor is removed once its run settles.
 */
export class RunRegistry {
  private readonly executors = new Map<number, RunExecutor>()

  constructor(private readonly deps: RunRegistryDeps) {}

  async startRunExecution(
    runId: number,
    credentials: Credentials,
    numWorkers: number,
    options: ExecutionOptions = {},
    onUpdate?: RunUpdateListener,
  ): Promise<RunOutcome> {
    if (this.executors.has(runId)) {
      throw new RunAlreadyActiveError(runId)
    }

    const executor = new RunExecutor(runId, {
      ...mergeOptions(this.deps.defaults ?? {}, options),
      store: this.deps.store,
      workerFactory: this.deps.workerFactory,
      credentials,
      numWorkers,
      onUpdate,
    })
    this.executors.set(runId, executor)

    try {
      return await executor.execute()
    } finally {
      this.executors.delete(runId)
    }
  }

  stopRunExecution(runId: number): boolean {
    return this.executors.get(runId)?.stop() ?? false
  }

  async pauseRunExecution(runId: number): Promise<boolean> {
    const executor = this.executors.get(runId)
    return executor ? executor.pause() : false
  }

  async resumeRunExecution(runId: number): Promise<boolean> {
    const executor = this.executors.get(runId)
    return executor ? executor.resume() : false
  }

  isRunPaused(runId: number): boolean {
    return this.executors.get(runId)?.isPaused() ?? false
  }

  getExecutor(runId: number): RunExecutor | undefined {
    return this.executors.get(runId)
  }

  activeRunIds(): number[] {
    return [...this.executors.keys()]
  }

  // Stops every active run; used on shutdown
  stopAll(): number[] {
    return this.activeRunIds().filter((runId) => this.stopRunExecution(runId))
  }
}

export function createRunRegistry(deps: RunRegistryDeps): RunRegistry {
  return new RunRegistry(deps)
}

// Field-wise so an explicit undefined falls back to the default
function mergeOptions(base: ExecutionOptions, override: ExecutionOptions): ExecutionOptions {
  return {
    maxRetries: override.maxRetries ?? base.maxRetries,
    maxConsecutiveFailures: override.maxConsecutiveFailures ?? base.maxConsecutiveFailures,
    watchdog: {
      intervalMs: override.watchdog?.intervalMs ?? base.watchdog?.intervalMs,
      stallThresholdMs: override.watchdog?.stallThresholdMs ?? base.watchdog?.stallThresholdMs,
    },
    progressIntervalMs: override.progressIntervalMs ?? base.progressIntervalMs,
    queueWaitMs: override.queueWaitMs ?? base.queueWaitMs,
    idlePollMs: override.idlePollMs ?? base.idlePollMs,
    artifactsDir: override.artifactsDir ?? base.artifactsDir,
    skipCache: override.skipCache ?? base.skipCache,
    clock: override.clock ?? base.clock,
  }
}
