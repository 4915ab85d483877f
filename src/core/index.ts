/**
 * Run execution engine: queue, cache gate, worker supervision, watchdog and
 * progress notifications, plus the shared types and configuration
 */

export * from './types'
export * from './config'
export {
  StoreError,
  RunNotFoundError,
  RunAlreadyActiveError,
  InvalidRunTransitionError,
  QueueInvariantError,
  RunExecutionError,
  UnknownParameterError,
  toError,
  errorMessage,
} from './errors'
export { PriorityTaskQueue, type QueueItem } from './priority-task-queue'
export { CacheGate, type CacheContext, type CacheLookup } from './cache-gate'
export {
  RunExecutor,
  type ExecutionOptions,
  type RunExecutorOptions,
  type RunOutcome,
  type FinalRunStatus,
} from './run-executor'
export { RunRegistry, createRunRegistry, type RunRegistryDeps } from './run-registry'
export { Watchdog, type WatchdogHost } from './watchdog'
export { ProgressChannel } from './progress-channel'
export { WorkerSlot, type Delegation } from './worker-slot'
export { assertRunTransition, isRunTransitionAllowed, isTerminalRunStatus } from './run-state'
export { classifyException } from './utils/classify-error'
