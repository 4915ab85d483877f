import type { ResultMetrics } from './metrics'
import type { RunStatus } from './run'
import type { ParameterValues } from './run-config'
import type { FailureType } from './worker'

export interface QueueStats {
  pending: number
  inProgress: number
  completed: number
  failed: number
}

export type RestartReason = 'browser' | 'consecutive_failures' | 'stalled'

interface EventBase {
  runId: number
  timestamp: string
}

export type RunEvent =
  | (EventBase & { type: 'run_started'; totalTasks: number })
  | (EventBase & { type: 'task_started'; taskId: number; params: ParameterValues; attempt: number; workerId: number })
  | (EventBase & {
      type: 'task_completed'
      taskId: number
      params: ParameterValues
      result: ResultMetrics
      cached: boolean
    })
  | (EventBase & {
      type: 'task_failed'
      taskId: number
      params: ParameterValues
      error: string
      failureType: FailureType
      willRetry: boolean
    })
  | (EventBase & { type: 'worker_restarted'; workerId: number; reason: RestartReason })
  | (EventBase & { type: 'run_paused' })
  | (EventBase & { type: 'run_resumed' })
  | (EventBase & { type: 'progress'; stats: QueueStats })
  | (EventBase & { type: 'run_completed'; status: RunStatus; stats: QueueStats })

export type RunEventType = RunEvent['type']

// Distributes over the union so each variant keeps its own fields
type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never

export type RunEventPayload = DistributiveOmit<RunEvent, 'runId' | 'timestamp'>

export type RunUpdateListener = (runId: number, event: RunEvent) => void | Promise<void>
