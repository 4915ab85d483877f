import type { ResultMetrics } from './metrics'
import type { ParameterValues, RunConfig, RunMode } from './run-config'
import type { FailureType } from './worker'

export const RUN_STATUSES = ['pending', 'running', 'paused', 'completed', 'failed'] as const
export type RunStatus = (typeof RUN_STATUSES)[number]

export const TASK_STATUSES = ['pending', 'running', 'completed', 'failed'] as const
export type TaskStatus = (typeof TASK_STATUSES)[number]

export const NON_TERMINAL_TASK_STATUSES: readonly TaskStatus[] = ['pending', 'running']

// The web page (backtest) a run sweeps parameters against
export interface TargetRecord {
  id: number
  url: string
  name?: string
  runCount: number
  lastRunAt?: Date
  createdAt: Date
}

export interface RunRecord {
  id: number
  targetId: number
  mode: RunMode
  config: RunConfig
  status: RunStatus
  startedAt?: Date
  completedAt?: Date
  createdAt: Date
}

export interface TaskRecord {
  id: number
  runId: number
  params: ParameterValues
  status: TaskStatus
  attempts: number
  createdAt: Date
  updatedAt: Date
}

export interface ResultRecord {
  id: number
  taskId: number
  metrics: ResultMetrics
  rawData?: Record<string, unknown>
  createdAt: Date
}

export interface NewFailure {
  attemptNumber: number
  failureType: FailureType
  errorMessage: string
  screenshotPath?: string
  htmlPath?: string
}

export interface FailureRecord extends NewFailure {
  id: number
  taskId: number
  createdAt: Date
}

export interface TaskCounts {
  total: number
  pending: number
  running: number
  completed: number
  failed: number
}
