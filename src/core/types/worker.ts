import type { ResultMetrics } from './metrics'
import type { ParameterValues } from './run-config'

export const FAILURE_TYPES = ['timing', 'modal', 'session', 'browser', 'permanent'] as const
export type FailureType = (typeof FAILURE_TYPES)[number]

export interface Credentials {
  email: string
  password: string
}

export interface FailureArtifacts {
  screenshotPath?: string
  htmlPath?: string
}

export interface TaskRequest {
  taskId: number
  params: ParameterValues
  // Handler configs keyed by parameter name
  parameterConfigs: Record<string, unknown>
  credentials: Credentials
  target: { id: number; url: string }
  artifactsDir: string
}

export type TaskOutcome =
  | {
      success: true
      metrics: ResultMetrics
      rawData?: Record<string, unknown>
    }
  | {
      success: false
      failureType: FailureType
      message: string
      artifacts?: FailureArtifacts
    }

/**
 * One external session able to evaluate tasks against the target.
 *
 * Handles are disposable: the supervisor closes a crashed or stalled handle
 * and asks the factory for a fresh one under the same worker id.
 * `executeTask` reports interaction problems as a failed outcome and only
 * throws when the session itself breaks.
 */
export interface WorkerHandle {
  readonly workerId: number
  start(): Promise<void>
  executeTask(request: TaskRequest): Promise<TaskOutcome>
  close(): Promise<void>
}

export type WorkerFactory = (workerId: number) => WorkerHandle
