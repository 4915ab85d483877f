import type {
  FailureRecord,
  NewFailure,
  ParameterValues,
  ResultMetrics,
  ResultRecord,
  RunConfig,
  RunRecord,
  RunStatus,
  TargetRecord,
  TaskCounts,
  TaskRecord,
  TaskStatus,
} from '../core/types'

export interface CreateRunInput {
  targetId: number
  config: RunConfig
}

export interface ListRunsOptions {
  targetId?: number
  limit?: number
}

export interface UpdateTaskOptions {
  incrementAttempts?: boolean
}

export interface TaskResult {
  task: TaskRecord
  result: ResultRecord
}

/**
 * Persistence used by the engine. Result and failure writes are atomic with
 * the task status change they belong to. Every method rejects with
 * `StoreError` when the referenced row is missing or the write is invalid.
 */
export interface RunStore {
  getOrCreateTarget(url: string, name?: string): Promise<TargetRecord>
  getTarget(targetId: number): Promise<TargetRecord | undefined>
  listRecentTargets(limit?: number): Promise<TargetRecord[]>
  recordTargetRun(targetId: number): Promise<void>

  createRun(input: CreateRunInput): Promise<RunRecord>
  getRun(runId: number): Promise<RunRecord | undefined>
  listRuns(options?: ListRunsOptions): Promise<RunRecord[]>
  // Stamps startedAt on the first move to running and completedAt on completed/failed
  updateRunStatus(runId: number, status: RunStatus): Promise<RunRecord>

  createTasks(runId: number, params: ParameterValues[]): Promise<TaskRecord[]>
  getTask(taskId: number): Promise<TaskRecord | undefined>
  listTasks(runId: number, statuses?: readonly TaskStatus[]): Promise<TaskRecord[]>
  updateTaskStatus(taskId: number, status: TaskStatus, options?: UpdateTaskOptions): Promise<TaskRecord>
  completeTask(taskId: number, metrics: ResultMetrics, rawData?: Record<string, unknown>): Promise<ResultRecord>
  failTask(taskId: number, failure: NewFailure): Promise<FailureRecord>

  // Most recent result for the same target and parameter mapping, any run
  findCachedResult(targetId: number, params: ParameterValues): Promise<ResultRecord | undefined>
  getResult(taskId: number): Promise<ResultRecord | undefined>
  listRunResults(runId: number): Promise<TaskResult[]>
  listFailures(runId: number): Promise<FailureRecord[]>
  countTasks(runId: number): Promise<TaskCounts>

  close(): Promise<void>
}
