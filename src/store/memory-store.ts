import { StoreError } from '../core/errors'
import type {
  FailureRecord,
  NewFailure,
  ParameterValues,
  ResultMetrics,
  ResultRecord,
  RunRecord,
  RunStatus,
  TargetRecord,
  TaskCounts,
  TaskRecord,
  TaskStatus,
} from '../core/types'
import { pickMetrics } from '../core/types'
import { paramsKey } from './params-key'
import type { CreateRunInput, ListRunsOptions, RunStore, TaskResult, UpdateTaskOptions } from './run-store'

/**
 * Process-local store with the same semantics as the SQLite one.
 * Records are copied on the way in and out.
 */
export class InMemoryRunStore implements RunStore {
  private readonly targets = new Map<number, TargetRecord>()
  private readonly runs = new Map<number, RunRecord>()
  private readonly tasks = new Map<number, TaskRecord>()
  private readonly results = new Map<number, ResultRecord>() // by task id
  private readonly failures: FailureRecord[] = []
  private nextId = { target: 1, run: 1, task: 1, result: 1, failure: 1 }

  constructor(private readonly now: () => Date = () => new Date()) {}

  async getOrCreateTarget(url: string, name?: string): Promise<TargetRecord> {
    for (const target of this.targets.values()) {
      if (target.url === url) {
        if (name && target.name !== name) target.name = name
        return structuredClone(target)
      }
    }
    const target: TargetRecord = { id: this.nextId.target++, url, name, runCount: 0, createdAt: this.now() }
    this.targets.set(target.id, target)
    return structuredClone(target)
  }

  async getTarget(targetId: number): Promise<TargetRecord | undefined> {
    const target = this.targets.get(targetId)
    return target && structuredClone(target)
  }

  async listRecentTargets(limit = 10): Promise<TargetRecord[]> {
    return [...this.targets.values()]
      .sort((a, b) => (b.lastRunAt?.getTime() ?? 0) - (a.lastRunAt?.getTime() ?? 0) || b.id - a.id)
      .slice(0, limit)
      .map((target) => structuredClone(target))
  }

  async recordTargetRun(targetId: number): Promise<void> {
    const target = this.requireTarget(targetId)
    target.runCount++
    target.lastRunAt = this.now()
  }

  async createRun(input: CreateRunInput): Promise<RunRecord> {
    this.requireTarget(input.targetId)
    const run: RunRecord = {
      id: this.nextId.run++,
      targetId: input.targetId,
      mode: input.config.mode,
      config: structuredClone(input.config),
      status: 'pending',
      createdAt: this.now(),
    }
    this.runs.set(run.id, run)
    return structuredClone(run)
  }

  async getRun(runId: number): Promise<RunRecord | undefined> {
    const run = this.runs.get(runId)
    return run && structuredClone(run)
  }

  async listRuns(options: ListRunsOptions = {}): Promise<RunRecord[]> {
    return [...this.runs.values()]
      .filter((run) => options.targetId === undefined || run.targetId === options.targetId)
      .sort((a, b) => b.id - a.id)
      .slice(0, options.limit ?? 20)
      .map((run) => structuredClone(run))
  }

  async updateRunStatus(runId: number, status: RunStatus): Promise<RunRecord> {
    const run = this.runs.get(runId)
    if (!run) throw new StoreError(`Run ${runId} does not exist`)

    run.status = status
    if (status === 'running' && !run.startedAt) run.startedAt = this.now()
    if (status === 'completed' || status === 'failed') run.completedAt = this.now()
    return structuredClone(run)
  }

  async createTasks(runId: number, params: ParameterValues[]): Promise<TaskRecord[]> {
    if (!this.runs.has(runId)) throw new StoreError(`Run ${runId} does not exist`)

    return params.map((values) => {
      const now = this.now()
      const task: TaskRecord = {
        id: this.nextId.task++,
        runId,
        params: { ...values },
        status: 'pending',
        attempts: 0,
        createdAt: now,
        updatedAt: now,
      }
      this.tasks.set(task.id, task)
      return structuredClone(task)
    })
  }

  async getTask(taskId: number): Promise<TaskRecord | undefined> {
    const task = this.tasks.get(taskId)
    return task && structuredClone(task)
  }

  async listTasks(runId: number, statuses?: readonly TaskStatus[]): Promise<TaskRecord[]> {
    return [...this.tasks.values()]
      .filter((task) => task.runId === runId && (!statuses || statuses.includes(task.status)))
      .map((task) => structuredClone(task))
  }

  async updateTaskStatus(taskId: number, status: TaskStatus, options: UpdateTaskOptions = {}): Promise<TaskRecord> {
    const task = this.requireTask(taskId)
    task.status = status
    if (options.incrementAttempts) task.attempts++
    task.updatedAt = this.now()
    return structuredClone(task)
  }

  async completeTask(taskId: number, metrics: ResultMetrics, rawData?: Record<string, unknown>): Promise<ResultRecord> {
    const task = this.requireTask(taskId)
    if (this.results.has(taskId)) throw new StoreError(`Task ${taskId} already has a result`)

    const result: ResultRecord = {
      id: this.nextId.result++,
      taskId,
      metrics: pickMetrics(metrics),
      rawData: rawData && structuredClone(rawData),
      createdAt: this.now(),
    }
    this.results.set(taskId, result)
    task.status = 'completed'
    task.updatedAt = this.now()
    return structuredClone(result)
  }

  async failTask(taskId: number, failure: NewFailure): Promise<FailureRecord> {
    const task = this.requireTask(taskId)
    const record: FailureRecord = { ...failure, id: this.nextId.failure++, taskId, createdAt: this.now() }
    this.failures.push(record)
    task.status = 'failed'
    task.updatedAt = this.now()
    return structuredClone(record)
  }

  async findCachedResult(targetId: number, params: ParameterValues): Promise<ResultRecord | undefined> {
    const key = paramsKey(params)
    let found: ResultRecord | undefined
    for (const result of this.results.values()) {
      const task = this.tasks.get(result.taskId)
      const run = task && this.runs.get(task.runId)
      if (!task || !run || run.targetId !== targetId || paramsKey(task.params) !== key) continue
      if (!found || result.id > found.id) found = result
    }
    return found && structuredClone(found)
  }

  async getResult(taskId: number): Promise<ResultRecord | undefined> {
    const result = this.results.get(taskId)
    return result && structuredClone(result)
  }

  async listRunResults(runId: number): Promise<TaskResult[]> {
    const entries: TaskResult[] = []
    for (const task of this.tasks.values()) {
      const result = this.results.get(task.id)
      if (task.runId === runId && result) {
        entries.push({ task: structuredClone(task), result: structuredClone(result) })
      }
    }
    return entries
  }

  async listFailures(runId: number): Promise<FailureRecord[]> {
    return this.failures
      .filter((failure) => this.tasks.get(failure.taskId)?.runId === runId)
      .map((failure) => structuredClone(failure))
  }

  async countTasks(runId: number): Promise<TaskCounts> {
    const counts: TaskCounts = { total: 0, pending: 0, running: 0, completed: 0, failed: 0 }
    for (const task of this.tasks.values()) {
      if (task.runId !== runId) continue
      counts.total++
      counts[task.status]++
    }
    return counts
  }

  async close(): Promise<void> {}

  private requireTarget(targetId: number): TargetRecord {
    const target = this.targets.get(targetId)
    if (!target) throw new StoreError(`Target ${targetId} does not exist`)
    return target
  }

  private requireTask(taskId: number): TaskRecord {
    const task = this.tasks.get(taskId)
    if (!task) throw new StoreError(`Task ${taskId} does not exist`)
    return task
  }
}
