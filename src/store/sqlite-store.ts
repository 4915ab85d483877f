import fs from 'node:fs'
import path from 'node:path'
import Database from 'better-sqlite3'
import { z } from 'zod'
import { StoreError, errorMessage } from '../core/errors'
import {
  FAILURE_TYPES,
  ParameterValueSchema,
  ResultMetricsSchema,
  RUN_STATUSES,
  RunConfigSchema,
  TASK_STATUSES,
  pickMetrics,
  type FailureRecord,
  type NewFailure,
  type ParameterValues,
  type ResultMetrics,
  type ResultRecord,
  type RunRecord,
  type RunStatus,
  type TargetRecord,
  type TaskCounts,
  type TaskRecord,
  type TaskStatus,
} from '../core/types'
import { paramsKey } from './params-key'
import { SCHEMA_SQL } from './schema'
import type { CreateRunInput, ListRunsOptions, RunStore, TaskResult, UpdateTaskOptions } from './run-store'

type TargetRow = {
  id: number
  url: string
  name: string | null
  run_count: number
  last_run_at: string | null
  created_at: string
}

type RunRow = {
  id: number
  target_id: number
  config_json: string
  status: string
  started_at: string | null
  completed_at: string | null
  created_at: string
}

type TaskRow = {
  id: number
  run_id: number
  params_json: string
  status: string
  attempts: number
  created_at: string
  updated_at: string
}

type ResultRow = {
  id: number
  task_id: number
  metrics_json: string
  raw_data_json: string | null
  created_at: string
}

type FailureRow = {
  id: number
  task_id: number
  attempt_number: number
  failure_type: string
  error_message: string
  screenshot_path: string | null
  html_path: string | null
  created_at: string
}

type TaskResultRow = TaskRow & {
  result_id: number
  metrics_json: string
  raw_data_json: string | null
  result_created_at: string
}

const ParamsSchema = z.record(z.string(), ParameterValueSchema)
const RawDataSchema = z.record(z.string(), z.unknown())
const RunStatusSchema = z.enum(RUN_STATUSES)
const TaskStatusSchema = z.enum(TASK_STATUSES)
const FailureTypeSchema = z.enum(FAILURE_TYPES)

export interface SqliteRunStoreOptions {
  now?: () => Date
}

/**
 * better-sqlite3 implementation of the run store. The driver is synchronous;
 * the async surface keeps it interchangeable with other stores.
 */
export class SqliteRunStore implements RunStore {
  private closed = false
  private readonly now: () => Date

  private constructor(
    private readonly db: Database.Database,
    options: SqliteRunStoreOptions,
  ) {
    this.now = options.now ?? (() => new Date())
  }

  /**
   * Opens (and creates when missing) the database at `dbPath`; `:memory:` is accepted
   */
  static open(dbPath: string, options: SqliteRunStoreOptions = {}): SqliteRunStore {
    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true })
    }
    const db = new Database(dbPath)
    db.pragma('journal_mode = WAL')
    db.pragma('foreign_keys = ON')
    db.exec(SCHEMA_SQL)
    return new SqliteRunStore(db, options)
  }

  async getOrCreateTarget(url: string, name?: string): Promise<TargetRecord> {
    return this.guard('getOrCreateTarget', () => {
      const existing = this.db.prepare<[string], TargetRow>('SELECT * FROM targets WHERE url = ?').get(url)
      if (existing) {
        if (name && existing.name !== name) {
          this.db.prepare('UPDATE targets SET name = ? WHERE id = ?').run(name, existing.id)
          return toTarget({ ...existing, name })
        }
        return toTarget(existing)
      }

      const info = this.db
        .prepare('INSERT INTO targets (url, name, created_at) VALUES (?, ?, ?)')
        .run(url, name ?? null, this.timestamp())
      return this.requireTarget(Number(info.lastInsertRowid))
    })
  }

  async getTarget(targetId: number): Promise<TargetRecord | undefined> {
    return this.guard('getTarget', () => {
      const row = this.db.prepare<[number], TargetRow>('SELECT * FROM targets WHERE id = ?').get(targetId)
      return row && toTarget(row)
    })
  }

  async listRecentTargets(limit = 10): Promise<TargetRecord[]> {
    return this.guard('listRecentTargets', () =>
      this.db
        .prepare<[number], TargetRow>(
          'SELECT * FROM targets ORDER BY last_run_at IS NULL, last_run_at DESC, id DESC LIMIT ?',
        )
        .all(limit)
        .map(toTarget),
    )
  }

  async recordTargetRun(targetId: number): Promise<void> {
    return this.guard('recordTargetRun', () => {
      const info = this.db
        .prepare('UPDATE targets SET run_count = run_count + 1, last_run_at = ? WHERE id = ?')
        .run(this.timestamp(), targetId)
      if (info.changes === 0) throw new StoreError(`Target ${targetId} does not exist`)
    })
  }

  async createRun(input: CreateRunInput): Promise<RunRecord> {
    return this.guard('createRun', () => {
      this.requireTarget(input.targetId)
      const info = this.db
        .prepare('INSERT INTO runs (target_id, mode, config_json, created_at) VALUES (?, ?, ?, ?)')
        .run(input.targetId, input.config.mode, JSON.stringify(input.config), this.timestamp())
      return this.requireRun(Number(info.lastInsertRowid))
    })
  }

  async getRun(runId: number): Promise<RunRecord | undefined> {
    return this.guard('getRun', () => {
      const row = this.db.prepare<[number], RunRow>('SELECT * FROM runs WHERE id = ?').get(runId)
      return row && toRun(row)
    })
  }

  async listRuns(options: ListRunsOptions = {}): Promise<RunRecord[]> {
    return this.guard('listRuns', () => {
      const limit = options.limit ?? 20
      const rows =
        options.targetId === undefined
          ? this.db.prepare<[number], RunRow>('SELECT * FROM runs ORDER BY id DESC LIMIT ?').all(limit)
          : this.db
              .prepare<[number, number], RunRow>('SELECT * FROM runs WHERE target_id = ? ORDER BY id DESC LIMIT ?')
              .all(options.targetId, limit)
      return rows.map(toRun)
    })
  }

  async updateRunStatus(runId: number, status: RunStatus): Promise<RunRecord> {
    return this.guard('updateRunStatus', () => {
      const now = this.timestamp()
      const finished = status === 'completed' || status === 'failed'
      const info = this.db
        .prepare(
          `UPDATE runs SET
             status = @status,
             started_at = CASE WHEN @status = 'running' AND started_at IS NULL THEN @now ELSE started_at END,
             completed_at = CASE WHEN @finished = 1 THEN @now ELSE completed_at END
           WHERE id = @id`,
        )
        .run({ status, now, finished: finished ? 1 : 0, id: runId })
      if (info.changes === 0) throw new StoreError(`Run ${runId} does not exist`)
      return this.requireRun(runId)
    })
  }

  async createTasks(runId: number, params: ParameterValues[]): Promise<TaskRecord[]> {
    return this.guard('createTasks', () => {
      this.requireRun(runId)
      const insert = this.db.prepare(
        'INSERT INTO tasks (run_id, params_json, params_key, created_at, updated_at) VALUES (?, ?, ?, ?, ?)',
      )
      const tx = this.db.transaction((mappings: ParameterValues[]) => {
        const ids: number[] = []
        for (const values of mappings) {
          const now = this.timestamp()
          const info = insert.run(runId, JSON.stringify(values), paramsKey(values), now, now)
          ids.push(Number(info.lastInsertRowid))
        }
        return ids
      })
      return tx(params).map((id) => this.requireTask(id))
    })
  }

  async getTask(taskId: number): Promise<TaskRecord | undefined> {
    return this.guard('getTask', () => {
      const row = this.db.prepare<[number], TaskRow>('SELECT * FROM tasks WHERE id = ?').get(taskId)
      return row && toTask(row)
    })
  }

  async listTasks(runId: number, statuses?: readonly TaskStatus[]): Promise<TaskRecord[]> {
    return this.guard('listTasks', () => {
      const rows = this.db.prepare<[number], TaskRow>('SELECT * FROM tasks WHERE run_id = ? ORDER BY id').all(runId)
      return rows.map(toTask).filter((task) => !statuses || statuses.includes(task.status))
    })
  }

  async updateTaskStatus(taskId: number, status: TaskStatus, options: UpdateTaskOptions = {}): Promise<TaskRecord> {
    return this.guard('updateTaskStatus', () => {
      const info = this.db
        .prepare('UPDATE tasks SET status = ?, attempts = attempts + ?, updated_at = ? WHERE id = ?')
        .run(status, options.incrementAttempts ? 1 : 0, this.timestamp(), taskId)
      if (info.changes === 0) throw new StoreError(`Task ${taskId} does not exist`)
      return this.requireTask(taskId)
    })
  }

  async completeTask(taskId: number, metrics: ResultMetrics, rawData?: Record<string, unknown>): Promise<ResultRecord> {
    return this.guard('completeTask', () => {
      const tx = this.db.transaction(() => {
        const now = this.timestamp()
        const info = this.db
          .prepare("UPDATE tasks SET status = 'completed', updated_at = ? WHERE id = ?")
          .run(now, taskId)
        if (info.changes === 0) throw new StoreError(`Task ${taskId} does not exist`)

        this.db
          .prepare('INSERT INTO results (task_id, metrics_json, raw_data_json, created_at) VALUES (?, ?, ?, ?)')
          .run(taskId, JSON.stringify(pickMetrics(metrics)), rawData ? JSON.stringify(rawData) : null, now)
      })
      tx()

      const result = this.db.prepare<[number], ResultRow>('SELECT * FROM results WHERE task_id = ?').get(taskId)
      if (!result) throw new StoreError(`Result for task ${taskId} was not written`)
      return toResult(result)
    })
  }

  async failTask(taskId: number, failure: NewFailure): Promise<FailureRecord> {
    return this.guard('failTask', () => {
      const tx = this.db.transaction(() => {
        const now = this.timestamp()
        const info = this.db.prepare("UPDATE tasks SET status = 'failed', updated_at = ? WHERE id = ?").run(now, taskId)
        if (info.changes === 0) throw new StoreError(`Task ${taskId} does not exist`)

        return this.db
          .prepare(
            `INSERT INTO failures
               (task_id, attempt_number, failure_type, error_message, screenshot_path, html_path, created_at)
             VALUES (?, ?, ?, ?, ?, ?, ?)`,
          )
          .run(
            taskId,
            failure.attemptNumber,
            failure.failureType,
            failure.errorMessage,
            failure.screenshotPath ?? null,
            failure.htmlPath ?? null,
            now,
          )
      })
      const info = tx()

      const row = this.db
        .prepare<[number], FailureRow>('SELECT * FROM failures WHERE id = ?')
        .get(Number(info.lastInsertRowid))
      if (!row) throw new StoreError(`Failure for task ${taskId} was not written`)
      return toFailure(row)
    })
  }

  async findCachedResult(targetId: number, params: ParameterValues): Promise<ResultRecord | undefined> {
    return this.guard('findCachedResult', () => {
      const row = this.db
        .prepare<[number, string], ResultRow>(
          `SELECT r.* FROM results r
             JOIN tasks t ON t.id = r.task_id
             JOIN runs ru ON ru.id = t.run_id
           WHERE ru.target_id = ? AND t.params_key = ?
           ORDER BY r.id DESC
           LIMIT 1`,
        )
        .get(targetId, paramsKey(params))
      return row && toResult(row)
    })
  }

  async getResult(taskId: number): Promise<ResultRecord | undefined> {
    return this.guard('getResult', () => {
      const row = this.db.prepare<[number], ResultRow>('SELECT * FROM results WHERE task_id = ?').get(taskId)
      return row && toResult(row)
    })
  }

  async listRunResults(runId: number): Promise<TaskResult[]> {
    return this.guard('listRunResults', () => {
      const rows = this.db
        .prepare<[number], TaskResultRow>(
          `SELECT t.*, r.id AS result_id, r.metrics_json, r.raw_data_json, r.created_at AS result_created_at
             FROM tasks t JOIN results r ON r.task_id = t.id
           WHERE t.run_id = ?
           ORDER BY t.id`,
        )
        .all(runId)
      return rows.map((row) => ({
        task: toTask(row),
        result: toResult({
          id: row.result_id,
          task_id: row.id,
          metrics_json: row.metrics_json,
          raw_data_json: row.raw_data_json,
          created_at: row.result_created_at,
        }),
      }))
    })
  }

  async listFailures(runId: number): Promise<FailureRecord[]> {
    return this.guard('listFailures', () =>
      this.db
        .prepare<[number], FailureRow>(
          'SELECT f.* FROM failures f JOIN tasks t ON t.id = f.task_id WHERE t.run_id = ? ORDER BY f.id',
        )
        .all(runId)
        .map(toFailure),
    )
  }

  async countTasks(runId: number): Promise<TaskCounts> {
    return this.guard('countTasks', () => {
      const rows = this.db
        .prepare<[number], { status: string; count: number }>(
          'SELECT status, COUNT(*) AS count FROM tasks WHERE run_id = ? GROUP BY status',
        )
        .all(runId)
      const counts: TaskCounts = { total: 0, pending: 0, running: 0, completed: 0, failed: 0 }
      for (const row of rows) {
        counts[TaskStatusSchema.parse(row.status)] = row.count
        counts.total += row.count
      }
      return counts
    })
  }

  async close(): Promise<void> {
    if (this.closed) return
    this.db.close()
    this.closed = true
  }

  private guard<T>(operation: string, fn: () => T): Promise<T> {
    try {
      return Promise.resolve(fn())
    } catch (error) {
      if (error instanceof StoreError) return Promise.reject(error)
      return Promise.reject(new StoreError(`${operation} failed: ${errorMessage(error)}`, error))
    }
  }

  private timestamp(): string {
    return this.now().toISOString()
  }

  private requireTarget(targetId: number): TargetRecord {
    const row = this.db.prepare<[number], TargetRow>('SELECT * FROM targets WHERE id = ?').get(targetId)
    if (!row) throw new StoreError(`Target ${targetId} does not exist`)
    return toTarget(row)
  }

  private requireRun(runId: number): RunRecord {
    const row = this.db.prepare<[number], RunRow>('SELECT * FROM runs WHERE id = ?').get(runId)
    if (!row) throw new StoreError(`Run ${runId} does not exist`)
    return toRun(row)
  }

  private requireTask(taskId: number): TaskRecord {
    const row = this.db.prepare<[number], TaskRow>('SELECT * FROM tasks WHERE id = ?').get(taskId)
    if (!row) throw new StoreError(`Task ${taskId} does not exist`)
    return toTask(row)
  }
}

function optionalDate(value: string | null): Date | undefined {
  return value === null ? undefined : new Date(value)
}

function toTarget(row: TargetRow): TargetRecord {
  return {
    id: row.id,
    url: row.url,
    name: row.name ?? undefined,
    runCount: row.run_count,
    lastRunAt: optionalDate(row.last_run_at),
    createdAt: new Date(row.created_at),
  }
}

function toRun(row: RunRow): RunRecord {
  const config = RunConfigSchema.parse(JSON.parse(row.config_json))
  return {
    id: row.id,
    targetId: row.target_id,
    mode: config.mode,
    config,
    status: RunStatusSchema.parse(row.status),
    startedAt: optionalDate(row.started_at),
    completedAt: optionalDate(row.completed_at),
    createdAt: new Date(row.created_at),
  }
}

function toTask(row: TaskRow): TaskRecord {
  return {
    id: row.id,
    runId: row.run_id,
    params: ParamsSchema.parse(JSON.parse(row.params_json)),
    status: TaskStatusSchema.parse(row.status),
    attempts: row.attempts,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  }
}

function toResult(row: ResultRow): ResultRecord {
  return {
    id: row.id,
    taskId: row.task_id,
    metrics: ResultMetricsSchema.parse(JSON.parse(row.metrics_json)),
    rawData: row.raw_data_json === null ? undefined : RawDataSchema.parse(JSON.parse(row.raw_data_json)),
    createdAt: new Date(row.created_at),
  }
}

function toFailure(row: FailureRow): FailureRecord {
  return {
    id: row.id,
    taskId: row.task_id,
    attemptNumber: row.attempt_number,
    failureType: FailureTypeSchema.parse(row.failure_type),
    errorMessage: row.error_message,
    screenshotPath: row.screenshot_path ?? undefined,
    htmlPath: row.html_path ?? undefined,
    createdAt: new Date(row.created_at),
  }
}
