import { mkdir, writeFile } from 'node:fs/promises'
import * as path from 'node:path'
import type { FailureType, ParameterValues, ResultMetrics, RunConfig, RunStatus, TaskCounts } from '../../core/types'
import type { Recommendations, ScoredEntry } from '../recommendations'
import type { RunReport } from '../run-report'

export interface JSONReporterOptions {
  prettyPrint?: boolean
}

interface RankedEntry {
  taskId: number
  params: ParameterValues
  score: number
}

/**
 * Machine-readable run report
 */
export interface JSONReport {
  run: {
    id: number
    status: RunStatus
    config: RunConfig
    startedAt?: string // ISO string
    completedAt?: string // ISO string
    durationMs?: number
  }
  target: {
    id: number
    url: string
    name?: string
  }
  counts: TaskCounts
  results: Array<{
    taskId: number
    params: ParameterValues
    metrics: ResultMetrics
  }>
  failures: Array<{
    taskId: number
    attemptNumber: number
    failureType: FailureType
    errorMessage: string
    screenshotPath?: string
    htmlPath?: string
  }>
  recommendations?: {
    goal: string
    topPick?: RankedEntry
    alternatives: RankedEntry[]
    avoid: RankedEntry[]
  }
  meta: {
    version: string
    generatedAt: string // ISO string
    generator: string
  }
}

export class JSONReporter {
  private options: Required<JSONReporterOptions>

  constructor(options: JSONReporterOptions = {}) {
    this.options = {
      prettyPrint: options.prettyPrint ?? false,
    }
  }

  generate(report: RunReport, recommendations?: Recommendations): string {
    const json = this.createReport(report, recommendations)
    return this.options.prettyPrint ? JSON.stringify(json, null, 2) : JSON.stringify(json)
  }

  /**
   * Writes `run-<id>.json` into `dir` and returns the file path
   */
  async writeFile(report: RunReport, dir: string, recommendations?: Recommendations): Promise<string> {
    await mkdir(dir, { recursive: true })
    const filePath = path.join(dir, `run-${report.run.id}.json`)
    await writeFile(filePath, this.generate(report, recommendations), 'utf-8')
    return filePath
  }

  createReport(report: RunReport, recommendations?: Recommendations): JSONReport {
    const { run, target } = report

    const json: JSONReport = {
      run: {
        id: run.id,
        status: run.status,
        config: run.config,
        startedAt: run.startedAt?.toISOString(),
        completedAt: run.completedAt?.toISOString(),
        durationMs: report.durationMs,
      },
      target: { id: target.id, url: target.url, name: target.name },
      counts: report.counts,
      results: report.entries.map(({ taskId, params, metrics }) => ({ taskId, params, metrics })),
      failures: report.failures.map((failure) => ({
        taskId: failure.taskId,
        attemptNumber: failure.attemptNumber,
        failureType: failure.failureType,
        errorMessage: failure.errorMessage,
        screenshotPath: failure.screenshotPath,
        htmlPath: failure.htmlPath,
      })),
      meta: {
        version: '1.0.0',
        generatedAt: report.generatedAt.toISOString(),
        generator: 'sweeprunner-json-reporter',
      },
    }

    if (recommendations) {
      json.recommendations = {
        goal: recommendations.goal,
        topPick: recommendations.topPick && ranked(recommendations.topPick),
        alternatives: recommendations.alternatives.map(ranked),
        avoid: recommendations.avoid.map(ranked),
      }
    }
    return json
  }
}

function ranked(entry: ScoredEntry): RankedEntry {
  return { taskId: entry.taskId, params: entry.params, score: Math.round(entry.score * 10) / 10 }
}
