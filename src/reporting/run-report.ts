import { RunNotFoundError, StoreError } from '../core/errors'
import type {
  FailureRecord,
  ParameterValues,
  ResultMetrics,
  RunRecord,
  TargetRecord,
  TaskCounts,
} from '../core/types'
import type { RunStore } from '../store'

export interface ReportEntry {
  taskId: number
  params: ParameterValues
  metrics: ResultMetrics
}

/**
 * Everything known about one run, read back from the store
 */
export interface RunReport {
  run: RunRecord
  target: TargetRecord
  counts: TaskCounts
  entries: ReportEntry[]
  failures: FailureRecord[]
  durationMs?: number
  generatedAt: Date
}

export async function buildRunReport(
  store: RunStore,
  runId: number,
  now: () => Date = () => new Date(),
): Promise<RunReport> {
  const run = await store.getRun(runId)
  if (!run) {
    throw new RunNotFoundError(runId)
  }
  const target = await store.getTarget(run.targetId)
  if (!target) {
    throw new StoreError(`Target ${run.targetId} of run ${runId} does not exist`)
  }

  const [counts, results, failures] = await Promise.all([
    store.countTasks(runId),
    store.listRunResults(runId),
    store.listFailures(runId),
  ])

  const entries = results
    .map(({ task, result }) => ({ taskId: task.id, params: task.params, metrics: result.metrics }))
    .sort((a, b) => a.taskId - b.taskId)

  return {
    run,
    target,
    counts,
    entries,
    failures,
    durationMs: runDuration(run),
    generatedAt: now(),
  }
}

function runDuration(run: RunRecord): number | undefined {
  if (!run.startedAt || !run.completedAt) return undefined
  return run.completedAt.getTime() - run.startedAt.getTime()
}

/**
 * Parameter names across all entries, in order of first appearance
 */
export function parameterNames(entries: readonly ReportEntry[]): string[] {
  const names = new Set<string>()
  for (const entry of entries) {
    for (const name of Object.keys(entry.params)) names.add(name)
  }
  return [...names]
}

export function formatParams(params: ParameterValues): string {
  return Object.entries(params)
    .map(([name, value]) => `${name}=${value}`)
    .join(', ')
}
