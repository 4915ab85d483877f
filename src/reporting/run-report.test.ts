import { describe, it, expect, beforeEach } from '@jest/globals'
import { RunNotFoundError } from '../core/errors'
import { InMemoryRunStore } from '../store'
import { buildRunReport, formatParams, parameterNames } from './run-report'

describe('buildRunReport', () => {
  let clock: Date
  let store: InMemoryRunStore

  beforeEach(() => {
    clock = new Date('2026-03-01T10:00:00.000Z')
    store = new InMemoryRunStore(() => clock)
  })

  async function seedRun() {
    const target = await store.getOrCreateTarget('https://app.example.com/test/abc', 'Iron condor')
    const run = await store.createRun({
      targetId: target.id,
      config: { mode: 'sweep', parameter: 'delta', values: [5, 10, 15], skipCache: false },
    })
    const tasks = await store.createTasks(run.id, [{ delta: 5 }, { delta: 10 }, { delta: 15 }])
    await store.updateRunStatus(run.id, 'running')
    return { run, tasks }
  }

  it('collects results, failures and counts for a run', async () => {
    const { run, tasks } = await seedRun()
    const [first, second, third] = tasks
    if (!first || !second || !third) throw new Error('expected three tasks')

    await store.completeTask(third.id, { pl: 900, cagr: 4.2 })
    await store.completeTask(first.id, { pl: 1200 })
    await store.failTask(second.id, { attemptNumber: 3, failureType: 'timing', errorMessage: 'Backtest timed out' })
    clock = new Date('2026-03-01T10:02:05.000Z')
    await store.updateRunStatus(run.id, 'completed')

    const report = await buildRunReport(store, run.id, () => new Date('2026-03-01T11:00:00.000Z'))

    expect(report.run.status).toBe('completed')
    expect(report.target.name).toBe('Iron condor')
    expect(report.counts).toEqual({ total: 3, pending: 0, running: 0, completed: 2, failed: 1 })
    expect(report.entries).toEqual([
      { taskId: first.id, params: { delta: 5 }, metrics: { pl: 1200 } },
      { taskId: third.id, params: { delta: 15 }, metrics: { pl: 900, cagr: 4.2 } },
    ])
    expect(report.failures.map((failure) => failure.errorMessage)).toEqual(['Backtest timed out'])
    expect(report.durationMs).toBe(125_000)
    expect(report.generatedAt.toISOString()).toBe('2026-03-01T11:00:00.000Z')
  })

  it('has no duration while the run is unfinished', async () => {
    const { run } = await seedRun()

    const report = await buildRunReport(store, run.id)

    expect(report.durationMs).toBeUndefined()
    expect(report.counts.pending).toBe(3)
  })

  it('rejects unknown runs', async () => {
    await expect(buildRunReport(store, 42)).rejects.toBeInstanceOf(RunNotFoundError)
  })
})

describe('parameterNames', () => {
  it('lists names in order of first appearance', () => {
    const names = parameterNames([
      { taskId: 1, params: { delta: 5 }, metrics: {} },
      { taskId: 2, params: { delta: 10, stopLoss: 50 }, metrics: {} },
    ])

    expect(names).toEqual(['delta', 'stopLoss'])
  })
})

describe('formatParams', () => {
  it('joins name=value pairs', () => {
    expect(formatParams({ delta: 5, entryTime: '10:30' })).toBe('delta=5, entryTime=10:30')
  })
})
