import { describe, it, expect, jest, beforeEach } from '@jest/globals'
import { ConfigValidationError, UnknownParameterError } from './core/errors'
import type { SweepConfigInput, TaskOutcome } from './core/types'
import { EventLog, FakeWorkerFactory, deferred, succeed } from './core/tests/fakes'
import { InMemoryRunStore } from './store'
import { createSweepRun, resumeSweep, runSweep } from './sweeprunner'

jest.mock('./logger', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}))

const TARGET_URL = 'https://app.example.com/test/abc'
const credentials = { email: 'user@example.com', password: 'test-secret' }

const fastConfig: SweepConfigInput = {
  workers: 1,
  queueWaitMs: 10,
  idlePollMs: 5,
  progressIntervalMs: 60_000,
  watchdog: { intervalMs: 3_600_000 },
}

describe('createSweepRun', () => {
  let store: InMemoryRunStore

  beforeEach(() => {
    store = new InMemoryRunStore()
  })

  it('creates one pending task per swept value', async () => {
    const { run, tasks } = await createSweepRun(store, {
      url: TARGET_URL,
      name: 'Iron condor',
      config: { mode: 'sweep', parameter: 'delta', values: [5, 10, 15] },
    })

    expect(run.status).toBe('pending')
    expect(run.config).toEqual({ mode: 'sweep', parameter: 'delta', values: [5, 10, 15], skipCache: false })
    expect(tasks.map((task) => task.params)).toEqual([{ delta: 5 }, { delta: 10 }, { delta: 15 }])
    expect(tasks.every((task) => task.status === 'pending' && task.attempts === 0)).toBe(true)

    const target = await store.getTarget(run.targetId)
    expect(target).toMatchObject({ url: TARGET_URL, name: 'Iron condor', runCount: 1 })
  })

  it('expands grid runs into the cartesian product', async () => {
    const { tasks } = await createSweepRun(store, {
      url: TARGET_URL,
      config: { mode: 'grid', parameters: { delta: { values: [5, 10] }, stop_loss: { values: [50, 100] } } },
    })

    expect(tasks.map((task) => task.params)).toEqual([
      { delta: 5, stop_loss: 50 },
      { delta: 5, stop_loss: 100 },
      { delta: 10, stop_loss: 50 },
      { delta: 10, stop_loss: 100 },
    ])
  })

  it('reuses the target of an earlier run', async () => {
    const first = await createSweepRun(store, {
      url: TARGET_URL,
      config: { mode: 'sweep', parameter: 'delta', values: [5] },
    })
    const second = await createSweepRun(store, {
      url: TARGET_URL,
      config: { mode: 'sweep', parameter: 'delta', values: [10] },
    })

    expect(second.run.targetId).toBe(first.run.targetId)
    expect((await store.getTarget(first.run.targetId))?.runCount).toBe(2)
  })

  it('rejects an invalid run config before writing anything', async () => {
    const creating = createSweepRun(store, {
      url: TARGET_URL,
      config: { mode: 'sweep', parameter: 'delta', values: [] },
    })

    await expect(creating).rejects.toThrow(ConfigValidationError)
    expect(await store.listRecentTargets()).toEqual([])
  })

  it('rejects values a parameter does not accept', async () => {
    await expect(
      createSweepRun(store, { url: TARGET_URL, config: { mode: 'sweep', parameter: 'delta', values: [500] } }),
    ).rejects.toThrow('Invalid parameter values')
  })

  it('rejects unknown parameters', async () => {
    await expect(
      createSweepRun(store, { url: TARGET_URL, config: { mode: 'sweep', parameter: 'gamma', values: [1] } }),
    ).rejects.toThrow(UnknownParameterError)
  })
})

describe('runSweep', () => {
  it('creates and executes a run and reports on it', async () => {
    const store = new InMemoryRunStore()
    const factory = new FakeWorkerFactory(succeed({ pl: 250, cagr: 3.5 }))

    const { outcome, report } = await runSweep({
      config: {
        ...fastConfig,
        target: { url: TARGET_URL },
        sweep: { mode: 'sweep', parameter: 'delta', values: [5, 10] },
      },
      credentials,
      store,
      workerFactory: factory.create,
    })

    expect(outcome).toEqual({
      runId: 1,
      status: 'completed',
      stats: { pending: 0, inProgress: 0, completed: 2, failed: 0 },
    })
    expect(report.run.status).toBe('completed')
    expect(report.entries).toEqual([
      { taskId: 1, params: { delta: 5 }, metrics: { pl: 250, cagr: 3.5 } },
      { taskId: 2, params: { delta: 10 }, metrics: { pl: 250, cagr: 3.5 } },
    ])
    expect(factory.calls.map((call) => call.credentials)).toEqual([credentials, credentials])
  })

  it('needs a target and a run config', async () => {
    const running = runSweep({ config: fastConfig, credentials, store: new InMemoryRunStore() })

    await expect(running).rejects.toThrow('Configuration cannot start a run')
  })

  it('stops gracefully when the signal aborts', async () => {
    const store = new InMemoryRunStore()
    const gate = deferred<TaskOutcome>()
    const factory = new FakeWorkerFactory(() => gate.promise)
    const controller = new AbortController()
    const log = new EventLog()

    const running = runSweep({
      config: {
        ...fastConfig,
        target: { url: TARGET_URL },
        sweep: { mode: 'sweep', parameter: 'delta', values: [5, 10] },
      },
      credentials,
      store,
      workerFactory: factory.create,
      onUpdate: log.listener,
      signal: controller.signal,
    })
    await log.waitFor((event) => event.type === 'task_started')
    controller.abort()
    gate.resolve({ success: true, metrics: { pl: 1 } })

    const { outcome, report } = await running
    expect(outcome.status).toBe('failed')
    expect(report.counts).toEqual({ total: 2, pending: 1, running: 0, completed: 1, failed: 0 })
  })

  it('refuses a signal that is already aborted', async () => {
    const store = new InMemoryRunStore()
    const controller = new AbortController()
    controller.abort()

    const running = runSweep({
      config: {
        ...fastConfig,
        target: { url: TARGET_URL },
        sweep: { mode: 'sweep', parameter: 'delta', values: [5] },
      },
      credentials,
      store,
      workerFactory: new FakeWorkerFactory().create,
      signal: controller.signal,
    })

    await expect(running).rejects.toThrow('Run 1 was not started: the signal is already aborted')
  })
})

describe('resumeSweep', () => {
  it('finishes the remaining tasks of an existing run', async () => {
    const store = new InMemoryRunStore()
    const { run, tasks } = await createSweepRun(store, {
      url: TARGET_URL,
      config: { mode: 'sweep', parameter: 'delta', values: [5, 10, 15] },
    })
    const [first] = tasks
    if (!first) throw new Error('expected a task')
    await store.completeTask(first.id, { pl: 10 })
    const factory = new FakeWorkerFactory()

    const { outcome } = await resumeSweep(run.id, {
      config: fastConfig,
      credentials,
      store,
      workerFactory: factory.create,
    })

    expect(outcome.status).toBe('completed')
    expect(factory.calls.map((call) => call.taskId)).toEqual([2, 3])
  })
})
