import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals'
import { join } from 'node:path'
import { SqliteRunStore } from '../../store'
import { createSweepRun } from '../../sweeprunner'
import { runCli } from '../cli'
import { captureOutput, createTempDir, mockProcessExit, type TempDir } from './helpers'

jest.mock('../../logger', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
  setLogLevel: jest.fn(),
}))

jest.mock('../../browser', () => {
  const fakes = jest.requireActual<typeof import('../../core/tests/fakes')>('../../core/tests/fakes')
  return {
    createBrowserWorkerFactory: () => new fakes.FakeWorkerFactory(fakes.succeed({ pl: 42, cagr: 2.5 })).create,
  }
})

const TARGET_URL = 'https://app.example.com/test/abc'

describe('CLI commands', () => {
  let dir: TempDir
  let dbPath: string
  let configPath: string

  beforeEach(async () => {
    dir = await createTempDir()
    dbPath = join(dir.path, 'runs.db')
    configPath = await dir.writeConfig('sweep.config.json', {
      target: { url: TARGET_URL, name: 'Iron condor' },
      sweep: { mode: 'sweep', parameter: 'delta', values: [5, 10] },
      workers: 1,
      queueWaitMs: 10,
      idlePollMs: 5,
      progressIntervalMs: 60000,
      watchdog: { intervalMs: 3600000 },
      database: { path: dbPath },
    })
  })

  afterEach(async () => {
    await dir.remove()
  })

  async function seedRun(): Promise<number> {
    const store = SqliteRunStore.open(dbPath)
    try {
      const { run, tasks } = await createSweepRun(store, {
        url: TARGET_URL,
        config: { mode: 'sweep', parameter: 'delta', values: [5, 10, 15] },
      })
      const [first] = tasks
      if (!first) throw new Error('expected a task')
      await store.completeTask(first.id, { pl: 1200, cagr: 8 })
      return run.id
    } finally {
      await store.close()
    }
  }

  async function capture(argv: string[]): Promise<string> {
    const output = captureOutput()
    try {
      await runCli(argv)
      return output.getLogs()
    } finally {
      output.restore()
    }
  }

  describe('run', () => {
    const credentialKeys = ['SWEEP_EMAIL', 'SWEEP_PASSWORD'] as const

    beforeEach(() => {
      process.env.SWEEP_EMAIL = 'user@example.com'
      process.env.SWEEP_PASSWORD = 'test-secret'
    })

    afterEach(() => {
      for (const key of credentialKeys) delete process.env[key]
    })

    it('executes the configured sweep and prints the JSON report when quiet', async () => {
      const report = JSON.parse(await capture(['run', '--quiet', '--config', configPath]))

      expect(report.run.status).toBe('completed')
      expect(report.target).toEqual({ id: 1, url: TARGET_URL, name: 'Iron condor' })
      expect(report.results).toEqual([
        { taskId: 1, params: { delta: 5 }, metrics: { pl: 42, cagr: 2.5 } },
        { taskId: 2, params: { delta: 10 }, metrics: { pl: 42, cagr: 2.5 } },
      ])
      expect(report.recommendations.goal).toBe('balanced')
    })

    it('takes the target and worker count from the command line', async () => {
      const url = 'https://app.example.com/test/xyz'

      const report = JSON.parse(await capture(['run', '-q', '--url', url, '--workers', '2', '--config', configPath]))

      expect(report.target.url).toBe(url)
      expect(report.counts.completed).toBe(2)
    })

    it('exits with an error without credentials', async () => {
      delete process.env.SWEEP_PASSWORD
      const mockExit = mockProcessExit()
      const output = captureOutput()

      try {
        await expect(runCli(['run', '--config', configPath])).rejects.toThrow('process.exit called')

        expect(output.getErrors()).toContain('SWEEP_EMAIL and SWEEP_PASSWORD must be set')
      } finally {
        output.restore()
        mockExit.mockRestore()
      }
    })
  })

  describe('status', () => {
    it('prints the run and its task counts', async () => {
      const runId = await seedRun()

      const lines = (await capture(['status', String(runId), '--config', configPath])).split('\n')

      expect(lines).toEqual([
        'Run #1 (sweep) on https://app.example.com/test/abc',
        'Status: pending',
        'Tasks: 3 total, 1 completed, 0 failed, 0 running, 2 pending',
      ])
    })

    it('exits with an error for an unknown run', async () => {
      const mockExit = mockProcessExit()
      const output = captureOutput()

      try {
        await expect(runCli(['status', '9', '--config', configPath])).rejects.toThrow('process.exit called')

        expect(output.getErrors()).toContain('❌ Run 9 not found')
      } finally {
        output.restore()
        mockExit.mockRestore()
      }
    })
  })

  describe('report', () => {
    it('prints results and recommendations as JSON', async () => {
      const runId = await seedRun()

      const report = JSON.parse(await capture(['report', String(runId), '-f', 'json', '--config', configPath]))

      expect(report.counts).toEqual({ total: 3, pending: 2, running: 0, completed: 1, failed: 0 })
      expect(report.recommendations).toEqual({
        goal: 'balanced',
        topPick: { taskId: 1, params: { delta: 5 }, score: 12.5 },
        alternatives: [],
        avoid: [],
      })
    })

    it('uses the requested goal', async () => {
      const runId = await seedRun()

      const report = JSON.parse(
        await capture(['report', String(runId), '-f', 'json', '--goal', 'protect_capital', '--config', configPath]),
      )

      expect(report.recommendations.goal).toBe('protect_capital')
    })
  })

  describe('parameters', () => {
    it('lists every parameter with its defaults', async () => {
      const parameters = JSON.parse(await capture(['parameters', '--quiet']))

      expect(parameters.map((parameter: { name: string }) => parameter.name)).toEqual([
        'delta',
        'entry_time',
        'profit_target',
        'stop_loss',
      ])
      expect(parameters[0].defaults).toEqual({ start: 5, end: 50, step: 1, applyTo: 'both' })
    })
  })
})
