import type { RunReport } from '../run-report'

export function createMockReport(overrides: Partial<RunReport> = {}): RunReport {
  return {
    run: {
      id: 4,
      targetId: 1,
      mode: 'sweep',
      config: { mode: 'sweep', parameter: 'delta', values: [5, 10, 15], skipCache: false },
      status: 'completed',
      startedAt: new Date('2026-03-01T10:00:00.000Z'),
      completedAt: new Date('2026-03-01T10:02:05.000Z'),
      createdAt: new Date('2026-03-01T09:59:00.000Z'),
    },
    target: {
      id: 1,
      url: 'https://app.example.com/test/abc',
      name: 'Iron condor',
      runCount: 1,
      createdAt: new Date('2026-02-01T00:00:00.000Z'),
    },
    counts: { total: 3, pending: 0, running: 0, completed: 2, failed: 1 },
    entries: [
      {
        taskId: 1,
        params: { delta: 5 },
        metrics: { pl: 13376, cagr: 12.5, maxDrawdown: 8.4, winPercentage: 68.2, mar: 1.49 },
      },
      { taskId: 2, params: { delta: 10 }, metrics: { pl: -155, cagr: -1.5 } },
    ],
    failures: [
      {
        id: 1,
        taskId: 3,
        attemptNumber: 3,
        failureType: 'modal',
        errorMessage: 'Failed to open backtest dialog',
        screenshotPath: 'artifacts/task_3_screenshot.png',
        createdAt: new Date('2026-03-01T10:02:00.000Z'),
      },
    ],
    durationMs: 125_000,
    generatedAt: new Date('2026-03-01T10:05:00.000Z'),
    ...overrides,
  }
}
