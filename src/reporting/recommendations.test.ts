import { describe, it, expect } from '@jest/globals'
import { findParetoOptimal, generateRecommendations, normalizeValues, scoreEntries } from './recommendations'
import type { ReportEntry } from './run-report'

const entryA: ReportEntry = {
  taskId: 1,
  params: { delta: 5 },
  metrics: { cagr: 20, mar: 2, winPercentage: 60, captureRate: 10, maxDrawdown: 10 },
}
const entryB: ReportEntry = {
  taskId: 2,
  params: { delta: 10 },
  metrics: { cagr: 10, mar: 1, winPercentage: 50, captureRate: 5, maxDrawdown: 20 },
}
const entryC: ReportEntry = {
  taskId: 3,
  params: { delta: 15 },
  metrics: { cagr: 30, mar: 1.5, winPercentage: 55, captureRate: 8, maxDrawdown: 25 },
}

describe('normalizeValues', () => {
  it('scales to the unit interval', () => {
    expect(normalizeValues([0, 5, 10])).toEqual([0, 0.5, 1])
  })

  it('puts equal values in the middle', () => {
    expect(normalizeValues([3, 3])).toEqual([0.5, 0.5])
  })

  it('returns nothing for no values', () => {
    expect(normalizeValues([])).toEqual([])
  })
})

describe('scoreEntries', () => {
  it('weights normalized metrics for the balanced goal', () => {
    const [a, b, c] = scoreEntries([entryA, entryB, entryC], 'balanced')

    expect(a).toBeCloseTo(87.5)
    expect(b).toBeCloseTo(3.333, 2)
    expect(c).toBeCloseTo(59)
  })

  it('favours returns or drawdown depending on the goal', () => {
    const risky: ReportEntry = {
      taskId: 1,
      params: { delta: 30 },
      metrics: { cagr: 50, maxDrawdown: 40, mar: 1, winPercentage: 50, captureRate: 5 },
    }
    const safe: ReportEntry = {
      taskId: 2,
      params: { delta: 10 },
      metrics: { cagr: 10, maxDrawdown: 5, mar: 1, winPercentage: 50, captureRate: 5 },
    }

    const [riskyReturns, safeReturns] = scoreEntries([risky, safe], 'maximize_returns')
    const [riskyProtect, safeProtect] = scoreEntries([risky, safe], 'protect_capital')

    expect(riskyReturns).toBeCloseTo(65)
    expect(safeReturns).toBeCloseTo(35)
    expect(riskyProtect).toBeCloseTo(42.5)
    expect(safeProtect).toBeCloseTo(57.5)
  })

  it('gives nothing for a missing metric', () => {
    const sparse: ReportEntry = { taskId: 1, params: {}, metrics: { cagr: 10 } }
    const fuller: ReportEntry = { taskId: 2, params: {}, metrics: { cagr: 20, mar: 1 } }

    const [sparseScore, fullerScore] = scoreEntries([sparse, fuller])

    expect(sparseScore).toBe(0)
    expect(fullerScore).toBeCloseTo(40)
  })
})

describe('findParetoOptimal', () => {
  it('drops entries another entry beats everywhere', () => {
    expect(findParetoOptimal([entryA, entryB, entryC])).toEqual([entryA, entryC])
  })
})

describe('generateRecommendations', () => {
  it('picks the best score and splits the rest', () => {
    const recommendations = generateRecommendations([entryA, entryB, entryC])

    expect(recommendations.goal).toBe('balanced')
    expect(recommendations.topPick?.taskId).toBe(1)
    expect(recommendations.alternatives.map((entry) => entry.taskId)).toEqual([3])
    expect(recommendations.avoid.map((entry) => entry.taskId)).toEqual([2])
  })

  it('has no pick without entries', () => {
    expect(generateRecommendations([], 'protect_capital')).toEqual({
      goal: 'protect_capital',
      alternatives: [],
      avoid: [],
    })
  })
})
