import type { Goal, MetricKey } from '../core/types'
import type { ReportEntry } from './run-report'

type Weights = ReadonlyArray<readonly [MetricKey, number]>

export const GOAL_WEIGHTS: Record<Goal, Weights> = {
  balanced: [
    ['mar', 0.3],
    ['cagr', 0.25],
    ['winPercentage', 0.2],
    ['captureRate', 0.15],
    ['maxDrawdown', 0.1],
  ],
  maximize_returns: [
    ['cagr', 0.4],
    ['mar', 0.2],
    ['winPercentage', 0.15],
    ['captureRate', 0.15],
    ['maxDrawdown', 0.1],
  ],
  protect_capital: [
    ['maxDrawdown', 0.3],
    ['winPercentage', 0.25],
    ['mar', 0.2],
    ['cagr', 0.15],
    ['captureRate', 0.1],
  ],
}

const MAXIMIZE: readonly MetricKey[] = ['cagr', 'mar', 'winPercentage', 'captureRate']
const MINIMIZE: readonly MetricKey[] = ['maxDrawdown']

export interface ScoredEntry extends ReportEntry {
  // 0 to 100
  score: number
}

export interface Recommendations {
  goal: Goal
  topPick?: ScoredEntry
  // Other Pareto-optimal entries, best first
  alternatives: ScoredEntry[]
  // Dominated entries, worst first
  avoid: ScoredEntry[]
}

/**
 * Min-max normalizes to [0, 1]; 0.5 for every value when they are all equal
 */
export function normalizeValues(values: readonly number[]): number[] {
  if (values.length === 0) return []
  const min = Math.min(...values)
  const max = Math.max(...values)
  if (min === max) return values.map(() => 0.5)
  return values.map((value) => (value - min) / (max - min))
}

/**
 * Weighted score per entry. Drawdown is inverted so lower is better; an
 * entry missing a metric gets nothing for it.
 */
export function scoreEntries(entries: readonly ReportEntry[], goal: Goal = 'balanced'): number[] {
  const scores = entries.map(() => 0)

  for (const [metric, weight] of GOAL_WEIGHTS[goal]) {
    const present: Array<{ index: number; value: number }> = []
    entries.forEach((entry, index) => {
      const value = entry.metrics[metric]
      if (value !== undefined) present.push({ index, value })
    })

    const normalized = normalizeValues(present.map(({ value }) => value))
    present.forEach(({ index }, i) => {
      const value = normalized[i] ?? 0
      scores[index] = (scores[index] ?? 0) + (MINIMIZE.includes(metric) ? 1 - value : value) * weight
    })
  }
  return scores.map((score) => score * 100)
}

function dominates(a: ReportEntry, b: ReportEntry): boolean {
  let strictlyBetter = false
  for (const metric of MAXIMIZE) {
    const av = a.metrics[metric] ?? -Infinity
    const bv = b.metrics[metric] ?? -Infinity
    if (av < bv) return false
    if (av > bv) strictlyBetter = true
  }
  for (const metric of MINIMIZE) {
    const av = a.metrics[metric] ?? Infinity
    const bv = b.metrics[metric] ?? Infinity
    if (av > bv) return false
    if (av < bv) strictlyBetter = true
  }
  return strictlyBetter
}

/**
 * Entries no other entry beats on every metric at once
 */
export function findParetoOptimal<T extends ReportEntry>(entries: readonly T[]): T[] {
  return entries.filter((candidate) => !entries.some((other) => other !== candidate && dominates(other, candidate)))
}

export function generateRecommendations(entries: readonly ReportEntry[], goal: Goal = 'balanced'): Recommendations {
  if (entries.length === 0) {
    return { goal, alternatives: [], avoid: [] }
  }

  const scores = scoreEntries(entries, goal)
  const scored: ScoredEntry[] = entries.map((entry, index) => ({ ...entry, score: scores[index] ?? 0 }))
  const pareto = new Set(findParetoOptimal(scored))
  const ranked = [...scored].sort((a, b) => b.score - a.score)
  const [topPick] = ranked

  return {
    goal,
    topPick,
    alternatives: ranked.filter((entry) => entry !== topPick && pareto.has(entry)).slice(0, 5),
    avoid: ranked
      .filter((entry) => !pareto.has(entry))
      .slice(-3)
      .reverse(),
  }
}
