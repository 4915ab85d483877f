import { z } from 'zod'

// Metrics read off a finished backtest; every field is optional because the
// target page does not always render all of them.
export const ResultMetricsSchema = z.object({
  pl: z.number().optional(),
  cagr: z.number().optional(),
  maxDrawdown: z.number().optional(),
  mar: z.number().optional(),
  winPercentage: z.number().optional(),
  totalPremium: z.number().optional(),
  captureRate: z.number().optional(),
  startingCapital: z.number().optional(),
  endingCapital: z.number().optional(),
  totalTrades: z.number().int().optional(),
  winners: z.number().int().optional(),
  avgPerTrade: z.number().optional(),
  avgWinner: z.number().optional(),
  avgLoser: z.number().optional(),
  maxWinner: z.number().optional(),
  maxLoser: z.number().optional(),
  avgMinutesInTrade: z.number().optional(),
})

export type ResultMetrics = z.infer<typeof ResultMetricsSchema>

export type MetricKey = keyof ResultMetrics

export const METRIC_KEYS = [
  'pl',
  'cagr',
  'maxDrawdown',
  'mar',
  'winPercentage',
  'totalPremium',
  'captureRate',
  'startingCapital',
  'endingCapital',
  'totalTrades',
  'winners',
  'avgPerTrade',
  'avgWinner',
  'avgLoser',
  'maxWinner',
  'maxLoser',
  'avgMinutesInTrade',
] as const satisfies readonly MetricKey[]

/**
 * Copies only the known metric fields, dropping undefined entries
 */
export function pickMetrics(source: ResultMetrics): ResultMetrics {
  const metrics: ResultMetrics = {}
  for (const key of METRIC_KEYS) {
    const value = source[key]
    if (value !== undefined) {
      metrics[key] = value
    }
  }
  return metrics
}
