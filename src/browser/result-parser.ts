import type { MetricKey, ResultMetrics } from '../core/types'
import { METRIC_KEYS } from '../core/types'

export type RawResults = Partial<Record<MetricKey, string>>

const PERCENTAGE_FIELDS = new Set<MetricKey>(['cagr', 'maxDrawdown', 'winPercentage', 'captureRate'])
const INTEGER_FIELDS = new Set<MetricKey>(['totalTrades', 'winners'])

function toNumber(text: string): number | undefined {
  if (text === '') return undefined
  const value = Number(text)
  return Number.isFinite(value) ? value : undefined
}

/**
 * Parses `$13,376` or `-$155` into a number
 */
export function parseCurrency(value: string): number | undefined {
  return toNumber(value.trim().replace(/[,$]/g, ''))
}

/**
 * Parses `68.2%` into 68.2
 */
export function parsePercentage(value: string): number | undefined {
  return toNumber(value.replace('%', '').replace(/,/g, '').trim())
}

/**
 * Parses any summary value: currency, percentage or plain number. A unit
 * suffix after a slash (`$21 / lot`) is dropped.
 */
export function parseResultValue(value: string): number | undefined {
  const head = value.includes('/') ? (value.split('/')[0] ?? '') : value
  if (head.includes('$')) return parseCurrency(head)
  if (head.includes('%')) return parsePercentage(head)
  return toNumber(head.replace(/,/g, '').trim())
}

/**
 * Turns the texts read off the results page into metrics. Fields that are
 * missing or do not parse are left out.
 */
export function parseResults(raw: RawResults): ResultMetrics {
  const metrics: ResultMetrics = {}
  for (const key of METRIC_KEYS) {
    const text = raw[key]
    if (text === undefined) continue

    let value = PERCENTAGE_FIELDS.has(key) ? parsePercentage(text) : parseResultValue(text)
    if (value !== undefined && INTEGER_FIELDS.has(key)) {
      value = Math.trunc(value)
    }
    if (value !== undefined) {
      metrics[key] = value
    }
  }
  return metrics
}
