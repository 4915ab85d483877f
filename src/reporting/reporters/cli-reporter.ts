import pc from 'picocolors'
import type { MetricKey, RunStatus } from '../../core/types'
import type { Recommendations, ScoredEntry } from '../recommendations'
import { formatParams, parameterNames, type ReportEntry, type RunReport } from '../run-report'

export interface CLIReporterOptions {
  showColors?: boolean
  showMetrics?: MetricKey[]
}

const METRIC_HEADERS: Record<MetricKey, string> = {
  pl: 'P/L',
  cagr: 'CAGR',
  maxDrawdown: 'Max DD',
  mar: 'MAR',
  winPercentage: 'Win %',
  totalPremium: 'Premium',
  captureRate: 'Capture',
  startingCapital: 'Start',
  endingCapital: 'End',
  totalTrades: 'Trades',
  winners: 'Winners',
  avgPerTrade: 'Avg/Trade',
  avgWinner: 'Avg Win',
  avgLoser: 'Avg Loss',
  maxWinner: 'Max Win',
  maxLoser: 'Max Loss',
  avgMinutesInTrade: 'Avg Min',
}

const CURRENCY_METRICS = new Set<MetricKey>([
  'pl',
  'totalPremium',
  'startingCapital',
  'endingCapital',
  'avgPerTrade',
  'avgWinner',
  'avgLoser',
  'maxWinner',
  'maxLoser',
])
const PERCENT_METRICS = new Set<MetricKey>(['cagr', 'maxDrawdown', 'winPercentage', 'captureRate'])

type Color = 'green' | 'red' | 'yellow' | 'blue'

/**
 * Renders a run report as a table of parameters and metrics, followed by a
 * summary, the failures and optional recommendations
 */
export class CLIReporter {
  private options: Required<CLIReporterOptions>

  constructor(options: CLIReporterOptions = {}) {
    this.options = {
      showColors: options.showColors ?? true,
      showMetrics: options.showMetrics ?? ['pl', 'cagr', 'maxDrawdown', 'winPercentage', 'mar'],
    }
  }

  generate(report: RunReport, recommendations?: Recommendations): string {
    const lines: string[] = []

    lines.push(this.formatHeader(report))
    lines.push('')

    if (report.entries.length > 0) {
      lines.push(this.formatTable(report.entries))
      lines.push('')
    }

    lines.push(this.formatSummary(report))

    if (recommendations?.topPick) {
      lines.push('')
      lines.push(this.formatRecommendations(recommendations))
    }

    return lines.join('\n')
  }

  print(report: RunReport, recommendations?: Recommendations): void {
    // eslint-disable-next-line no-console
    console.log(this.generate(report, recommendations))
  }

  private formatHeader(report: RunReport): string {
    const status = this.formatStatus(report.run.status)
    const target = report.target.name ?? report.target.url
    const duration = report.durationMs === undefined ? '' : ` (${(report.durationMs / 1000).toFixed(1)}s)`
    return `${status} Run #${report.run.id} (${report.run.mode}) on ${target}${duration}`
  }

  private formatStatus(status: RunStatus): string {
    switch (status) {
      case 'completed':
        return this.colorize('✓ COMPLETED', 'green')
      case 'failed':
        return this.colorize('✗ FAILED', 'red')
      default:
        return this.colorize(status.toUpperCase(), 'yellow')
    }
  }

  private formatTable(entries: ReportEntry[]): string {
    const params = parameterNames(entries)
    const headers = ['Task', ...params, ...this.options.showMetrics.map((metric) => METRIC_HEADERS[metric])]
    const rows = entries.map((entry) => [
      String(entry.taskId),
      ...params.map((name) => String(entry.params[name] ?? '-')),
      ...this.options.showMetrics.map((metric) => formatMetricValue(metric, entry.metrics[metric])),
    ])

    const widths = this.calculateColumnWidths(headers, rows)
    return [
      this.formatRow(headers, widths),
      this.formatSeparator(widths),
      ...rows.map((row) => this.formatRow(row, widths)),
    ].join('\n')
  }

  private calculateColumnWidths(headers: string[], rows: string[][]): number[] {
    const widths = headers.map((header) => header.length)
    for (const row of rows) {
      row.forEach((cell, index) => {
        widths[index] = Math.max(widths[index] ?? 0, this.stripColors(cell).length)
      })
    }
    return widths.map((width) => Math.max(width, 4))
  }

  private formatRow(cells: string[], widths: number[]): string {
    return cells
      .map((cell, index) => {
        const padding = (widths[index] ?? 0) - this.stripColors(cell).length
        return cell + ' '.repeat(Math.max(0, padding))
      })
      .join(' | ')
  }

  private formatSeparator(widths: number[]): string {
    return widths.map((width) => '-'.repeat(width)).join('-+-')
  }

  private formatSummary(report: RunReport): string {
    const { counts } = report
    const lines = [
      `Tasks: ${counts.total} total, ${counts.completed} completed, ${counts.failed} failed, ${counts.pending + counts.running} pending`,
    ]

    if (report.failures.length > 0) {
      lines.push('')
      lines.push(this.colorize('Failed Tasks:', 'red'))
      for (const failure of report.failures) {
        lines.push(`  • Task ${failure.taskId} [${failure.failureType}]: ${failure.errorMessage}`)
      }
    }

    return lines.join('\n')
  }

  private formatRecommendations(recommendations: Recommendations): string {
    const lines = [this.colorize(`Recommendations (goal: ${recommendations.goal})`, 'blue')]
    if (recommendations.topPick) {
      lines.push(`  Top pick: ${this.describe(recommendations.topPick)}`)
    }
    for (const entry of recommendations.alternatives) {
      lines.push(`  Alternative: ${this.describe(entry)}`)
    }
    for (const entry of recommendations.avoid) {
      lines.push(`  ${this.colorize('Avoid', 'yellow')}: ${this.describe(entry)}`)
    }
    return lines.join('\n')
  }

  private describe(entry: ScoredEntry): string {
    return `Task ${entry.taskId} (${formatParams(entry.params)}) score ${entry.score.toFixed(1)}`
  }

  private colorize(text: string, color: Color): string {
    if (!this.options.showColors) {
      return text
    }
    return pc[color](text)
  }

  private stripColors(text: string): string {
    // eslint-disable-next-line no-control-regex
    return text.replace(/\x1b\[[0-9;]*m/g, '')
  }
}

export function formatMetricValue(metric: MetricKey, value: number | undefined): string {
  if (value === undefined) return '-'

  if (CURRENCY_METRICS.has(metric)) {
    const amount = `$${Math.abs(Math.round(value)).toLocaleString('en-US')}`
    return value < 0 ? `-${amount}` : amount
  }
  if (PERCENT_METRICS.has(metric)) {
    return `${value.toFixed(1)}%`
  }
  if (metric === 'mar') {
    return value.toFixed(2)
  }
  return String(Math.round(value))
}
