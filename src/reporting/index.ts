export { buildRunReport, parameterNames, formatParams, type RunReport, type ReportEntry } from './run-report'
export {
  generateRecommendations,
  findParetoOptimal,
  normalizeValues,
  scoreEntries,
  GOAL_WEIGHTS,
  type Recommendations,
  type ScoredEntry,
} from './recommendations'
export {
  CLIReporter,
  formatMetricValue,
  type CLIReporterOptions,
  JSONReporter,
  type JSONReporterOptions,
  type JSONReport,
} from './reporters'
