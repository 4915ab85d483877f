export { CLIReporter, formatMetricValue, type CLIReporterOptions } from './cli-reporter'
export { JSONReporter, type JSONReporterOptions, type JSONReport } from './json-reporter'
