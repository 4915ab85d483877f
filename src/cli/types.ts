/**
 * CLI command definitions and interfaces
 */

export interface BaseArgs {
  config?: string
  verbose?: boolean
  quiet?: boolean
}

export interface PrintConfigArgs extends BaseArgs {
  format?: string
}

export interface RunArgs extends BaseArgs {
  url?: string
  workers?: number
  skipCache?: boolean
  headless?: boolean
}

export interface RunIdArgs extends BaseArgs {
  runId: number
}

export interface ReportArgs extends RunIdArgs {
  format?: string
  goal?: string
  output?: string
}
