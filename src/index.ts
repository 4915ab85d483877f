// Main programmatic API
export { createSweepRun, runSweep, resumeSweep } from './sweeprunner'
export type { SweepRunPlan, SweepResult } from './sweeprunner'
export type { CreateSweepRunRequest, ExecuteSweepOptions, RunSweepOptions } from './api'

// Engine
export * from './core'

// Persistence
export * from './store'

// Parameters
export * from './parameters'

// Browser workers
export {
  BrowserWorker,
  createBrowserWorkerFactory,
  launchChromeSession,
  CdpPageDriver,
  RateLimiter,
  type BrowserWorkerOptions,
  type BrowserSettings,
  type PageDriver,
  type Locator,
} from './browser'

// Reporting
export * from './reporting'

// CLI
export { createCli, runCli } from './cli/cli'

export { logger, setLogLevel, type LogLevel } from './logger'
