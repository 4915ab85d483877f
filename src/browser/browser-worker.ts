import { logger } from '../logger'
import { errorMessage } from '../core/errors'
import type {
  FailureType,
  ParameterValue,
  SweepConfig,
  TaskOutcome,
  TaskRequest,
  WorkerFactory,
  WorkerHandle,
} from '../core/types'
import { getParameter, type ParameterHandler } from '../parameters'
import {
  captureFailureArtifacts,
  extractResults,
  login,
  navigateToTarget,
  openNewBacktestModal,
  runBacktest,
  type ActionTimings,
} from './actions'
import { launchChromeSession, type ChromeSession, type ChromeSessionOptions } from './chrome-session'
import type { PageDriver } from './page-driver'
import { RateLimiter, type Throttle } from './rate-limiter'
import { parseResults } from './result-parser'

export interface BrowserWorkerOptions {
  headless: boolean
  timeoutMs: number
  runTimeoutMs: number
  // Pause after each parameter is applied
  baseDelayMs: number
  settleMs?: number
  chromeFlags?: string[]
  // Defaults to the origin of the target URL
  loginUrl?: string
  rateLimiter?: Throttle
  openSession?: (options: ChromeSessionOptions) => Promise<ChromeSession>
}

interface PreparedParameter {
  handler: ParameterHandler
  value: ParameterValue
  config: unknown
}

type Failure = Extract<TaskOutcome, { success: false }>

/**
 * Drives one Chrome instance through login, the new-backtest dialog and the
 * results page. Interaction problems come back as failed outcomes; only a
 * broken session throws.
 */
export class BrowserWorker implements WorkerHandle {
  private session?: ChromeSession
  private loggedIn = false
  private currentUrl?: string
  private readonly timings: ActionTimings

  constructor(
    readonly workerId: number,
    private readonly options: BrowserWorkerOptions,
  ) {
    this.timings = {
      timeoutMs: options.timeoutMs,
      runTimeoutMs: options.runTimeoutMs,
      settleMs: options.settleMs ?? 2000,
    }
  }

  async start(): Promise<void> {
    if (this.session) return

    const open = this.options.openSession ?? launchChromeSession
    this.session = await open({ headless: this.options.headless, chromeFlags: this.options.chromeFlags })
    logger.debug(`[Worker ${this.workerId}] Browser ready (port: ${this.session.port})`)
  }

  async executeTask(request: TaskRequest): Promise<TaskOutcome> {
    if (!this.session) {
      throw new Error(`Worker ${this.workerId} is not started`)
    }
    const page = this.session.driver

    await this.options.rateLimiter?.acquire()
    logger.debug(`[Worker ${this.workerId}] Starting task ${request.taskId}: ${JSON.stringify(request.params)}`)

    try {
      const outcome = await this.runTask(page, request)
      if (!outcome.success) {
        // a half-filled dialog may be left open
        this.currentUrl = undefined
      }
      return outcome
    } catch (error) {
      this.currentUrl = undefined
      await captureFailureArtifacts(page, request.artifactsDir, request.taskId)
      throw error
    }
  }

  async close(): Promise<void> {
    const session = this.session
    this.session = undefined
    this.loggedIn = false
    this.currentUrl = undefined
    await session?.close()
  }

  private async runTask(page: PageDriver, request: TaskRequest): Promise<TaskOutcome> {
    const prepared = prepareParameters(request)
    if (!Array.isArray(prepared)) return prepared

    if (!(await this.ensureLoggedIn(page, request))) {
      return failure('session', 'Failed to log in')
    }
    if (!(await this.ensureOnTarget(page, request.target.url))) {
      return failure('timing', 'Failed to navigate to target')
    }
    if (!(await openNewBacktestModal(page, this.timings))) {
      return this.failWithArtifacts(page, request, 'modal', 'Failed to open backtest dialog')
    }

    for (const { handler, value, config } of prepared) {
      logger.debug(`[Worker ${this.workerId}] Setting ${handler.name}=${value}`)
      if (!(await handler.applyToTarget(page, value, config))) {
        return this.failWithArtifacts(page, request, 'timing', `Failed to set ${handler.name}`)
      }
      await page.pause(this.options.baseDelayMs)
    }

    if (!(await runBacktest(page, this.timings))) {
      return this.failWithArtifacts(page, request, 'timing', 'Backtest timed out')
    }

    const raw = await extractResults(page)
    const metrics = parseResults(raw)
    if (Object.keys(metrics).length === 0) {
      return this.failWithArtifacts(page, request, 'timing', 'Results page showed no metrics')
    }
    logger.debug(`[Worker ${this.workerId}] Task ${request.taskId} completed`)
    return { success: true, metrics, rawData: { raw } }
  }

  private async ensureLoggedIn(page: PageDriver, request: TaskRequest): Promise<boolean> {
    if (this.loggedIn) return true

    const loginUrl = this.options.loginUrl ?? `${new URL(request.target.url).origin}/`
    const { email, password } = request.credentials
    this.loggedIn = await login(page, loginUrl, email, password, this.timings)
    this.currentUrl = undefined
    return this.loggedIn
  }

  private async ensureOnTarget(page: PageDriver, url: string): Promise<boolean> {
    if (this.currentUrl === url) return true

    const arrived = await navigateToTarget(page, url, this.timings)
    if (arrived) this.currentUrl = url
    return arrived
  }

  private async failWithArtifacts(
    page: PageDriver,
    request: TaskRequest,
    failureType: FailureType,
    message: string,
  ): Promise<Failure> {
    const artifacts = await captureFailureArtifacts(page, request.artifactsDir, request.taskId)
    return { ...failure(failureType, message), artifacts }
  }
}

function failure(failureType: FailureType, message: string): Failure {
  return { success: false, failureType, message }
}

// Unknown parameters and invalid values or configs never succeed on retry
function prepareParameters(request: TaskRequest): PreparedParameter[] | Failure {
  try {
    return Object.entries(request.params).map(([name, value]) => {
      const handler = getParameter(name)
      const config = request.parameterConfigs[name]
      handler.configSchema.parse(config ?? {})
      return { handler, value: handler.parseValue(value), config }
    })
  } catch (error) {
    return failure('permanent', `Invalid parameters: ${errorMessage(error)}`)
  }
}

export type BrowserSettings = Pick<
  SweepConfig,
  'headless' | 'timeoutMs' | 'runTimeoutMs' | 'baseDelayMs' | 'minRequestDelayMs'
>

/**
 * Creates browser workers that share one rate limiter
 */
export function createBrowserWorkerFactory(
  settings: BrowserSettings,
  overrides: Partial<BrowserWorkerOptions> = {},
): WorkerFactory {
  const rateLimiter = overrides.rateLimiter ?? new RateLimiter(settings.minRequestDelayMs)
  return (workerId) =>
    new BrowserWorker(workerId, {
      headless: settings.headless,
      timeoutMs: settings.timeoutMs,
      runTimeoutMs: settings.runTimeoutMs,
      baseDelayMs: settings.baseDelayMs,
      ...overrides,
      rateLimiter,
    })
}
