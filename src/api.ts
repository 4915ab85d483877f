/**
 * Basic usage:
 * ```ts
 * import { runSweep } from 'sweeprunner'
 *
 * const { outcome, report } = await runSweep({
 *   config: {
 *     target: { url: 'https://app.example.com/test/abc' },
 *     sweep: { mode: 'sweep', parameter: 'delta', values: [5, 10, 15] },
 *     workers: 2,
 *   },
 *   credentials: { email: 'user@example.com', password: 'test-secret' },
 * })
 * ```
 */

import type { Credentials, RunConfigInput, RunUpdateListener, SweepConfigInput, WorkerFactory } from './core/types'
import type { RunStore } from './store'

export interface CreateSweepRunRequest {
  /** Page the backtests run on */
  url: string

  /** Display name stored with the target */
  name?: string

  /** Run configuration; validated before anything is written */
  config: RunConfigInput
}

export interface ExecuteSweepOptions {
  /** Engine and browser settings (defaults fill the gaps) */
  config?: SweepConfigInput

  /** Login for the target site */
  credentials: Credentials

  /** Store to use; by default the SQLite database at `config.database.path` is opened and closed again */
  store?: RunStore

  /** Worker handles to delegate to (default: headless Chrome workers) */
  workerFactory?: WorkerFactory

  /** Receives every run event */
  onUpdate?: RunUpdateListener

  /** Aborting stops the run gracefully; it ends as failed when tasks remain */
  signal?: AbortSignal
}

export interface RunSweepOptions extends ExecuteSweepOptions {
  /** Must carry `target` and `sweep` */
  config: SweepConfigInput
}
