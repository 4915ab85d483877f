import { logger } from '../logger'
import type { TaskOutcome, TaskRequest, WorkerFactory, WorkerHandle } from './types'

export type Delegation = { kind: 'outcome'; outcome: TaskOutcome } | { kind: 'abandoned' }

/**
 * One position in the worker pool. Owns the current handle, the activity
 * timestamp the watchdog reads and the consecutive-failure counter.
 */
export class WorkerSlot {
  consecutiveFailures = 0
  private handle?: WorkerHandle
  private lastActivity: number
  private inFlight?: AbortController

  constructor(
    readonly workerId: number,
    private readonly factory: WorkerFactory,
    private readonly clock: () => number = Date.now,
  ) {
    this.lastActivity = clock()
  }

  get lastActivityAt(): number {
    return this.lastActivity
  }

  get busy(): boolean {
    return this.inFlight !== undefined
  }

  touch(): void {
    this.lastActivity = this.clock()
  }

  /**
   * Runs the request on this slot's handle, creating and starting one first
   * when needed. Resolves `abandoned` when the slot is restarted meanwhile;
   * the old handle's eventual result is discarded.
   */
  async delegate(request: TaskRequest): Promise<Delegation> {
    const controller = new AbortController()
    this.inFlight = controller

    const abandoned = new Promise<Delegation>((resolve) => {
      controller.signal.addEventListener('abort', () => resolve({ kind: 'abandoned' }), { once: true })
    })
    const work = this.run(request)

    try {
      return await Promise.race([work, abandoned])
    } finally {
      if (controller.signal.aborted) {
        void work.catch((error: unknown) => {
          logger.debug(`Worker ${this.workerId}: abandoned task ${request.taskId} settled with an error:`, error)
        })
      }
      if (this.inFlight === controller) {
        this.inFlight = undefined
      }
    }
  }

  /**
   * Discards the current handle. Any delegation in progress is abandoned.
   */
  async restart(): Promise<void> {
    this.inFlight?.abort()
    this.inFlight = undefined
    this.consecutiveFailures = 0
    this.touch()
    await this.release()
  }

  async release(): Promise<void> {
    const handle = this.handle
    this.handle = undefined
    if (!handle) return

    try {
      await handle.close()
    } catch (error) {
      logger.warn(`Worker ${this.workerId}: failed to close handle:`, error)
    }
  }

  private async run(request: TaskRequest): Promise<Delegation> {
    const handle = await this.acquire()
    const outcome = await handle.executeTask(request)
    return { kind: 'outcome', outcome }
  }

  private async acquire(): Promise<WorkerHandle> {
    if (this.handle) return this.handle

    const handle = this.factory(this.workerId)
    this.handle = handle
    try {
      await handle.start()
    } catch (error) {
      if (this.handle === handle) this.handle = undefined
      await handle.close().catch((closeError: unknown) => {
        logger.debug(`Worker ${this.workerId}: close after failed start also failed:`, closeError)
      })
      throw error
    }
    return handle
  }
}
