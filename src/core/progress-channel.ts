import { logger } from '../logger'
import type { QueueStats, RunEvent, RunEventPayload, RunUpdateListener } from './types'

/**
 * Fans run events out to subscribers. A listener that throws or rejects is
 * logged and skipped; it never reaches the engine.
 */
export class ProgressChannel {
  private readonly listeners = new Set<RunUpdateListener>()

  constructor(
    private readonly runId: number,
    private readonly now: () => Date = () => new Date(),
  ) {}

  subscribe(listener: RunUpdateListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  publish(payload: RunEventPayload): RunEvent {
    const event: RunEvent = { ...payload, runId: this.runId, timestamp: this.now().toISOString() }

    for (const listener of this.listeners) {
      try {
        const pending = listener(this.runId, event)
        if (pending instanceof Promise) {
          void pending.catch((error: unknown) => this.reportListenerError(event, error))
        }
      } catch (error) {
        this.reportListenerError(event, error)
      }
    }
    return event
  }

  /**
   * Publishes `progress` every `intervalMs` until the returned function is called
   */
  startTicker(intervalMs: number, stats: () => QueueStats): () => void {
    const timer = setInterval(() => {
      this.publish({ type: 'progress', stats: stats() })
    }, intervalMs)
    timer.unref()
    return () => clearInterval(timer)
  }

  private reportListenerError(event: RunEvent, error: unknown): void {
    logger.warn(`Run ${this.runId}: listener failed on ${event.type}:`, error)
  }
}
