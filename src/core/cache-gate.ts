import { logger } from '../logger'
import type { RunStore } from '../store'
import type { PriorityTaskQueue, QueueItem } from './priority-task-queue'
import type { ProgressChannel } from './progress-channel'
import type { ResultRecord } from './types'

export interface CacheContext {
  targetId: number
  skipCache: boolean
}

export type CacheLookup = { hit: true; result: ResultRecord } | { hit: false }

/**
 * Satisfies a task from an earlier result for the same target and parameters.
 * A hit is recorded exactly like a worker success, without touching a worker.
 */
export class CacheGate {
  constructor(
    private readonly store: RunStore,
    private readonly queue: PriorityTaskQueue,
    private readonly channel: ProgressChannel,
  ) {}

  async lookup(item: QueueItem, context: CacheContext): Promise<CacheLookup> {
    if (context.skipCache) {
      return { hit: false }
    }

    let cached: ResultRecord | undefined
    try {
      cached = await this.store.findCachedResult(context.targetId, item.params)
    } catch (error) {
      logger.warn(`Cache lookup failed for task ${item.taskId}, running it instead:`, error)
      return { hit: false }
    }
    if (!cached) {
      return { hit: false }
    }

    const result = await this.store.completeTask(item.taskId, cached.metrics, cached.rawData)
    this.queue.markCompleted(item.taskId)
    logger.debug(`Task ${item.taskId} served from cached result ${cached.id}`)
    this.channel.publish({
      type: 'task_completed',
      taskId: item.taskId,
      params: item.params,
      result: result.metrics,
      cached: true,
    })
    return { hit: true, result }
  }
}
