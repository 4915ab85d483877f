import { QueueInvariantError } from './errors'
import type { ParameterValues, QueueStats } from './types'
import { MinHeap } from './utils/min-heap'

export interface QueueItem {
  taskId: number
  params: ParameterValues
  attempts: number
}

interface Entry<T> {
  item: T
  priority: number
  seq: number
}

interface Waiter<T> {
  resolve: (item: T | undefined) => void
  timer?: NodeJS.Timeout
}

/**
 * Min-priority work queue shared by the worker loops of one run.
 *
 * Items come out by priority, then insertion order. Every mutation happens in
 * one synchronous step of the event loop and an item handed to a waiter is
 * removed before any other caller can see it, so a task id is never in flight
 * twice.
 */
export class PriorityTaskQueue<T extends QueueItem = QueueItem> {
  private readonly heap = new MinHeap<Entry<T>>((a, b) => a.priority - b.priority || a.seq - b.seq)
  private readonly pendingIds = new Set<number>()
  private readonly inFlight = new Set<number>()
  private readonly waiters: Waiter<T>[] = []
  private seq = 0
  private completed = 0
  private failed = 0
  private closed = false

  put(item: T, priority: number): void {
    if (this.inFlight.has(item.taskId)) {
      throw new QueueInvariantError(`Task ${item.taskId} is already in flight`)
    }
    if (this.pendingIds.has(item.taskId)) {
      throw new QueueInvariantError(`Task ${item.taskId} is already queued`)
    }

    this.heap.push({ item, priority, seq: this.seq++ })
    this.pendingIds.add(item.taskId)
    this.dispatch()
  }

  /**
   * Takes the next item, waiting at most `timeoutMs`. Resolves `undefined`
   * when nothing arrived in time or the queue was closed.
   */
  get(timeoutMs: number): Promise<T | undefined> {
    if (this.closed) {
      return Promise.resolve(undefined)
    }

    const item = this.take()
    if (item !== undefined) {
      return Promise.resolve(item)
    }

    return new Promise((resolve) => {
      const waiter: Waiter<T> = { resolve }
      waiter.timer = setTimeout(() => {
        const index = this.waiters.indexOf(waiter)
        if (index !== -1) this.waiters.splice(index, 1)
        resolve(undefined)
      }, timeoutMs)
      this.waiters.push(waiter)
    })
  }

  requeue(item: T, priority: number): void {
    if (!this.inFlight.delete(item.taskId)) {
      throw new QueueInvariantError(`Task ${item.taskId} is not in flight`)
    }
    this.put(item, priority)
  }

  markCompleted(taskId: number): void {
    this.settle(taskId)
    this.completed++
  }

  markFailed(taskId: number): void {
    this.settle(taskId)
    this.failed++
  }

  isInFlight(taskId: number): boolean {
    return this.inFlight.has(taskId)
  }

  stats(): QueueStats {
    return {
      pending: this.heap.size,
      inProgress: this.inFlight.size,
      completed: this.completed,
      failed: this.failed,
    }
  }

  isEmpty(): boolean {
    return this.heap.size === 0
  }

  // Nothing pending and nothing in flight
  isDrained(): boolean {
    return this.heap.size === 0 && this.inFlight.size === 0
  }

  /**
   * Drops every pending item and wakes the waiters
   */
  clear(): void {
    for (const entry of this.heap.clear()) {
      this.pendingIds.delete(entry.item.taskId)
    }
    this.wakeAll()
  }

  /**
   * Wakes every waiter with `undefined`; later `get` calls return at once.
   * Items can still be put back so nothing in flight is lost.
   */
  close(): void {
    this.closed = true
    this.wakeAll()
  }

  private settle(taskId: number): void {
    if (!this.inFlight.delete(taskId)) {
      throw new QueueInvariantError(`Task ${taskId} is not in flight`)
    }
  }

  private take(): T | undefined {
    const entry = this.heap.pop()
    if (!entry) return undefined

    this.pendingIds.delete(entry.item.taskId)
    this.inFlight.add(entry.item.taskId)
    return entry.item
  }

  private dispatch(): void {
    while (this.waiters.length > 0 && this.heap.size > 0) {
      const waiter = this.waiters.shift()
      const item = this.take()
      if (!waiter || item === undefined) return
      clearTimeout(waiter.timer)
      waiter.resolve(item)
    }
  }

  private wakeAll(): void {
    for (const waiter of this.waiters.splice(0, this.waiters.length)) {
      clearTimeout(waiter.timer)
      waiter.resolve(undefined)
    }
  }
}
