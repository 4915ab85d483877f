import type { ResultMetrics, RunEvent, RunEventType, TaskOutcome, TaskRequest, WorkerHandle } from '../types'

export type WorkerScript = (request: TaskRequest, call: number) => TaskOutcome | Promise<TaskOutcome>

export const succeed =
  (metrics: ResultMetrics = { pl: 100 }): WorkerScript =>
  () => ({ success: true, metrics })

export class FakeWorkerHandle implements WorkerHandle {
  started = false
  closed = false
  executed: number[] = []

  constructor(
    readonly workerId: number,
    private readonly factory: FakeWorkerFactory,
  ) {}

  async start(): Promise<void> {
    await this.factory.onStart?.(this)
    this.started = true
  }

  async executeTask(request: TaskRequest): Promise<TaskOutcome> {
    this.executed.push(request.taskId)
    return this.factory.run(request)
  }

  async close(): Promise<void> {
    this.closed = true
  }
}

/**
 * Records every handle and call, and flags a task running twice at once
 */
export class FakeWorkerFactory {
  readonly handles: FakeWorkerHandle[] = []
  readonly calls: TaskRequest[] = []
  readonly duplicateInFlight: number[] = []
  onStart?: (handle: FakeWorkerHandle) => void | Promise<void>
  private readonly active = new Set<number>()

  constructor(private readonly script: WorkerScript = succeed()) {}

  readonly create = (workerId: number): FakeWorkerHandle => {
    const handle = new FakeWorkerHandle(workerId, this)
    this.handles.push(handle)
    return handle
  }

  async run(request: TaskRequest): Promise<TaskOutcome> {
    if (this.active.has(request.taskId)) {
      this.duplicateInFlight.push(request.taskId)
    }
    this.active.add(request.taskId)
    this.calls.push(request)
    try {
      return await this.script(request, this.calls.length)
    } finally {
      this.active.delete(request.taskId)
    }
  }
}

export interface Deferred<T> {
  promise: Promise<T>
  resolve: (value: T) => void
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined
  const promise = new Promise<T>((res) => {
    resolve = res
  })
  return { promise, resolve }
}

/**
 * Collects run events and lets a test wait for one to arrive
 */
export class EventLog {
  readonly events: RunEvent[] = []
  private readonly waiters: Array<{ match: (event: RunEvent) => boolean; resolve: (event: RunEvent) => void }> = []

  readonly listener = (_runId: number, event: RunEvent): void => {
    this.events.push(event)
    for (const waiter of [...this.waiters]) {
      if (waiter.match(event)) {
        this.waiters.splice(this.waiters.indexOf(waiter), 1)
        waiter.resolve(event)
      }
    }
  }

  ofType<T extends RunEventType>(type: T): Array<Extract<RunEvent, { type: T }>> {
    return this.events.filter((event): event is Extract<RunEvent, { type: T }> => event.type === type)
  }

  types(): RunEventType[] {
    return this.events.map((event) => event.type)
  }

  waitFor(match: (event: RunEvent) => boolean): Promise<RunEvent> {
    const seen = this.events.find(match)
    if (seen) return Promise.resolve(seen)
    return new Promise((resolve) => this.waiters.push({ match, resolve }))
  }
}
