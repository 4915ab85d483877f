import type { RunStatus } from './types'

export { ConfigLoadError, ConfigValidationError } from './config/errors'

export class StoreError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause })
    this.name = 'StoreError'
  }
}

export class RunNotFoundError extends Error {
  constructor(public readonly runId: number) {
    super(`Run ${runId} not found`)
    this.name = 'RunNotFoundError'
  }
}

export class RunAlreadyActiveError extends Error {
  constructor(public readonly runId: number) {
    super(`Run ${runId} is already executing`)
    this.name = 'RunAlreadyActiveError'
  }
}

export class InvalidRunTransitionError extends Error {
  constructor(
    public readonly from: RunStatus,
    public readonly to: RunStatus,
  ) {
    super(`Invalid run transition: ${from} -> ${to}`)
    this.name = 'InvalidRunTransitionError'
  }
}

export class QueueInvariantError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'QueueInvariantError'
  }
}

// Raised after a run was finalized as failed because of an infrastructure error
export class RunExecutionError extends Error {
  constructor(
    public readonly runId: number,
    message: string,
    cause?: unknown,
  ) {
    super(message, { cause })
    this.name = 'RunExecutionError'
  }
}

export class UnknownParameterError extends Error {
  constructor(
    public readonly parameter: string,
    public readonly available: readonly string[],
  ) {
    super(`Unknown parameter "${parameter}". Available: ${available.join(', ')}`)
    this.name = 'UnknownParameterError'
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value))
}

export function errorMessage(value: unknown): string {
  return value instanceof Error ? value.message : String(value)
}
